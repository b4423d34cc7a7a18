import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { defaultConfig, type GateConfig } from "../src/config.js";

export async function makeTempDir(prefix = "shadowgate-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeFile(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
}

export async function readFile(filePath: string): Promise<string> {
  return fs.readFile(filePath, "utf8");
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.lstat(filePath);
    return true;
  } catch {
    return false;
  }
}

/** Creates a throwaway repository with the given files and runs `fn` against it. */
export async function withRepo(files: Record<string, string>, fn: (root: string) => Promise<void>): Promise<void> {
  const root = await makeTempDir();
  try {
    for (const [relPath, content] of Object.entries(files)) {
      await writeFile(path.join(root, relPath), content);
    }
    await fn(root);
  } finally {
    await fs.rm(root, { recursive: true, force: true });
  }
}

/** Defaults with clipboard copying off, so tests never reach a system tool. */
export function testConfig(overrides: (config: GateConfig) => void = () => undefined): GateConfig {
  const config = defaultConfig();
  config.preferences.autoCopy = false;
  overrides(config);
  return config;
}
