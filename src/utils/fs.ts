import fs from "node:fs/promises";
import path from "node:path";
import { createReadStream, createWriteStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import { randomUUID } from "node:crypto";
import fg from "fast-glob";
import { isInside, toPosixPath } from "./paths.js";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
}

async function lstatExists(targetPath: string): Promise<boolean> {
  try {
    await fs.lstat(targetPath);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(targetPath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(targetPath);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, "utf8");
  return JSON.parse(raw);
}

export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  const payload = `${JSON.stringify(data, null, 2)}\n`;
  await writeFileAtomic(filePath, payload);
}

/** Reads a UTF-8 file, or returns null when it does not exist. */
export async function readTextIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isNotFound(err)) {
      return null;
    }
    throw err;
  }
}

export function isNotFound(err: unknown): boolean {
  return hasErrorCode(err, "ENOENT");
}

export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

async function modeOf(filePath: string): Promise<number | null> {
  try {
    return (await fs.stat(filePath)).mode;
  } catch (err) {
    if (isNotFound(err)) {
      return null;
    }
    throw err;
  }
}

/**
 * Writes through a temp sibling and renames it over the target. An existing
 * target keeps its permission bits.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tempPath = path.join(path.dirname(filePath), `.shadowgate-tmp-${randomUUID()}-${path.basename(filePath)}`);
  await fs.writeFile(tempPath, content, "utf8");
  try {
    const mode = await modeOf(filePath);
    if (mode !== null) {
      await fs.chmod(tempPath, mode & 0o7777);
    }
    await fs.rename(tempPath, filePath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
}

export interface WalkResult {
  files: string[];
  symlinks: string[];
}

/**
 * Lists regular files under rootDir as sorted posix relative paths. Symlinks
 * are reported separately and never followed.
 */
export async function walkFiles(rootDir: string, ignore: string[] = []): Promise<WalkResult> {
  const entries = await fg("**/*", {
    cwd: rootDir,
    dot: true,
    onlyFiles: false,
    followSymbolicLinks: false,
    ignore,
    unique: true
  });
  const files: string[] = [];
  const symlinks: string[] = [];
  for (const entry of entries) {
    const relPath = toPosixPath(entry);
    const stat = await fs.lstat(path.join(rootDir, relPath));
    if (stat.isSymbolicLink()) {
      symlinks.push(relPath);
    } else if (stat.isFile()) {
      files.push(relPath);
    }
  }
  files.sort();
  symlinks.sort();
  return { files, symlinks };
}

/** Streams srcPath to destPath and carries over its permission bits. */
export async function copyFileStream(srcPath: string, destPath: string): Promise<void> {
  await ensureDir(path.dirname(destPath));
  const { mode } = await fs.stat(srcPath);
  await pipeline(createReadStream(srcPath), createWriteStream(destPath));
  await fs.chmod(destPath, mode & 0o7777);
}

export async function removeDir(targetPath: string): Promise<void> {
  await fs.rm(targetPath, { recursive: true, force: true });
}

/**
 * Throws when targetPath, or any existing ancestor of it, resolves through a
 * symlink to a location outside rootDir.
 */
export async function assertNoSymlinkEscape(rootDir: string, targetPath: string): Promise<void> {
  const realRoot = await fs.realpath(rootDir);
  let probe = path.resolve(targetPath);
  while (!(await lstatExists(probe))) {
    const parent = path.dirname(probe);
    if (parent === probe) {
      return;
    }
    probe = parent;
  }
  let resolved: string;
  try {
    resolved = await fs.realpath(probe);
  } catch {
    throw new Error(`Symlink escape blocked: ${targetPath} goes through a dangling link`);
  }
  if (!isInside(realRoot, resolved)) {
    throw new Error(`Symlink escape blocked: ${targetPath} resolves outside ${rootDir}`);
  }
}
