import path from "node:path";
import { z } from "zod";
import { GateError, errorMessage } from "./errors.js";
import { readTextIfExists } from "./utils/fs.js";

export const TOOL_NAME = "shadowgate";
export const CONFIG_FILE_NAME = "shadowgate.json";

const PreferencesSchema = z
  .object({
    requirePlan: z.boolean().default(false),
    autoCopy: z.boolean().default(true),
    resetStageAfterPromote: z.boolean().default(false),
    advisoryThreshold: z.number().int().nonnegative().default(3),
    summaryLines: z.number().int().positive().default(30)
  })
  .default({});

const GitSchema = z
  .object({
    autoCommit: z.boolean().default(false),
    autoPush: z.boolean().default(true)
  })
  .default({});

const PathsSchema = z
  .object({
    protected: z.array(z.string()).default([]),
    allowHidden: z.array(z.string()).default([])
  })
  .default({});

const CommandsSchema = z
  .object({
    check: z.array(z.string()).default([])
  })
  .default({});

export const ConfigSchema = z.object({
  commands: CommandsSchema,
  preferences: PreferencesSchema,
  git: GitSchema,
  paths: PathsSchema
});

export type GateConfig = z.infer<typeof ConfigSchema>;

export function defaultConfig(): GateConfig {
  return ConfigSchema.parse({});
}

export function parseConfig(raw: unknown): GateConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new GateError(`Invalid ${CONFIG_FILE_NAME}: ${details}`, "input");
  }
  return result.data;
}

export async function loadConfig(repoRoot: string): Promise<GateConfig> {
  const configPath = path.join(repoRoot, CONFIG_FILE_NAME);
  const raw = await readTextIfExists(configPath);
  if (raw === null) {
    return defaultConfig();
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new GateError(`${CONFIG_FILE_NAME} is not valid JSON: ${errorMessage(err)}`, "input");
  }
  return parseConfig(parsed);
}
