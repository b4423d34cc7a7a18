import fs from "node:fs/promises";
import path from "node:path";
import { GateError, PromoteError, errorMessage } from "../errors.js";
import type { EventLog } from "../events.js";
import {
  assertNoSymlinkEscape,
  copyFileStream,
  ensureDir,
  hasErrorCode,
  isNotFound,
  pathExists,
  writeJsonFile
} from "../utils/fs.js";
import { hashFile } from "../utils/hash.js";
import { silentLogger, type Logger } from "../utils/log.js";
import { isInside, safeJoin } from "../utils/paths.js";
import { validatePath, type PathPolicy } from "../validate/path.js";
import type { Stage } from "./manager.js";
import { shouldPreserve } from "./preserve.js";
import { nowSeconds, type TouchedPath } from "./state.js";

export const DELETED_MANIFEST = "_deleted.json";

/** Workspace mutations made by a promotion. Tests swap these to inject failures. */
export interface PromoteIO {
  copyFile(srcPath: string, destPath: string): Promise<void>;
  removeFile(targetPath: string): Promise<void>;
}

export const defaultPromoteIO: PromoteIO = {
  copyFile: copyFileStream,
  removeFile: (targetPath) => fs.rm(targetPath, { force: true })
};

export interface PromoteOptions {
  policy?: PathPolicy;
  events?: EventLog;
  logger?: Logger;
  io?: PromoteIO;
}

export interface PromoteResult {
  written: string[];
  deleted: string[];
  backupDir: string;
}

interface PlannedTouch {
  touch: TouchedPath;
  source: string;
  target: string;
}

interface BackupSet {
  dir: string;
  /** Touched paths that did not exist in the workspace before promotion. */
  absent: Set<string>;
  /** Workspace directories the writes will have to create. */
  createdDirs: Set<string>;
}

async function planTouches(stage: Stage, policy: PathPolicy): Promise<PlannedTouch[]> {
  const planned: PlannedTouch[] = [];
  for (const touch of stage.state.touched) {
    const verdict = validatePath(touch.path, policy);
    if (!verdict.ok) {
      throw new GateError(`Promotion refused for ${touch.path}: ${verdict.reason}`, verdict.kind);
    }
    if (verdict.path !== touch.path || shouldPreserve(touch.path)) {
      throw new GateError(`Promotion refused for ${touch.path}: not a canonical, promotable path`, "path_rejected");
    }
    const target = safeJoin(stage.repoRoot, touch.path);
    try {
      await assertNoSymlinkEscape(stage.repoRoot, target);
    } catch (err) {
      throw new GateError(errorMessage(err), "path_rejected");
    }
    planned.push({ touch, source: safeJoin(stage.paths.worktree, touch.path), target });
  }
  return planned;
}

async function createBackupDir(backupsDir: string): Promise<string> {
  const base = String(nowSeconds());
  let candidate = path.join(backupsDir, base);
  for (let n = 1; await pathExists(candidate); n++) {
    candidate = path.join(backupsDir, `${base}-${n}`);
  }
  await ensureDir(candidate);
  return candidate;
}

async function takeBackup(stage: Stage, planned: PlannedTouch[]): Promise<BackupSet> {
  const dir = await createBackupDir(stage.paths.backupsDir);
  const absent = new Set<string>();
  for (const { touch, target } of planned) {
    try {
      const stat = await fs.lstat(target);
      if (!stat.isFile()) {
        throw new GateError(`Cannot promote ${touch.path}: the workspace entry is not a regular file`, "promote");
      }
      await copyFileStream(target, safeJoin(dir, touch.path));
    } catch (err) {
      if (!isNotFound(err)) {
        throw err;
      }
      absent.add(touch.path);
    }
  }
  await writeJsonFile(path.join(dir, DELETED_MANIFEST), [...absent]);
  return { dir, absent, createdDirs: await missingParents(stage.repoRoot, planned) };
}

async function missingParents(repoRoot: string, planned: PlannedTouch[]): Promise<Set<string>> {
  const missing = new Set<string>();
  for (const { touch, target } of planned) {
    if (touch.kind !== "Write") {
      continue;
    }
    let dir = path.dirname(target);
    while (dir !== repoRoot && isInside(repoRoot, dir) && !missing.has(dir) && !(await pathExists(dir))) {
      missing.add(dir);
      dir = path.dirname(dir);
    }
  }
  return missing;
}

/** Puts every planned path back to its pre-promotion state. Returns failures. */
async function rollback(backup: BackupSet, planned: PlannedTouch[]): Promise<string[]> {
  const failures: string[] = [];
  for (const { touch, target } of planned) {
    try {
      if (backup.absent.has(touch.path)) {
        await fs.rm(target, { force: true });
      } else {
        await copyFileStream(safeJoin(backup.dir, touch.path), target);
      }
    } catch (err) {
      failures.push(`${touch.path}: ${errorMessage(err)}`);
    }
  }
  const deepestFirst = [...backup.createdDirs].sort((a, b) => b.length - a.length);
  for (const dir of deepestFirst) {
    try {
      await fs.rmdir(dir);
    } catch (err) {
      if (!isNotFound(err) && !hasErrorCode(err, "ENOTEMPTY")) {
        failures.push(`${dir}: ${errorMessage(err)}`);
      }
    }
  }
  return failures;
}

/**
 * Copies touched paths from the stage to the workspace: writes first, deletes
 * last. A backup set is taken before the first mutation and restored if any
 * step fails. Paths outside `touched` are never visited.
 */
export async function promote(stage: Stage, options: PromoteOptions = {}): Promise<PromoteResult> {
  const io = options.io ?? defaultPromoteIO;
  const logger = options.logger ?? silentLogger;
  const planned = await planTouches(stage, options.policy ?? {});

  await options.events?.append("promote_started", { files: planned.length });
  let backup: BackupSet;
  try {
    backup = await takeBackup(stage, planned);
  } catch (err) {
    await options.events?.append("promote_failed", { error: errorMessage(err), rolled_back: false });
    throw new PromoteError(`Promotion aborted before any change: backup failed (${errorMessage(err)})`, true, []);
  }
  logger.debug(`backup set at ${backup.dir}`);

  const writes = planned.filter(({ touch }) => touch.kind === "Write");
  const deletes = planned.filter(({ touch }) => touch.kind === "Delete");
  const result: PromoteResult = { written: [], deleted: [], backupDir: backup.dir };

  try {
    for (const { touch, source, target } of writes) {
      await ensureDir(path.dirname(target));
      await io.copyFile(source, target);
      const [expected, actual] = await Promise.all([hashFile(source), hashFile(target)]);
      if (expected !== actual) {
        throw new Error(`copied content of ${touch.path} does not match the stage`);
      }
      result.written.push(touch.path);
    }
    for (const { touch, target } of deletes) {
      await io.removeFile(target);
      result.deleted.push(touch.path);
    }
  } catch (err) {
    const failures = await rollback(backup, planned);
    for (const failure of failures) {
      logger.error(`Rollback failed for ${failure}`);
    }
    const rolledBack = failures.length === 0;
    await options.events?.append("promote_failed", { error: errorMessage(err), rolled_back: rolledBack });
    const outcome = rolledBack
      ? "The workspace was restored from the backup."
      : `Rollback was incomplete; restore by hand from ${backup.dir}.`;
    throw new PromoteError(`Promotion failed: ${errorMessage(err)}. ${outcome}`, rolledBack, failures);
  }

  await options.events?.append("promote_succeeded", {
    files_written: result.written.length,
    files_deleted: result.deleted.length,
    backup: backup.dir
  });
  return result;
}
