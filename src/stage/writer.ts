import fs from "node:fs/promises";
import type { Delivery, ManifestEntry } from "../delivery/types.js";
import { GateError, errorMessage } from "../errors.js";
import type { EventLog } from "../events.js";
import { applyPatchSet } from "../patch/apply.js";
import { assertNoSymlinkEscape, isNotFound, readTextIfExists, writeFileAtomic } from "../utils/fs.js";
import { silentLogger, type Logger } from "../utils/log.js";
import { safeJoin } from "../utils/paths.js";
import type { Stage, StageManager } from "./manager.js";

export interface WriteSummary {
  written: string[];
  deleted: string[];
}

export interface WriterOptions {
  events?: EventLog;
  logger?: Logger;
}

function writeError(relPath: string, err: unknown): GateError {
  if (err instanceof GateError) {
    return err;
  }
  return new GateError(`Failed to write ${relPath} in the stage: ${errorMessage(err)}`, "write");
}

/** Resolves a delivery path inside the worktree, refusing symlink escapes. */
async function resolveInStage(stage: Stage, relPath: string): Promise<string> {
  try {
    const target = safeJoin(stage.paths.worktree, relPath);
    await assertNoSymlinkEscape(stage.paths.worktree, target);
    return target;
  } catch (err) {
    throw new GateError(errorMessage(err), "path_rejected");
  }
}

async function contentFor(stage: Stage, delivery: Delivery, entry: ManifestEntry, target: string): Promise<string> {
  const body = delivery.files.get(entry.path);
  if (body) {
    return body.content;
  }
  const patch = delivery.patches.get(entry.path);
  if (!patch) {
    throw new GateError(`No file body or patch for ${entry.path}`, "write");
  }
  const base = await readTextIfExists(target);
  if (base === null) {
    throw new GateError(
      `Patch failed for ${entry.path}: the file does not exist in the stage. Send the full file as NEW instead.`,
      "patch_base_missing"
    );
  }
  return applyPatchSet(entry.path, base, patch);
}

/**
 * Applies manifest entries to the stage worktree in order, recording each
 * touch. The real workspace is never written.
 */
export async function writeDelivery(
  manager: StageManager,
  stage: Stage,
  delivery: Delivery,
  options: WriterOptions = {}
): Promise<WriteSummary> {
  const logger = options.logger ?? silentLogger;
  const summary: WriteSummary = { written: [], deleted: [] };

  for (const entry of delivery.manifest) {
    const target = await resolveInStage(stage, entry.path);

    if (entry.operation === "delete") {
      try {
        const stat = await fs.lstat(target);
        if (stat.isDirectory()) {
          throw new GateError(`Refusing to delete directory ${entry.path}; list its files instead`, "write");
        }
        await fs.rm(target, { force: true });
      } catch (err) {
        if (!isNotFound(err)) {
          throw writeError(entry.path, err);
        }
        logger.debug(`delete of missing ${entry.path} is a no-op`);
      }
      await manager.recordTouch(stage, entry.path, "Delete");
      await options.events?.append("file_deleted", { path: entry.path });
      summary.deleted.push(entry.path);
      continue;
    }

    try {
      const content = await contentFor(stage, delivery, entry, target);
      await writeFileAtomic(target, content);
    } catch (err) {
      throw writeError(entry.path, err);
    }
    await manager.recordTouch(stage, entry.path, "Write");
    await options.events?.append("file_written", { path: entry.path });
    summary.written.push(entry.path);
  }

  return summary;
}
