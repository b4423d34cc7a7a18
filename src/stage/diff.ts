import { diffLines } from "diff";
import { readTextIfExists } from "../utils/fs.js";
import { safeJoin } from "../utils/paths.js";
import type { Stage } from "./manager.js";

export type DiffStatus = "new" | "modified" | "deleted" | "unchanged";

export interface DiffEntry {
  path: string;
  status: DiffStatus;
  added: number;
  removed: number;
}

export function countLineChanges(before: string, after: string): { added: number; removed: number } {
  let added = 0;
  let removed = 0;
  for (const change of diffLines(before, after)) {
    if (change.added) {
      added += change.count ?? 0;
    } else if (change.removed) {
      removed += change.count ?? 0;
    }
  }
  return { added, removed };
}

/** Compares every touched path between the workspace and the stage worktree. */
export async function summarizeStageDiff(stage: Stage): Promise<DiffEntry[]> {
  const entries: DiffEntry[] = [];
  for (const touch of stage.state.touched) {
    const before = await readTextIfExists(safeJoin(stage.repoRoot, touch.path));
    const after =
      touch.kind === "Delete" ? null : await readTextIfExists(safeJoin(stage.paths.worktree, touch.path));
    let status: DiffStatus;
    if (before === null && after === null) {
      status = "unchanged";
    } else if (before === null) {
      status = "new";
    } else if (after === null) {
      status = "deleted";
    } else {
      status = before === after ? "unchanged" : "modified";
    }
    entries.push({ path: touch.path, status, ...countLineChanges(before ?? "", after ?? "") });
  }
  return entries;
}

export function formatDiffSummary(entries: DiffEntry[]): string[] {
  if (entries.length === 0) {
    return ["No staged changes."];
  }
  return entries.map((entry) => {
    const label = entry.status.padEnd(9);
    return `${label} ${entry.path} (+${entry.added} -${entry.removed})`;
  });
}
