import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import fs from "node:fs/promises";
import { StageManager, stagePaths } from "../src/stage/manager.js";
import { summarizeStageDiff, formatDiffSummary, countLineChanges } from "../src/stage/diff.js";
import { upsertTouch, type StageState } from "../src/stage/state.js";
import { EventLog, readEvents } from "../src/events.js";
import { GateError } from "../src/errors.js";
import { exists, readFile, withRepo, writeFile } from "./helpers.js";

const WORKSPACE = {
  "src/a.ts": "export const a = 1;\n",
  "src/dist/keep.ts": "export const k = 1;\n",
  ".git/HEAD": "ref: refs/heads/main\n",
  "node_modules/pkg/index.js": "module.exports = 1;\n",
  "dist/out.js": "built\n",
  ".DS_Store": "junk"
};

test("creating a stage mirrors the workspace minus preserved paths", async () => {
  await withRepo(WORKSPACE, async (root) => {
    const manager = new StageManager(root);
    const { stage, created, stats } = await manager.openOrCreate();
    assert.equal(created, true);
    assert.equal(stats?.filesCopied, 2);
    assert.equal(stats?.symlinksSkipped, 0);
    assert.equal(await readFile(path.join(stage.paths.worktree, "src/a.ts")), "export const a = 1;\n");
    assert.equal(await exists(path.join(stage.paths.worktree, "src/dist/keep.ts")), true);
    assert.equal(await exists(path.join(stage.paths.worktree, ".git")), false);
    assert.equal(await exists(path.join(stage.paths.worktree, "node_modules")), false);
    assert.equal(await exists(path.join(stage.paths.worktree, "dist")), false);
    assert.deepEqual(stage.state.touched, []);
    assert.equal(stage.state.apply_count, 0);
  });
});

test("a live stage is reused and reset removes it", async () => {
  await withRepo({ "a.txt": "a\n" }, async (root) => {
    const manager = new StageManager(root);
    const first = await manager.openOrCreate();
    const second = await manager.openOrCreate();
    assert.equal(second.created, false);
    assert.equal(second.stage.state.id, first.stage.state.id);
    assert.equal(await manager.effectiveCwd(), manager.paths.worktree);

    assert.equal(await manager.reset(), true);
    assert.equal(await manager.exists(), false);
    assert.equal(await manager.reset(), false);
    assert.equal(await manager.effectiveCwd(), path.resolve(root));
    assert.equal(await readFile(path.join(root, "a.txt")), "a\n");
  });
});

test("stage lifecycle is recorded in the event log", async () => {
  await withRepo({ "a.txt": "a\n" }, async (root) => {
    const events = new EventLog(stagePaths(root).stateDir);
    const manager = new StageManager(root, { events });
    const { stage } = await manager.openOrCreate();
    await manager.reset();
    const recorded = await readEvents(events.filePath);
    assert.deepEqual(
      recorded.map((event) => event.kind),
      [
        { tag: "stage_created", fields: { id: stage.state.id, files_copied: 1 } },
        { tag: "stage_reset", fields: { id: stage.state.id } }
      ]
    );
  });
});

test("an unreadable state file is a stage error", async () => {
  await withRepo({ "a.txt": "a\n" }, async (root) => {
    const manager = new StageManager(root);
    await manager.openOrCreate();
    await fs.writeFile(manager.paths.stateFile, JSON.stringify({ id: "" }));
    await assert.rejects(manager.open(), (err: unknown) => err instanceof GateError && err.code === "stage_io");
  });
});

test("unknown state fields survive a save", async () => {
  await withRepo({ "a.txt": "a\n" }, async (root) => {
    const manager = new StageManager(root);
    await manager.openOrCreate();
    await fs.writeFile(
      manager.paths.stateFile,
      JSON.stringify({ id: "s1", created_at: 10, touched: [], apply_count: 2, note: "kept" })
    );
    const stage = await manager.open();
    assert.ok(stage);
    await manager.recordTouch(stage, "a.txt", "Write");
    await manager.markApplied(stage);
    const saved: unknown = JSON.parse(await readFile(manager.paths.stateFile));
    assert.ok(typeof saved === "object" && saved !== null);
    assert.equal(Reflect.get(saved, "note"), "kept");
    assert.equal(Reflect.get(saved, "apply_count"), 3);
    assert.deepEqual(Reflect.get(saved, "touched"), [{ path: "a.txt", kind: "Write" }]);
  });
});

test("upsertTouch keeps one entry per path with the latest kind", () => {
  const state: StageState = { id: "s", created_at: 0, touched: [], apply_count: 0 };
  upsertTouch(state, "a", "Write");
  upsertTouch(state, "b", "Write");
  upsertTouch(state, "a", "Delete");
  assert.deepEqual(state.touched, [
    { path: "a", kind: "Delete" },
    { path: "b", kind: "Write" }
  ]);
});

test("the diff summary compares touched paths against the workspace", async () => {
  await withRepo({ "a.txt": "one\ntwo\n", "gone.txt": "bye\n", "same.txt": "s\n" }, async (root) => {
    const manager = new StageManager(root);
    const { stage } = await manager.openOrCreate();
    await writeFile(path.join(stage.paths.worktree, "a.txt"), "one\n2\n");
    await writeFile(path.join(stage.paths.worktree, "new.txt"), "n\n");
    await fs.rm(path.join(stage.paths.worktree, "gone.txt"));
    await manager.recordTouch(stage, "a.txt", "Write");
    await manager.recordTouch(stage, "new.txt", "Write");
    await manager.recordTouch(stage, "gone.txt", "Delete");
    await manager.recordTouch(stage, "same.txt", "Write");

    const entries = await summarizeStageDiff(stage);
    assert.deepEqual(entries, [
      { path: "a.txt", status: "modified", added: 1, removed: 1 },
      { path: "new.txt", status: "new", added: 1, removed: 0 },
      { path: "gone.txt", status: "deleted", added: 0, removed: 1 },
      { path: "same.txt", status: "unchanged", added: 0, removed: 0 }
    ]);
    assert.equal(formatDiffSummary(entries)[0], "modified  a.txt (+1 -1)");
  });
});

test("formatDiffSummary reports an empty stage", () => {
  assert.deepEqual(formatDiffSummary([]), ["No staged changes."]);
  assert.deepEqual(countLineChanges("a\nb\n", "a\nb\nc\n"), { added: 1, removed: 0 });
});
