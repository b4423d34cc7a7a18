import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import fs from "node:fs/promises";
import { EVENTS_FILE_NAME, EventLog, readEvents } from "../src/events.js";
import type { Logger } from "../src/utils/log.js";
import { makeTempDir } from "./helpers.js";

function recordingLogger(lines: string[]): Logger {
  const push = (message: string): void => {
    lines.push(message);
  };
  return { info: push, success: push, warn: push, error: push, detail: push, debug: push };
}

test("appends one JSON object per line with a seconds timestamp", async () => {
  const dir = await makeTempDir();
  try {
    const log = new EventLog(path.join(dir, "state"));
    assert.equal(log.filePath, path.join(dir, "state", EVENTS_FILE_NAME));
    const before = Math.floor(Date.now() / 1000);
    await log.append("file_written", { path: "src/a.ts" });
    await log.append("check_failed", { command: "npm test", exit_code: 1 });

    const raw = await fs.readFile(log.filePath, "utf8");
    const lines = raw.split("\n");
    assert.equal(lines.length, 3);
    assert.equal(lines[2], "");

    const events = await readEvents(log.filePath);
    assert.deepEqual(
      events.map((event) => event.kind),
      [
        { tag: "file_written", fields: { path: "src/a.ts" } },
        { tag: "check_failed", fields: { command: "npm test", exit_code: 1 } }
      ]
    );
    assert.ok(events.every((event) => Number.isInteger(event.timestamp) && event.timestamp >= before));
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test("reading skips malformed lines and a missing file reads as empty", async () => {
  const dir = await makeTempDir();
  try {
    const filePath = path.join(dir, EVENTS_FILE_NAME);
    assert.deepEqual(await readEvents(filePath), []);
    await fs.writeFile(
      filePath,
      ['{"timestamp":1,"kind":{"tag":"stage_reset","fields":{}}}', "not json", '{"timestamp":"x"}', ""].join("\n")
    );
    assert.deepEqual(await readEvents(filePath), [{ timestamp: 1, kind: { tag: "stage_reset", fields: {} } }]);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test("a failed append is logged and never thrown", async () => {
  const dir = await makeTempDir();
  try {
    const blocker = path.join(dir, "blocker");
    await fs.writeFile(blocker, "a file where a directory should be");
    const lines: string[] = [];
    const log = new EventLog(path.join(blocker, "state"), recordingLogger(lines));
    await log.append("stage_reset", {});
    assert.equal(lines.length, 1);
    assert.match(lines[0], /^event log append failed \(stage_reset\): /);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});
