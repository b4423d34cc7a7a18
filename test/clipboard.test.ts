import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { pipeToTool, readFromTool, type ClipboardTool } from "../src/clipboard.js";
import { readFile, withRepo } from "./helpers.js";

function nodeTool(script: string, ...args: string[]): ClipboardTool {
  return { program: process.execPath, args: ["-e", script, ...args] };
}

test("a copy tool receives the text on stdin", async () => {
  await withRepo({}, async (root) => {
    const target = path.join(root, "copied.txt");
    await pipeToTool(nodeTool("process.stdin.pipe(require('fs').createWriteStream(process.argv[1]))", target), "feedback\n");
    assert.equal(await readFile(target), "feedback\n");
  });
});

test("a copy tool that never exits is killed after the timeout", async () => {
  await assert.rejects(pipeToTool(nodeTool("setInterval(() => {}, 1000)"), "x", 200), {
    message: `${process.execPath} did not finish within 200ms`
  });
});

test("a paste tool's stdout is the clipboard text", async () => {
  assert.equal(await readFromTool(nodeTool("process.stdout.write('pasted text')")), "pasted text");
});

test("a paste tool that fails is reported with its exit code", async () => {
  await assert.rejects(readFromTool(nodeTool("process.exit(2)")), {
    message: `${process.execPath} exited with code 2`
  });
});
