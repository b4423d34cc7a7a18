import test from "node:test";
import assert from "node:assert/strict";
import { parseDelivery, stripOuterFence } from "../src/delivery/parser.js";
import { sanitizeDelivery } from "../src/delivery/sanitize.js";
import { GateError } from "../src/errors.js";
import { fingerprint } from "../src/utils/hash.js";

function codeOf(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    assert.ok(err instanceof GateError, "expected a GateError");
    return err.code;
  }
  assert.fail("expected the call to throw");
}

test("parses plan, manifest, file and patch blocks wrapped in prose", () => {
  const text = [
    "Sure, here is the change.",
    "<plan>",
    "GOAL: Rename the helper",
    "CHANGES: touch two files",
    "</plan>",
    "<delivery>",
    "1. src/a.ts",
    "- src/new.ts [NEW]",
    "* old.ts [DELETE]",
    "</delivery>",
    '<file path="src/new.ts">',
    "```ts",
    "export const y = 2;",
    "```",
    "</file>",
    "<patch path=src/a.ts>",
    "<<<< SEARCH",
    "old",
    "====",
    "new",
    ">>>>",
    "</patch>",
    "Let me know if you need more."
  ].join("\n");

  const { delivery, warnings } = parseDelivery(text);
  assert.deepEqual(warnings, []);
  assert.deepEqual(delivery.plan, { text: "GOAL: Rename the helper\nCHANGES: touch two files", goal: "Rename the helper" });
  assert.deepEqual(delivery.manifest, [
    { path: "src/a.ts", operation: "update" },
    { path: "src/new.ts", operation: "new" },
    { path: "old.ts", operation: "delete" }
  ]);
  assert.deepEqual(delivery.files.get("src/new.ts"), { content: "export const y = 2;\n", lineCount: 1 });
  assert.deepEqual(delivery.patches.get("src/a.ts"), {
    baseSha256: undefined,
    instructions: [{ format: "v0", search: "old", replace: "new" }]
  });
});

test("markers inside prose do not open blocks", () => {
  const text = 'Use <file path="x.ts"> tags.\n<file path="y.ts">\nconst y = 1;\n</file>\n';
  const { delivery, warnings } = parseDelivery(text);
  assert.deepEqual([...delivery.files.keys()], ["y.ts"]);
  assert.deepEqual(delivery.manifest, [{ path: "y.ts", operation: "update" }]);
  assert.deepEqual(warnings, ["No <delivery> manifest found; derived one from the file and patch blocks"]);
});

test("markers are case-insensitive and unknown attributes are ignored", () => {
  const text = '<FILE lang="ts" path=\'a.ts\'>\nconst a = 1;\n</File>\n<delivery>\na.ts\n</DELIVERY>';
  const { delivery } = parseDelivery(text);
  assert.deepEqual(delivery.files.get("a.ts"), { content: "const a = 1;\n", lineCount: 1 });
});

test("a block without a path is skipped with a warning", () => {
  const text = "<file>\nx\n</file>\n<delivery>\na.ts [DELETE]\n</delivery>";
  const { delivery, warnings } = parseDelivery(text);
  assert.equal(delivery.files.size, 0);
  assert.deepEqual(warnings, ["<file> block at line 1 has no path attribute; skipped"]);
});

test("an unclosed block is a parse error", () => {
  assert.equal(codeOf(() => parseDelivery('<file path="a.ts">\nconst a = 1;\n')), "parse");
});

test("an empty delivery is a parse error", () => {
  assert.equal(codeOf(() => parseDelivery("nothing to see")), "parse");
});

test("reserved keywords cannot be used as paths", () => {
  assert.equal(codeOf(() => parseDelivery('<file path="manifest">\nx\n</file>')), "parse");
});

test("a file and a patch for the same path conflict", () => {
  const text = [
    '<file path="a.ts">',
    "const a = 1;",
    "</file>",
    '<patch path="a.ts">',
    "<<<< SEARCH",
    "1",
    "====",
    "2",
    ">>>>",
    "</patch>"
  ].join("\n");
  assert.equal(codeOf(() => parseDelivery(text)), "parse");
});

test("patch blocks for one path compose in order", () => {
  const block = (search: string, replace: string): string =>
    ['<patch path="a.ts">', "<<<< SEARCH", search, "====", replace, ">>>>", "</patch>"].join("\n");
  const { delivery } = parseDelivery(`${block("a", "b")}\n${block("b", "c")}`);
  assert.deepEqual(
    delivery.patches.get("a.ts")?.instructions.map((instruction) => instruction.format === "v0" && instruction.search),
    ["a", "b"]
  );
});

test("conflicting base hashes across patch blocks are a protocol violation", () => {
  const block = (content: string): string =>
    ['<patch path="a.ts">', `BASE_SHA256: ${fingerprint(content)}`, "<<<< SEARCH", "a", "====", "b", ">>>>", "</patch>"].join(
      "\n"
    );
  assert.equal(codeOf(() => parseDelivery(`${block("one")}\n${block("two")}`)), "protocol");
});

test("patch parse errors keep their code and name the path", () => {
  const text = ['<patch path="a.ts">', "MAX_MATCHES: 2", "LEFT_CTX:", "x", "OLD:", "y", "RIGHT_CTX:", "z", "NEW:", "w", "</patch>"].join(
    "\n"
  );
  try {
    parseDelivery(text);
    assert.fail("expected a protocol violation");
  } catch (err) {
    assert.ok(err instanceof GateError);
    assert.equal(err.code, "protocol");
    assert.equal(err.message, "Patch for a.ts (line 1): Protocol violation: MAX_MATCHES must be 1. Got: 2");
  }
});

test("stripOuterFence removes only a fence that wraps the whole body", () => {
  assert.deepEqual(stripOuterFence(["", "```js", "x", "```", ""]), ["x"]);
  assert.deepEqual(stripOuterFence(["x", "```", "y"]), ["x", "```", "y"]);
  assert.deepEqual(stripOuterFence(["```js", "x", "```js"]), ["```js", "x", "```js"]);
});

test("sanitize strips stray fence lines from code bodies only", () => {
  const text = [
    '<file path="a.py">',
    "print(1)",
    "```",
    "print(2)",
    "</file>",
    '<file path="notes.md">',
    "text",
    "```",
    "</file>"
  ].join("\n");
  const { delivery } = parseDelivery(text);
  const reports = sanitizeDelivery(delivery);
  assert.deepEqual(reports, [{ path: "a.py", linesRemoved: 1 }]);
  assert.deepEqual(delivery.files.get("a.py"), { content: "print(1)\nprint(2)\n", lineCount: 2 });
  assert.deepEqual(delivery.files.get("notes.md"), { content: "text\n```\n", lineCount: 2 });
});
