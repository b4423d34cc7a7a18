import test from "node:test";
import assert from "node:assert/strict";
import { applyInstruction, applyPatchSet, resolveInstruction } from "../src/patch/apply.js";
import { AmbiguousMatchError, HashMismatchError, ZeroMatchError } from "../src/errors.js";
import { fingerprint } from "../src/utils/hash.js";
import { detectLineEnding } from "../src/patch/text.js";
import type { PatchInstruction, PatchSet } from "../src/patch/types.js";

test("replaces the single occurrence of the search text", () => {
  const out = applyInstruction("a.ts", "const a = 1;\nconst b = 2;\n", {
    format: "v0",
    search: "const b = 2;",
    replace: "const b = 3;"
  });
  assert.equal(out, "const a = 1;\nconst b = 3;\n");
});

test("keeps CRLF line endings of the target", () => {
  const out = applyInstruction("a.txt", "a\r\nb\r\nc\r\n", { format: "v0", search: "b", replace: "B\nx" });
  assert.equal(out, "a\r\nB\r\nx\r\nc\r\n");
});

test("a CRLF search block matches an LF file", () => {
  const out = applyInstruction("a.txt", "one\ntwo\nthree\n", { format: "v0", search: "one\r\ntwo", replace: "1\r\n2" });
  assert.equal(out, "1\n2\nthree\n");
});

test("a file with mixed endings matches its normalized form and comes back as CRLF", () => {
  const out = applyInstruction("m.txt", "a\r\nb\nc\n", { format: "v0", search: "b\nc", replace: "B\nC" });
  assert.equal(out, "a\r\nB\r\nC\r\n");
});

test("bare CR endings are matched and kept", () => {
  const out = applyInstruction("m.txt", "a\rb\rc\r", { format: "v0", search: "a\nb", replace: "x" });
  assert.equal(out, "x\rc\r");
});

test("detectLineEnding prefers CRLF, then bare CR, then LF", () => {
  assert.equal(detectLineEnding("a\nb\r\n"), "\r\n");
  assert.equal(detectLineEnding("a\rb\r"), "\r");
  assert.equal(detectLineEnding("a\rb\n"), "\n");
  assert.equal(detectLineEnding("ab"), "\n");
});

test("ambiguous line numbers count lines of the normalized text", () => {
  assert.throws(
    () => applyInstruction("a.txt", "x\ry\rx\r", { format: "v0", search: "x", replace: "z" }),
    (err: unknown) => {
      assert.ok(err instanceof AmbiguousMatchError);
      assert.deepEqual(err.lineNumbers, [1, 3]);
      return true;
    }
  );
});

test("a missing search text reports the closest region", () => {
  const content = "function computeTotal(items) {\n  return items.length;\n}\n";
  assert.throws(
    () =>
      applyInstruction("calc.js", content, {
        format: "v0",
        search: "function computeTotal(items) {\n  return items.size;\n}",
        replace: "x"
      }),
    (err: unknown) => {
      assert.ok(err instanceof ZeroMatchError);
      assert.equal(err.code, "zero_match");
      assert.deepEqual(err.probe, {
        startLine: 1,
        divergenceLine: 2,
        matchedChars: 46,
        lines: ["function computeTotal(items) {", "  return items.length;", "}"]
      });
      assert.ok(err.message.includes("Did you mean this region? (line 1)"));
      assert.ok(err.message.includes("> 2 |   return items.length;"));
      return true;
    }
  );
});

test("a short miss has no probe but still names the expected text", () => {
  assert.throws(
    () => applyInstruction("a.ts", "abc\n", { format: "v0", search: "xyz", replace: "q" }),
    (err: unknown) => {
      assert.ok(err instanceof ZeroMatchError);
      assert.equal(err.probe, null);
      assert.ok(err.message.includes("Expected start: 'xyz'"));
      return true;
    }
  );
});

test("an anchored miss notes when LEFT_CTX is absent", () => {
  assert.throws(
    () =>
      applyInstruction("a.rs", "fn b() {}\n", {
        format: "v1",
        leftCtx: "fn a() {\n",
        old: "  1\n",
        rightCtx: "}\n",
        new: "  2\n"
      }),
    (err: unknown) => err instanceof ZeroMatchError && err.message.includes("LEFT_CTX was not found in the file.")
  );
});

test("several occurrences are ambiguous", () => {
  assert.throws(
    () => applyInstruction("a.ts", "x = 1\nx = 1\n", { format: "v0", search: "x = 1", replace: "x = 2" }),
    (err: unknown) => {
      assert.ok(err instanceof AmbiguousMatchError);
      assert.equal(err.count, 2);
      assert.deepEqual(err.lineNumbers, [1, 2]);
      assert.ok(err.message.startsWith("Patch failed for a.ts: ambiguous match. Found 2 occurrences at lines 1, 2."));
      return true;
    }
  );
});

test("context anchors pick the right occurrence", () => {
  const instruction: PatchInstruction = { format: "v1", leftCtx: "fn a() {\n", old: "  1\n", rightCtx: "}\n", new: "  2\n" };
  assert.deepEqual(resolveInstruction(instruction), {
    search: "fn a() {\n  1\n}\n",
    replace: "fn a() {\n  2\n}\n",
    leftCtx: "fn a() {\n"
  });
  const out = applyInstruction("a.rs", "fn a() {\n  1\n}\nfn b() {\n  1\n}\n", instruction);
  assert.equal(out, "fn a() {\n  2\n}\nfn b() {\n  1\n}\n");
});

test("instructions compose against the previous output", () => {
  const out = applyPatchSet("a.txt", "a\n", {
    instructions: [
      { format: "v0", search: "a", replace: "b" },
      { format: "v0", search: "b", replace: "c" }
    ]
  });
  assert.equal(out, "c\n");
});

test("the base hash is checked against the LF-normalized original", () => {
  const patch: PatchSet = {
    baseSha256: fingerprint("line one\nline two\n"),
    instructions: [{ format: "v0", search: "two", replace: "2" }]
  };
  assert.equal(applyPatchSet("a.txt", "line one\r\nline two\r\n", patch), "line one\r\nline 2\r\n");

  assert.throws(
    () => applyPatchSet("a.txt", "changed\n", patch),
    (err: unknown) => {
      assert.ok(err instanceof HashMismatchError);
      assert.equal(err.declared, patch.baseSha256);
      assert.equal(err.actual, fingerprint("changed\n"));
      return true;
    }
  );
});
