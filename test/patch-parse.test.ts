import test from "node:test";
import assert from "node:assert/strict";
import { detectPatchFormat, parsePatchDocument, serializePatchDocument } from "../src/patch/parse.js";
import { GateError } from "../src/errors.js";

const BASE = "a".repeat(64);

function failureCode(content: string): string {
  try {
    parsePatchDocument(content);
  } catch (err) {
    assert.ok(err instanceof GateError);
    return err.code;
  }
  assert.fail("expected the patch to be refused");
}

test("parses search/replace blocks", () => {
  const doc = parsePatchDocument("<<<< SEARCH\nfoo\nbar\n====\nbaz\n>>>>\n<<<< SEARCH\nq\n====\n>>>>\n");
  assert.deepEqual(doc, {
    format: "v0",
    baseSha256: undefined,
    instructions: [
      { format: "v0", search: "foo\nbar", replace: "baz" },
      { format: "v0", search: "q", replace: "" }
    ]
  });
});

test("BASE_SHA256 is validated and lowercased", () => {
  const doc = parsePatchDocument(`BASE_SHA256: ${"A".repeat(64)}\n<<<< SEARCH\nx\n====\ny\n>>>>\n`);
  assert.equal(doc.baseSha256, BASE);
  assert.equal(failureCode("BASE_SHA256: 1234\n<<<< SEARCH\nx\n====\ny\n>>>>\n"), "protocol");
});

test("malformed search/replace blocks are parse errors", () => {
  assert.equal(failureCode("<<<< SEARCH\nx\n>>>>\n"), "parse");
  assert.equal(failureCode("<<<< SEARCH\nx\n====\ny\n"), "parse");
  assert.equal(failureCode("<<<< SEARCH\n====\ny\n>>>>\n"), "parse");
  assert.equal(failureCode("just some prose"), "parse");
  assert.equal(failureCode(""), "parse");
});

test("parses context-anchored instructions", () => {
  const doc = parsePatchDocument(
    `BASE_SHA256: ${BASE}\nMAX_MATCHES: 1\nLEFT_CTX:\nfn a() {\nOLD:\n  1\nRIGHT_CTX:\n}\nNEW:\n  2\n`
  );
  assert.deepEqual(doc, {
    format: "v1",
    baseSha256: BASE,
    instructions: [{ format: "v1", leftCtx: "fn a() {\n", old: "  1\n", rightCtx: "}\n", new: "  2\n" }]
  });
});

test("context-anchored patches must be complete and capped at one match", () => {
  assert.equal(failureCode("LEFT_CTX:\na\nOLD:\nb\nRIGHT_CTX:\nc\nNEW:\nd\n"), "protocol");
  assert.equal(failureCode("MAX_MATCHES: 1\nLEFT_CTX:\na\nOLD:\nb\n"), "protocol");
  assert.equal(failureCode("MAX_MATCHES: 1\nLEFT_CTX:\na\nLEFT_CTX:\nb\n"), "protocol");
  assert.equal(failureCode("MAX_MATCHES: 1\nLEFT_CTX:\nOLD:\nRIGHT_CTX:\nNEW:\nx\n"), "protocol");
});

test("format detection follows the first keyword", () => {
  assert.equal(detectPatchFormat("note\n<<<< SEARCH\n"), "v0");
  assert.equal(detectPatchFormat("MAX_MATCHES: 1\n"), "v1");
  assert.equal(detectPatchFormat("nothing here"), null);
});

test("a serialized document parses back to itself", () => {
  const doc = parsePatchDocument(`MAX_MATCHES: 1\nLEFT_CTX:\nx\nOLD:\ny\nRIGHT_CTX:\nz\nNEW:\nw\n`);
  assert.deepEqual(parsePatchDocument(serializePatchDocument(doc)), doc);
});
