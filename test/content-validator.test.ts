import test from "node:test";
import assert from "node:assert/strict";
import { checkSyntax, findTruncationLine, introducedIssues, validateContent } from "../src/validate/content.js";

function messages(relPath: string, content: string): string[] {
  return validateContent(relPath, content).map((issue) => issue.message);
}

test("accepts a complete source file", () => {
  assert.deepEqual(validateContent("src/a.ts", "export const x: number = 1;\n"), []);
});

test("rejects empty and whitespace-only bodies", () => {
  assert.deepEqual(messages("a.ts", ""), ["File is empty: a.ts"]);
  assert.deepEqual(messages("a.ts", "  \n\t\n"), ["File is empty: a.ts"]);
});

test("rejects an elided line comment", () => {
  assert.deepEqual(messages("a.rs", "fn main() {\n// ...\n}\n"), [
    "Truncation detected in a.rs at line 2: the body is incomplete."
  ]);
});

test("the ignore tag exempts its own line only", () => {
  assert.deepEqual(validateContent("a.rs", "// ... shadowgate:ignore\n"), []);
  assert.equal(findTruncationLine("// ... shadowgate:ignore\n/* ... */\n"), 2);
});

test("detects the other truncation markers", () => {
  assert.equal(findTruncationLine("x\n# ...\n"), 2);
  assert.equal(findTruncationLine("// rest of the handlers\n"), 1);
  assert.equal(findTruncationLine("// remaining methods unchanged\n"), 1);
  assert.equal(findTruncationLine("  // TODO: implement\n"), 1);
  assert.equal(findTruncationLine("a\nb\n…\n"), 3);
  assert.equal(findTruncationLine("const s = 'ok';\n"), null);
});

test("markdown fences are rejected in code but allowed in markdown", () => {
  assert.deepEqual(messages("a.py", "```python\nprint(1)\n```\n"), [
    "Markdown fences detected in a.py. Content must be raw code; rerun with --sanitize to strip them."
  ]);
  assert.deepEqual(validateContent("README.md", "# Title\n\n```sh\nnpm test\n```\n"), []);
});

test("syntax errors in TypeScript and JSON are rejected", () => {
  const issues = validateContent("src/broken.ts", "export function f( {\n");
  assert.equal(issues.length, 1);
  assert.equal(issues[0].kind, "content_rejected");
  assert.match(issues[0].message, /^Syntax error in src\/broken\.ts \(line \d+: /);

  assert.notEqual(checkSyntax("data.json", "{\"a\": }"), null);
  assert.equal(checkSyntax("data.json", "{\"a\": 1}"), null);
});

test("files without a known grammar skip the syntax check", () => {
  assert.equal(checkSyntax("notes.txt", "fn ( {"), null);
  assert.equal(checkSyntax("a.rs", "fn broken( {"), null);
  assert.equal(checkSyntax("tool.py", "def broken(:"), null);
  assert.deepEqual(validateContent("a.rs", "fn broken( {\n"), []);
});

test("TSX bodies parse with JSX enabled", () => {
  assert.equal(checkSyntax("ui/App.tsx", "export const App = () => <div className=\"x\">hi</div>;\n"), null);
});

test("roadmap files are refused as protected", () => {
  const [issue] = validateContent("ROADMAP.md", "# Roadmap\n");
  assert.equal(issue.kind, "protected_file");
  assert.match(issue.message, /roadmap commands/);
});

test("introducedIssues ignores problems the baseline already had", () => {
  const baseline = 'const label = "loading…";\nconst x = 1;\n';
  assert.deepEqual(introducedIssues("a.ts", 'const label = "loading…";\nconst x = 2;\n', baseline), []);

  const issues = introducedIssues("a.ts", 'const label = "loading…";\n// ...\n', baseline);
  assert.deepEqual(
    issues.map((issue) => issue.message),
    ["Truncation detected in a.ts at line 2: the body is incomplete."]
  );
});

test("introducedIssues reports a syntax error only when the baseline parsed", () => {
  assert.deepEqual(introducedIssues("a.ts", "export function f( {\nconst y = 1;\n", "export function f( {\n"), []);
  assert.equal(introducedIssues("a.ts", "export function f( {\n", "export function f() {}\n").length, 1);
  assert.equal(introducedIssues("a.ts", "export function f( {\n", null).length, 1);
});

test("introducedIssues keeps a fence that was already in the file", () => {
  const baseline = 'const fence = "```";\n';
  assert.deepEqual(introducedIssues("a.ts", `${baseline}export const z = 1;\n`, baseline), []);
});
