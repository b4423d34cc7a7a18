import ts from "typescript";
import type { ValidationIssue } from "../errors.js";
import { errorMessage } from "../errors.js";
import { extensionOf, isMarkdownPath } from "../utils/paths.js";
import { isRoadmapFile, protectedMessage } from "./path.js";

/** A line carrying this tag is exempt from the truncation check. */
export const IGNORE_TAG = "shadowgate:ignore";

const TRUNCATION_PATTERNS: RegExp[] = [
  /\/\/\s*\.\.\./,
  /\/\*\s*\.\.\.\s*\*\//,
  /^\s*#\s*\.\.\.\s*$/,
  /\/\/\s*rest of\b/i,
  /\/\/\s*remaining\b/i,
  /\/\/\s*todo:\s*implement/i,
  /\/\/\s*implementation goes here/i,
  /\brest of (the )?(code|file|implementation|function|class|module)\b/i,
  /\bremaining code\b/i,
  /…/
];

const FENCE = /(```|~~~)/;

const SCRIPT_EXTENSIONS = new Set([".ts", ".tsx", ".mts", ".cts", ".js", ".jsx", ".mjs", ".cjs"]);

function isTruncationMarker(line: string): boolean {
  return !line.includes(IGNORE_TAG) && TRUNCATION_PATTERNS.some((pattern) => pattern.test(line));
}

/** 1-based line of the first truncation marker not carrying the ignore tag. */
export function findTruncationLine(content: string): number | null {
  const index = content.split("\n").findIndex(isTruncationMarker);
  return index === -1 ? null : index + 1;
}

/** Returns a syntax error description, or null when the body parses. */
export function checkSyntax(relPath: string, content: string): string | null {
  const ext = extensionOf(relPath);
  if (ext === ".json") {
    try {
      JSON.parse(content);
      return null;
    } catch (err) {
      return errorMessage(err);
    }
  }
  if (!SCRIPT_EXTENSIONS.has(ext)) {
    return null;
  }
  const output = ts.transpileModule(content, {
    fileName: relPath,
    reportDiagnostics: true,
    compilerOptions: { jsx: ts.JsxEmit.Preserve }
  });
  const [first] = output.diagnostics ?? [];
  if (!first) {
    return null;
  }
  const message = ts.flattenDiagnosticMessageText(first.messageText, " ");
  if (first.file && first.start !== undefined) {
    const { line } = first.file.getLineAndCharacterOfPosition(first.start);
    return `line ${line + 1}: ${message}`;
  }
  return message;
}

/**
 * Checks a whole-file body for plausibility. An empty result means the body
 * is acceptable.
 */
export function validateContent(relPath: string, content: string): ValidationIssue[] {
  if (isRoadmapFile(relPath)) {
    return [{ kind: "protected_file", path: relPath, message: protectedMessage(relPath) }];
  }
  return introducedIssues(relPath, content, null);
}

/**
 * Like validateContent, but only reports problems that `baseline` (the
 * file as it was before the delivery touched it) did not already have. A
 * truncation marker counts as new when its line text is absent from the
 * baseline.
 */
export function introducedIssues(relPath: string, content: string, baseline: string | null): ValidationIssue[] {
  const reject = (message: string): ValidationIssue => ({ kind: "content_rejected", path: relPath, message });
  if (content.trim() === "") {
    return [reject(`File is empty: ${relPath}`)];
  }
  const issues: ValidationIssue[] = [];
  if (!isMarkdownPath(relPath) && FENCE.test(content) && !(baseline !== null && FENCE.test(baseline))) {
    issues.push(
      reject(`Markdown fences detected in ${relPath}. Content must be raw code; rerun with --sanitize to strip them.`)
    );
  }
  const known = new Set(baseline === null ? [] : baseline.split("\n").filter(isTruncationMarker));
  const truncated = content.split("\n").findIndex((line) => isTruncationMarker(line) && !known.has(line));
  if (truncated !== -1) {
    issues.push(reject(`Truncation detected in ${relPath} at line ${truncated + 1}: the body is incomplete.`));
  }
  const syntax = checkSyntax(relPath, content);
  if (syntax !== null && (baseline === null || checkSyntax(relPath, baseline) === null)) {
    issues.push(reject(`Syntax error in ${relPath} (${syntax}). Send a complete, parseable file.`));
  }
  return issues;
}
