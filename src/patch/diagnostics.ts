import type { ProbeRegion } from "../errors.js";
import { lineNumberAt, splitLines } from "./text.js";

const MIN_PROBE_CHARS = 20;
const MAX_QUOTED_LINES = 12;
const RULE = "-".repeat(40);

/**
 * Locates the longest prefix of `search` (at least 20 characters) present in
 * `content` and returns the lines around the point where the two diverge.
 */
export function probeClosestRegion(content: string, search: string): ProbeRegion | null {
  if (search.length < MIN_PROBE_CHARS || !content.includes(search.slice(0, MIN_PROBE_CHARS))) {
    return null;
  }
  // Presence is monotone in prefix length, so bisect.
  let low = MIN_PROBE_CHARS;
  let high = search.length;
  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    if (content.includes(search.slice(0, mid))) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  const index = content.indexOf(search.slice(0, low));
  const startLine = lineNumberAt(content, index);
  const divergenceLine = lineNumberAt(content, index + low);
  const fileLines = splitLines(content);
  const lastLine = Math.min(fileLines.length, divergenceLine + 2);
  const firstLine = Math.max(startLine, lastLine - MAX_QUOTED_LINES + 1);
  return {
    startLine: firstLine,
    divergenceLine,
    matchedChars: low,
    lines: fileLines.slice(firstLine - 1, lastLine)
  };
}

function quoteRegion(probe: ProbeRegion): string[] {
  const width = String(probe.startLine + probe.lines.length - 1).length;
  return probe.lines.map((line, offset) => {
    const lineNo = probe.startLine + offset;
    const marker = lineNo === probe.divergenceLine ? ">" : " ";
    return `${marker} ${String(lineNo).padStart(width)} | ${line}`;
  });
}

export function describeZeroMatch(
  relPath: string,
  content: string,
  search: string,
  probe: ProbeRegion | null,
  leftCtx?: string
): string {
  const lines = [`Patch failed for ${relPath}: could not find an exact match for the SEARCH text.`];
  if (probe) {
    lines.push(
      "",
      `Did you mean this region? (line ${probe.startLine})`,
      RULE,
      ...quoteRegion(probe),
      RULE,
      `The first ${probe.matchedChars} characters match; the text diverges at line ${probe.divergenceLine}.`
    );
  }
  const searchLines = splitLines(search);
  lines.push(
    "",
    `Expected start: '${(searchLines[0] ?? "").trim()}'`,
    `Expected end:   '${(searchLines[searchLines.length - 1] ?? "").trim()}'`
  );
  if (leftCtx !== undefined && leftCtx.trim() !== "" && !content.includes(leftCtx.trim())) {
    lines.push("LEFT_CTX was not found in the file.");
  }
  lines.push("", "NEXT: Regenerate the patch using the exact current text, or send the full file.");
  return lines.join("\n");
}

export function describeAmbiguous(relPath: string, content: string, needle: string, lineNumbers: number[]): string {
  const fileLines = splitLines(content);
  const lines = [
    `Patch failed for ${relPath}: ambiguous match. Found ${lineNumbers.length} occurrences at lines ${lineNumbers.join(", ")}.`
  ];
  for (const lineNo of lineNumbers.slice(0, 5)) {
    lines.push(`  Line ${lineNo}: ${(fileLines[lineNo - 1] ?? "").trim()}`);
  }
  if (lineNumbers.length > 5) {
    lines.push("  ... and others.");
  }
  const firstLine = splitLines(needle)[0] ?? "";
  lines.push("", `NEXT: Add surrounding context (LEFT_CTX / RIGHT_CTX) so '${firstLine.trim()}' matches once.`);
  return lines.join("\n");
}
