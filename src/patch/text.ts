import { normalizeLineEndings } from "../utils/hash.js";

export type LineEnding = "\n" | "\r\n" | "\r";

/** Splits into lines the way a line reader would: no trailing empty line, CR stripped. */
export function splitLines(text: string): string[] {
  if (text === "") {
    return [];
  }
  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

/** CRLF wins when present anywhere; a file with bare CRs and no LF is classic Mac. */
export function detectLineEnding(content: string): LineEnding {
  if (content.includes("\r\n")) {
    return "\r\n";
  }
  if (content.includes("\r") && !content.includes("\n")) {
    return "\r";
  }
  return "\n";
}

export function toLineEnding(text: string, eol: LineEnding): string {
  const lf = normalizeLineEndings(text);
  return eol === "\n" ? lf : lf.replace(/\n/g, eol);
}

/** 1-based line number of a character offset. */
export function lineNumberAt(content: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset && i < content.length; i++) {
    if (content.charCodeAt(i) === 10) {
      line++;
    }
  }
  return line;
}

/** Offsets of non-overlapping occurrences, scanning left to right. */
export function findOccurrences(content: string, needle: string): number[] {
  const found: number[] = [];
  if (!needle) {
    return found;
  }
  let from = 0;
  while (from <= content.length) {
    const index = content.indexOf(needle, from);
    if (index === -1) {
      break;
    }
    found.push(index);
    from = index + needle.length;
  }
  return found;
}
