import { isMarkdownPath } from "../utils/paths.js";
import type { Delivery, FileBody } from "./types.js";

export interface SanitizeReport {
  path: string;
  linesRemoved: number;
}

const FENCE_LINE = /^\s*(```|~~~)/;

/**
 * Removes stray markdown fence lines from code file bodies. Markdown files are
 * left alone. Returns one report per body that changed.
 */
export function sanitizeDelivery(delivery: Delivery): SanitizeReport[] {
  const reports: SanitizeReport[] = [];
  for (const [path, body] of delivery.files) {
    if (isMarkdownPath(path)) {
      continue;
    }
    const cleaned = stripFenceLines(body);
    const linesRemoved = body.lineCount - cleaned.lineCount;
    if (linesRemoved > 0) {
      delivery.files.set(path, cleaned);
      reports.push({ path, linesRemoved });
    }
  }
  return reports;
}

function stripFenceLines(body: FileBody): FileBody {
  const lines = body.content.split("\n");
  const trailingNewline = lines[lines.length - 1] === "";
  if (trailingNewline) {
    lines.pop();
  }
  const kept = lines.filter((line) => !FENCE_LINE.test(line));
  const content = kept.length > 0 ? `${kept.join("\n")}${trailingNewline ? "\n" : ""}` : "";
  return { content, lineCount: kept.length };
}
