import fs from "node:fs/promises";
import { readClipboard } from "./clipboard.js";
import { GateError, errorMessage } from "./errors.js";

export type InputSource =
  | { kind: "clipboard" }
  | { kind: "stdin" }
  | { kind: "file"; path: string }
  | { kind: "text"; text: string; label?: string };

export function describeSource(source: InputSource): string {
  switch (source.kind) {
    case "clipboard":
      return "clipboard";
    case "stdin":
      return "stdin";
    case "file":
      return `file:${source.path}`;
    case "text":
      return source.label ?? "text";
  }
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

export async function readInput(source: InputSource): Promise<string> {
  try {
    switch (source.kind) {
      case "clipboard":
        return await readClipboard();
      case "stdin":
        return await readStdin();
      case "file":
        return await fs.readFile(source.path, "utf8");
      case "text":
        return source.text;
    }
  } catch (err) {
    throw new GateError(`Could not read delivery from ${describeSource(source)}: ${errorMessage(err)}`, "input");
  }
}
