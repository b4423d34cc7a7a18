import { GateError } from "../errors.js";
import { splitLines } from "./text.js";
import type { ContextAnchoredInstruction, PatchDocument, PatchFormat, PatchInstruction } from "./types.js";

const V0_OPEN = "<<<< SEARCH";
const V0_SEPARATOR = "====";
const V0_CLOSE = ">>>>";
const BASE_PREFIX = "BASE_SHA256:";
const MAX_MATCHES_PREFIX = "MAX_MATCHES:";
const V1_HEADERS = ["LEFT_CTX:", "OLD:", "RIGHT_CTX:", "NEW:"] as const;

type V1Header = (typeof V1_HEADERS)[number];

function isV1Header(line: string): line is V1Header {
  return (V1_HEADERS as readonly string[]).includes(line);
}

function parseError(message: string): GateError {
  return new GateError(message, "parse");
}

function protocolError(message: string): GateError {
  return new GateError(`Protocol violation: ${message}`, "protocol");
}

/** Picks the wire format from the first recognized keyword. */
export function detectPatchFormat(content: string): PatchFormat | null {
  for (const line of splitLines(content)) {
    const trimmed = line.trim();
    if (trimmed === V0_OPEN) {
      return "v0";
    }
    if (isV1Header(trimmed) || trimmed.startsWith(MAX_MATCHES_PREFIX)) {
      return "v1";
    }
  }
  return null;
}

export function parsePatchDocument(content: string): PatchDocument {
  const format = detectPatchFormat(content);
  if (format === null) {
    if (content.includes(BASE_PREFIX) || content.trim() === "") {
      throw parseError("Patch contains no instructions (expected '<<<< SEARCH' or 'LEFT_CTX:' sections)");
    }
    throw parseError("Unrecognized patch format (expected '<<<< SEARCH' or 'LEFT_CTX:' sections)");
  }
  const lines = splitLines(content);
  return format === "v0" ? parseV0(lines) : parseV1(lines);
}

function readBaseSha(line: string, current: string | undefined): string {
  const value = line.slice(BASE_PREFIX.length).trim();
  if (!/^[0-9a-fA-F]{64}$/.test(value)) {
    throw protocolError(`BASE_SHA256 must be 64 hex characters, got '${value}'`);
  }
  const normalized = value.toLowerCase();
  if (current !== undefined && current !== normalized) {
    throw protocolError("patch declares two different BASE_SHA256 values");
  }
  return normalized;
}

function collectSection(lines: string[], start: number, terminator: string, missing: string): [string, number] {
  const collected: string[] = [];
  for (let i = start; i < lines.length; i++) {
    if (lines[i].trim() === terminator) {
      return [collected.join("\n"), i + 1];
    }
    collected.push(lines[i]);
  }
  throw parseError(missing);
}

function parseV0(lines: string[]): PatchDocument {
  const instructions: PatchInstruction[] = [];
  let baseSha256: string | undefined;
  let i = 0;
  while (i < lines.length) {
    const trimmed = lines[i].trim();
    if (trimmed.startsWith(BASE_PREFIX)) {
      baseSha256 = readBaseSha(trimmed, baseSha256);
      i++;
      continue;
    }
    if (trimmed !== V0_OPEN) {
      i++;
      continue;
    }
    const [search, afterSearch] = collectSection(
      lines,
      i + 1,
      V0_SEPARATOR,
      "Missing '====' separator after SEARCH block"
    );
    const [replace, afterReplace] = collectSection(
      lines,
      afterSearch,
      V0_CLOSE,
      "Missing '>>>>' terminator after REPLACE block"
    );
    if (search === "") {
      throw parseError("SEARCH block is empty");
    }
    instructions.push({ format: "v0", search, replace });
    i = afterReplace;
  }
  if (instructions.length === 0) {
    throw parseError("No valid <<<< SEARCH blocks found in patch");
  }
  return { format: "v0", baseSha256, instructions };
}

type PendingSections = Partial<Record<V1Header, string>>;

function collectUntilHeader(lines: string[], start: number): [string, number] {
  const collected: string[] = [];
  let i = start;
  while (i < lines.length && !isV1Header(lines[i].trim())) {
    collected.push(lines[i]);
    i++;
  }
  return [collected.length > 0 ? `${collected.join("\n")}\n` : "", i];
}

function takeInstruction(pending: PendingSections): ContextAnchoredInstruction | null {
  const leftCtx = pending["LEFT_CTX:"];
  const old = pending["OLD:"];
  const rightCtx = pending["RIGHT_CTX:"];
  const replacement = pending["NEW:"];
  if (leftCtx === undefined || old === undefined || rightCtx === undefined || replacement === undefined) {
    return null;
  }
  return { format: "v1", leftCtx, old, rightCtx, new: replacement };
}

function parseV1(lines: string[]): PatchDocument {
  const instructions: PatchInstruction[] = [];
  let baseSha256: string | undefined;
  let maxMatchesSeen = false;
  let sawLeftCtx = false;
  let pending: PendingSections = {};
  let i = 0;

  while (i < lines.length) {
    const trimmed = lines[i].trim();
    if (trimmed.startsWith(BASE_PREFIX)) {
      baseSha256 = readBaseSha(trimmed, baseSha256);
      i++;
      continue;
    }
    if (trimmed.startsWith(MAX_MATCHES_PREFIX)) {
      const value = trimmed.slice(MAX_MATCHES_PREFIX.length).trim();
      if (value !== "1") {
        throw protocolError(`MAX_MATCHES must be 1. Got: ${value}`);
      }
      maxMatchesSeen = true;
      i++;
      continue;
    }
    if (!isV1Header(trimmed)) {
      i++;
      continue;
    }
    if (trimmed === "LEFT_CTX:") {
      sawLeftCtx = true;
    }
    if (pending[trimmed] !== undefined) {
      throw protocolError(`duplicate ${trimmed} section before the instruction was complete`);
    }
    const [text, next] = collectUntilHeader(lines, i + 1);
    pending[trimmed] = text;
    const instruction = takeInstruction(pending);
    if (instruction) {
      if (instruction.leftCtx + instruction.old + instruction.rightCtx === "") {
        throw protocolError("V1 instruction has empty LEFT_CTX, OLD and RIGHT_CTX");
      }
      instructions.push(instruction);
      pending = {};
    }
    i = next;
  }

  if (instructions.length === 0 && sawLeftCtx) {
    throw protocolError("parsed V1 headers but found no complete instruction; LEFT_CTX, OLD, RIGHT_CTX and NEW are all required");
  }
  if (Object.keys(pending).length > 0) {
    throw protocolError(`incomplete V1 instruction at end of patch (have ${Object.keys(pending).join(", ")})`);
  }
  if (instructions.length === 0) {
    throw protocolError("V1 patch contains no complete instruction");
  }
  if (!maxMatchesSeen) {
    throw protocolError("V1 patch must declare MAX_MATCHES: 1");
  }
  return { format: "v1", baseSha256, instructions };
}

function withTrailingNewline(text: string): string {
  return text === "" || text.endsWith("\n") ? text : `${text}\n`;
}

export function serializePatchDocument(doc: PatchDocument): string {
  const out: string[] = [];
  if (doc.baseSha256) {
    out.push(`${BASE_PREFIX} ${doc.baseSha256}\n`);
  }
  if (doc.instructions.some((instruction) => instruction.format === "v1")) {
    out.push(`${MAX_MATCHES_PREFIX} 1\n`);
  }
  for (const instruction of doc.instructions) {
    if (instruction.format === "v0") {
      out.push(`${V0_OPEN}\n${instruction.search}\n${V0_SEPARATOR}\n${instruction.replace}\n${V0_CLOSE}\n`);
    } else {
      out.push(
        `LEFT_CTX:\n${withTrailingNewline(instruction.leftCtx)}` +
          `OLD:\n${withTrailingNewline(instruction.old)}` +
          `RIGHT_CTX:\n${withTrailingNewline(instruction.rightCtx)}` +
          `NEW:\n${withTrailingNewline(instruction.new)}`
      );
    }
  }
  return out.join("");
}
