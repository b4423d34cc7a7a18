import { AmbiguousMatchError, GateError, HashMismatchError, ZeroMatchError } from "../errors.js";
import { fingerprint, normalizeLineEndings } from "../utils/hash.js";
import { describeAmbiguous, describeZeroMatch, probeClosestRegion } from "./diagnostics.js";
import { detectLineEnding, findOccurrences, lineNumberAt, toLineEnding } from "./text.js";
import type { PatchDocument, PatchInstruction, PatchSet, ResolvedInstruction } from "./types.js";

/** The one place patch formats are told apart. */
export function resolveInstruction(instruction: PatchInstruction): ResolvedInstruction {
  switch (instruction.format) {
    case "v0":
      return { search: instruction.search, replace: instruction.replace };
    case "v1":
      return {
        search: instruction.leftCtx + instruction.old + instruction.rightCtx,
        replace: instruction.leftCtx + instruction.new + instruction.rightCtx,
        leftCtx: instruction.leftCtx
      };
  }
}

/**
 * Folds every patch document for one path into a single set. A later
 * document may repeat the first declared BASE_SHA256 but not contradict it.
 */
export function mergePatchDocuments(relPath: string, docs: PatchDocument[]): PatchSet {
  let baseSha256: string | undefined;
  const instructions: PatchInstruction[] = [];
  for (const doc of docs) {
    if (doc.baseSha256 !== undefined) {
      if (baseSha256 !== undefined && baseSha256 !== doc.baseSha256) {
        throw new GateError(
          `Protocol violation: patches for ${relPath} declare conflicting BASE_SHA256 values (${baseSha256} vs ${doc.baseSha256})`,
          "protocol"
        );
      }
      baseSha256 = doc.baseSha256;
    }
    instructions.push(...doc.instructions);
  }
  return { baseSha256, instructions };
}

/**
 * Applies instructions in order, each against the output of the previous one.
 * The declared base hash is compared once, against `original`.
 */
export function applyPatchSet(relPath: string, original: string, patch: PatchSet): string {
  if (patch.baseSha256 !== undefined) {
    const actual = fingerprint(original);
    if (actual !== patch.baseSha256) {
      throw new HashMismatchError(relPath, patch.baseSha256, actual);
    }
  }
  let current = original;
  for (const instruction of patch.instructions) {
    current = applyInstruction(relPath, current, instruction);
  }
  return current;
}

/**
 * Matching runs over LF-normalized text, so a search block matches whatever
 * line endings the file or the delivery used. The result is re-emitted in
 * the file's detected convention; line numbers in errors refer to the
 * normalized text.
 */
export function applyInstruction(relPath: string, content: string, instruction: PatchInstruction): string {
  const eol = detectLineEnding(content);
  const text = normalizeLineEndings(content);
  const { search, replace, leftCtx } = resolveInstruction(instruction);
  const needle = normalizeLineEndings(search);
  const occurrences = findOccurrences(text, needle);

  if (occurrences.length === 0) {
    const probe = probeClosestRegion(text, needle);
    throw new ZeroMatchError(
      describeZeroMatch(relPath, text, needle, probe, leftCtx === undefined ? undefined : normalizeLineEndings(leftCtx)),
      probe
    );
  }
  if (occurrences.length > 1) {
    const lineNumbers = occurrences.map((offset) => lineNumberAt(text, offset));
    throw new AmbiguousMatchError(describeAmbiguous(relPath, text, needle, lineNumbers), occurrences.length, lineNumbers);
  }

  const [index] = occurrences;
  const patched = text.slice(0, index) + normalizeLineEndings(replace) + text.slice(index + needle.length);
  return toLineEnding(patched, eol);
}
