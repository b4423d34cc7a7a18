export type GateErrorCode =
  | "input"
  | "parse"
  | "protocol"
  | "path_rejected"
  | "protected_file"
  | "content_rejected"
  | "hash_mismatch"
  | "zero_match"
  | "ambiguous"
  | "patch_base_missing"
  | "stage_io"
  | "write"
  | "check_failed"
  | "promote"
  | "cancelled";

export class GateError extends Error {
  readonly code: GateErrorCode;

  constructor(message: string, code: GateErrorCode) {
    super(message);
    this.name = "GateError";
    this.code = code;
  }
}

export class HashMismatchError extends GateError {
  readonly path: string;
  readonly declared: string;
  readonly actual: string;

  constructor(path: string, declared: string, actual: string) {
    super(
      [
        `HashMismatch for ${path}: BASE_SHA256 verification failed.`,
        `Declared: ${declared}`,
        `Actual:   ${actual}`,
        "Hashes are computed after normalizing line endings to LF; regenerate the patch against the current file."
      ].join("\n"),
      "hash_mismatch"
    );
    this.name = "HashMismatchError";
    this.path = path;
    this.declared = declared;
    this.actual = actual;
  }
}

export class AmbiguousMatchError extends GateError {
  readonly count: number;
  readonly lineNumbers: number[];

  constructor(message: string, count: number, lineNumbers: number[]) {
    super(message, "ambiguous");
    this.name = "AmbiguousMatchError";
    this.count = count;
    this.lineNumbers = lineNumbers;
  }
}

export interface ProbeRegion {
  /** 1-based line of the first quoted line. */
  startLine: number;
  /** 1-based line where the file stops agreeing with the search text. */
  divergenceLine: number;
  matchedChars: number;
  lines: string[];
}

export class ZeroMatchError extends GateError {
  readonly probe: ProbeRegion | null;

  constructor(message: string, probe: ProbeRegion | null) {
    super(message, "zero_match");
    this.name = "ZeroMatchError";
    this.probe = probe;
  }
}

export type ValidationIssueKind = "path_rejected" | "protected_file" | "content_rejected" | "manifest";

export interface ValidationIssue {
  kind: ValidationIssueKind;
  path: string;
  message: string;
}

export class ValidationError extends GateError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(
      `Delivery rejected:\n${issues.map((issue) => `- ${issue.message}`).join("\n")}`,
      dominantCode(issues)
    );
    this.name = "ValidationError";
    this.issues = issues;
  }
}

function dominantCode(issues: ValidationIssue[]): GateErrorCode {
  if (issues.some((issue) => issue.kind === "path_rejected")) {
    return "path_rejected";
  }
  if (issues.some((issue) => issue.kind === "protected_file")) {
    return "protected_file";
  }
  return "content_rejected";
}

export class PromoteError extends GateError {
  readonly rolledBack: boolean;
  readonly rollbackErrors: string[];

  constructor(message: string, rolledBack: boolean, rollbackErrors: string[]) {
    super(message, "promote");
    this.name = "PromoteError";
    this.rolledBack = rolledBack;
    this.rollbackErrors = rollbackErrors;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
