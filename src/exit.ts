import { GateError, type GateErrorCode } from "./errors.js";

/** Process exit codes. Scripts depend on these values. */
export const ExitCode = {
  Success: 0,
  Error: 1,
  InvalidInput: 2,
  SafetyViolation: 3,
  PatchFailure: 4,
  PromoteFailure: 5,
  CheckFailed: 6
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

const EXIT_BY_CODE: Record<GateErrorCode, ExitCode> = {
  input: ExitCode.Error,
  parse: ExitCode.InvalidInput,
  protocol: ExitCode.InvalidInput,
  content_rejected: ExitCode.InvalidInput,
  path_rejected: ExitCode.SafetyViolation,
  protected_file: ExitCode.SafetyViolation,
  hash_mismatch: ExitCode.PatchFailure,
  zero_match: ExitCode.PatchFailure,
  ambiguous: ExitCode.PatchFailure,
  patch_base_missing: ExitCode.PatchFailure,
  stage_io: ExitCode.Error,
  write: ExitCode.Error,
  check_failed: ExitCode.CheckFailed,
  promote: ExitCode.PromoteFailure,
  cancelled: ExitCode.Error
};

export function exitCodeFor(err: unknown): ExitCode {
  if (err instanceof GateError) {
    return EXIT_BY_CODE[err.code];
  }
  return ExitCode.Error;
}
