import { GateError, ValidationError } from "../errors.js";
import type { CheckOutcome } from "../verify/verifier.js";

const DELIVERY_HINT =
  'Send corrected files as <file path="..."> blocks (or <patch path="..."> blocks against the current text), each marker on its own line, listed in the <delivery> manifest.';

/** Feedback meant to be pasted back to the model that produced the delivery. */
export function formatRejectionFeedback(err: GateError): string {
  const lines = ["The previous delivery was rejected.", ""];
  if (err instanceof ValidationError) {
    lines.push("VALIDATION ERRORS:", ...err.issues.map((issue) => `- ${issue.message}`));
  } else if (err.code === "parse" || err.code === "protocol") {
    lines.push("FORMAT ERROR:", err.message);
  } else {
    lines.push("PATCH FAILED:", err.message);
  }
  lines.push("", DELIVERY_HINT);
  return lines.join("\n");
}

export function formatCheckFeedback(failure: CheckOutcome): string {
  return [
    `The delivery was applied to the stage but the check '${failure.name}' failed (exit ${failure.exitCode}).`,
    "",
    failure.summary,
    "",
    "Fix the reported problems and send the affected files again."
  ].join("\n");
}

/** Edit-volume advisory, or null when the stage is under the threshold. */
export function editAdvisory(touchedCount: number, threshold: number): string | null {
  if (touchedCount <= threshold) {
    return null;
  }
  return [
    "[ADVISORY] High edit volume detected",
    `  ${touchedCount} files touched in the stage.`,
    "  Consider promoting and committing soon to keep checkpoints small."
  ].join("\n");
}

export const DEFAULT_COMMIT_MESSAGE = "chore: apply shadowgate changes";

export function commitMessageFor(goal: string | undefined): string {
  return goal ? `ai: ${goal}` : DEFAULT_COMMIT_MESSAGE;
}
