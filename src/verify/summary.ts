const NOISE_PREFIXES = ["Compiling", "Checking", "Finished", "Downloading", "Running", "Building", "Blocking", "Fresh"];

const NOISE_PATTERNS: RegExp[] = [
  /^test .+ \.\.\. ok$/,
  /^[✓✔√]\s/,
  /^ok \d+ - /,
  /^PASS\s/,
  /^#\s(pass|skipped|todo)\b/
];

export function isNoiseLine(line: string): boolean {
  const trimmed = line.trim();
  if (trimmed === "") {
    return true;
  }
  return NOISE_PREFIXES.some((prefix) => trimmed.startsWith(prefix)) || NOISE_PATTERNS.some((pattern) => pattern.test(trimmed));
}

/**
 * Reduces check output to what explains a failure: build chatter and passing
 * test lines are dropped and only the last `maxLines` lines are kept.
 */
export function summarizeOutput(output: string, maxLines: number): string {
  const kept = output
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .filter((line) => !isNoiseLine(line));
  if (kept.length === 0) {
    return "(no diagnostic output)";
  }
  if (kept.length <= maxLines) {
    return kept.join("\n");
  }
  const hidden = kept.length - maxLines;
  return [`... (${hidden} lines hidden)`, ...kept.slice(hidden)].join("\n");
}
