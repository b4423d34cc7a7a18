import path from "node:path";
import { readTextIfExists } from "../utils/fs.js";
import { introducedIssues } from "../validate/content.js";

export interface ScanFinding {
  path: string;
  message: string;
}

/**
 * A scan run over the effective working directory after the external checks.
 * `baselineRoot`, when given, holds the files as they were before the
 * delivery.
 */
export interface StructuralScanner {
  readonly name: string;
  scan(cwd: string, paths: string[], baselineRoot?: string): Promise<ScanFinding[]>;
}

/**
 * Re-runs the content validator over touched files as they now stand,
 * reporting only what the baseline copy did not already contain.
 */
export const contentScanner: StructuralScanner = {
  name: "structural-scan",
  async scan(cwd, paths, baselineRoot) {
    const findings: ScanFinding[] = [];
    for (const relPath of paths) {
      const content = await readTextIfExists(path.join(cwd, relPath));
      if (content === null) {
        continue;
      }
      const baseline = baselineRoot === undefined ? null : await readTextIfExists(path.join(baselineRoot, relPath));
      for (const issue of introducedIssues(relPath, content, baseline)) {
        findings.push({ path: relPath, message: issue.message });
      }
    }
    return findings;
  }
};
