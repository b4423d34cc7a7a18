import type { GateConfig } from "../config.js";
import type { Delivery } from "../delivery/types.js";
import { ValidationError, type ValidationIssue } from "../errors.js";
import { resolveInstruction } from "../patch/apply.js";
import { findTruncationLine, validateContent } from "./content.js";
import { validatePath, type PathPolicy } from "./path.js";

export function pathPolicyFrom(config: GateConfig): PathPolicy {
  return { protectedPaths: config.paths.protected, allowHidden: config.paths.allowHidden };
}

/**
 * Collects every problem with a parsed delivery. Path checks run first; bodies
 * of rejected paths are not inspected further.
 */
export function collectDeliveryIssues(delivery: Delivery, config: GateConfig): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const policy = pathPolicyFrom(config);
  const rejectedPaths = new Set<string>();
  const manifestPaths = new Set<string>();

  const checkPath = (path: string): void => {
    if (rejectedPaths.has(path)) {
      return;
    }
    const verdict = validatePath(path, policy);
    if (!verdict.ok) {
      rejectedPaths.add(path);
      issues.push({ kind: verdict.kind, path, message: verdict.reason });
    }
  };

  if (config.preferences.requirePlan && !delivery.plan) {
    issues.push({ kind: "manifest", path: "", message: "A <plan> block with a GOAL: line is required." });
  }

  for (const entry of delivery.manifest) {
    checkPath(entry.path);
    if (manifestPaths.has(entry.path)) {
      issues.push({ kind: "manifest", path: entry.path, message: `Manifest lists '${entry.path}' more than once.` });
      continue;
    }
    manifestPaths.add(entry.path);
    const hasBody = delivery.files.has(entry.path);
    const hasPatch = delivery.patches.has(entry.path);
    if (entry.operation === "delete") {
      if (hasBody || hasPatch) {
        issues.push({
          kind: "manifest",
          path: entry.path,
          message: `Manifest says delete '${entry.path}', but a file or patch block was provided.`
        });
      }
    } else if (!hasBody && !hasPatch) {
      const verb = entry.operation === "new" ? "create" : "update";
      issues.push({
        kind: "manifest",
        path: entry.path,
        message: `Manifest says ${verb} '${entry.path}', but no file or patch block was found.`
      });
    } else if (entry.operation === "new" && hasPatch) {
      issues.push({
        kind: "manifest",
        path: entry.path,
        message: `Manifest marks '${entry.path}' as NEW, but only a patch was provided; send the full file.`
      });
    }
  }

  for (const path of [...delivery.files.keys(), ...delivery.patches.keys()]) {
    if (!manifestPaths.has(path)) {
      checkPath(path);
      issues.push({ kind: "manifest", path, message: `Block for '${path}' is not listed in the manifest.` });
    }
  }

  for (const [path, body] of delivery.files) {
    if (!rejectedPaths.has(path)) {
      issues.push(...validateContent(path, body.content));
    }
  }

  for (const [path, patch] of delivery.patches) {
    if (rejectedPaths.has(path)) {
      continue;
    }
    patch.instructions.forEach((instruction, index) => {
      const { replace } = resolveInstruction(instruction);
      const line = findTruncationLine(replace);
      if (line !== null) {
        issues.push({
          kind: "content_rejected",
          path,
          message: `Truncation detected in patch ${index + 1} for ${path} at replacement line ${line}: the replacement is incomplete.`
        });
      }
    });
  }

  return issues;
}

export function validateDelivery(delivery: Delivery, config: GateConfig): void {
  const issues = collectDeliveryIssues(delivery, config);
  if (issues.length > 0) {
    throw new ValidationError(issues);
  }
}
