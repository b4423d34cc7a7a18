import { CONFIG_FILE_NAME } from "../config.js";
import { shouldPreserve } from "../stage/preserve.js";
import { looksAbsolute, normalizeRelPath, toPosixPath } from "../utils/paths.js";

export type PathVerdict =
  | { ok: true; path: string }
  | { ok: false; kind: "path_rejected" | "protected_file"; reason: string };

export interface PathPolicy {
  /** Extra protected file names or relative paths, compared case-insensitively. */
  protectedPaths?: string[];
  /** Extra hidden names allowed through. */
  allowHidden?: string[];
}

/** Rejected wherever they appear in a path. */
const BLOCKED_DIRS = new Set([".git", ".ssh", ".aws", ".gnupg", ".cargo"]);

const BLOCKED_FILE_PATTERNS: RegExp[] = [
  /^\.env(\..*)?$/i,
  /^id_(rsa|dsa|ecdsa|ed25519)(\.pub)?$/i,
  /\.(pem|key|p12|pfx|keystore|jks)$/i,
  /^credentials(\.json)?$/i,
  /^\.netrc$/i,
  /^\.npmrc$/i
];

export const ROADMAP_FILES = ["tasks.toml", "ROADMAP.md"];

const PROTECTED_FILES = [
  CONFIG_FILE_NAME,
  ".shadowgateignore",
  "package-lock.json",
  "yarn.lock",
  "pnpm-lock.yaml",
  "bun.lockb",
  "Cargo.lock",
  "poetry.lock",
  "Pipfile.lock",
  "Gemfile.lock",
  "composer.lock",
  "go.sum",
  ...ROADMAP_FILES
];

const ALLOWED_HIDDEN = new Set([
  ".gitignore",
  ".gitattributes",
  ".editorconfig",
  ".github",
  ".prettierrc",
  ".prettierignore",
  ".eslintrc",
  ".eslintrc.json",
  ".eslintrc.cjs",
  ".eslintignore",
  ".nvmrc",
  ".node-version",
  ".vscode"
]);

export function isRoadmapFile(relPath: string): boolean {
  const lower = relPath.toLowerCase();
  return ROADMAP_FILES.some((name) => name.toLowerCase() === lower);
}

export function protectedMessage(relPath: string): string {
  if (isRoadmapFile(relPath)) {
    return `Cannot overwrite protected file: ${relPath}. The task store is edited through roadmap commands, not file deliveries.`;
  }
  return `Cannot overwrite protected file: ${relPath}. Change it by hand or through the tool that owns it.`;
}

/**
 * Decides whether a delivery path may be written. Accepted paths come back in
 * canonical relative form.
 */
export function validatePath(rawPath: string, policy: PathPolicy = {}): PathVerdict {
  const reject = (reason: string): PathVerdict => ({ ok: false, kind: "path_rejected", reason });

  if (rawPath.includes("\0")) {
    return reject(`Path contains a null byte: ${JSON.stringify(rawPath)}`);
  }
  const trimmed = rawPath.trim();
  if (looksAbsolute(trimmed)) {
    return reject(`Absolute paths are not allowed: ${rawPath}`);
  }
  const segments = toPosixPath(trimmed).split("/");
  if (segments.includes("..")) {
    return reject(`Path traversal is not allowed: ${rawPath}`);
  }
  const relPath = normalizeRelPath(trimmed);
  if (relPath === "") {
    return reject("Empty paths are not allowed");
  }

  const parts = relPath.split("/");
  const allowHidden = new Set([...ALLOWED_HIDDEN, ...(policy.allowHidden ?? [])].map((name) => name.toLowerCase()));
  for (const part of parts) {
    const lower = part.toLowerCase();
    if (BLOCKED_DIRS.has(lower)) {
      return reject(`Access to sensitive directory blocked: ${relPath}`);
    }
    if (BLOCKED_FILE_PATTERNS.some((pattern) => pattern.test(part))) {
      return reject(`Access to sensitive file blocked: ${relPath}`);
    }
    if (part.startsWith(".") && !allowHidden.has(lower)) {
      return reject(`Hidden files are blocked: ${relPath}`);
    }
  }

  if (shouldPreserve(relPath)) {
    return reject(`Path is inside a preserved directory (dependencies, build output or tool state): ${relPath}`);
  }

  if (isProtected(relPath, policy)) {
    return { ok: false, kind: "protected_file", reason: protectedMessage(relPath) };
  }
  return { ok: true, path: relPath };
}

export function isProtected(relPath: string, policy: PathPolicy = {}): boolean {
  const lowerPath = relPath.toLowerCase();
  const fileName = lowerPath.split("/").pop() ?? lowerPath;
  const builtIn = PROTECTED_FILES.some((name) => name.toLowerCase() === fileName);
  const extra = (policy.protectedPaths ?? []).some((entry) => {
    const lowerEntry = normalizeRelPath(entry).toLowerCase();
    return lowerEntry.includes("/") ? lowerEntry === lowerPath : lowerEntry === fileName;
  });
  return builtIn || extra;
}
