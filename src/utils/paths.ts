import path from "node:path";

export function toPosixPath(inputPath: string): string {
  return inputPath.replace(/\\/g, "/");
}

/**
 * Collapses a delivery path to its canonical relative form: forward slashes,
 * no empty or `.` segments. Does not resolve `..`; callers reject those.
 */
export function normalizeRelPath(inputPath: string): string {
  return toPosixPath(inputPath.trim())
    .split("/")
    .filter((segment) => segment !== "" && segment !== ".")
    .join("/");
}

/** Absolute on any platform: leading slash, leading backslash (UNC), or drive letter. */
export function looksAbsolute(inputPath: string): boolean {
  const trimmed = inputPath.trim();
  return trimmed.startsWith("/") || trimmed.startsWith("\\") || /^[a-zA-Z]:/.test(trimmed);
}

/**
 * Canonical form used as a delivery key. Absolute paths are kept as written so
 * validation can still see and reject them.
 */
export function canonicalDeliveryPath(inputPath: string): string {
  return looksAbsolute(inputPath) ? inputPath.trim() : normalizeRelPath(inputPath);
}

function ensureSafeRelPath(relPath: string): void {
  const posixPath = toPosixPath(relPath);
  if (posixPath.includes("\0")) {
    throw new Error(`Invalid path contains null byte: ${relPath}`);
  }
  if (!posixPath || posixPath === ".") {
    throw new Error(`Empty paths are not allowed`);
  }
  if (posixPath.startsWith("/")) {
    throw new Error(`Absolute paths are not allowed: ${relPath}`);
  }
  if (/^[a-zA-Z]:/.test(posixPath)) {
    throw new Error(`Drive paths are not allowed: ${relPath}`);
  }
  const segments = posixPath.split("/");
  for (const segment of segments) {
    if (!segment) {
      throw new Error(`Invalid path segment in: ${relPath}`);
    }
    if (segment === "..") {
      throw new Error(`Path traversal is not allowed: ${relPath}`);
    }
  }
}

export function safeJoin(rootDir: string, relPosixPath: string): string {
  ensureSafeRelPath(relPosixPath);
  const relNative = toPosixPath(relPosixPath).split("/").join(path.sep);
  const rootResolved = path.resolve(rootDir);
  const targetResolved = path.resolve(rootResolved, relNative);
  if (!isInside(rootResolved, targetResolved)) {
    throw new Error(`Path escapes root: ${relPosixPath}`);
  }
  return targetResolved;
}

export function isInside(rootDir: string, targetPath: string): boolean {
  const relative = path.relative(rootDir, targetPath);
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

export function extensionOf(relPath: string): string {
  return path.posix.extname(relPath).toLowerCase();
}

export function isMarkdownPath(relPath: string): boolean {
  const ext = extensionOf(relPath);
  return ext === ".md" || ext === ".markdown" || ext === ".mdx";
}
