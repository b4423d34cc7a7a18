import { normalizeRelPath } from "../utils/paths.js";

export const STATE_DIR_NAME = ".shadowgate";

/** Never mirrored or promoted, at any depth. */
const PRESERVED_ANYWHERE = [STATE_DIR_NAME, ".git", "node_modules", "__pycache__", ".venv", "venv", ".tox"];

/** Never mirrored or promoted when they sit at the repository root. */
const PRESERVED_AT_ROOT = ["dist", "build", "target", "out", "coverage", ".next", ".nuxt", "vendor"];

const PRESERVED_FILES = [".DS_Store", "Thumbs.db", "desktop.ini"];

/**
 * The one predicate deciding which workspace paths the stage leaves alone:
 * they are not copied into the worktree and never promoted back out.
 */
export function shouldPreserve(relPath: string): boolean {
  const parts = normalizeRelPath(relPath).split("/");
  if (parts.length === 0 || parts[0] === "") {
    return false;
  }
  if (PRESERVED_AT_ROOT.includes(parts[0])) {
    return true;
  }
  if (parts.some((part) => PRESERVED_ANYWHERE.includes(part))) {
    return true;
  }
  const fileName = parts[parts.length - 1];
  return PRESERVED_FILES.includes(fileName);
}

/** fast-glob ignore patterns that prune preserved directories during a walk. */
export function preservedGlobs(): string[] {
  return [
    ...PRESERVED_ANYWHERE.map((dir) => `**/${dir}/**`),
    ...PRESERVED_AT_ROOT.map((dir) => `${dir}/**`)
  ];
}
