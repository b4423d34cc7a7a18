import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { STATE_DIR_NAME } from "./stage/preserve.js";

const execFileAsync = promisify(execFile);

export interface GitOutcome {
  committed: boolean;
  pushed: boolean;
  message: string;
}

async function git(cwd: string, args: string[]): Promise<string> {
  const { stdout } = await execFileAsync("git", args, { cwd });
  return stdout;
}

async function succeeds(cwd: string, args: string[]): Promise<boolean> {
  try {
    await git(cwd, args);
    return true;
  } catch {
    return false;
  }
}

export async function isGitRepo(cwd: string): Promise<boolean> {
  return succeeds(cwd, ["rev-parse", "--git-dir"]);
}

/** Whether the work tree has changes, ignoring the tool's own state directory. */
export async function isDirty(cwd: string): Promise<boolean> {
  const status = await git(cwd, ["status", "--porcelain"]);
  return status
    .split("\n")
    .map((line) => line.slice(3).replace(/^"|"$/g, ""))
    .some((file) => file !== "" && !file.startsWith(`${STATE_DIR_NAME}/`));
}

async function hasPushTarget(cwd: string): Promise<boolean> {
  const remotes = (await git(cwd, ["remote"])).trim();
  if (remotes === "") {
    return false;
  }
  return succeeds(cwd, ["rev-parse", "--abbrev-ref", "--symbolic-full-name", "@{u}"]);
}

/**
 * Stages everything, commits when something is staged and pushes when a
 * remote with an upstream exists. A missing remote or upstream is not an error.
 */
export async function commitAndPush(cwd: string, message: string, options: { push: boolean }): Promise<GitOutcome> {
  await git(cwd, ["add", "-A", "--", ".", `:(exclude)${STATE_DIR_NAME}`]);
  const staged = (await git(cwd, ["diff", "--cached", "--name-only"])).trim();
  if (staged === "") {
    return { committed: false, pushed: false, message: "Nothing to commit" };
  }
  await git(cwd, ["commit", "-m", message]);
  if (!options.push) {
    return { committed: true, pushed: false, message: "Committed" };
  }
  if (!(await hasPushTarget(cwd))) {
    return { committed: true, pushed: false, message: "Committed; no remote or upstream to push to" };
  }
  await git(cwd, ["push"]);
  return { committed: true, pushed: true, message: "Committed and pushed" };
}
