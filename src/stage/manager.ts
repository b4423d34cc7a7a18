import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { GateError, errorMessage } from "../errors.js";
import type { EventLog } from "../events.js";
import { copyFileStream, ensureDir, isDirectory, pathExists, readJsonFile, removeDir, walkFiles, writeJsonFile } from "../utils/fs.js";
import { silentLogger, type Logger } from "../utils/log.js";
import { safeJoin } from "../utils/paths.js";
import { STATE_DIR_NAME, preservedGlobs, shouldPreserve } from "./preserve.js";
import { StageStateSchema, nowSeconds, upsertTouch, type StageState, type TouchKind } from "./state.js";

export interface StagePaths {
  /** `<repo>/.shadowgate` */
  stateDir: string;
  stageDir: string;
  worktree: string;
  stateFile: string;
  backupsDir: string;
}

export function stagePaths(repoRoot: string): StagePaths {
  const stateDir = path.join(path.resolve(repoRoot), STATE_DIR_NAME);
  const stageDir = path.join(stateDir, "stage");
  return {
    stateDir,
    stageDir,
    worktree: path.join(stageDir, "worktree"),
    stateFile: path.join(stageDir, "state.json"),
    backupsDir: path.join(stateDir, "backups")
  };
}

export interface CopyStats {
  filesCopied: number;
  preservedSkipped: number;
  symlinksSkipped: number;
}

export interface Stage {
  repoRoot: string;
  paths: StagePaths;
  state: StageState;
}

export interface OpenResult {
  stage: Stage;
  created: boolean;
  /** Present when the stage was created by this call. */
  stats?: CopyStats;
}

export interface StageManagerOptions {
  events?: EventLog;
  logger?: Logger;
}

function stageIoError(action: string, err: unknown): GateError {
  if (err instanceof GateError) {
    return err;
  }
  return new GateError(`Stage ${action} failed: ${errorMessage(err)}`, "stage_io");
}

/** Owns `<repo>/.shadowgate/stage`: the shadow worktree and its state file. */
export class StageManager {
  readonly repoRoot: string;
  readonly paths: StagePaths;
  private readonly events?: EventLog;
  private readonly logger: Logger;

  constructor(repoRoot: string, options: StageManagerOptions = {}) {
    this.repoRoot = path.resolve(repoRoot);
    this.paths = stagePaths(this.repoRoot);
    this.events = options.events;
    this.logger = options.logger ?? silentLogger;
  }

  async exists(): Promise<boolean> {
    return (await isDirectory(this.paths.worktree)) && (await pathExists(this.paths.stateFile));
  }

  /** Opens the live stage, or returns null when there is none. */
  async open(): Promise<Stage | null> {
    if (!(await this.exists())) {
      return null;
    }
    let raw: unknown;
    try {
      raw = await readJsonFile(this.paths.stateFile);
    } catch (err) {
      throw stageIoError("state read", err);
    }
    const parsed = StageStateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new GateError(
        `Stage state file is invalid (${parsed.error.issues[0]?.message ?? "unknown issue"}); run 'shadowgate abort' to discard it`,
        "stage_io"
      );
    }
    return { repoRoot: this.repoRoot, paths: this.paths, state: parsed.data };
  }

  async openOrCreate(): Promise<OpenResult> {
    const existing = await this.open();
    if (existing) {
      this.logger.debug(`reusing stage ${existing.state.id}`);
      return { stage: existing, created: false };
    }
    const { stage, stats } = await this.create();
    return { stage, created: true, stats };
  }

  /**
   * Builds a fresh stage in a temporary sibling directory and renames it into
   * place, so a failed copy never leaves a half-made stage behind.
   */
  async create(): Promise<{ stage: Stage; stats: CopyStats }> {
    // Leftovers of an incomplete stage are not reusable.
    await removeDir(this.paths.stageDir);
    const tempDir = path.join(this.paths.stateDir, `stage.tmp-${randomUUID()}`);
    try {
      const stats = await this.copyWorkspace(path.join(tempDir, "worktree"));
      const now = nowSeconds();
      const state: StageState = StageStateSchema.parse({
        id: randomUUID(),
        created_at: now,
        updated_at: now,
        touched: [],
        apply_count: 0
      });
      await writeJsonFile(path.join(tempDir, "state.json"), state);
      await fs.rename(tempDir, this.paths.stageDir);
      await this.events?.append("stage_created", { id: state.id, files_copied: stats.filesCopied });
      this.logger.debug(
        `stage ${state.id} created: ${stats.filesCopied} files copied, ${stats.preservedSkipped} preserved, ${stats.symlinksSkipped} symlinks skipped`
      );
      return { stage: { repoRoot: this.repoRoot, paths: this.paths, state }, stats };
    } catch (err) {
      await removeDir(tempDir);
      throw stageIoError("creation", err);
    }
  }

  private async copyWorkspace(destRoot: string): Promise<CopyStats> {
    await ensureDir(destRoot);
    const { files, symlinks } = await walkFiles(this.repoRoot, preservedGlobs());
    let filesCopied = 0;
    let preservedSkipped = 0;
    for (const relPath of files) {
      if (shouldPreserve(relPath)) {
        preservedSkipped++;
        continue;
      }
      await copyFileStream(safeJoin(this.repoRoot, relPath), safeJoin(destRoot, relPath));
      filesCopied++;
    }
    const symlinksSkipped = symlinks.filter((relPath) => !shouldPreserve(relPath)).length;
    return { filesCopied, preservedSkipped, symlinksSkipped };
  }

  async save(stage: Stage): Promise<void> {
    stage.state.updated_at = nowSeconds();
    try {
      await writeJsonFile(stage.paths.stateFile, stage.state);
    } catch (err) {
      throw stageIoError("state write", err);
    }
  }

  async recordTouch(stage: Stage, relPath: string, kind: TouchKind): Promise<void> {
    upsertTouch(stage.state, relPath, kind);
    await this.save(stage);
  }

  async markApplied(stage: Stage): Promise<void> {
    stage.state.apply_count += 1;
    await this.save(stage);
  }

  async clearTouched(stage: Stage): Promise<void> {
    stage.state.touched = [];
    await this.save(stage);
  }

  /** Removes the stage directory. Returns whether there was one. Idempotent. */
  async reset(): Promise<boolean> {
    const hadStage = await pathExists(this.paths.stageDir);
    if (!hadStage) {
      return false;
    }
    let id: string | undefined;
    try {
      id = (await this.open())?.state.id;
    } catch (err) {
      this.logger.debug(`resetting unreadable stage: ${errorMessage(err)}`);
    }
    await removeDir(this.paths.stageDir);
    await this.events?.append("stage_reset", id === undefined ? {} : { id });
    return true;
  }

  /** Where downstream tools should run: the worktree when a stage is live. */
  async effectiveCwd(): Promise<string> {
    return (await this.exists()) ? this.paths.worktree : this.repoRoot;
  }
}
