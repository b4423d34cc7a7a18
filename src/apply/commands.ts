import { loadConfig, type GateConfig } from "../config.js";
import { GateError, errorMessage } from "../errors.js";
import { EventLog } from "../events.js";
import { ExitCode, exitCodeFor } from "../exit.js";
import { summarizeStageDiff, type DiffEntry } from "../stage/diff.js";
import { StageManager, stagePaths, type CopyStats } from "../stage/manager.js";
import type { StageState } from "../stage/state.js";
import { silentLogger } from "../utils/log.js";
import type { VerifyReport } from "../verify/verifier.js";
import { promoteAndFinalize, stageTarget, verifyTarget, type RunContext } from "./orchestrator.js";

export interface CommandOutcome<T = undefined> {
  exitCode: ExitCode;
  message?: string;
  data?: T;
}

interface Session {
  config: GateConfig;
  events: EventLog;
  manager: StageManager;
}

async function openSession(ctx: RunContext): Promise<Session> {
  const logger = ctx.logger ?? silentLogger;
  const events = new EventLog(stagePaths(ctx.repoRoot).stateDir, logger);
  const manager = new StageManager(ctx.repoRoot, { events, logger });
  const config = ctx.config ?? (await loadConfig(manager.repoRoot));
  return { config, events, manager };
}

function failed<T>(err: unknown): CommandOutcome<T> {
  return { exitCode: exitCodeFor(err), message: errorMessage(err) };
}

function noStage(): GateError {
  return new GateError("No stage exists. Run 'shadowgate apply' first.", "input");
}

export interface PromoteCommandOptions {
  dryRun?: boolean;
  commit?: boolean;
  push?: boolean;
}

export interface PromoteSummary {
  written: string[];
  deleted: string[];
  diff?: DiffEntry[];
}

/** Promotes the live stage as it stands; with dryRun only reports the diff. */
export async function runPromote(
  ctx: RunContext,
  options: PromoteCommandOptions = {}
): Promise<CommandOutcome<PromoteSummary>> {
  try {
    const { config, events, manager } = await openSession(ctx);
    const stage = await manager.open();
    if (!stage) {
      throw noStage();
    }
    if (options.dryRun) {
      const diff = await summarizeStageDiff(stage);
      return { exitCode: ExitCode.Success, data: { written: [], deleted: [], diff } };
    }
    if (stage.state.touched.length === 0) {
      return { exitCode: ExitCode.Success, message: "Nothing to promote.", data: { written: [], deleted: [] } };
    }
    const { result } = await promoteAndFinalize(ctx, config, manager, stage, events, options);
    return { exitCode: ExitCode.Success, data: { written: result.written, deleted: result.deleted } };
  } catch (err) {
    return failed(err);
  }
}

/** Runs the verifier in the effective working directory: the stage when one is live. */
export async function runCheck(ctx: RunContext): Promise<CommandOutcome<VerifyReport>> {
  try {
    const { config, events, manager } = await openSession(ctx);
    const stage = await manager.open();
    const cwd = await manager.effectiveCwd();
    const target = stage ? stageTarget(stage) : { cwd, touched: [] };
    const report = await verifyTarget(ctx, config, target, events, true);
    return {
      exitCode: report.passed ? ExitCode.Success : ExitCode.CheckFailed,
      message: report.failure ? `Check failed: ${report.failure.name}` : undefined,
      data: report
    };
  } catch (err) {
    return failed(err);
  }
}

/** Creates the stage; with force an existing one is discarded first. */
export async function runBranch(ctx: RunContext, force: boolean): Promise<CommandOutcome<CopyStats>> {
  try {
    const { manager } = await openSession(ctx);
    if (await manager.exists()) {
      if (!force) {
        throw new GateError("A stage already exists. Use 'branch --force' to recreate it or 'abort' to discard it.", "input");
      }
      await manager.reset();
    }
    const { stats } = await manager.create();
    return { exitCode: ExitCode.Success, data: stats };
  } catch (err) {
    return failed(err);
  }
}

export async function runAbort(ctx: RunContext): Promise<CommandOutcome<boolean>> {
  try {
    const { manager } = await openSession(ctx);
    const removed = await manager.reset();
    return { exitCode: ExitCode.Success, message: removed ? "Stage discarded." : "No stage to discard.", data: removed };
  } catch (err) {
    return failed(err);
  }
}

export async function readStatus(ctx: RunContext): Promise<CommandOutcome<StageState | null>> {
  try {
    const { manager } = await openSession(ctx);
    const stage = await manager.open();
    return { exitCode: ExitCode.Success, data: stage ? stage.state : null };
  } catch (err) {
    return failed(err);
  }
}
