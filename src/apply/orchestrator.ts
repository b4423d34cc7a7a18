import chalk from "chalk";
import { loadConfig, type GateConfig } from "../config.js";
import { parseDelivery } from "../delivery/parser.js";
import { sanitizeDelivery } from "../delivery/sanitize.js";
import type { Delivery, Plan } from "../delivery/types.js";
import { GateError, errorMessage } from "../errors.js";
import { EventLog } from "../events.js";
import { ExitCode, exitCodeFor } from "../exit.js";
import { commitAndPush, isDirty, isGitRepo } from "../git.js";
import { describeSource, readInput, type InputSource } from "../input.js";
import { summarizeStageDiff, type DiffEntry } from "../stage/diff.js";
import { StageManager, stagePaths, type Stage } from "../stage/manager.js";
import { promote, type PromoteIO, type PromoteResult } from "../stage/promote.js";
import { writeDelivery } from "../stage/writer.js";
import { silentLogger, type Logger } from "../utils/log.js";
import { pathPolicyFrom, validateDelivery } from "../validate/delivery.js";
import { contentScanner, type StructuralScanner } from "../verify/scanner.js";
import { runVerification, type CommandRunner, type VerifyReport } from "../verify/verifier.js";
import { commitMessageFor, editAdvisory, formatCheckFeedback, formatRejectionFeedback } from "./messages.js";

export type ApplyStatus =
  | "success"
  | "dry_run"
  | "invalid_input"
  | "safety_violation"
  | "patch_failure"
  | "check_failed"
  | "promote_failure"
  | "error";

export interface ApplyOutcome {
  status: ApplyStatus;
  exitCode: ExitCode;
  /** Human-readable failure reason. */
  message?: string;
  /** Text for the model that wrote the delivery. */
  feedback?: string;
  written: string[];
  deleted: string[];
  promoted: boolean;
  warnings: string[];
  advisory?: string;
  diff?: DiffEntry[];
  stageId?: string;
}

/** Injection points shared by `apply`, `promote` and `check`. */
export interface RunContext {
  repoRoot: string;
  config?: GateConfig;
  logger?: Logger;
  /** Best-effort clipboard sink for feedback. */
  copy?: (text: string) => Promise<void>;
  runner?: CommandRunner;
  scanner?: StructuralScanner;
  promoteIO?: PromoteIO;
  /** Hide the spinner. */
  silent?: boolean;
}

export interface ApplyOptions extends RunContext {
  source: InputSource;
  force?: boolean;
  dryRun?: boolean;
  sanitize?: boolean;
  /** Defaults to true; false suppresses the configured auto-commit. */
  commit?: boolean;
  /** Defaults to true; false suppresses the configured auto-push. */
  push?: boolean;
  /** Asked before staging when a plan is present; absent means no prompt. */
  confirm?: (plan: Plan) => Promise<boolean>;
}

const STATUS_BY_EXIT: Record<ExitCode, ApplyStatus> = {
  [ExitCode.Success]: "success",
  [ExitCode.Error]: "error",
  [ExitCode.InvalidInput]: "invalid_input",
  [ExitCode.SafetyViolation]: "safety_violation",
  [ExitCode.PatchFailure]: "patch_failure",
  [ExitCode.PromoteFailure]: "promote_failure",
  [ExitCode.CheckFailed]: "check_failed"
};

function emptyOutcome(): ApplyOutcome {
  return { status: "success", exitCode: ExitCode.Success, written: [], deleted: [], promoted: false, warnings: [] };
}

function failWith(outcome: ApplyOutcome, err: unknown): ApplyOutcome {
  const exitCode = exitCodeFor(err);
  outcome.status = STATUS_BY_EXIT[exitCode];
  outcome.exitCode = exitCode;
  outcome.message = errorMessage(err);
  return outcome;
}

async function shareFeedback(ctx: RunContext, config: GateConfig, feedback: string): Promise<void> {
  const logger = ctx.logger ?? silentLogger;
  if (!config.preferences.autoCopy || !ctx.copy) {
    return;
  }
  try {
    await ctx.copy(feedback);
    logger.detail("Feedback copied to clipboard");
  } catch (err) {
    logger.debug(`clipboard copy failed: ${errorMessage(err)}`);
  }
}

export interface VerifyTarget {
  cwd: string;
  /** Files for the structural scan. */
  touched: string[];
  /** The workspace the stage was copied from. */
  baselineRoot?: string;
}

export function stageTarget(stage: Stage): VerifyTarget {
  return {
    cwd: stage.paths.worktree,
    baselineRoot: stage.repoRoot,
    touched: stage.state.touched.filter((touch) => touch.kind === "Write").map((touch) => touch.path)
  };
}

/** Runs the configured checks. `copySummary` sends a failure summary to `ctx.copy`. */
export function verifyTarget(
  ctx: RunContext,
  config: GateConfig,
  target: VerifyTarget,
  events: EventLog,
  copySummary: boolean
): Promise<VerifyReport> {
  return runVerification({
    cwd: target.cwd,
    commands: config.commands.check,
    touched: target.touched,
    baselineRoot: target.baselineRoot,
    scanner: ctx.scanner ?? contentScanner,
    summaryLines: config.preferences.summaryLines,
    events,
    logger: ctx.logger,
    copy: copySummary && config.preferences.autoCopy ? ctx.copy : undefined,
    runner: ctx.runner,
    silent: ctx.silent
  });
}

export interface FinalizeOptions {
  commit?: boolean;
  push?: boolean;
  goal?: string;
}

/**
 * Promotes the stage, then clears or removes it and runs the configured git
 * steps. Git problems are reported as warnings only.
 */
export async function promoteAndFinalize(
  ctx: RunContext,
  config: GateConfig,
  manager: StageManager,
  stage: Stage,
  events: EventLog,
  options: FinalizeOptions
): Promise<{ result: PromoteResult; warnings: string[] }> {
  const logger = ctx.logger ?? silentLogger;
  const warnings: string[] = [];
  const gitEnabled = config.git.autoCommit && options.commit !== false && (await isGitRepo(ctx.repoRoot));

  if (gitEnabled) {
    try {
      if (await isDirty(ctx.repoRoot)) {
        warnings.push("Workspace has uncommitted changes; they will be included in the commit.");
      }
    } catch (err) {
      logger.debug(`git status failed: ${errorMessage(err)}`);
    }
  }

  const result = await promote(stage, {
    policy: pathPolicyFrom(config),
    events,
    logger,
    io: ctx.promoteIO
  });

  if (config.preferences.resetStageAfterPromote) {
    await manager.reset();
  } else {
    await manager.clearTouched(stage);
  }

  if (gitEnabled) {
    try {
      const git = await commitAndPush(ctx.repoRoot, commitMessageFor(options.goal), {
        push: config.git.autoPush && options.push !== false
      });
      logger.detail(git.message);
    } catch (err) {
      warnings.push(`Git step failed: ${errorMessage(err)}`);
    }
  }
  for (const warning of warnings) {
    logger.warn(warning);
  }
  return { result, warnings };
}

function printPlan(logger: Logger, plan: Plan): void {
  logger.info(chalk.bold("\nPlan"));
  for (const line of plan.text.split("\n")) {
    logger.detail(`  ${line}`);
  }
  logger.info("");
}

/**
 * parse -> validate -> stage -> write -> verify -> promote. Never throws for
 * an expected failure: the outcome carries the status and exit code.
 */
export async function runApply(options: ApplyOptions): Promise<ApplyOutcome> {
  const logger = options.logger ?? silentLogger;
  const outcome = emptyOutcome();
  const events = new EventLog(stagePaths(options.repoRoot).stateDir, logger);
  const manager = new StageManager(options.repoRoot, { events, logger });

  let config: GateConfig;
  try {
    config = options.config ?? (await loadConfig(manager.repoRoot));
  } catch (err) {
    return failWith(outcome, err);
  }
  const ctx: RunContext = { ...options, repoRoot: manager.repoRoot };

  await events.append("apply_started", { source: describeSource(options.source), dry_run: options.dryRun ?? false });

  const reject = async (err: unknown): Promise<ApplyOutcome> => {
    await events.append("apply_rejected", { reason: errorMessage(err) });
    failWith(outcome, err);
    if (err instanceof GateError && err.code !== "input" && err.code !== "stage_io" && err.code !== "cancelled") {
      outcome.feedback = formatRejectionFeedback(err);
      await shareFeedback(ctx, config, outcome.feedback);
    }
    return outcome;
  };

  let delivery: Delivery;
  try {
    const raw = await readInput(options.source);
    const parsed = parseDelivery(raw);
    delivery = parsed.delivery;
    outcome.warnings.push(...parsed.warnings);
    if (options.sanitize) {
      for (const report of sanitizeDelivery(delivery)) {
        await events.append("sanitization_performed", { path: report.path, lines_removed: report.linesRemoved });
        logger.detail(`Sanitized ${report.path}: removed ${report.linesRemoved} fence line(s)`);
      }
    }
    validateDelivery(delivery, config);
  } catch (err) {
    return reject(err);
  }
  for (const warning of outcome.warnings) {
    logger.warn(warning);
  }

  if (delivery.plan && !options.force && !options.dryRun && options.confirm) {
    printPlan(logger, delivery.plan);
    if (!(await options.confirm(delivery.plan))) {
      return reject(new GateError("Apply cancelled by user", "cancelled"));
    }
  }

  let stage: Stage;
  try {
    const opened = await manager.openOrCreate();
    stage = opened.stage;
    outcome.stageId = stage.state.id;
    if (opened.stats) {
      logger.detail(
        `Stage created: ${opened.stats.filesCopied} files copied, ${opened.stats.preservedSkipped} preserved, ${opened.stats.symlinksSkipped} symlinks skipped`
      );
    }
    const summary = await writeDelivery(manager, stage, delivery, { events, logger });
    outcome.written = summary.written;
    outcome.deleted = summary.deleted;
    await manager.markApplied(stage);
  } catch (err) {
    return reject(err);
  }

  outcome.advisory = editAdvisory(stage.state.touched.length, config.preferences.advisoryThreshold) ?? undefined;
  if (outcome.advisory) {
    logger.warn(outcome.advisory);
  }

  let report: VerifyReport;
  try {
    report = await verifyTarget(ctx, config, stageTarget(stage), events, false);
  } catch (err) {
    return failWith(outcome, err);
  }
  if (!report.passed && report.failure) {
    outcome.status = "check_failed";
    outcome.exitCode = ExitCode.CheckFailed;
    outcome.message = `Check failed: ${report.failure.name}`;
    outcome.feedback = formatCheckFeedback(report.failure);
    await shareFeedback(ctx, config, outcome.feedback);
    return outcome;
  }

  if (options.dryRun) {
    outcome.status = "dry_run";
    try {
      outcome.diff = await summarizeStageDiff(stage);
    } catch (err) {
      return failWith(outcome, err);
    }
    await events.append("apply_succeeded", {
      files_written: outcome.written.length,
      files_deleted: outcome.deleted.length,
      promoted: false
    });
    return outcome;
  }

  try {
    const { result, warnings } = await promoteAndFinalize(ctx, config, manager, stage, events, {
      commit: options.commit,
      push: options.push,
      goal: delivery.plan?.goal
    });
    outcome.warnings.push(...warnings);
    outcome.promoted = true;
    await events.append("apply_succeeded", {
      files_written: result.written.length,
      files_deleted: result.deleted.length,
      promoted: true
    });
  } catch (err) {
    return failWith(outcome, err);
  }
  return outcome;
}
