#!/usr/bin/env node
import path from "node:path";
import { createInterface } from "node:readline/promises";
import chalk from "chalk";
import { Command } from "commander";
import { readStatus, runAbort, runBranch, runCheck, runPromote } from "./apply/commands.js";
import { runApply, type ApplyOutcome } from "./apply/orchestrator.js";
import { copyToClipboard } from "./clipboard.js";
import { TOOL_NAME } from "./config.js";
import type { Plan } from "./delivery/types.js";
import { ExitCode } from "./exit.js";
import type { InputSource } from "./input.js";
import { formatDiffSummary, type DiffEntry } from "./stage/diff.js";
import { createConsoleLogger } from "./utils/log.js";

const logger = createConsoleLogger();

const program = new Command();

program
  .name(TOOL_NAME)
  .description("Stage, verify and promote model-authored source edits.")
  .version("0.1.0")
  .option("-C, --repo <dir>", "Repository root", process.cwd());

function repoRoot(): string {
  const { repo } = program.opts<{ repo: string }>();
  return path.resolve(repo);
}

function baseContext() {
  return { repoRoot: repoRoot(), logger, copy: copyToClipboard };
}

async function confirmPlan(plan: Plan): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(chalk.cyan(`Apply this plan${plan.goal ? ` (${plan.goal})` : ""}? [y/N] `));
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

function printDiff(diff: DiffEntry[]): void {
  for (const line of formatDiffSummary(diff)) {
    logger.detail(`  ${line}`);
  }
}

function printOutcome(outcome: ApplyOutcome): void {
  if (outcome.exitCode !== ExitCode.Success) {
    logger.error(`✗ ${outcome.message ?? "Apply failed"}`);
    if (outcome.feedback) {
      logger.info(chalk.cyan.bold("\n→ Paste this back to the model:"));
      logger.info(outcome.feedback);
    }
    return;
  }
  if (outcome.status === "dry_run") {
    logger.info(chalk.bold.magenta("DRY RUN: staged and verified, workspace untouched."));
    printDiff(outcome.diff ?? []);
    return;
  }
  logger.success("✓ Applied and promoted");
  for (const file of outcome.written) {
    logger.info(`   ${chalk.green("→")} ${file}`);
  }
  for (const file of outcome.deleted) {
    logger.info(`   ${chalk.red("✗")} ${file}`);
  }
}

program
  .command("apply")
  .description("Apply a delivery: parse, validate, stage, verify and promote.")
  .option("--force", "Skip the interactive confirmation")
  .option("--dry-run", "Stage and verify without promoting")
  .option("--stdin", "Read the delivery from stdin")
  .option("--file <path>", "Read the delivery from a file")
  .option("--sanitize", "Strip markdown fences from code file bodies")
  .option("--no-commit", "Skip the configured git commit")
  .option("--no-push", "Skip the configured git push")
  .action(
    async (opts: { force?: boolean; dryRun?: boolean; stdin?: boolean; file?: string; sanitize?: boolean; commit: boolean; push: boolean }) => {
      try {
        const source: InputSource = opts.file
          ? { kind: "file", path: path.resolve(opts.file) }
          : opts.stdin
            ? { kind: "stdin" }
            : { kind: "clipboard" };
        const interactive = process.stdin.isTTY === true && source.kind !== "stdin";
        const outcome = await runApply({
          ...baseContext(),
          source,
          force: opts.force,
          dryRun: opts.dryRun,
          sanitize: opts.sanitize,
          commit: opts.commit,
          push: opts.push,
          confirm: interactive ? confirmPlan : undefined
        });
        printOutcome(outcome);
        process.exitCode = outcome.exitCode;
      } catch (err) {
        console.error(err instanceof Error ? err.message : err);
        process.exitCode = ExitCode.Error;
      }
    }
  );

program
  .command("promote")
  .description("Promote the current stage to the workspace.")
  .option("--dry-run", "Show what would change without promoting")
  .option("--no-commit", "Skip the configured git commit")
  .option("--no-push", "Skip the configured git push")
  .action(async (opts: { dryRun?: boolean; commit: boolean; push: boolean }) => {
    const outcome = await runPromote(baseContext(), opts);
    if (outcome.exitCode !== ExitCode.Success) {
      logger.error(outcome.message ?? "Promotion failed");
    } else if (outcome.data?.diff) {
      printDiff(outcome.data.diff);
    } else if (outcome.message) {
      logger.info(outcome.message);
    } else {
      logger.success(`✓ Promoted ${outcome.data?.written.length ?? 0} write(s), ${outcome.data?.deleted.length ?? 0} delete(s)`);
    }
    process.exitCode = outcome.exitCode;
  });

program
  .command("check")
  .description("Run the configured checks in the stage (or the workspace when no stage exists).")
  .action(async () => {
    const outcome = await runCheck(baseContext());
    if (outcome.exitCode !== ExitCode.Success) {
      logger.error(outcome.message ?? "Checks failed");
    }
    process.exitCode = outcome.exitCode;
  });

program
  .command("branch")
  .description("Create the stage; --force recreates an existing one.")
  .option("--force", "Discard an existing stage first")
  .action(async (opts: { force?: boolean }) => {
    const outcome = await runBranch(baseContext(), opts.force ?? false);
    if (outcome.exitCode !== ExitCode.Success || !outcome.data) {
      logger.error(outcome.message ?? "Could not create the stage");
    } else {
      const stats = outcome.data;
      logger.success(
        `✓ Stage created: ${stats.filesCopied} files copied, ${stats.preservedSkipped} preserved, ${stats.symlinksSkipped} symlinks skipped`
      );
    }
    process.exitCode = outcome.exitCode;
  });

program
  .command("abort")
  .description("Discard the stage.")
  .action(async () => {
    const outcome = await runAbort(baseContext());
    if (outcome.exitCode !== ExitCode.Success) {
      logger.error(outcome.message ?? "Could not discard the stage");
    } else {
      logger.success(outcome.message ?? "Stage discarded.");
    }
    process.exitCode = outcome.exitCode;
  });

program
  .command("status")
  .description("Show the stage and its touched paths.")
  .action(async () => {
    const outcome = await readStatus(baseContext());
    if (outcome.exitCode !== ExitCode.Success) {
      logger.error(outcome.message ?? "Could not read the stage");
    } else if (!outcome.data) {
      logger.info("No stage.");
    } else {
      const state = outcome.data;
      logger.info(`Stage ${state.id} (${state.apply_count} apply(s), ${state.touched.length} touched)`);
      for (const touch of state.touched) {
        logger.detail(`  ${touch.kind === "Write" ? "W" : "D"} ${touch.path}`);
      }
    }
    process.exitCode = outcome.exitCode;
  });

await program.parseAsync(process.argv);
