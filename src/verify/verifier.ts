import chalk from "chalk";
import { errorMessage } from "../errors.js";
import type { EventLog } from "../events.js";
import { silentLogger, type Logger } from "../utils/log.js";
import { runCommand, type CommandResult } from "./command.js";
import { Hud } from "./hud.js";
import type { StructuralScanner } from "./scanner.js";
import { summarizeOutput } from "./summary.js";

export interface CheckOutcome {
  name: string;
  passed: boolean;
  exitCode: number;
  /** Filtered, bounded output; empty when the check passed. */
  summary: string;
}

export interface VerifyReport {
  passed: boolean;
  checks: CheckOutcome[];
  failure?: CheckOutcome;
}

export type CommandRunner = (command: string, cwd: string, onLine?: (line: string) => void) => Promise<CommandResult>;

export interface VerifyOptions {
  cwd: string;
  commands: string[];
  /** Paths handed to the structural scanner. */
  touched: string[];
  /** Pre-delivery copy of the touched files; the scanner ignores what it already contains. */
  baselineRoot?: string;
  scanner?: StructuralScanner;
  summaryLines?: number;
  events?: EventLog;
  logger?: Logger;
  /** Best-effort sink for a failure summary, normally the clipboard. */
  copy?: (text: string) => Promise<void>;
  runner?: CommandRunner;
  silent?: boolean;
}

const RULE = "─".repeat(60);

async function reportFailure(failure: CheckOutcome, options: VerifyOptions, logger: Logger): Promise<void> {
  logger.info("");
  logger.detail(RULE);
  logger.error(`FAILED: ${failure.name} (exit ${failure.exitCode})`);
  logger.detail(RULE);
  logger.info(failure.summary);
  logger.detail(RULE);
  if (!options.copy) {
    return;
  }
  try {
    await options.copy(failure.summary);
    logger.detail("Error output copied to clipboard");
  } catch (err) {
    logger.debug(`clipboard copy failed: ${errorMessage(err)}`);
  }
}

/**
 * Runs the external checks and then the structural scan inside `cwd`,
 * stopping at the first failure.
 */
export async function runVerification(options: VerifyOptions): Promise<VerifyReport> {
  const logger = options.logger ?? silentLogger;
  const runner = options.runner ?? runCommand;
  const summaryLines = options.summaryLines ?? 30;
  const total = options.commands.length + (options.scanner ? 1 : 0);
  const checks: CheckOutcome[] = [];
  if (total === 0) {
    logger.detail("No checks configured.");
    return { passed: true, checks };
  }

  const hud = new Hud({ title: chalk.bold("Verifying"), silent: options.silent });
  let step = 0;
  try {
    for (const command of options.commands) {
      step++;
      hud.setMacroStep(step, total, command);
      await options.events?.append("check_started", { command });
      const result = await runner(command, options.cwd, (line) => hud.pushLog(line));
      const passed = result.exitCode === 0;
      const outcome: CheckOutcome = {
        name: command,
        passed,
        exitCode: result.exitCode,
        summary: passed ? "" : summarizeOutput(result.output, summaryLines)
      };
      checks.push(outcome);
      if (!passed) {
        await options.events?.append("check_failed", { command, exit_code: result.exitCode });
        hud.finish(false, `${command} failed`);
        await reportFailure(outcome, options, logger);
        return { passed: false, checks, failure: outcome };
      }
      await options.events?.append("check_passed", { command });
    }

    if (options.scanner) {
      step++;
      const { name } = options.scanner;
      hud.setMacroStep(step, total, name);
      hud.setMicroStatus(`${options.touched.length} touched file(s)`);
      await options.events?.append("check_started", { command: name });
      const findings = await options.scanner.scan(options.cwd, options.touched, options.baselineRoot);
      const passed = findings.length === 0;
      const outcome: CheckOutcome = {
        name,
        passed,
        exitCode: passed ? 0 : 1,
        summary: passed ? "" : summarizeOutput(findings.map((finding) => finding.message).join("\n"), summaryLines)
      };
      checks.push(outcome);
      if (!passed) {
        await options.events?.append("check_failed", { command: name, exit_code: 1 });
        hud.finish(false, `${name} found ${findings.length} problem(s)`);
        await reportFailure(outcome, options, logger);
        return { passed: false, checks, failure: outcome };
      }
      await options.events?.append("check_passed", { command: name });
    }
  } catch (err) {
    hud.finish(false, "Verification aborted");
    throw err;
  }

  hud.finish(true, `All ${total} check(s) passed`);
  return { passed: true, checks };
}
