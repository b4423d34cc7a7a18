import chalk from "chalk";
import ora, { type Ora } from "ora";

const LOG_CAPACITY = 5;
const MAX_MICRO_WIDTH = 80;

export interface HudOptions {
  title: string;
  /** Suppress all terminal output. */
  silent?: boolean;
}

export interface HudSnapshot {
  title: string;
  step: number;
  total: number;
  stepName: string;
  micro: string;
  log: string[];
  finished: boolean;
}

/**
 * Progress display for the verifier. The HUD owns its state; callers only
 * send updates, and every update re-renders the spinner line.
 */
export class Hud {
  private readonly spinner: Ora;
  private readonly state: HudSnapshot;

  constructor(options: HudOptions) {
    this.state = { title: options.title, step: 0, total: 0, stepName: "", micro: "", log: [], finished: false };
    this.spinner = ora({ text: options.title, isSilent: options.silent ?? false }).start();
  }

  setMacroStep(step: number, total: number, name: string): void {
    this.update(() => {
      this.state.step = step;
      this.state.total = total;
      this.state.stepName = name;
      this.state.micro = "";
    });
  }

  setMicroStatus(status: string): void {
    this.update(() => {
      this.state.micro = status.trim();
    });
  }

  pushLog(line: string): void {
    this.update(() => {
      this.state.log.push(line);
      if (this.state.log.length > LOG_CAPACITY) {
        this.state.log.shift();
      }
      this.state.micro = line.trim();
    });
  }

  finish(success: boolean, message: string): void {
    if (this.state.finished) {
      return;
    }
    this.state.finished = true;
    if (success) {
      this.spinner.succeed(message);
    } else {
      this.spinner.fail(message);
    }
  }

  snapshot(): HudSnapshot {
    return { ...this.state, log: [...this.state.log] };
  }

  private update(mutate: () => void): void {
    if (this.state.finished) {
      return;
    }
    mutate();
    this.spinner.text = this.render();
  }

  private render(): string {
    const { title, step, total, stepName, micro } = this.state;
    const head = total > 0 ? `${title} [${step}/${total}] ${stepName}` : title;
    if (!micro) {
      return head;
    }
    const clipped = micro.length > MAX_MICRO_WIDTH ? `${micro.slice(0, MAX_MICRO_WIDTH - 1)}…` : micro;
    return `${head}\n  ${chalk.dim(clipped)}`;
  }
}
