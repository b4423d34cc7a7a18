import chalk from "chalk";

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Secondary output, dimmed. */
  detail(message: string): void;
  debug(message: string): void;
}

export interface ConsoleLoggerOptions {
  debug?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const debugEnabled = options.debug ?? Boolean(process.env.SHADOWGATE_DEBUG);
  return {
    info: (message) => console.log(message),
    success: (message) => console.log(chalk.green(message)),
    warn: (message) => console.error(chalk.yellow(message)),
    error: (message) => console.error(chalk.red(message)),
    detail: (message) => console.log(chalk.dim(message)),
    debug: (message) => {
      if (debugEnabled) {
        console.error(chalk.dim(`[debug] ${message}`));
      }
    }
  };
}

const noop = (): void => undefined;

export const silentLogger: Logger = {
  info: noop,
  success: noop,
  warn: noop,
  error: noop,
  detail: noop,
  debug: noop
};
