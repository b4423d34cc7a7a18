import { spawn } from "node:child_process";

export interface CommandResult {
  exitCode: number;
  /** stdout and stderr interleaved in arrival order. */
  output: string;
}

/** Exit code reported when the program could not be started at all. */
export const SPAWN_FAILURE_EXIT = 127;

/**
 * Splits a command string into program and arguments. Single and double
 * quotes group words; there is no shell expansion.
 */
export function splitCommand(command: string): string[] {
  const argv: string[] = [];
  let current = "";
  let quote: "'" | '"' | null = null;
  let hasToken = false;
  for (const char of command) {
    if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
      continue;
    }
    if (char === "'" || char === '"') {
      quote = char;
      hasToken = true;
    } else if (/\s/.test(char)) {
      if (hasToken) {
        argv.push(current);
        current = "";
        hasToken = false;
      }
    } else {
      current += char;
      hasToken = true;
    }
  }
  if (quote) {
    throw new Error(`Unterminated ${quote} quote in command: ${command}`);
  }
  if (hasToken) {
    argv.push(current);
  }
  return argv;
}

/**
 * Runs one command to completion in `cwd`. Never rejects: a program that
 * cannot be started yields exit code 127 with the error as its output.
 */
export function runCommand(command: string, cwd: string, onLine?: (line: string) => void): Promise<CommandResult> {
  let argv: string[];
  try {
    argv = splitCommand(command);
  } catch (err) {
    return Promise.resolve({ exitCode: SPAWN_FAILURE_EXIT, output: err instanceof Error ? err.message : String(err) });
  }
  const [program, ...args] = argv;
  if (!program) {
    return Promise.resolve({ exitCode: SPAWN_FAILURE_EXIT, output: "Empty check command" });
  }

  return new Promise((resolve) => {
    const proc = spawn(program, args, { cwd, stdio: ["ignore", "pipe", "pipe"] });
    let output = "";
    let pending = "";
    let settled = false;

    const onData = (data: Buffer): void => {
      const text = data.toString();
      output += text;
      if (onLine) {
        pending += text;
        const lines = pending.split("\n");
        pending = lines.pop() ?? "";
        for (const line of lines) {
          if (line.trim() !== "") {
            onLine(line);
          }
        }
      }
    };

    proc.stdout.on("data", onData);
    proc.stderr.on("data", onData);

    proc.on("close", (code) => {
      if (settled) {
        return;
      }
      settled = true;
      resolve({ exitCode: code ?? 1, output });
    });

    proc.on("error", (error) => {
      if (settled) {
        return;
      }
      settled = true;
      resolve({ exitCode: SPAWN_FAILURE_EXIT, output: `Failed to start '${program}': ${error.message}` });
    });
  });
}
