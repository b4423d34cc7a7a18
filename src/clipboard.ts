import { spawn } from "node:child_process";

export interface ClipboardTool {
  program: string;
  args: string[];
}

function copyTools(): ClipboardTool[] {
  switch (process.platform) {
    case "darwin":
      return [{ program: "pbcopy", args: [] }];
    case "win32":
      return [{ program: "clip", args: [] }];
    default:
      return [
        { program: "wl-copy", args: [] },
        { program: "xclip", args: ["-selection", "clipboard"] },
        { program: "xsel", args: ["--clipboard", "--input"] }
      ];
  }
}

function pasteTools(): ClipboardTool[] {
  switch (process.platform) {
    case "darwin":
      return [{ program: "pbpaste", args: [] }];
    case "win32":
      return [{ program: "powershell", args: ["-NoProfile", "-Command", "Get-Clipboard -Raw"] }];
    default:
      return [
        { program: "wl-paste", args: ["--no-newline"] },
        { program: "xclip", args: ["-selection", "clipboard", "-o"] },
        { program: "xsel", args: ["--clipboard", "--output"] }
      ];
  }
}

/** Upper bound on one clipboard tool run. */
export const CLIPBOARD_TIMEOUT_MS = 5000;

function timeoutError(tool: ClipboardTool, timeoutMs: number): Error {
  return new Error(`${tool.program} did not finish within ${timeoutMs}ms`);
}

function exitError(tool: ClipboardTool, code: number | null): Error {
  return new Error(`${tool.program} exited with code ${code ?? "null"}`);
}

/**
 * Feeds `input` to a copy tool. xclip and some wl-copy builds fork a child
 * that keeps serving the selection, so stdout is not piped and the run ends
 * on `exit` rather than `close`.
 */
export function pipeToTool(tool: ClipboardTool, input: string, timeoutMs = CLIPBOARD_TIMEOUT_MS): Promise<void> {
  return new Promise((resolve, reject) => {
    const proc = spawn(tool.program, tool.args, { stdio: ["pipe", "ignore", "ignore"] });
    const timer = setTimeout(() => {
      proc.kill();
      reject(timeoutError(tool, timeoutMs));
    }, timeoutMs);
    const fail = (err: Error): void => {
      clearTimeout(timer);
      reject(err);
    };
    proc.on("error", fail);
    proc.stdin.on("error", fail);
    proc.on("exit", (code) => {
      clearTimeout(timer);
      if (code === 0) {
        resolve();
      } else {
        reject(exitError(tool, code));
      }
    });
    proc.stdin.end(input);
  });
}

export function readFromTool(tool: ClipboardTool, timeoutMs = CLIPBOARD_TIMEOUT_MS): Promise<string> {
  return new Promise((resolve, reject) => {
    const proc = spawn(tool.program, tool.args, { stdio: ["ignore", "pipe", "ignore"] });
    const timer = setTimeout(() => {
      proc.kill();
      reject(timeoutError(tool, timeoutMs));
    }, timeoutMs);
    let stdout = "";
    proc.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });
    proc.on("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });
    proc.on("close", (code) => {
      clearTimeout(timer);
      if (code === 0) {
        resolve(stdout);
      } else {
        reject(exitError(tool, code));
      }
    });
  });
}

async function firstWorking<T>(tools: ClipboardTool[], run: (tool: ClipboardTool) => Promise<T>): Promise<T> {
  const failures: string[] = [];
  for (const tool of tools) {
    try {
      return await run(tool);
    } catch (err) {
      failures.push(err instanceof Error ? err.message : String(err));
    }
  }
  throw new Error(`No clipboard tool available (${failures.join("; ")})`);
}

export async function copyToClipboard(text: string): Promise<void> {
  await firstWorking(copyTools(), (tool) => pipeToTool(tool, text));
}

export async function readClipboard(): Promise<string> {
  return firstWorking(pasteTools(), (tool) => readFromTool(tool));
}
