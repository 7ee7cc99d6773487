import { spawn } from "node:child_process";
import { existsSync } from "node:fs";
import path from "node:path";
import { AnalyzerNotFoundError, AnalyzerWorkingDirectoryError } from "../errors.js";
import type { YalafiSettings } from "../settings.js";

export interface AnalyzerCommand {
  readonly executable: string;
  readonly args: readonly string[];
  /** Working directory: the checked document's folder. */
  readonly cwd: string;
}

export interface ProcessResult {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * Runs the checker to completion. Implementations resolve once the process
 * has exited (whatever the status), terminate it when `signal` aborts, and
 * reject with {@link AnalyzerNotFoundError} when the executable is missing
 * or {@link AnalyzerWorkingDirectoryError} when `cwd` is.
 */
export interface ProcessLauncher {
  run(command: AnalyzerCommand, signal: AbortSignal): Promise<ProcessResult>;
}

export const YALAFI_MODULE_ARGS = ["-m", "yalafi.shell", "--out", "json"] as const;

export function buildAnalyzerCommand(settings: YalafiSettings, filePath: string): AnalyzerCommand {
  return {
    executable: settings.pythonPath,
    args: [...YALAFI_MODULE_ARGS, ...settings.commandLineOptions, filePath],
    cwd: path.dirname(filePath),
  };
}

export function formatCommandLine(command: AnalyzerCommand): string {
  return [command.executable, ...command.args].map((part) => JSON.stringify(part)).join(", ");
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

export class NodeProcessLauncher implements ProcessLauncher {
  run(command: AnalyzerCommand, signal: AbortSignal): Promise<ProcessResult> {
    return new Promise<ProcessResult>((resolve, reject) => {
      const child = spawn(command.executable, [...command.args], {
        cwd: command.cwd,
        stdio: ["ignore", "pipe", "pipe"],
        windowsHide: true,
      });

      const stdout: string[] = [];
      const stderr: string[] = [];
      child.stdout.setEncoding("utf8");
      child.stderr.setEncoding("utf8");
      child.stdout.on("data", (chunk: string) => stdout.push(chunk));
      child.stderr.on("data", (chunk: string) => stderr.push(chunk));

      const onAbort = () => {
        child.kill("SIGTERM");
      };
      if (signal.aborted) onAbort();
      else signal.addEventListener("abort", onAbort, { once: true });

      child.once("error", (e) => {
        signal.removeEventListener("abort", onAbort);
        if (isErrnoException(e) && e.code === "ENOENT") {
          // a missing cwd is reported as ENOENT on the executable too
          reject(
            existsSync(command.cwd)
              ? new AnalyzerNotFoundError(command.executable)
              : new AnalyzerWorkingDirectoryError(command.cwd),
          );
        } else {
          reject(e);
        }
      });

      child.once("close", (exitCode, exitSignal) => {
        signal.removeEventListener("abort", onAbort);
        resolve({ exitCode, signal: exitSignal, stdout: stdout.join(""), stderr: stderr.join("") });
      });
    });
  }
}
