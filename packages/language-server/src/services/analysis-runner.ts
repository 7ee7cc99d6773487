import {
  AnalyzerExitError,
  AnalyzerNotFoundError,
  AnalyzerOutputError,
  AnalyzerWorkingDirectoryError,
  formatError,
} from "../errors.js";
import { mapMatches, type YalafiDiagnostic } from "../mapping/match-mapper.js";
import type { YalafiSettings } from "../settings.js";
import { parseAnalyzerOutput } from "./analyzer-output.js";
import { buildAnalyzerCommand, formatCommandLine, type AnalyzerCommand, type ProcessLauncher } from "./analyzer-process.js";
import { documentPath } from "./document-store.js";
import type { ProgressChannel } from "./progress.js";
import type { AnalysisRun, RunRegistry } from "./run-registry.js";
import type { Logger } from "./types.js";

export const PROGRESS_TITLE = "Spellchecking";

/** The one sentence a user sees when a run fails; details go to the log. */
export const FAILURE_NOTIFICATION = "Could not run YaLafi. See YaLafi output for more information.";

export type AnalysisOutcome =
  | { readonly kind: "completed"; readonly run: AnalysisRun; readonly diagnostics: YalafiDiagnostic[] }
  | { readonly kind: "failed"; readonly run: AnalysisRun; readonly error: Error }
  | { readonly kind: "cancelled"; readonly run: AnalysisRun }
  | { readonly kind: "skipped"; readonly reason: string };

/** What the runner needs from a document: its identity and live text. */
export interface AnalysisTarget {
  readonly uri: string;
  getText(): string;
}

export interface UserNotifier {
  showErrorMessage(message: string): void;
}

export interface AnalysisRunnerDeps {
  readonly registry: RunRegistry;
  readonly launcher: ProcessLauncher;
  readonly progress: ProgressChannel;
  readonly notifier: UserNotifier;
  readonly logger: Logger;
  /** Settings for a document; expected to fall back to defaults rather than reject. */
  readonly settings: (scopeUri: string) => Promise<YalafiSettings>;
}

function indent(text: string): string {
  return text.split("\n").join("\n    ");
}

/**
 * Owns the lifecycle of checker invocations: register, report progress,
 * spawn, classify the result, map matches. Publishing is left to the caller,
 * which applies the outcome on the message loop.
 */
export class AnalysisRunner {
  constructor(private readonly deps: AnalysisRunnerDeps) {}

  async run(document: AnalysisTarget): Promise<AnalysisOutcome> {
    const { registry, progress, logger } = this.deps;
    const filePath = documentPath(document.uri);
    if (!filePath) {
      logger.info(`[check] skipping ${document.uri}: not a file on disk`);
      return { kind: "skipped", reason: "not a file document" };
    }

    const { run, superseded } = registry.start(document.uri);
    if (superseded) {
      logger.info(`[check] cancelled run ${superseded.token} for ${document.uri}: superseded by ${run.token}`);
    }
    logger.info(`[check] checking document "${filePath}"`);

    try {
      await progress.create(run.token);
      progress.begin(run.token, { title: PROGRESS_TITLE, message: "Run YaLafi", cancellable: true });
      return await this.#execute(run, document, filePath);
    } finally {
      registry.finish(run);
    }
  }

  async #execute(run: AnalysisRun, document: AnalysisTarget, filePath: string): Promise<AnalysisOutcome> {
    const { launcher, progress, logger } = this.deps;
    let command: AnalyzerCommand | null = null;
    try {
      const settings = await this.deps.settings(document.uri);
      if (run.isCancelled) return this.#cancelled(run);

      command = buildAnalyzerCommand(settings, filePath);
      // edits arriving while the checker runs are not reflected in its result
      const text = document.getText();
      run.markRunning();
      const result = await launcher.run(command, run.signal);
      logger.info(`[check] YaLafi subprocess returned with code ${result.exitCode ?? result.signal ?? "null"}`);
      if (run.isCancelled) return this.#cancelled(run);

      if (result.exitCode !== 0) {
        throw new AnalyzerExitError([command.executable, ...command.args], result.exitCode, result.stderr);
      }

      progress.report(run.token, "Parse result");
      const output = parseAnalyzerOutput(result.stdout, result.stderr);
      progress.report(run.token, "Create Diagnostics");
      const diagnostics = mapMatches(output.matches, text, logger);

      run.settle("completed");
      progress.end(run.token, "Finished");
      return { kind: "completed", run, diagnostics };
    } catch (e) {
      if (run.isCancelled) return this.#cancelled(run);
      this.#logFailure(e, command);
      run.settle("failed");
      this.deps.notifier.showErrorMessage(FAILURE_NOTIFICATION);
      progress.end(run.token, "Failed");
      return { kind: "failed", run, error: e instanceof Error ? e : new Error(String(e)) };
    }
  }

  #cancelled(run: AnalysisRun): AnalysisOutcome {
    this.deps.logger.info(`[check] run ${run.token} cancelled`);
    this.deps.progress.end(run.token, "Cancelled");
    return { kind: "cancelled", run };
  }

  #logFailure(e: unknown, command: AnalyzerCommand | null): void {
    const { logger } = this.deps;
    if (e instanceof AnalyzerExitError) {
      logger.error("[check] Could not run YaLafi. Maybe the command line options are not correctly set.");
      logger.error(`[check] Exit code: ${e.exitCode ?? "null"}`);
      logger.error(`[check] Command was:\n    [${command ? formatCommandLine(command) : ""}]`);
      logger.error(`[check] Stderr:\n    ${indent(e.stderr)}`);
    } else if (e instanceof AnalyzerNotFoundError || e instanceof AnalyzerWorkingDirectoryError) {
      logger.error(`[check] ${e.message}`);
    } else if (e instanceof AnalyzerOutputError) {
      logger.error(`[check] ${e.message}`);
      logger.error(`[check] YaLafi Stderr:\n    ${indent(e.stderr)}`);
    } else {
      logger.error(`[check] YaLafi run failed: ${formatError(e)}`);
    }
  }
}
