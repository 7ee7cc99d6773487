/* =============================================================================
 * SERVER ERRORS
 * ============================================================================= */

/** Error codes */
export const YalafiErrorCode = {
  PROCESS_NOT_FOUND: "YALAFI_PROCESS_NOT_FOUND",
  WORKDIR_NOT_FOUND: "YALAFI_WORKDIR_NOT_FOUND",
  PROCESS_FAILED: "YALAFI_PROCESS_FAILED",
  OUTPUT_INVALID: "YALAFI_OUTPUT_INVALID",
  MATCH_FIELD: "YALAFI_MATCH_FIELD",
  CONFIG_TIMEOUT: "YALAFI_CONFIG_TIMEOUT",
} as const;

export type YalafiErrorCodeType = (typeof YalafiErrorCode)[keyof typeof YalafiErrorCode];

export class YalafiError extends Error {
  constructor(
    message: string,
    public readonly code: YalafiErrorCodeType,
  ) {
    super(message);
    this.name = "YalafiError";
  }
}

/** The analyzer executable could not be located. */
export class AnalyzerNotFoundError extends YalafiError {
  constructor(public readonly executable: string) {
    super(`Could not run YaLafi because ${executable} was not found.`, YalafiErrorCode.PROCESS_NOT_FOUND);
    this.name = "AnalyzerNotFoundError";
  }
}

/** The checked document's folder is gone, so the analyzer cannot start there. */
export class AnalyzerWorkingDirectoryError extends YalafiError {
  constructor(public readonly cwd: string) {
    super(`Could not run YaLafi because the folder ${cwd} does not exist.`, YalafiErrorCode.WORKDIR_NOT_FOUND);
    this.name = "AnalyzerWorkingDirectoryError";
  }
}

/** The analyzer exited with a non-zero status outside of a cancellation. */
export class AnalyzerExitError extends YalafiError {
  constructor(
    public readonly command: readonly string[],
    public readonly exitCode: number | null,
    public readonly stderr: string,
  ) {
    super(`YaLafi exited with code ${exitCode ?? "null"}.`, YalafiErrorCode.PROCESS_FAILED);
    this.name = "AnalyzerExitError";
  }
}

/** stdout was not JSON, or not shaped like `{ matches: [...] }`. */
export class AnalyzerOutputError extends YalafiError {
  constructor(
    reason: string,
    public readonly stderr: string = "",
  ) {
    super(`YaLafi did not return valid JSON: ${reason}`, YalafiErrorCode.OUTPUT_INVALID);
    this.name = "AnalyzerOutputError";
  }
}

/** One match record has a missing or mistyped field. */
export class MatchFieldError extends YalafiError {
  constructor(
    public readonly field: string,
    public readonly expectedType: string,
  ) {
    super(`Expected ${field} to be of type ${expectedType}.`, YalafiErrorCode.MATCH_FIELD);
    this.name = "MatchFieldError";
  }
}

export class ConfigurationTimeoutError extends YalafiError {
  constructor(public readonly timeoutMs: number) {
    super(`Configuration request timed out after ${timeoutMs}ms.`, YalafiErrorCode.CONFIG_TIMEOUT);
    this.name = "ConfigurationTimeoutError";
  }
}

export function formatError(e: unknown): string {
  if (e instanceof Error) return e.stack ?? e.message;
  return String(e);
}
