import { randomUUID } from "node:crypto";

export type AnalysisRunState = "pending" | "running" | "completed" | "failed" | "cancelled";

export type TerminalRunState = Extract<AnalysisRunState, "completed" | "failed" | "cancelled">;

export class AnalysisRun {
  #state: AnalysisRunState = "pending";
  readonly #abort = new AbortController();

  constructor(
    /** Work-done progress token; also the key cancel requests carry. */
    readonly token: string,
    readonly uri: string,
  ) {}

  get state(): AnalysisRunState {
    return this.#state;
  }

  get signal(): AbortSignal {
    return this.#abort.signal;
  }

  get isCancelled(): boolean {
    return this.#state === "cancelled";
  }

  get isTerminal(): boolean {
    return this.#state === "completed" || this.#state === "failed" || this.#state === "cancelled";
  }

  markRunning(): void {
    if (this.#state === "pending") this.#state = "running";
  }

  /** Returns false when the run had already reached a terminal state. */
  cancel(): boolean {
    if (this.isTerminal) return false;
    this.#state = "cancelled";
    this.#abort.abort();
    return true;
  }

  settle(state: Exclude<TerminalRunState, "cancelled">): void {
    if (!this.isTerminal) this.#state = state;
  }
}

/**
 * Session-scoped table of in-flight checker runs.
 *
 * Keyed by progress token for cancel requests and by document for the
 * one-run-per-document rule: starting a run cancels the document's previous
 * one. Created with the connection and disposed on shutdown.
 */
export class RunRegistry {
  #byToken = new Map<string, AnalysisRun>();
  #byUri = new Map<string, AnalysisRun>();

  constructor(private readonly createToken: () => string = randomUUID) {}

  start(uri: string): { run: AnalysisRun; superseded: AnalysisRun | null } {
    const previous = this.#byUri.get(uri) ?? null;
    const superseded = previous?.cancel() ? previous : null;
    const run = new AnalysisRun(this.createToken(), uri);
    this.#byToken.set(run.token, run);
    this.#byUri.set(uri, run);
    return { run, superseded };
  }

  get(token: string): AnalysisRun | undefined {
    return this.#byToken.get(token);
  }

  /** The document's current run, if it is still in flight. */
  current(uri: string): AnalysisRun | undefined {
    return this.#byUri.get(uri);
  }

  /** Cancel by progress token. Unknown or finished tokens are a no-op. */
  cancel(token: string): boolean {
    const run = this.#byToken.get(token);
    return run ? run.cancel() : false;
  }

  cancelDocument(uri: string): boolean {
    const run = this.#byUri.get(uri);
    return run ? run.cancel() : false;
  }

  /** Drop a run that reached a terminal state. */
  finish(run: AnalysisRun): void {
    if (this.#byToken.get(run.token) === run) this.#byToken.delete(run.token);
    if (this.#byUri.get(run.uri) === run) this.#byUri.delete(run.uri);
  }

  get size(): number {
    return this.#byToken.size;
  }

  dispose(): void {
    for (const run of this.#byToken.values()) {
      run.cancel();
    }
    this.#byToken.clear();
    this.#byUri.clear();
  }
}
