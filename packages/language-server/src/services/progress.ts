import {
  WorkDoneProgress,
  WorkDoneProgressCreateRequest,
  type Connection,
  type WorkDoneProgressBegin,
  type WorkDoneProgressEnd,
  type WorkDoneProgressReport,
} from "vscode-languageserver/node.js";
import { formatError } from "../errors.js";
import type { Logger } from "./types.js";

export interface ProgressBegin {
  title: string;
  message?: string;
  cancellable?: boolean;
}

/** Work-done progress for one checker run, addressed by the run's token. */
export interface ProgressChannel {
  create(token: string): Promise<void>;
  begin(token: string, value: ProgressBegin): void;
  report(token: string, message: string): void;
  end(token: string, message: string): void;
}

/**
 * Server-initiated work-done progress (`window/workDoneProgress/create` +
 * `$/progress`). Does nothing when the client did not announce
 * `window.workDoneProgress`.
 */
export class ConnectionProgress implements ProgressChannel {
  constructor(
    private readonly connection: Connection,
    private readonly logger: Logger,
    private readonly isSupported: () => boolean,
  ) {}

  async create(token: string): Promise<void> {
    if (!this.isSupported()) return;
    try {
      await this.connection.sendRequest(WorkDoneProgressCreateRequest.type, { token });
    } catch (e) {
      this.logger.warn(`[progress] create ${token} failed: ${formatError(e)}`);
    }
  }

  begin(token: string, value: ProgressBegin): void {
    const begin: WorkDoneProgressBegin = { kind: "begin", ...value };
    this.#send(token, begin);
  }

  report(token: string, message: string): void {
    const report: WorkDoneProgressReport = { kind: "report", message };
    this.#send(token, report);
  }

  end(token: string, message: string): void {
    const end: WorkDoneProgressEnd = { kind: "end", message };
    this.#send(token, end);
  }

  #send(token: string, value: WorkDoneProgressBegin | WorkDoneProgressReport | WorkDoneProgressEnd): void {
    if (!this.isSupported()) return;
    this.connection.sendProgress(WorkDoneProgress.type, token, value).catch((e: unknown) => {
      this.logger.warn(`[progress] ${value.kind} ${token} failed: ${formatError(e)}`);
    });
  }
}
