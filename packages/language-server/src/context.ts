import { MessageType, ShowMessageNotification, type Connection } from "vscode-languageserver/node.js";
import { formatError } from "./errors.js";
import { fetchSettings } from "./settings.js";
import { AnalysisRunner } from "./services/analysis-runner.js";
import { NodeProcessLauncher, type ProcessLauncher } from "./services/analyzer-process.js";
import { DiagnosticStore } from "./services/diagnostic-store.js";
import { DocumentStore } from "./services/document-store.js";
import { ConnectionProgress } from "./services/progress.js";
import { RunRegistry } from "./services/run-registry.js";
import type { Logger } from "./services/types.js";

/** What the client announced in `initialize` that changes server behavior. */
export interface ClientState {
  supportsConfiguration: boolean;
  supportsWorkDoneProgress: boolean;
}

/**
 * Everything handlers work with, minus the connection itself. Handlers take
 * this so they can be exercised without a live connection.
 */
export interface HandlerContext {
  readonly logger: Logger;
  readonly documents: DocumentStore;
  readonly diagnostics: DiagnosticStore;
  readonly runs: RunRegistry;
  readonly runner: AnalysisRunner;
  readonly client: ClientState;
  /** Send the document's current diagnostic set to the client. */
  publish(uri: string): void;
}

/**
 * Shared server context passed to all handlers.
 * Owns the session-scoped stores and the run registry.
 */
export interface ServerContext extends HandlerContext {
  readonly connection: Connection;
}

export interface ServerContextInit {
  connection: Connection;
  logger: Logger;
  launcher?: ProcessLauncher;
}

export function createServerContext(init: ServerContextInit): ServerContext {
  const { connection, logger } = init;
  const client: ClientState = { supportsConfiguration: false, supportsWorkDoneProgress: false };
  const documents = new DocumentStore();
  const diagnostics = new DiagnosticStore();
  const runs = new RunRegistry();

  const runner = new AnalysisRunner({
    registry: runs,
    launcher: init.launcher ?? new NodeProcessLauncher(),
    progress: new ConnectionProgress(connection, logger, () => client.supportsWorkDoneProgress),
    logger,
    notifier: {
      showErrorMessage: (message) => {
        connection
          .sendNotification(ShowMessageNotification.type, { type: MessageType.Error, message })
          .catch((e: unknown) => logger.error(`[check] could not show error message: ${formatError(e)}`));
      },
    },
    settings: (scopeUri) =>
      fetchSettings(client.supportsConfiguration ? connection.workspace : null, logger, { scopeUri }),
  });

  function publish(uri: string): void {
    const version = documents.get(uri)?.version;
    connection
      .sendDiagnostics({ uri, version, diagnostics: [...diagnostics.get(uri)] })
      .catch((e: unknown) => logger.error(`[diagnostics] publish failed for ${uri}: ${formatError(e)}`));
  }

  return {
    connection,
    logger,
    documents,
    diagnostics,
    runs,
    runner,
    client,
    publish,
  };
}
