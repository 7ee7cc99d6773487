/**
 * LSP lifecycle handlers: initialize, document events, progress cancellation
 */
import {
  CodeActionKind,
  TextDocumentSyncKind,
  WorkDoneProgressCancelNotification,
  type DidChangeTextDocumentParams,
  type DidCloseTextDocumentParams,
  type DidOpenTextDocumentParams,
  type DidSaveTextDocumentParams,
  type InitializeParams,
  type InitializeResult,
  type WorkDoneProgressCancelParams,
} from "vscode-languageserver/node.js";
import type { HandlerContext, ServerContext } from "../context.js";
import { formatError } from "../errors.js";
import type { AnalysisOutcome } from "../services/analysis-runner.js";

export const SERVER_NAME = "yalafi-language-server";
export const SERVER_VERSION = "0.1.0";

export function handleInitialize(ctx: HandlerContext, params: InitializeParams): InitializeResult {
  ctx.client.supportsConfiguration = params.capabilities.workspace?.configuration === true;
  ctx.client.supportsWorkDoneProgress = params.capabilities.window?.workDoneProgress === true;
  ctx.logger.info(
    `initialize: configuration=${ctx.client.supportsConfiguration} workDoneProgress=${ctx.client.supportsWorkDoneProgress}`,
  );
  return {
    capabilities: {
      textDocumentSync: {
        openClose: true,
        change: TextDocumentSyncKind.Incremental,
        save: { includeText: false },
      },
      codeActionProvider: { codeActionKinds: [CodeActionKind.QuickFix] },
    },
    serverInfo: { name: SERVER_NAME, version: SERVER_VERSION },
  };
}

export function handleDidOpen(ctx: HandlerContext, params: DidOpenTextDocumentParams): void {
  ctx.logger.log(`didOpen ${params.textDocument.uri}`);
  ctx.documents.open(params.textDocument);
  ctx.diagnostics.clear(params.textDocument.uri);
}

/**
 * Shift the live diagnostics with every change, in the order received and
 * before the text itself moves on, then republish.
 */
export function handleDidChange(ctx: HandlerContext, params: DidChangeTextDocumentParams): void {
  const { uri, version } = params.textDocument;
  if (!ctx.documents.has(uri)) {
    ctx.logger.warn(`didChange for unknown document ${uri}`);
    return;
  }
  ctx.diagnostics.applyChanges(uri, params.contentChanges);
  ctx.documents.applyChanges(uri, params.contentChanges, version);
  ctx.publish(uri);
}

/** Apply a finished run on the message loop. */
export function applyOutcome(ctx: HandlerContext, uri: string, outcome: AnalysisOutcome): void {
  switch (outcome.kind) {
    case "completed":
      if (!ctx.documents.has(uri)) {
        ctx.logger.info(`[check] discarding result for closed document ${uri}`);
        return;
      }
      ctx.diagnostics.replace(uri, outcome.diagnostics);
      ctx.logger.info(`[check] ${outcome.diagnostics.length} diagnostics for ${uri}`);
      ctx.publish(uri);
      return;
    case "failed":
    case "cancelled":
    case "skipped":
      // the previous diagnostic set stays authoritative
      return;
  }
}

export async function handleDidSave(ctx: HandlerContext, params: DidSaveTextDocumentParams): Promise<void> {
  const { uri } = params.textDocument;
  const doc = ctx.documents.get(uri);
  if (!doc) {
    ctx.logger.warn(`didSave for unknown document ${uri}`);
    return;
  }
  try {
    const outcome = await ctx.runner.run(doc);
    applyOutcome(ctx, uri, outcome);
  } catch (e) {
    ctx.logger.error(`[check] didSave failed for ${uri}: ${formatError(e)}`);
  }
}

export function handleDidClose(ctx: HandlerContext, params: DidCloseTextDocumentParams): void {
  const { uri } = params.textDocument;
  ctx.logger.log(`didClose ${uri}`);
  if (ctx.runs.cancelDocument(uri)) {
    ctx.logger.info(`[check] cancelled in-flight run for closed document ${uri}`);
  }
  ctx.documents.close(uri);
  ctx.diagnostics.clear(uri);
  ctx.publish(uri);
}

export function handleProgressCancel(ctx: HandlerContext, params: WorkDoneProgressCancelParams): void {
  const token = String(params.token);
  if (ctx.runs.cancel(token)) {
    ctx.logger.info(`Will cancel progress with token ${token}`);
  }
}

export function handleShutdown(ctx: HandlerContext): void {
  ctx.logger.info(`shutdown: cancelling ${ctx.runs.size} in-flight run(s)`);
  ctx.runs.dispose();
}

/**
 * Registers all lifecycle handlers on the connection.
 */
export function registerLifecycleHandlers(ctx: ServerContext): void {
  const { connection } = ctx;
  connection.onInitialize((params) => handleInitialize(ctx, params));

  connection.onInitialized(() => {
    ctx.logger.info("Initialized");
    // Registered after initialize so it replaces the library's own cancel
    // handler, which only knows about progress created through its reporters.
    connection.onNotification(WorkDoneProgressCancelNotification.type, (params) => handleProgressCancel(ctx, params));
  });

  connection.onDidOpenTextDocument((params) => handleDidOpen(ctx, params));
  connection.onDidChangeTextDocument((params) => handleDidChange(ctx, params));
  connection.onDidSaveTextDocument((params) => {
    void handleDidSave(ctx, params);
  });
  connection.onDidCloseTextDocument((params) => handleDidClose(ctx, params));
  connection.onShutdown(() => handleShutdown(ctx));
}
