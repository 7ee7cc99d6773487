/**
 * LSP feature handlers: code actions
 *
 * Handlers are wrapped in try/catch so an exception never destabilizes the
 * LSP connection. Errors are logged and an empty result is returned.
 */
import type { CodeAction, CodeActionParams } from "vscode-languageserver/node.js";
import type { HandlerContext, ServerContext } from "../context.js";
import { formatError } from "../errors.js";
import { buildCodeActions } from "../services/code-actions.js";
import { rangesIntersect } from "../services/ranges.js";

export function handleCodeAction(ctx: HandlerContext, params: CodeActionParams): CodeAction[] {
  const { uri } = params.textDocument;
  try {
    const doc = ctx.documents.get(uri);
    if (!doc) return [];
    const candidates = ctx.diagnostics.get(uri).filter((d) => rangesIntersect(d.range, params.range));
    const result = buildCodeActions(candidates, doc);
    if (result.kind === "drift") {
      ctx.logger.warn(
        `[codeAction] ${uri}: diagnostic at ${result.diagnostic.range.start.line}:${result.diagnostic.range.start.character} ` +
          `expected ${JSON.stringify(result.expected)} but found ${JSON.stringify(result.actual)}; no fixes offered`,
      );
      return [];
    }
    return result.actions;
  } catch (e) {
    ctx.logger.error(`[codeAction] failed for ${uri}: ${formatError(e)}`);
    return [];
  }
}

/**
 * Registers all LSP feature handlers on the connection.
 */
export function registerFeatureHandlers(ctx: ServerContext): void {
  ctx.connection.onCodeAction((params) => handleCodeAction(ctx, params));
}
