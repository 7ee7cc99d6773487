#!/usr/bin/env node
/**
 * YaLafi Language Server - Entry Point
 *
 * This is a thin entry point that creates the server context and wires together
 * all the handlers. The actual logic is split into:
 *
 * - context.ts             - ServerContext with the session's stores and run registry
 * - mapping/match-mapper.ts - Checker matches to LSP diagnostics
 * - handlers/features.ts    - Code actions
 * - handlers/lifecycle.ts   - Lifecycle, document events and progress cancellation
 *
 * The transport is picked from the command line by vscode-languageserver
 * (--stdio, --node-ipc, --socket=<port>, --pipe=<name>).
 */
import { createConnection, ProposedFeatures } from "vscode-languageserver/node.js";
import { createServerContext } from "./context.js";
import type { Logger } from "./services/types.js";
import { registerFeatureHandlers } from "./handlers/features.js";
import { registerLifecycleHandlers } from "./handlers/lifecycle.js";

// Create LSP connection
const connection = createConnection(ProposedFeatures.all);

// Create logger that writes to LSP connection console
const logger: Logger = {
  log: (m: string) => connection.console.log(`[yalafi-ls] ${m}`),
  info: (m: string) => connection.console.info(`[yalafi-ls] ${m}`),
  warn: (m: string) => connection.console.warn(`[yalafi-ls] ${m}`),
  error: (m: string) => connection.console.error(`[yalafi-ls] ${m}`),
};

// Create server context with all dependencies
const ctx = createServerContext({ connection, logger });

// Register all handlers
registerLifecycleHandlers(ctx);
registerFeatureHandlers(ctx);

// Start listening
connection.listen();
