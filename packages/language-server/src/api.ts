// Canonical test-facing exports for language-server internals.
// Keeps test imports package-based instead of reaching into ../../src paths.
export * from "./context.js";
export * from "./errors.js";
export * from "./settings.js";
export * from "./handlers/features.js";
export * from "./handlers/lifecycle.js";
export * from "./mapping/match-mapper.js";
export * from "./services/analysis-runner.js";
export * from "./services/analyzer-output.js";
export * from "./services/analyzer-process.js";
export * from "./services/code-actions.js";
export * from "./services/diagnostic-shifter.js";
export * from "./services/diagnostic-store.js";
export * from "./services/document-store.js";
export * from "./services/position-index.js";
export * from "./services/progress.js";
export * from "./services/ranges.js";
export * from "./services/run-registry.js";
export * from "./services/severity.js";
export type * from "./services/types.js";
