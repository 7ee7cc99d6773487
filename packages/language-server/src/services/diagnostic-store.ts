import type { Diagnostic, TextDocumentContentChangeEvent } from "vscode-languageserver/node.js";
import { shiftDiagnosticsForChanges } from "./diagnostic-shifter.js";

/**
 * Per-document diagnostic sets owned by the session.
 *
 * A set is either the output of the last completed checker run, shifted by
 * every edit received since, or empty.
 */
export class DiagnosticStore {
  #sets = new Map<string, Diagnostic[]>();

  get(uri: string): readonly Diagnostic[] {
    return this.#sets.get(uri) ?? [];
  }

  replace(uri: string, diagnostics: readonly Diagnostic[]): readonly Diagnostic[] {
    const next = [...diagnostics];
    this.#sets.set(uri, next);
    return next;
  }

  applyChanges(uri: string, changes: readonly TextDocumentContentChangeEvent[]): readonly Diagnostic[] {
    const current = this.#sets.get(uri);
    if (!current) return [];
    shiftDiagnosticsForChanges(current, changes);
    return current;
  }

  clear(uri: string): void {
    this.#sets.delete(uri);
  }
}
