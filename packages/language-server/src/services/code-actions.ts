import {
  CodeActionKind,
  TextDocumentEdit,
  TextEdit,
  VersionedTextDocumentIdentifier,
  type CodeAction,
  type Diagnostic,
} from "vscode-languageserver/node.js";
import { readDiagnosticData, SOURCE_NAME, type YalafiDiagnosticData } from "../mapping/match-mapper.js";
import { textInRange } from "./position-index.js";

export const MAX_CODE_ACTIONS = 10;

/** The live document a fix is built against. */
export interface CodeActionTarget {
  readonly uri: string;
  readonly version: number;
  getText(): string;
}

export type CodeActionResult =
  | { readonly kind: "actions"; readonly actions: CodeAction[] }
  /** A diagnostic no longer covers the text it was reported for; no fix is offered at all. */
  | { readonly kind: "drift"; readonly diagnostic: Diagnostic; readonly expected: string; readonly actual: string };

function fixable(diagnostic: Diagnostic): YalafiDiagnosticData | null {
  if (diagnostic.source !== SOURCE_NAME) return null;
  const data = readDiagnosticData(diagnostic);
  if (!data || data.replacements.length === 0) return null;
  return data;
}

/**
 * Quick fixes from the checker's replacement suggestions.
 *
 * Every candidate diagnostic must still cover exactly the text it was
 * reported for; the first one that doesn't abandons the whole pass.
 */
export function buildCodeActions(diagnostics: readonly Diagnostic[], document: CodeActionTarget): CodeActionResult {
  const text = document.getText();
  const identifier = VersionedTextDocumentIdentifier.create(document.uri, document.version);
  const actions: CodeAction[] = [];

  for (const diagnostic of diagnostics) {
    const data = fixable(diagnostic);
    if (!data) continue;

    const actual = textInRange(text, diagnostic.range);
    if (actual !== data.plainText) {
      return { kind: "drift", diagnostic, expected: data.plainText, actual };
    }

    for (const replacement of data.replacements) {
      const title = replacement.shortDescription === undefined
        ? replacement.value
        : `${replacement.value} (${replacement.shortDescription})`;
      actions.push({
        title,
        kind: CodeActionKind.QuickFix,
        diagnostics: [diagnostic],
        edit: {
          documentChanges: [
            TextDocumentEdit.create(identifier, [TextEdit.replace(diagnostic.range, replacement.value)]),
          ],
        },
      });
      if (actions.length >= MAX_CODE_ACTIONS) {
        return { kind: "actions", actions };
      }
    }
  }

  return { kind: "actions", actions };
}
