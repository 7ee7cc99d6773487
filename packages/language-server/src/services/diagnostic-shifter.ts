import {
  TextDocumentContentChangeEvent,
  type Diagnostic,
  type Position,
  type Range,
} from "vscode-languageserver/node.js";
import { comparePositions, isBefore, isSamePosition, rangeContains } from "./ranges.js";

interface ChangeGeometry {
  readonly range: Range;
  readonly rows: number;
  readonly lineDelta: number;
  /** UTF-16 width of the text after the last inserted line break (or all of it). */
  readonly lastLineLength: number;
}

function measure(range: Range, text: string): ChangeGeometry {
  const lastBreak = text.lastIndexOf("\n");
  const rows = text.split("\n").length - 1;
  return {
    range,
    rows,
    lineDelta: range.start.line - range.end.line + rows,
    lastLineLength: lastBreak === -1 ? text.length : text.length - lastBreak - 1,
  };
}

/**
 * Where a position at or after the end of the change ends up once the change
 * is applied. Positions on the change's last line move with the inserted
 * text; positions on later lines only move vertically.
 */
function movePosition(p: Position, change: ChangeGeometry): Position {
  const { range } = change;
  if (p.line !== range.end.line) {
    return { line: p.line + change.lineDelta, character: p.character };
  }
  const lineStart = change.rows === 0 ? range.start.character : 0;
  return {
    line: p.line + change.lineDelta,
    character: lineStart + change.lastLineLength + (p.character - range.end.character),
  };
}

/**
 * Keeps diagnostics aligned with the text while the user edits between two
 * checker runs. Mutates `diagnostics` in place: ranges that only moved are
 * rewritten, ranges the change overwrote or cut through are dropped.
 *
 * `change.range` is expressed in the document as it was before the change.
 */
export function shiftDiagnostics(diagnostics: Diagnostic[], change: TextDocumentContentChangeEvent): void {
  if (diagnostics.length === 0) return;
  if (!TextDocumentContentChangeEvent.isIncremental(change)) {
    diagnostics.length = 0;
    return;
  }

  const geometry = measure(change.range, change.text);
  const { start, end } = change.range;
  const kept: Diagnostic[] = [];

  for (const d of diagnostics) {
    if (isBefore(d.range.end, start)) {
      kept.push(d);
    } else if (d.range.start.line > end.line) {
      d.range = {
        start: { line: d.range.start.line + geometry.lineDelta, character: d.range.start.character },
        end: { line: d.range.end.line + geometry.lineDelta, character: d.range.end.character },
      };
      kept.push(d);
    } else if (rangeContains(change.range, d.range)) {
      // the text the diagnostic described is gone
      continue;
    } else if (comparePositions(d.range.start, end) >= 0) {
      d.range = { start: movePosition(d.range.start, geometry), end: movePosition(d.range.end, geometry) };
      kept.push(d);
    } else if (isSamePosition(d.range.end, start)) {
      kept.push(d);
    }
    // anything left straddles a boundary of the change
  }

  diagnostics.splice(0, diagnostics.length, ...kept);
}

export function shiftDiagnosticsForChanges(
  diagnostics: Diagnostic[],
  changes: readonly TextDocumentContentChangeEvent[],
): void {
  for (const change of changes) {
    shiftDiagnostics(diagnostics, change);
  }
}
