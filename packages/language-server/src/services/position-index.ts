import type { Position, Range } from "vscode-languageserver/node.js";

/**
 * Offset <-> position conversion for checker output.
 *
 * Offsets count characters (code points), which is what YaLafi reports.
 * Columns are UTF-16 code units, which is what LSP positions use, so a
 * character outside the BMP advances the column by 2 but the offset by 1.
 * Line endings are not normalized: `\r` is an ordinary unit on its line.
 */

export function positionAt(text: string, offset: number): Position {
  let line = 0;
  let character = 0;
  let seen = 0;
  for (const ch of text) {
    if (seen >= offset) break;
    if (ch === "\n") {
      line += 1;
      character = 0;
    } else {
      character += ch.length;
    }
    seen += 1;
  }
  return { line, character };
}

export function offsetAt(text: string, position: Position): number {
  let line = 0;
  let character = 0;
  let offset = 0;
  for (const ch of text) {
    if (line === position.line && (character >= position.character || ch === "\n")) break;
    if (ch === "\n") {
      line += 1;
      character = 0;
    } else {
      character += ch.length;
    }
    offset += 1;
  }
  return offset;
}

export function textInRange(text: string, range: Range): string {
  const chars = Array.from(text);
  return chars.slice(offsetAt(text, range.start), offsetAt(text, range.end)).join("");
}
