import { describe, test, expect } from "vitest";
import type { TextDocumentContentChangeEvent } from "vscode-languageserver/node.js";
import { shiftDiagnostics, shiftDiagnosticsForChanges } from "../../src/services/diagnostic-shifter.js";
import { comparePositions } from "../../src/services/ranges.js";
import { diagnostic, range } from "../helpers/test-factories.js";

function change(
  startLine: number,
  startChar: number,
  endLine: number,
  endChar: number,
  text: string,
): TextDocumentContentChangeEvent {
  return { range: range(startLine, startChar, endLine, endChar), text };
}

describe("shiftDiagnostics", () => {
  test("leaves diagnostics before the change untouched", () => {
    const d = diagnostic({ range: range(0, 0, 0, 3) });
    const set = [d];
    shiftDiagnostics(set, change(1, 0, 1, 2, "x"));
    expect(set).toEqual([d]);
    expect(set[0]?.range).toEqual(range(0, 0, 0, 3));
  });

  test("moves diagnostics on later lines by the inserted line breaks", () => {
    const set = [diagnostic({ range: range(2, 2, 2, 5) })];
    shiftDiagnostics(set, change(0, 0, 0, 0, "X\nY\n"));
    expect(set[0]?.range).toEqual(range(4, 2, 4, 5));
  });

  test("moves diagnostics on later lines up when lines are deleted", () => {
    const set = [diagnostic({ range: range(3, 1, 3, 4) })];
    shiftDiagnostics(set, change(0, 0, 2, 0, ""));
    expect(set[0]?.range).toEqual(range(1, 1, 1, 4));
  });

  test("removes a diagnostic whose span was overwritten", () => {
    const set = [diagnostic({ range: range(0, 4, 0, 7) })];
    shiftDiagnostics(set, change(0, 2, 0, 10, ""));
    expect(set).toEqual([]);
  });

  test("removes a diagnostic replaced exactly", () => {
    const set = [diagnostic({ range: range(0, 4, 0, 7) })];
    shiftDiagnostics(set, change(0, 4, 0, 7, "the"));
    expect(set).toEqual([]);
  });

  test("shifts columns for a single-line edit earlier on the same line", () => {
    const set = [diagnostic({ range: range(0, 8, 0, 11) })];
    shiftDiagnostics(set, change(0, 0, 0, 3, "the quick"));
    expect(set[0]?.range).toEqual(range(0, 14, 0, 17));
  });

  test("pushes a diagnostic right when text is inserted at its start", () => {
    const set = [diagnostic({ range: range(0, 8, 0, 11) })];
    shiftDiagnostics(set, change(0, 8, 0, 8, "xx"));
    expect(set[0]?.range).toEqual(range(0, 10, 0, 13));
  });

  test("shifts only the start column of a multi-line diagnostic", () => {
    const set = [diagnostic({ range: range(0, 8, 1, 2) })];
    shiftDiagnostics(set, change(0, 0, 0, 3, "a"));
    expect(set[0]?.range).toEqual(range(0, 6, 1, 2));
  });

  test("follows the text when a multi-line deletion ends before the diagnostic", () => {
    const set = [diagnostic({ range: range(1, 4, 1, 7) })];
    shiftDiagnostics(set, change(0, 5, 1, 2, ""));
    expect(set[0]?.range).toEqual(range(0, 7, 0, 10));
  });

  test("follows the text when a line break is inserted before the diagnostic", () => {
    const set = [diagnostic({ range: range(0, 5, 0, 8) })];
    shiftDiagnostics(set, change(0, 2, 0, 2, "x\nyz"));
    expect(set[0]?.range).toEqual(range(1, 5, 1, 8));
  });

  test("keeps a diagnostic that ends where the change begins", () => {
    const set = [diagnostic({ range: range(0, 0, 0, 3) })];
    shiftDiagnostics(set, change(0, 3, 0, 3, "s"));
    expect(set[0]?.range).toEqual(range(0, 0, 0, 3));
  });

  test("removes a diagnostic the change cuts through", () => {
    const tail = [diagnostic({ range: range(0, 2, 0, 6) })];
    shiftDiagnostics(tail, change(0, 4, 0, 8, ""));
    expect(tail).toEqual([]);

    const head = [diagnostic({ range: range(0, 2, 0, 6) })];
    shiftDiagnostics(head, change(0, 0, 0, 4, "abc"));
    expect(head).toEqual([]);
  });

  test("removes a zero-width diagnostic at the insertion point", () => {
    const set = [diagnostic({ range: range(0, 3, 0, 3) })];
    shiftDiagnostics(set, change(0, 3, 0, 3, "x"));
    expect(set).toEqual([]);
  });

  test("drops everything on a full-content change", () => {
    const set = [diagnostic({ range: range(0, 0, 0, 3) }), diagnostic({ range: range(4, 0, 4, 3) })];
    shiftDiagnostics(set, { text: "replaced" });
    expect(set).toEqual([]);
  });

  test("mutates the array it was given and visits every element once", () => {
    const keep = diagnostic({ range: range(0, 0, 0, 2) });
    const drop = diagnostic({ range: range(1, 1, 1, 3) });
    const move = diagnostic({ range: range(2, 0, 2, 4) });
    const set = [keep, drop, move];
    shiftDiagnostics(set, change(1, 0, 1, 5, "a\nb"));
    expect(set).toHaveLength(2);
    expect(set[0]).toBe(keep);
    expect(set[1]).toBe(move);
    expect(move.range).toEqual(range(3, 0, 3, 4));
  });
});

describe("shiftDiagnosticsForChanges", () => {
  test("applies changes in order, each against the preceding state", () => {
    const set = [diagnostic({ range: range(1, 4, 1, 7) })];
    shiftDiagnosticsForChanges(set, [
      change(0, 0, 0, 0, "new line\n"),
      change(2, 0, 2, 2, ""),
    ]);
    expect(set[0]?.range).toEqual(range(2, 2, 2, 5));
  });

  test("never produces a range that ends before it starts", () => {
    const set = [
      diagnostic({ range: range(0, 1, 0, 4) }),
      diagnostic({ range: range(0, 6, 2, 1) }),
      diagnostic({ range: range(3, 0, 3, 9) }),
      diagnostic({ range: range(5, 2, 6, 0) }),
    ];
    shiftDiagnosticsForChanges(set, [
      change(0, 5, 0, 5, "\n\n"),
      change(4, 3, 5, 0, "z"),
      change(0, 0, 0, 1, "\u{1F600}"),
      change(9, 0, 9, 0, "tail\n"),
    ]);
    for (const d of set) {
      expect(comparePositions(d.range.start, d.range.end)).toBeLessThanOrEqual(0);
    }
  });
});
