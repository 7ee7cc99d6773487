/**
 * Type mapping utilities: checker matches → LSP diagnostics
 */
import type { Diagnostic } from "vscode-languageserver/node.js";
import { MatchFieldError } from "../errors.js";
import { decodeMatch, type AnalyzerContext, type AnalyzerMatch, type AnalyzerReplacement } from "../services/analyzer-output.js";
import { positionAt } from "../services/position-index.js";
import { severityForCategory } from "../services/severity.js";
import type { Logger } from "../services/types.js";

/** `source` of every diagnostic this server publishes. */
export const SOURCE_NAME = "YaLafi";

export const MAX_REPLACEMENTS = 10;

/** Payload kept in `Diagnostic.data` so quick fixes can be built later. */
export interface YalafiDiagnosticData {
  /** The text the diagnostic covered when the checker ran. */
  readonly plainText: string;
  readonly replacements: readonly AnalyzerReplacement[];
}

export interface YalafiDiagnostic extends Diagnostic {
  data: YalafiDiagnosticData;
}

/**
 * Split the context excerpt around its span of interest.
 *
 * Returns the span itself and the excerpt with `>>>`/`<<<` around the span.
 * Offsets count code points, like every offset the checker reports.
 */
export function markContext(context: AnalyzerContext): { plainText: string; markedContext: string } {
  const chars = Array.from(context.text);
  const before = chars.slice(0, context.offset).join("");
  const plainText = chars.slice(context.offset, context.offset + context.length).join("");
  const after = chars.slice(context.offset + context.length).join("");
  return { plainText, markedContext: `${before}>>>${plainText}<<<${after}` };
}

/** Map one decoded match against the full text that was checked. */
export function mapMatch(match: AnalyzerMatch, text: string): YalafiDiagnostic {
  const { plainText, markedContext } = markContext(match.context);
  return {
    range: {
      start: positionAt(text, match.offset),
      end: positionAt(text, match.offset + match.length),
    },
    message: `${match.shortMessage}\n${match.message}\nContext: ${markedContext}`,
    code: match.rule.id.toLowerCase(),
    severity: severityForCategory(match.rule.category.id),
    source: SOURCE_NAME,
    data: {
      plainText,
      replacements: match.replacements.slice(0, MAX_REPLACEMENTS),
    },
  };
}

/**
 * Decode and map every raw match. A malformed match is logged and skipped;
 * the rest of the run still produces diagnostics.
 */
export function mapMatches(matches: readonly unknown[], text: string, logger: Logger): YalafiDiagnostic[] {
  const mapped: YalafiDiagnostic[] = [];
  matches.forEach((raw, i) => {
    try {
      mapped.push(mapMatch(decodeMatch(raw, `matches[${i}]`), text));
    } catch (e) {
      if (!(e instanceof MatchFieldError)) throw e;
      logger.warn(`[diagnostics] skipping malformed match: ${e.message}`);
    }
  });
  return mapped;
}

function isReplacement(value: unknown): value is AnalyzerReplacement {
  if (typeof value !== "object" || value === null) return false;
  const { value: text, shortDescription } = value as Record<string, unknown>;
  return typeof text === "string" && (shortDescription === undefined || typeof shortDescription === "string");
}

/** Read back the payload of a diagnostic published by this server, or null. */
export function readDiagnosticData(diagnostic: Diagnostic): YalafiDiagnosticData | null {
  const data: unknown = diagnostic.data;
  if (typeof data !== "object" || data === null) return null;
  const { plainText, replacements } = data as Record<string, unknown>;
  if (typeof plainText !== "string" || !Array.isArray(replacements)) return null;
  if (!replacements.every(isReplacement)) return null;
  return { plainText, replacements };
}
