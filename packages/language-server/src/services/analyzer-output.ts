import { AnalyzerOutputError, MatchFieldError } from "../errors.js";

/* =============================================================================
 * Checker output model (`yalafi.shell --out json`)
 * ============================================================================= */

export interface AnalyzerReplacement {
  readonly value: string;
  readonly shortDescription?: string;
}

export interface AnalyzerRule {
  readonly id: string;
  readonly category: { readonly id: string };
}

/** Excerpt around a match, and the sub-span of interest inside it. */
export interface AnalyzerContext {
  readonly text: string;
  readonly offset: number;
  readonly length: number;
}

export interface AnalyzerMatch {
  /** Character offset into the analyzed document. */
  readonly offset: number;
  readonly length: number;
  readonly message: string;
  readonly shortMessage: string;
  readonly rule: AnalyzerRule;
  readonly replacements: readonly AnalyzerReplacement[];
  readonly context: AnalyzerContext;
}

/** Top level of the output. Matches stay undecoded so one bad entry can be skipped. */
export interface AnalyzerOutput {
  readonly matches: readonly unknown[];
}

/* =============================================================================
 * Decoding
 * ============================================================================= */

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function record(value: unknown, path: string): JsonRecord {
  if (!isRecord(value)) throw new MatchFieldError(path, "object");
  return value;
}

function string(value: unknown, path: string): string {
  if (typeof value !== "string") throw new MatchFieldError(path, "string");
  return value;
}

function count(value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new MatchFieldError(path, "non-negative integer");
  }
  return value;
}

function array(value: unknown, path: string): readonly unknown[] {
  if (!Array.isArray(value)) throw new MatchFieldError(path, "array");
  return value;
}

function decodeReplacement(value: unknown, path: string): AnalyzerReplacement {
  const raw = record(value, path);
  const replacement: { value: string; shortDescription?: string } = {
    value: string(raw.value, `${path}.value`),
  };
  if (raw.shortDescription !== undefined) {
    replacement.shortDescription = string(raw.shortDescription, `${path}.shortDescription`);
  }
  return replacement;
}

/**
 * Decode one element of `matches`. Throws {@link MatchFieldError} naming the
 * first offending field, e.g. `matches[3].rule.category.id`.
 */
export function decodeMatch(value: unknown, path = "match"): AnalyzerMatch {
  const raw = record(value, path);
  const rule = record(raw.rule, `${path}.rule`);
  const category = record(rule.category, `${path}.rule.category`);
  const context = record(raw.context, `${path}.context`);
  return {
    offset: count(raw.offset, `${path}.offset`),
    length: count(raw.length, `${path}.length`),
    message: string(raw.message, `${path}.message`),
    shortMessage: string(raw.shortMessage, `${path}.shortMessage`),
    rule: {
      id: string(rule.id, `${path}.rule.id`),
      category: { id: string(category.id, `${path}.rule.category.id`) },
    },
    replacements: array(raw.replacements, `${path}.replacements`).map((entry, i) =>
      decodeReplacement(entry, `${path}.replacements[${i}]`),
    ),
    context: {
      text: string(context.text, `${path}.context.text`),
      offset: count(context.offset, `${path}.context.offset`),
      length: count(context.length, `${path}.context.length`),
    },
  };
}

/** Parse the checker's stdout. Throws {@link AnalyzerOutputError} on anything but `{ matches: [...] }`. */
export function parseAnalyzerOutput(stdout: string, stderr = ""): AnalyzerOutput {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (e) {
    throw new AnalyzerOutputError(e instanceof Error ? e.message : String(e), stderr);
  }
  if (!isRecord(parsed)) {
    throw new AnalyzerOutputError("expected a JSON object at the top level", stderr);
  }
  if (!Array.isArray(parsed.matches)) {
    throw new AnalyzerOutputError("expected `matches` to be an array", stderr);
  }
  return { matches: parsed.matches };
}
