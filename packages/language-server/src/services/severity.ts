import { DiagnosticSeverity } from "vscode-languageserver/node.js";

/**
 * LanguageTool rule category -> diagnostic severity.
 *
 * Derived from the linter-yalafi mapping, with every error demoted to a
 * warning. Categories missing from the table are reported as errors.
 */
export const CATEGORY_SEVERITY: ReadonlyMap<string, DiagnosticSeverity> = new Map<string, DiagnosticSeverity>([
  ["CASING", DiagnosticSeverity.Warning],
  ["COLLOCATIONS", DiagnosticSeverity.Warning],
  ["COLLOQUIALISMS", DiagnosticSeverity.Information],
  ["COMPOUNDING", DiagnosticSeverity.Warning],
  ["CONFUSED_WORDS", DiagnosticSeverity.Information],
  ["CORRESPONDENCE", DiagnosticSeverity.Warning],
  ["EINHEIT_LEERZEICHEN", DiagnosticSeverity.Warning],
  ["EMPFOHLENE_RECHTSCHREIBUNG", DiagnosticSeverity.Information],
  ["FALSE_FRIENDS", DiagnosticSeverity.Information],
  ["GENDER_NEUTRALITY", DiagnosticSeverity.Information],
  ["GRAMMAR", DiagnosticSeverity.Warning],
  ["HILFESTELLUNG_KOMMASETZUNG", DiagnosticSeverity.Warning],
  ["IDIOMS", DiagnosticSeverity.Information],
  ["MISC", DiagnosticSeverity.Warning],
  ["MISUSED_TERMS_EU_PUBLICATIONS", DiagnosticSeverity.Warning],
  ["NONSTANDARD_PHRASES", DiagnosticSeverity.Information],
  ["PLAIN_ENGLISH", DiagnosticSeverity.Information],
  ["PROPER_NOUNS", DiagnosticSeverity.Warning],
  ["PUNCTUATION", DiagnosticSeverity.Warning],
  ["REDUNDANCY", DiagnosticSeverity.Warning],
  ["REGIONALISMS", DiagnosticSeverity.Information],
  ["REPETITIONS", DiagnosticSeverity.Information],
  ["SEMANTICS", DiagnosticSeverity.Warning],
  ["STYLE", DiagnosticSeverity.Information],
  ["TYPOGRAPHY", DiagnosticSeverity.Warning],
  ["TYPOS", DiagnosticSeverity.Warning],
  ["WIKIPEDIA", DiagnosticSeverity.Information],
]);

export function severityForCategory(categoryId: string): DiagnosticSeverity {
  return CATEGORY_SEVERITY.get(categoryId) ?? DiagnosticSeverity.Error;
}
