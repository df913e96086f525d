/**
 * Line classification rules shared by the speaker and section scanners.
 *
 * Rules are plain data evaluated top to bottom; the first rule whose pattern
 * matches wins. The scanners own the state, this file owns the patterns.
 */

import type { SectionName } from "./types";

export type LineRule<Name extends string> = {
  readonly name: Name;
  readonly pattern: RegExp;
};

export type LineMatch<Name extends string> = {
  rule: LineRule<Name>;
  match: RegExpMatchArray;
};

/**
 * "JOHN DOE: Hello team" → label "JOHN DOE", remainder "Hello team".
 * The label needs at least two characters, so "Q: ..." is not a speaker.
 */
export const SPEAKER_RULES: readonly LineRule<"speaker_label">[] = [
  { name: "speaker_label", pattern: /^([A-Z][A-Z\s]+):\s*(.*)$/ },
];

/**
 * Evaluated against the lowercased line.
 */
export const SECTION_RULES: readonly LineRule<Exclude<SectionName, "general">>[] = [
  { name: "prepared_remarks", pattern: /prepared remarks|opening remarks|prepared statement/ },
  { name: "qa_section", pattern: /question.?answer|q.?&.?a|questions/ },
  { name: "guidance", pattern: /guidance|outlook|forward.?looking/ },
  { name: "financial_metrics", pattern: /financial|revenue|earnings|eps|margin/ },
  { name: "business_update", pattern: /business update|operational|strategy/ },
];

export function matchFirstRule<Name extends string>(
  rules: readonly LineRule<Name>[],
  line: string,
): LineMatch<Name> | null {
  for (const rule of rules) {
    const match = line.match(rule.pattern);
    if (match) return { rule, match };
  }
  return null;
}
