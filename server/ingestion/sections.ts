/**
 * Coarse topical sectioning of a transcript.
 *
 * A line matching a section rule starts a new run under that section (the line
 * itself included); other lines extend the current run, which starts as
 * "general". A section seen twice keeps only its latest run.
 *
 * Layer: Ingestion (deterministic, pure)
 */

import { SECTION_RULES, matchFirstRule } from "./lineRules";
import type { SectionName, Sections } from "./types";

export function classifySectionLine(line: string): SectionName | null {
  return matchFirstRule(SECTION_RULES, line.toLowerCase())?.rule.name ?? null;
}

export function extractSections(text: string): Sections {
  const sections: Sections = {};
  let currentSection: SectionName = "general";
  let currentText: string[] = [];

  for (const line of text.split("\n")) {
    const matched = classifySectionLine(line);

    if (matched) {
      if (currentText.length > 0) {
        sections[currentSection] = currentText.join(" ");
      }
      currentSection = matched;
      currentText = [line];
    } else {
      currentText.push(line);
    }
  }

  if (currentText.length > 0) {
    sections[currentSection] = currentText.join(" ");
  }

  return sections;
}
