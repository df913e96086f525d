/**
 * Speaker segmentation.
 *
 * Splits transcript text into ordered speaker blocks:
 *
 *   JOHN DOE: Hello team
 *   Revenue was strong.
 *   JANE ROE: Thanks John.
 *
 * yields [{ John Doe, "Hello team Revenue was strong." }, { Jane Roe, "Thanks John." }].
 * Lines before the first label are dropped. A speaker who talks twice gets
 * two segments; blocks are never merged.
 *
 * Layer: Ingestion (deterministic, pure)
 */

import { SPEAKER_RULES, matchFirstRule } from "./lineRules";
import type { SpeakerSegment } from "./types";

type ScanState =
  | { kind: "no_speaker" }
  | { kind: "in_speaker"; label: string; buffer: string[] };

export function normalizeSpeakerLabel(label: string): string {
  return label
    .trim()
    .toLowerCase()
    .split(/\s+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

export function segmentSpeakers(text: string): SpeakerSegment[] {
  const segments: SpeakerSegment[] = [];
  let state: ScanState = { kind: "no_speaker" };

  const flush = () => {
    if (state.kind === "in_speaker" && state.buffer.length > 0) {
      segments.push({ speaker: state.label, text: state.buffer.join(" ") });
    }
  };

  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();
    if (!line) continue;

    const labelled = matchFirstRule(SPEAKER_RULES, line);
    if (labelled) {
      flush();
      const [, label = "", remainder = ""] = labelled.match;
      const first = remainder.trim();
      state = {
        kind: "in_speaker",
        label: normalizeSpeakerLabel(label),
        buffer: first ? [first] : [],
      };
      continue;
    }

    // continuation line
    if (state.kind === "in_speaker") state.buffer.push(line);
  }

  flush();
  return segments;
}
