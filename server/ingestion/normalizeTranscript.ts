/**
 * Transcript text normalization.
 *
 * Layer: Ingestion (deterministic, pure)
 */

type Rewrite = {
  pattern: RegExp;
  replacement: string;
};

// Order matters: whitespace is collapsed before spans are deleted.
const REWRITES: readonly Rewrite[] = [
  { pattern: /\s+/g, replacement: " " },
  // [00:12:31] style timestamps
  { pattern: /\[.*?\]/g, replacement: "" },
  // (Operator Instructions), (ph) and other inline annotations
  { pattern: /\(.*?\)/g, replacement: "" },
  // "JOHN DOE :" → "JOHN DOE:"
  { pattern: /\b([A-Z][A-Z ]*[A-Z])[ ]+:/g, replacement: "$1:" },
  { pattern: /Page \d+ of \d+/g, replacement: "" },
  { pattern: /^\d+\s*$/gm, replacement: "" },
];

function applyRewrites(text: string): string {
  let result = text;
  for (const { pattern, replacement } of REWRITES) {
    result = result.replace(pattern, replacement);
  }
  return result.trim();
}

/**
 * Cleans raw transcript text. Idempotent: deleting a span can leave a fresh
 * double space or a bare page number behind, so the rewrite pass repeats until
 * the text stops changing. A pass never lengthens the text.
 */
export function normalizeTranscript(text: string): string {
  let current = text;
  for (;;) {
    const next = applyRewrites(current);
    if (next === current) return next;
    current = next;
  }
}
