import type { Tokenizer } from "../ingestion/tokenizer";
import type { Chunk } from "../rag/types";

const TERMINAL_IDS: Record<string, number> = { ".": 0, "!": 1, "?": 2 };

/**
 * Whitespace tokenizer: every word is one token, and ".", "!" and "?" (as
 * standalone words) get the ids 0, 1 and 2.
 */
export class WordTokenizer implements Tokenizer {
  private readonly ids = new Map<string, number>(Object.entries(TERMINAL_IDS));
  private readonly words = new Map<number, string>(
    Object.entries(TERMINAL_IDS).map(([word, id]) => [id, word]),
  );
  private nextId = 10;

  encode(text: string): number[] {
    return text.split(/\s+/).filter(Boolean).map(word => this.idFor(word));
  }

  decode(tokens: number[]): string {
    return tokens.map(id => this.words.get(id) ?? "").join(" ");
  }

  private idFor(word: string): number {
    const existing = this.ids.get(word);
    if (existing !== undefined) return existing;
    const id = this.nextId++;
    this.ids.set(word, id);
    this.words.set(id, word);
    return id;
  }
}

export function makeChunk(text: string, index = 0): Chunk {
  return { text, startToken: index * 10, endToken: index * 10 + 10, tokenCount: 10 };
}

export const SAMPLE_TRANSCRIPT = "JOHN DOE: Revenue grew . Margins expanded .";
