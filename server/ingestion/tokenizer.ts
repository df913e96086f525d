/**
 * Tokenizer capability.
 *
 * The chunker only needs a reversible text ↔ token-id mapping; the live
 * implementation is the cl100k_base BPE used by the OpenAI chat models.
 */

import { getEncoding, type TiktokenEncoding } from "js-tiktoken";

export interface Tokenizer {
  encode(text: string): number[];
  decode(tokens: number[]): string;
}

export function createTiktokenTokenizer(encoding: TiktokenEncoding = "cl100k_base"): Tokenizer {
  const bpe = getEncoding(encoding);
  return {
    encode: (text) => bpe.encode(text),
    decode: (tokens) => bpe.decode(tokens),
  };
}
