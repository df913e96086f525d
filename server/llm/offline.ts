/**
 * Offline language model substitute.
 *
 * Composed in when no model credential is configured, and used as the
 * per-tier fallback when a live call fails. Answers are extractive: sentences
 * lifted from the transcript excerpts in the prompt, so output is
 * deterministic and never invents figures.
 */

import { FINANCIAL_KEYWORDS } from "../config/constants";
import type { CompletionOptions, LanguageModelClient, LLMMessage } from "./client";

const EXCERPTS_HEADER = "TRANSCRIPT EXCERPTS:\n";
const MARKET_DATA_SEPARATOR = "\n\nMARKET DATA:";
const QUERY_SEPARATOR = "\n\nQuery: ";

const MAX_BULLETS = 4;
const MAX_SUMMARY_SENTENCES = 3;

export const NO_EXCERPTS_MESSAGE = "No transcript excerpts were available for analysis.";

function splitUserPrompt(prompt: string): { context: string; query: string } {
  const at = prompt.lastIndexOf(QUERY_SEPARATOR);
  if (at === -1) return { context: "", query: prompt };
  return {
    context: prompt.slice(0, at).replace(/^Context:\n/, ""),
    query: prompt.slice(at + QUERY_SEPARATOR.length),
  };
}

export function excerptSentences(context: string): string[] {
  const start = context.indexOf(EXCERPTS_HEADER);
  if (start === -1) return [];
  const body = context.slice(start + EXCERPTS_HEADER.length);
  const end = body.indexOf(MARKET_DATA_SEPARATOR);
  const excerpts = end === -1 ? body : body.slice(0, end);

  return excerpts
    .split(/(?<=[.!?])\s+/)
    .map(s => s.trim())
    .filter(Boolean);
}

function isFinancial(sentence: string): boolean {
  const lower = sentence.toLowerCase();
  return FINANCIAL_KEYWORDS.some(keyword => lower.includes(keyword));
}

export class OfflineLanguageModelClient implements LanguageModelClient {
  readonly mode = "offline";

  async complete(messages: LLMMessage[], _options?: CompletionOptions): Promise<string> {
    const userPrompt = [...messages].reverse().find(m => m.role === "user")?.content ?? "";
    const { context, query } = splitUserPrompt(userPrompt);
    const sentences = excerptSentences(context);
    const q = query.toLowerCase();

    if (q.includes("bullet")) {
      if (sentences.length === 0) return `• ${NO_EXCERPTS_MESSAGE}`;
      const financial = sentences.filter(isFinancial);
      const picked = (financial.length > 0 ? financial : sentences).slice(0, MAX_BULLETS);
      return picked.map(s => `• ${s}`).join("\n");
    }

    if (q.includes("summary")) {
      if (sentences.length === 0) return NO_EXCERPTS_MESSAGE;
      return sentences.slice(0, MAX_SUMMARY_SENTENCES).join(" ");
    }

    if (q.includes("expert")) {
      if (sentences.length === 0) return `Expert analysis unavailable offline. ${NO_EXCERPTS_MESSAGE}`;
      const lines = sentences.slice(0, MAX_SUMMARY_SENTENCES).map(s => `- ${s}`);
      return ["Expert analysis unavailable offline. Key excerpts:", ...lines].join("\n");
    }

    const firstLine = query.split("\n")[0]?.trim() ?? "";
    return `Offline response for: ${firstLine}`;
  }
}
