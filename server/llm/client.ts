import { OpenAI } from "openai";
import { GoogleGenAI } from "@google/genai";
import { LLM_MODELS, GEMINI_MODELS, CLAUDE_MODELS, resolveMaxTokens } from "../config/models";
import { ExternalServiceError } from "../utils/errorHandler";

const OPENAI_MODELS = new Set<string>(Object.values(LLM_MODELS));
const GEMINI_MODEL_SET = new Set<string>(Object.values(GEMINI_MODELS));
const CLAUDE_MODEL_SET = new Set<string>(Object.values(CLAUDE_MODELS));

export type Provider = "openai" | "gemini" | "claude";

export function detectProvider(model: string): Provider {
  if (OPENAI_MODELS.has(model)) return "openai";
  if (GEMINI_MODEL_SET.has(model)) return "gemini";
  if (CLAUDE_MODEL_SET.has(model)) return "claude";
  if (model.startsWith("gpt-") || model.startsWith("o1") || model.startsWith("o3")) return "openai";
  if (model.startsWith("gemini-")) return "gemini";
  if (model.startsWith("claude-")) return "claude";
  throw new Error(`[LLM Client] Unknown model "${model}"; cannot determine provider. Add it to the model registry in server/config/models.ts`);
}

export type LLMMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type CompletionOptions = {
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
};

/**
 * messages → completion text. Implementations: ProviderLanguageModelClient
 * (network) and OfflineLanguageModelClient (server/llm/offline.ts).
 */
export interface LanguageModelClient {
  readonly mode: "live" | "offline";
  complete(messages: LLMMessage[], options?: CompletionOptions): Promise<string>;
}

export type ProviderApiKeys = {
  openai?: string;
  gemini?: string;
  anthropic?: string;
};

type ClaudeClient = InstanceType<typeof import("@anthropic-ai/sdk").default>;

/**
 * Routes completions to OpenAI, Gemini or Claude depending on the configured
 * model. SDK clients are created lazily, per instance.
 */
export class ProviderLanguageModelClient implements LanguageModelClient {
  readonly mode = "live";
  readonly provider: Provider;

  private _openai: OpenAI | null = null;
  private _gemini: GoogleGenAI | null = null;
  private _claude: ClaudeClient | null = null;

  constructor(private readonly model: string, private readonly apiKeys: ProviderApiKeys) {
    this.provider = detectProvider(model);
  }

  async complete(messages: LLMMessage[], options: CompletionOptions = {}): Promise<string> {
    const maxTokens = options.maxTokens === undefined
      ? undefined
      : resolveMaxTokens(this.model, options.maxTokens);
    const opts = { ...options, maxTokens };

    switch (this.provider) {
      case "openai":
        return this.callOpenAI(messages, opts);
      case "gemini":
        return this.callGemini(messages, opts);
      case "claude":
        return this.callClaude(messages, opts);
      default: {
        const _exhaustive: never = this.provider;
        throw new Error(`[LLM Client] Unhandled provider: ${_exhaustive}`);
      }
    }
  }

  private getOpenAI(): OpenAI {
    if (!this._openai) {
      const apiKey = this.apiKeys.openai;
      if (!apiKey) throw new ExternalServiceError("OpenAI", "OPENAI_API_KEY is not set");
      this._openai = new OpenAI({ apiKey, maxRetries: 0 });
    }
    return this._openai;
  }

  private getGemini(): GoogleGenAI {
    if (!this._gemini) {
      const apiKey = this.apiKeys.gemini;
      if (!apiKey) throw new ExternalServiceError("Gemini", "GEMINI_API_KEY is not set");
      this._gemini = new GoogleGenAI({ apiKey });
    }
    return this._gemini;
  }

  private async getClaude(): Promise<ClaudeClient> {
    if (!this._claude) {
      const apiKey = this.apiKeys.anthropic;
      if (!apiKey) throw new ExternalServiceError("Claude", "ANTHROPIC_API_KEY is not set");
      const Anthropic = (await import("@anthropic-ai/sdk")).default;
      this._claude = new Anthropic({ apiKey, maxRetries: 0 });
    }
    return this._claude;
  }

  private async callOpenAI(messages: LLMMessage[], opts: CompletionOptions): Promise<string> {
    const response = await this.getOpenAI().chat.completions.create(
      {
        model: this.model,
        messages,
        ...(opts.temperature !== undefined && { temperature: opts.temperature }),
        ...(opts.maxTokens !== undefined && { max_tokens: opts.maxTokens }),
      },
      { signal: opts.signal },
    );

    return response.choices[0]?.message?.content || "";
  }

  private async callGemini(messages: LLMMessage[], opts: CompletionOptions): Promise<string> {
    const systemParts = messages
      .filter(m => m.role === "system")
      .map(m => m.content);

    const nonSystemMessages = messages.filter(m => m.role !== "system");

    const contents = nonSystemMessages.map(m => ({
      role: m.role === "assistant" ? "model" as const : "user" as const,
      parts: [{ text: m.content }],
    }));

    const systemInstruction = systemParts.length > 0
      ? systemParts.join("\n\n")
      : undefined;

    const response = await this.getGemini().models.generateContent({
      model: this.model,
      config: {
        ...(systemInstruction && { systemInstruction }),
        ...(opts.temperature !== undefined && { temperature: opts.temperature }),
        ...(opts.maxTokens !== undefined && { maxOutputTokens: opts.maxTokens }),
        ...(opts.signal && { abortSignal: opts.signal }),
      },
      contents,
    });

    return response.text || "";
  }

  private async callClaude(messages: LLMMessage[], opts: CompletionOptions): Promise<string> {
    const client = await this.getClaude();

    const systemContent = messages
      .filter(m => m.role === "system")
      .map(m => m.content)
      .join("\n\n");

    const nonSystemMessages = messages.flatMap(m =>
      m.role === "system" ? [] : [{ role: m.role, content: m.content }],
    );

    const response = await client.messages.create(
      {
        model: this.model,
        max_tokens: opts.maxTokens || 4096,
        ...(systemContent && { system: systemContent }),
        messages: nonSystemMessages,
        ...(opts.temperature !== undefined && { temperature: opts.temperature }),
      },
      { signal: opts.signal },
    );

    const textBlock = response.content.find(b => b.type === "text");

    return textBlock?.type === "text" ? textBlock.text : "";
  }
}
