/**
 * Composition root.
 *
 * Builds every long-lived collaborator from Settings. Live capabilities are
 * chosen when their credential is configured, offline substitutes otherwise;
 * nothing downstream branches on credentials.
 */

import { EarningsCallPipeline } from "./analysis/pipeline";
import { TranscriptProcessor } from "./ingestion/processTranscript";
import { createTiktokenTokenizer, type Tokenizer } from "./ingestion/tokenizer";
import { ProviderLanguageModelClient, detectProvider, type LanguageModelClient } from "./llm/client";
import {
  OpenAIEmbeddingClient,
  ResilientEmbeddingClient,
  offlineEmbeddingsFor,
  type EmbeddingClient,
} from "./llm/embeddings";
import { OfflineLanguageModelClient } from "./llm/offline";
import { ProviderMarketDataAggregator } from "./marketData/aggregator";
import { AlphaVantageProvider } from "./marketData/alphaVantage";
import type { MarketDataProvider } from "./marketData/types";
import { YahooFinanceProvider } from "./marketData/yahooFinance";
import { TierOrchestrator } from "./rag/composer";
import { Retriever } from "./rag/retriever";
import { KeywordSentimentClassifier } from "./rag/sentiment";
import { createStorage, type IStorage } from "./storage";
import type { Settings } from "./config/settings";

export type CapabilityModes = {
  llm: "live" | "offline";
  embeddings: "live" | "offline";
  marketData: string[];
};

export type AppServices = {
  settings: Readonly<Settings>;
  pipeline: EarningsCallPipeline;
  storage: IStorage;
  capabilities: CapabilityModes;
};

export type AppServiceOverrides = {
  tokenizer?: Tokenizer;
  llm?: LanguageModelClient;
  embeddings?: EmbeddingClient;
  marketDataProviders?: MarketDataProvider[];
  storage?: IStorage;
};

function hasKeyForModel(settings: Settings): boolean {
  switch (detectProvider(settings.llm.model)) {
    case "openai":
      return Boolean(settings.apiKeys.openai);
    case "gemini":
      return Boolean(settings.apiKeys.gemini);
    case "claude":
      return Boolean(settings.apiKeys.anthropic);
  }
}

function createLanguageModel(settings: Settings): LanguageModelClient {
  if (!hasKeyForModel(settings)) {
    console.warn(`[AppServices] No API key for ${settings.llm.model}; tier analysis runs offline`);
    return new OfflineLanguageModelClient();
  }
  return new ProviderLanguageModelClient(settings.llm.model, {
    openai: settings.apiKeys.openai,
    gemini: settings.apiKeys.gemini,
    anthropic: settings.apiKeys.anthropic,
  });
}

function createEmbeddings(settings: Settings): EmbeddingClient {
  const offline = offlineEmbeddingsFor(settings.llm.embeddingModel);
  if (!settings.apiKeys.openai) {
    console.warn("[AppServices] OPENAI_API_KEY not set; embeddings run offline");
    return offline;
  }
  return new ResilientEmbeddingClient(
    new OpenAIEmbeddingClient(settings.llm.embeddingModel, settings.apiKeys.openai),
    offline,
    { label: "Embeddings", timeoutMs: settings.llm.timeoutMs, maxRetries: settings.llm.maxRetries },
  );
}

function createMarketDataProviders(settings: Settings): MarketDataProvider[] {
  const providers: MarketDataProvider[] = [];
  if (settings.yahooFinanceEnabled) {
    providers.push(new YahooFinanceProvider());
  }
  if (settings.apiKeys.alphaVantage) {
    providers.push(new AlphaVantageProvider(settings.apiKeys.alphaVantage));
  }
  return providers;
}

export function createAppServices(
  settings: Readonly<Settings>,
  overrides: AppServiceOverrides = {},
): AppServices {
  const tokenizer = overrides.tokenizer ?? createTiktokenTokenizer();
  const llm = overrides.llm ?? createLanguageModel(settings);
  const embeddings = overrides.embeddings ?? createEmbeddings(settings);
  const providers = overrides.marketDataProviders ?? createMarketDataProviders(settings);
  const storage = overrides.storage ?? createStorage(settings.databaseUrl);

  const orchestrator = new TierOrchestrator({
    llm,
    fallbackLlm: new OfflineLanguageModelClient(),
    sentiment: new KeywordSentimentClassifier(),
    config: {
      temperature: settings.llm.temperature,
      maxTokens: settings.llm.maxTokens,
      timeoutMs: settings.llm.timeoutMs,
      maxRetries: settings.llm.maxRetries,
    },
  });

  const pipeline = new EarningsCallPipeline({
    processor: new TranscriptProcessor(tokenizer, settings.chunking),
    orchestrator,
    retriever: new Retriever(embeddings),
    marketData: new ProviderMarketDataAggregator(providers),
    storage,
    defaultTopK: settings.topK,
  });

  return {
    settings,
    pipeline,
    storage,
    capabilities: {
      llm: llm.mode,
      embeddings: embeddings.mode,
      marketData: providers.map(p => p.name),
    },
  };
}
