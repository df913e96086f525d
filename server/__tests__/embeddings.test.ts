import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  OfflineEmbeddingClient,
  OpenAIEmbeddingClient,
  ResilientEmbeddingClient,
  offlineEmbeddingsFor,
  type EmbeddingClient,
} from "../llm/embeddings";
import { CancelledError } from "../utils/errorHandler";

const policy = { label: "Embeddings", timeoutMs: 1000, maxRetries: 1 };

describe("OfflineEmbeddingClient", () => {
  it("returns one constant vector per text", async () => {
    const client = new OfflineEmbeddingClient(4, 0.1);
    expect(await client.embed(["a", "b"])).toEqual([
      [0.1, 0.1, 0.1, 0.1],
      [0.1, 0.1, 0.1, 0.1],
    ]);
    expect(client.mode).toBe("offline");
  });

  it("matches the width of the configured model", async () => {
    const [vector] = await offlineEmbeddingsFor("text-embedding-3-small").embed(["x"]);
    expect(vector).toHaveLength(1536);
  });

  it("uses the default width for unknown models", async () => {
    const [vector] = await offlineEmbeddingsFor("some-other-model").embed(["x"]);
    expect(vector).toHaveLength(1536);
  });
});

describe("OpenAIEmbeddingClient", () => {
  it("skips the request for an empty batch", async () => {
    const client = new OpenAIEmbeddingClient("text-embedding-3-small", "test-secret");
    expect(await client.embed([])).toEqual([]);
  });
});

describe("ResilientEmbeddingClient", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the primary vectors when the call succeeds", async () => {
    const primary: EmbeddingClient = { mode: "live", embed: vi.fn(async (texts: string[]) => texts.map(() => [1, 0])) };
    const client = new ResilientEmbeddingClient(primary, new OfflineEmbeddingClient(2), policy);

    expect(await client.embed(["a"])).toEqual([[1, 0]]);
    expect(client.mode).toBe("live");
  });

  it("falls back to offline vectors after the retry budget", async () => {
    const embed = vi.fn(async (_texts: string[]) => {
      throw new Error("503 Service Unavailable");
    });
    const client = new ResilientEmbeddingClient({ mode: "live", embed }, new OfflineEmbeddingClient(2, 0.5), policy);

    expect(await client.embed(["a", "b"])).toEqual([[0.5, 0.5], [0.5, 0.5]]);
    expect(embed).toHaveBeenCalledTimes(2);
  });

  it("propagates caller cancellation instead of falling back", async () => {
    const controller = new AbortController();
    controller.abort();
    const fallback = new OfflineEmbeddingClient(2);
    const fallbackEmbed = vi.spyOn(fallback, "embed");
    const primary: EmbeddingClient = { mode: "live", embed: vi.fn(async () => [[1, 0]]) };
    const client = new ResilientEmbeddingClient(primary, fallback, policy);

    await expect(client.embed(["a"], controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(fallbackEmbed).not.toHaveBeenCalled();
  });
});
