import { describe, expect, it, vi } from "vitest";
import { LLMRateLimiter } from "../../../src/services/LLMRateLimiter.js";
import { GENERATION_FALLBACK_MESSAGE, LLMService, safeJsonParse } from "../../../src/services/LLMService.js";
import type { EmbeddingRequest } from "../../../src/services/llmTypes.js";

function createClient() {
  return {
    chat: {
      completions: {
        create: vi.fn()
      }
    },
    embeddings: {
      create: vi.fn()
    }
  };
}

function completion(content: string) {
  return {
    choices: [{ message: { content } }],
    usage: { prompt_tokens: 10, completion_tokens: 5 }
  };
}

const config = {
  apiKey: "test-secret",
  chatModel: "test-chat",
  embeddingModel: "test-embed"
};

const quickLimiter = (overrides: { circuitBreakerFailMax?: number } = {}) =>
  new LLMRateLimiter({
    maxConcurrent: 5,
    maxRetries: 0,
    retryDelayMs: 1,
    requestsPerMinute: 1000,
    timeoutMs: 5000,
    ...overrides
  });

describe("LLMService", () => {
  it("generates a trimmed answer from a single user message", async () => {
    const client = createClient();
    client.chat.completions.create.mockResolvedValue(completion("  HSN Code 40011010  "));
    const service = new LLMService(config, { client, rateLimiter: quickLimiter() });

    const answer = await service.generate("classify latex");

    expect(answer).toBe("HSN Code 40011010");
    expect(client.chat.completions.create).toHaveBeenCalledWith({
      model: "test-chat",
      temperature: 0.1,
      max_tokens: 1024,
      messages: [{ role: "user", content: "classify latex" }]
    });
    expect(service.getUsageRecords()).toHaveLength(1);
    expect(service.getUsageRecords()[0]).toMatchObject({
      phase: "generation",
      model: "test-chat",
      promptTokens: 10,
      completionTokens: 5
    });
  });

  it("embeds texts in batches of 100 and restores input order", async () => {
    const client = createClient();
    client.embeddings.create.mockImplementation(async (request: EmbeddingRequest) => ({
      data: request.input.map((text, index) => ({ embedding: [index, text.length], index })).reverse()
    }));
    const service = new LLMService(
      { ...config, embeddingDimensions: 8 },
      { client, rateLimiter: quickLimiter() }
    );
    const texts = Array.from({ length: 150 }, (_, index) => "x".repeat(index + 1));

    const vectors = await service.generateEmbeddings(texts);

    expect(client.embeddings.create).toHaveBeenCalledTimes(2);
    expect(client.embeddings.create.mock.calls[0]?.[0]).toMatchObject({ model: "test-embed", dimensions: 8 });
    expect(client.embeddings.create.mock.calls[1]?.[0].input).toHaveLength(50);
    expect(vectors).toHaveLength(150);
    expect(vectors[0]).toEqual([0, 1]);
    expect(vectors[100]).toEqual([0, 101]);
    expect(vectors[149]).toEqual([49, 150]);
  });

  it("uses a separate embedding client when one is supplied", async () => {
    const client = createClient();
    const embeddingClient = createClient();
    embeddingClient.embeddings.create.mockResolvedValue({ data: [{ embedding: [1], index: 0 }] });
    const service = new LLMService(config, { client, embeddingClient, rateLimiter: quickLimiter() });

    expect(await service.generateEmbeddings(["a"])).toEqual([[1]]);
    expect(client.embeddings.create).not.toHaveBeenCalled();
  });

  it("scores relevance pairs and clamps them into [0, 1]", async () => {
    const client = createClient();
    client.chat.completions.create.mockResolvedValue(
      completion(JSON.stringify({ scores: [0.9, "0.2", 1.7, -1] }))
    );
    const service = new LLMService(config, { client, rateLimiter: quickLimiter() });

    const scores = await service.scorePairs("latex", ["a", "b", "c", "d"]);

    expect(scores).toEqual([0.9, 0.2, 1, 0]);
    expect(client.chat.completions.create.mock.calls[0]?.[0]).toMatchObject({
      temperature: 0,
      response_format: { type: "json_object" }
    });
    expect(service.getUsageRecords()[0]?.phase).toBe("relevance");
  });

  it("rejects relevance responses of the wrong length", async () => {
    const client = createClient();
    client.chat.completions.create.mockResolvedValue(completion('Sure: {"scores": [0.5]}'));
    const service = new LLMService(config, { client, rateLimiter: quickLimiter() });

    await expect(service.scorePairs("latex", ["a", "b"])).rejects.toThrow(
      "Relevance response size mismatch: expected 2, received 1"
    );
    expect(await service.scorePairs("latex", [])).toEqual([]);
    expect(client.chat.completions.create).toHaveBeenCalledTimes(1);
  });

  it("falls back to a fixed message while the circuit is open", async () => {
    const client = createClient();
    client.chat.completions.create.mockRejectedValueOnce(new Error("invalid model"));
    const service = new LLMService(config, {
      client,
      rateLimiter: quickLimiter({ circuitBreakerFailMax: 1 })
    });

    await expect(service.generate("first")).rejects.toThrow("invalid model");
    expect(service.getCircuitState()).toBe("open");

    expect(await service.generate("second")).toBe(GENERATION_FALLBACK_MESSAGE);
    expect(client.chat.completions.create).toHaveBeenCalledTimes(1);
  });

  it("reports configuration and health", async () => {
    const client = createClient();
    client.embeddings.create.mockRejectedValue(new Error("unauthorized"));
    const service = new LLMService(config, { client, rateLimiter: quickLimiter() });

    expect(service.isConfigured()).toBe(true);
    expect(new LLMService({ ...config, apiKey: " " }, { client }).isConfigured()).toBe(false);
    expect(await service.healthCheck()).toBe(false);
  });
});

describe("safeJsonParse", () => {
  it("extracts the first JSON object from surrounding prose", () => {
    expect(safeJsonParse('{"a":1}')).toEqual({ a: 1 });
    expect(safeJsonParse('Result: {"a":2} done')).toEqual({ a: 2 });
    expect(safeJsonParse("no json here")).toEqual({});
  });
});
