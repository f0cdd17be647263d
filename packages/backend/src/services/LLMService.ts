import OpenAI from "openai";
import { z } from "zod";
import { appConfig } from "../config.js";
import { RELEVANCE_SYSTEM_PROMPT, buildRelevanceUserPrompt } from "../prompts/index.js";
import { CircuitOpenError } from "../utils/errors.js";
import { childLogger } from "../utils/logger.js";
import { LLMRateLimiter } from "./LLMRateLimiter.js";
import type {
  CircuitState,
  CompletionUsage,
  LLMConfig,
  LLMServiceLike,
  OpenAICompatibleClient,
  TokenUsagePhase,
  TokenUsageRecord
} from "./llmTypes.js";

const log = childLogger("LLMService");

export const GENERATION_FALLBACK_MESSAGE =
  "The answer generator is temporarily unavailable. The ranked matches below are based on retrieval scores only.";

const EMBEDDING_BATCH_SIZE = 100;

const relevanceResultSchema = z.object({
  scores: z.array(z.coerce.number())
});

const modelCostPerThousandTokens: Record<TokenUsagePhase, { input: number; output: number }> = {
  generation: { input: 0.00015, output: 0.0006 },
  embedding: { input: 0.00002, output: 0 },
  relevance: { input: 0.00015, output: 0.0006 }
};

type NormalizedLLMConfig = LLMConfig & {
  baseURL: string;
  temperature: number;
  maxTokens: number;
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  requestsPerMinute: number;
  timeoutMs: number;
  circuitBreakerFailMax: number;
  circuitBreakerResetMs: number;
};

export function createOpenAIClient(apiKey: string, baseURL: string): OpenAICompatibleClient {
  const openai = new OpenAI({ apiKey, baseURL });
  return {
    chat: {
      completions: {
        create: (request) => openai.chat.completions.create({ ...request, stream: false })
      }
    },
    embeddings: {
      create: (request) => openai.embeddings.create(request)
    }
  };
}

type ProviderSettings = Pick<LLMConfig, "apiKey" | "baseURL" | "chatModel" | "embeddingModel">;

function providerSettings(provider: typeof appConfig.LLM_PROVIDER): ProviderSettings {
  switch (provider) {
    case "gemini":
      return {
        apiKey: appConfig.GEMINI_API_KEY,
        baseURL: appConfig.GEMINI_BASE_URL,
        chatModel: appConfig.GEMINI_CHAT_MODEL,
        embeddingModel: appConfig.GEMINI_EMBEDDING_MODEL
      };
    case "qwen":
      return {
        apiKey: appConfig.QWEN_API_KEY,
        baseURL: appConfig.QWEN_BASE_URL,
        chatModel: appConfig.QWEN_CHAT_MODEL,
        embeddingModel: appConfig.QWEN_EMBEDDING_MODEL
      };
    case "openai":
      return {
        apiKey: appConfig.OPENAI_API_KEY,
        baseURL: appConfig.OPENAI_BASE_URL,
        chatModel: appConfig.OPENAI_CHAT_MODEL,
        embeddingModel: appConfig.OPENAI_EMBEDDING_MODEL
      };
  }
}

export class LLMService implements LLMServiceLike {
  readonly backendName = "llm";

  private readonly client: OpenAICompatibleClient;
  private readonly embeddingClient: OpenAICompatibleClient;
  private readonly rateLimiter: LLMRateLimiter;
  private readonly usageRecords: TokenUsageRecord[] = [];
  private readonly config: NormalizedLLMConfig;

  constructor(
    config: LLMConfig,
    deps?: {
      client?: OpenAICompatibleClient;
      embeddingClient?: OpenAICompatibleClient;
      rateLimiter?: LLMRateLimiter;
    }
  ) {
    this.config = {
      ...config,
      baseURL: config.baseURL ?? "https://api.openai.com/v1",
      temperature: config.temperature ?? 0.1,
      maxTokens: config.maxTokens ?? 1024,
      maxConcurrent: config.maxConcurrent ?? 5,
      maxRetries: config.maxRetries ?? 3,
      retryDelayMs: config.retryDelayMs ?? 1000,
      requestsPerMinute: config.requestsPerMinute ?? 30,
      timeoutMs: config.timeoutMs ?? 60_000,
      circuitBreakerFailMax: config.circuitBreakerFailMax ?? 5,
      circuitBreakerResetMs: config.circuitBreakerResetMs ?? 60_000
    };

    this.client = deps?.client ?? createOpenAIClient(this.config.apiKey, this.config.baseURL);

    // Use a separate client for embeddings if configured
    if (deps?.embeddingClient) {
      this.embeddingClient = deps.embeddingClient;
    } else if (config.embeddingApiKey && config.embeddingBaseURL) {
      this.embeddingClient = createOpenAIClient(config.embeddingApiKey, config.embeddingBaseURL);
    } else {
      this.embeddingClient = this.client;
    }

    this.rateLimiter =
      deps?.rateLimiter ??
      new LLMRateLimiter({
        maxConcurrent: this.config.maxConcurrent,
        maxRetries: this.config.maxRetries,
        retryDelayMs: this.config.retryDelayMs,
        requestsPerMinute: this.config.requestsPerMinute,
        timeoutMs: this.config.timeoutMs,
        circuitBreakerFailMax: this.config.circuitBreakerFailMax,
        circuitBreakerResetMs: this.config.circuitBreakerResetMs
      });
  }

  static fromEnv(): LLMService {
    const provider = appConfig.LLM_PROVIDER;

    const settings = providerSettings(provider);

    const config: LLMConfig = {
      ...settings,
      maxConcurrent: appConfig.LLM_MAX_CONCURRENT,
      maxRetries: appConfig.LLM_MAX_RETRIES,
      retryDelayMs: appConfig.LLM_RETRY_DELAY_MS,
      requestsPerMinute: appConfig.LLM_REQUESTS_PER_MINUTE,
      timeoutMs: appConfig.LLM_TIMEOUT_MS,
      circuitBreakerFailMax: appConfig.CIRCUIT_BREAKER_FAIL_MAX,
      circuitBreakerResetMs: appConfig.CIRCUIT_BREAKER_RESET_MS,
      temperature: appConfig.LLM_TEMPERATURE,
      maxTokens: 1024
    };

    if (provider === "openai") {
      config.embeddingDimensions = appConfig.EMBEDDING_DIMENSIONS;
    }
    if (appConfig.EMBEDDING_API_KEY) {
      config.embeddingApiKey = appConfig.EMBEDDING_API_KEY;
    }
    if (appConfig.EMBEDDING_BASE_URL) {
      config.embeddingBaseURL = appConfig.EMBEDDING_BASE_URL;
    }

    return new LLMService(config);
  }

  isConfigured(): boolean {
    return this.config.apiKey.trim().length > 0;
  }

  /**
   * Free-text answer for a fully built prompt. When the circuit breaker is open the
   * call is not attempted and a fixed fallback message is returned instead; every
   * other failure propagates to the caller.
   */
  async generate(prompt: string): Promise<string> {
    try {
      const response = await this.rateLimiter.run(() =>
        this.client.chat.completions.create({
          model: this.config.chatModel,
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
          messages: [{ role: "user", content: prompt }]
        })
      );

      this.recordUsage("generation", this.config.chatModel, response.usage);
      return response.choices[0]?.message?.content?.trim() ?? "";
    } catch (error) {
      if (error instanceof CircuitOpenError) {
        log.warn({ err: error }, "Generation skipped, returning fallback message");
        return GENERATION_FALLBACK_MESSAGE;
      }
      throw error;
    }
  }

  async generateEmbeddings(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];

    for (let start = 0; start < texts.length; start += EMBEDDING_BATCH_SIZE) {
      const batch = texts.slice(start, start + EMBEDDING_BATCH_SIZE);
      const dimensions = this.config.embeddingDimensions;
      const response = await this.rateLimiter.run(() =>
        this.embeddingClient.embeddings.create({
          model: this.config.embeddingModel,
          input: batch,
          ...(dimensions ? { dimensions } : {})
        })
      );

      this.recordUsage("embedding", this.config.embeddingModel, response.usage);
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      if (ordered.length !== batch.length) {
        throw new Error(
          `Embedding response size mismatch: expected ${batch.length}, received ${ordered.length}`
        );
      }
      vectors.push(...ordered.map((item) => item.embedding));
    }

    return vectors;
  }

  async scorePairs(query: string, texts: string[]): Promise<number[]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await this.rateLimiter.run(() =>
      this.client.chat.completions.create({
        model: this.config.chatModel,
        temperature: 0,
        max_tokens: 400,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: RELEVANCE_SYSTEM_PROMPT },
          { role: "user", content: buildRelevanceUserPrompt(query, texts) }
        ]
      })
    );

    const content = response.choices[0]?.message?.content ?? "{}";
    const parsed = relevanceResultSchema.parse(safeJsonParse(content));
    this.recordUsage("relevance", this.config.chatModel, response.usage);

    if (parsed.scores.length !== texts.length) {
      throw new Error(
        `Relevance response size mismatch: expected ${texts.length}, received ${parsed.scores.length}`
      );
    }
    return parsed.scores.map((score) => (Number.isFinite(score) ? Math.min(1, Math.max(0, score)) : 0));
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.generateEmbeddings(["ping"]);
      return true;
    } catch (error) {
      log.warn({ err: error }, "LLM health probe failed");
      return false;
    }
  }

  getCircuitState(): CircuitState {
    return this.rateLimiter.getCircuitState();
  }

  getUsageRecords(limit = 200): TokenUsageRecord[] {
    const safeLimit = Math.max(1, limit);
    return this.usageRecords.slice(-safeLimit);
  }

  private recordUsage(phase: TokenUsagePhase, model: string, usage: CompletionUsage | undefined): void {
    const promptTokens = usage?.prompt_tokens ?? 0;
    const completionTokens = usage?.completion_tokens ?? 0;

    const costSpec = modelCostPerThousandTokens[phase];
    const estimatedCost =
      (promptTokens / 1000) * costSpec.input + (completionTokens / 1000) * costSpec.output;

    this.usageRecords.push({
      phase,
      model,
      promptTokens,
      completionTokens,
      estimatedCost,
      timestamp: new Date()
    });
  }
}

export function safeJsonParse(input: string): unknown {
  try {
    return JSON.parse(input);
  } catch {
    const match = input.match(/\{[\s\S]*\}/);
    if (!match) {
      return {};
    }
    try {
      return JSON.parse(match[0]);
    } catch {
      return {};
    }
  }
}
