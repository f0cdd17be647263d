export interface LLMConfig {
  apiKey: string;
  baseURL?: string;
  chatModel: string;
  embeddingModel: string;
  embeddingApiKey?: string;
  embeddingBaseURL?: string;
  embeddingDimensions?: number;
  temperature?: number;
  maxTokens?: number;
  maxConcurrent?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  requestsPerMinute?: number;
  timeoutMs?: number;
  circuitBreakerFailMax?: number;
  circuitBreakerResetMs?: number;
}

export interface LLMRateLimitConfig {
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  requestsPerMinute: number;
  timeoutMs: number;
  circuitBreakerFailMax: number;
  circuitBreakerResetMs: number;
}

export type CircuitState = "closed" | "open" | "half_open";

export type TokenUsagePhase = "generation" | "embedding" | "relevance";

export interface TokenUsageRecord {
  phase: TokenUsagePhase;
  model: string;
  promptTokens: number;
  completionTokens: number;
  estimatedCost: number;
  timestamp: Date;
}

export type ChatCompletionMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string };

export interface ChatCompletionRequest {
  model: string;
  messages: ChatCompletionMessage[];
  temperature?: number;
  max_tokens?: number;
  response_format?: { type: "json_object" };
}

export interface CompletionUsage {
  prompt_tokens?: number;
  completion_tokens?: number;
}

export interface ChatCompletionResult {
  choices: Array<{ message?: { content?: string | null } }>;
  usage?: CompletionUsage;
}

export interface EmbeddingRequest {
  model: string;
  input: string[];
  dimensions?: number;
}

export interface EmbeddingResult {
  data: Array<{ embedding: number[]; index: number }>;
  usage?: CompletionUsage;
}

/**
 * The slice of an OpenAI-compatible SDK client the service calls. Tests pass a fake;
 * production wraps the `openai` package.
 */
export interface OpenAICompatibleClient {
  chat: {
    completions: {
      create(request: ChatCompletionRequest): Promise<ChatCompletionResult>;
    };
  };
  embeddings: {
    create(request: EmbeddingRequest): Promise<EmbeddingResult>;
  };
}

export interface GenerationBackend {
  readonly backendName: string;
  generate(prompt: string): Promise<string>;
}

export interface EmbeddingProvider {
  generateEmbeddings(texts: string[]): Promise<number[][]>;
}

/** Pairwise relevance model: one score in [0, 1] per text, in input order. */
export interface RelevanceScorer {
  scorePairs(query: string, texts: string[]): Promise<number[]>;
}

export interface LLMServiceLike extends GenerationBackend, EmbeddingProvider, RelevanceScorer {
  isConfigured(): boolean;
  healthCheck(): Promise<boolean>;
  getCircuitState?(): CircuitState;
  getUsageRecords?(limit?: number): TokenUsageRecord[];
}
