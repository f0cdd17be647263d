import { dirname, isAbsolute, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
loadEnv({ path: resolve(__dirname, "../../../.env") });

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGIN: z.string().default("http://localhost:5173"),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info"),
  DOCUMENTS_PATH: z.string().default("data/sample_documents.json"),
  GRAPH_BACKEND: z.string().default("memory"),
  GRAPH_EXPORT_PATH: z.string().default("data/output/taxonomy_graph.graphml"),
  GRAPH_VISUALIZATION_PATH: z.string().default("data/output/taxonomy_graph.html"),
  SIMILARITY_ENRICHMENT_ENABLED: booleanFlag,
  SIMILARITY_THRESHOLD: z.coerce.number().gt(0).lt(1).default(0.85),
  VECTOR_BACKEND: z.string().default("memory"),
  RETRIEVAL_STRATEGY: z.string().default("graph_contextual"),
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(5),
  RERANK_CANDIDATE_MULTIPLIER: z.coerce.number().int().positive().default(4),
  GRAPH_CONTEXT_CACHE_SIZE: z.coerce.number().int().min(128).default(256),
  RELEVANCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.4),
  DISAMBIGUATION_THRESHOLD: z.coerce.number().min(0).max(1).default(0.15),
  GENERATOR_BACKEND: z.string().default("mock"),
  LLM_PROVIDER: z.enum(["gemini", "qwen", "openai"]).default("openai"),
  GEMINI_API_KEY: z.string().default(""),
  GEMINI_BASE_URL: z.string().default("https://generativelanguage.googleapis.com/v1beta/openai/"),
  GEMINI_CHAT_MODEL: z.string().default("gemini-2.0-flash"),
  GEMINI_EMBEDDING_MODEL: z.string().default("text-embedding-004"),
  QWEN_API_KEY: z.string().default(""),
  QWEN_BASE_URL: z.string().default("https://dashscope.aliyuncs.com/compatible-mode/v1"),
  QWEN_CHAT_MODEL: z.string().default("qwen-plus"),
  QWEN_EMBEDDING_MODEL: z.string().default("text-embedding-v3"),
  OPENAI_API_KEY: z.string().default(""),
  OPENAI_BASE_URL: z.string().default("https://api.openai.com/v1"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  EMBEDDING_API_KEY: z.string().default(""),
  EMBEDDING_BASE_URL: z.string().default(""),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  LLM_MAX_CONCURRENT: z.coerce.number().int().positive().default(5),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  LLM_RETRY_DELAY_MS: z.coerce.number().int().positive().default(1000),
  LLM_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().default(30),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  CIRCUIT_BREAKER_FAIL_MAX: z.coerce.number().int().positive().default(5),
  CIRCUIT_BREAKER_RESET_MS: z.coerce.number().int().positive().default(60_000),
  NEO4J_URI: z.string().default("bolt://localhost:7687"),
  NEO4J_USER: z.string().default("neo4j"),
  NEO4J_PASSWORD: z.string().default(""),
  NEO4J_DATABASE: z.string().default("neo4j"),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536)
});

export type AppConfig = z.infer<typeof envSchema>;
export const appConfig: AppConfig = envSchema.parse(process.env);

const backendRoot = resolve(__dirname, "..");

/** Relative data paths are anchored at the backend package, not the working directory. */
export function resolveDataPath(path: string): string {
  return isAbsolute(path) ? path : resolve(backendRoot, path);
}
