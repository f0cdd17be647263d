import type { TaxonomyDocument, TaxonomyGraphStore, VectorStore } from "@taxograph/shared";
import { appConfig, resolveDataPath } from "../config.js";
import { TaxonomyGraphBuilder } from "../graph/TaxonomyGraphBuilder.js";
import { loadDocuments, toRecords } from "../ingest/documents.js";
import {
  RETRIEVAL_STRATEGY_NAMES,
  createRetrievalStrategy,
  isRetrievalStrategyName,
  type RetrievalStrategy
} from "../retrieval/strategies.js";
import { ClassificationService } from "../services/ClassificationService.js";
import { InMemoryConversationStore, type ConversationStoreLike } from "../services/InMemoryConversationStore.js";
import type { EmbeddingProvider, GenerationBackend, LLMServiceLike } from "../services/llmTypes.js";
import { LLMService } from "../services/LLMService.js";
import { MockGenerator } from "../services/MockGenerator.js";
import { QueryProcessor } from "../services/QueryProcessor.js";
import { InMemoryGraphStore } from "../store/InMemoryGraphStore.js";
import { Neo4jGraphStore } from "../store/Neo4jGraphStore.js";
import { Neo4jConnection, neo4jConnectionFromEnv } from "../store/neo4jSupport.js";
import { ConfigurationError } from "../utils/errors.js";
import { childLogger } from "../utils/logger.js";
import { InMemoryVectorStore } from "../vector/InMemoryVectorStore.js";
import { Neo4jVectorStore } from "../vector/Neo4jVectorStore.js";

const log = childLogger("runtime");

export const GRAPH_BACKENDS = ["memory", "neo4j"] as const;
export const VECTOR_BACKENDS = ["memory", "neo4j"] as const;
export const GENERATOR_BACKENDS = ["llm", "mock"] as const;

export interface TaxonomyRuntime {
  graphStore: TaxonomyGraphStore;
  vectorStore: VectorStore;
  builder: TaxonomyGraphBuilder;
  strategy: RetrievalStrategy;
  classificationService: ClassificationService;
  queryProcessor: QueryProcessor;
  documentCount: number;
}

let neo4jConnectionSingleton: Neo4jConnection | null = null;
let graphStoreSingleton: TaxonomyGraphStore | null = null;
let vectorStoreSingleton: VectorStore | null = null;
let llmServiceSingleton: LLMServiceLike | null = null;
let conversationStoreSingleton: ConversationStoreLike | null = null;
let connectPromise: Promise<void> | null = null;
let runtimePromise: Promise<TaxonomyRuntime> | null = null;

function unknownBackend(kind: string, name: string, expected: readonly string[]): ConfigurationError {
  return new ConfigurationError(`Unknown ${kind} backend "${name}". Expected one of: ${expected.join(", ")}`);
}

function getNeo4jConnectionSingleton(): Neo4jConnection {
  if (!neo4jConnectionSingleton) {
    neo4jConnectionSingleton = new Neo4jConnection(neo4jConnectionFromEnv());
  }
  return neo4jConnectionSingleton;
}

export function createGraphStore(name: string): TaxonomyGraphStore {
  switch (name) {
    case "memory":
      return new InMemoryGraphStore();
    case "neo4j":
      return new Neo4jGraphStore(getNeo4jConnectionSingleton());
    default:
      throw unknownBackend("graph", name, GRAPH_BACKENDS);
  }
}

export function createVectorStore(name: string, embeddings: EmbeddingProvider): VectorStore {
  switch (name) {
    case "memory":
      return new InMemoryVectorStore(embeddings);
    case "neo4j":
      return new Neo4jVectorStore(getNeo4jConnectionSingleton(), embeddings, appConfig.EMBEDDING_DIMENSIONS);
    default:
      throw unknownBackend("vector", name, VECTOR_BACKENDS);
  }
}

export function createGenerator(name: string, llmService: LLMServiceLike): GenerationBackend {
  switch (name) {
    case "llm":
      return llmService;
    case "mock":
      return new MockGenerator();
    default:
      throw unknownBackend("generator", name, GENERATOR_BACKENDS);
  }
}

export function getGraphStoreSingleton(): TaxonomyGraphStore {
  if (!graphStoreSingleton) {
    graphStoreSingleton = createGraphStore(appConfig.GRAPH_BACKEND);
  }

  return graphStoreSingleton;
}

export function getLLMServiceSingleton(): LLMServiceLike {
  if (!llmServiceSingleton) {
    llmServiceSingleton = LLMService.fromEnv();
  }

  return llmServiceSingleton;
}

export function getVectorStoreSingleton(): VectorStore {
  if (!vectorStoreSingleton) {
    vectorStoreSingleton = createVectorStore(appConfig.VECTOR_BACKEND, getLLMServiceSingleton());
  }

  return vectorStoreSingleton;
}

export function getConversationStoreSingleton(): ConversationStoreLike {
  if (!conversationStoreSingleton) {
    conversationStoreSingleton = new InMemoryConversationStore();
  }

  return conversationStoreSingleton;
}

export async function ensureGraphStoreConnected(
  store: TaxonomyGraphStore = getGraphStoreSingleton()
): Promise<void> {
  if (connectPromise) {
    return connectPromise;
  }

  connectPromise = store.connect().catch((error: unknown) => {
    connectPromise = null;
    throw error;
  });

  return connectPromise;
}

export interface BootstrapOptions {
  graphStore: TaxonomyGraphStore;
  vectorStore: VectorStore;
  llmService: LLMServiceLike;
  generator: GenerationBackend;
  documents: TaxonomyDocument[];
  strategyName: string;
  topK: number;
  candidateMultiplier: number;
  cacheSize: number;
  relevanceThreshold: number;
  disambiguationThreshold: number;
  similarity: { enabled: boolean; threshold: number };
  connectGraphStore?: () => Promise<void>;
}

/**
 * Builds the graph, then wires the retrieval strategy and dialogue engine over it.
 * The strategy name is checked before any work starts; the strategy itself is only
 * constructed once the graph build has finished. Graph and vector store are loaded
 * from the same document list.
 */
export async function bootstrapRuntime(options: BootstrapOptions): Promise<TaxonomyRuntime> {
  if (!isRetrievalStrategyName(options.strategyName)) {
    throw new ConfigurationError(
      `Unknown retrieval strategy "${options.strategyName}". Expected one of: ${RETRIEVAL_STRATEGY_NAMES.join(", ")}`
    );
  }

  const { graphStore, vectorStore, documents } = options;
  await (options.connectGraphStore ?? (() => graphStore.connect()))();

  const builder = new TaxonomyGraphBuilder(graphStore);
  await builder.optimize();
  await builder.build(toRecords(documents));
  await builder.enrichSiblings();
  if (options.similarity.enabled) {
    await builder.enrichSimilarity(options.llmService, options.similarity.threshold);
  }
  const integrity = await builder.validateIntegrity();
  if (!integrity.valid) {
    log.warn({ violations: integrity.violations.length }, "Graph integrity check reported violations");
  }

  const strategy = createRetrievalStrategy(options.strategyName, {
    graphStore,
    scorer: options.llmService,
    topK: options.topK,
    candidateMultiplier: options.candidateMultiplier,
    cacheSize: options.cacheSize
  });

  const classificationService = new ClassificationService(vectorStore, options.generator, strategy);
  await classificationService.initializeVectorStore(documents);

  const queryProcessor = new QueryProcessor(classificationService, {
    relevanceThreshold: options.relevanceThreshold,
    disambiguationThreshold: options.disambiguationThreshold
  });

  log.info(
    {
      documents: documents.length,
      graphBackend: graphStore.backendName,
      vectorBackend: vectorStore.backendName,
      generator: options.generator.backendName,
      strategy: strategy.name
    },
    "Runtime ready"
  );

  return {
    graphStore,
    vectorStore,
    builder,
    strategy,
    classificationService,
    queryProcessor,
    documentCount: documents.length
  };
}

export function ensureRuntimeReady(): Promise<TaxonomyRuntime> {
  if (runtimePromise) {
    return runtimePromise;
  }

  runtimePromise = (async () => {
    const llmService = getLLMServiceSingleton();
    const generator = createGenerator(appConfig.GENERATOR_BACKEND, llmService);
    const graphStore = getGraphStoreSingleton();
    const vectorStore = getVectorStoreSingleton();
    const documents = await loadDocuments(resolveDataPath(appConfig.DOCUMENTS_PATH));

    return bootstrapRuntime({
      graphStore,
      vectorStore,
      llmService,
      generator,
      documents,
      strategyName: appConfig.RETRIEVAL_STRATEGY,
      topK: appConfig.RETRIEVAL_TOP_K,
      candidateMultiplier: appConfig.RERANK_CANDIDATE_MULTIPLIER,
      cacheSize: appConfig.GRAPH_CONTEXT_CACHE_SIZE,
      relevanceThreshold: appConfig.RELEVANCE_THRESHOLD,
      disambiguationThreshold: appConfig.DISAMBIGUATION_THRESHOLD,
      similarity: {
        enabled: appConfig.SIMILARITY_ENRICHMENT_ENABLED,
        threshold: appConfig.SIMILARITY_THRESHOLD
      },
      connectGraphStore: () => ensureGraphStoreConnected(graphStore)
    });
  })().catch((error: unknown) => {
    runtimePromise = null;
    throw error;
  });

  return runtimePromise;
}

export async function shutdownRuntime(): Promise<void> {
  if (graphStoreSingleton) {
    await graphStoreSingleton.disconnect();
  }
  if (neo4jConnectionSingleton) {
    await neo4jConnectionSingleton.disconnect();
  }
  runtimePromise = null;
  connectPromise = null;
}
