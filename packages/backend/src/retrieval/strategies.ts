import {
  isHierarchyRelation,
  type RetrievedDocument,
  type TaxonomyGraphStore,
  type TraversableGraph,
  type VectorStore
} from "@taxograph/shared";
import { codeNodeId } from "../graph/TaxonomyGraphBuilder.js";
import type { RelevanceScorer } from "../services/llmTypes.js";
import { ConfigurationError } from "../utils/errors.js";
import { childLogger } from "../utils/logger.js";
import { LruCache } from "./LruCache.js";

const log = childLogger("retrieval");

export const RETRIEVAL_STRATEGY_NAMES = ["vector", "rerank", "graph_contextual"] as const;

export type RetrievalStrategyName = (typeof RETRIEVAL_STRATEGY_NAMES)[number];

export const GRAPH_CONTEXT_UNAVAILABLE = "Graph context not available for this backend.";
export const GRAPH_CONTEXT_NOT_FOUND = "Code not found in graph.";

/** Results are ordered by descending score and never longer than the strategy's top-k. */
export interface RetrievalStrategy {
  readonly name: RetrievalStrategyName;
  retrieve(query: string, vectorStore: VectorStore): Promise<RetrievedDocument[]>;
}

function byScoreDescending(docs: RetrievedDocument[]): RetrievedDocument[] {
  return docs
    .map((doc, order) => ({ doc, order }))
    .sort((a, b) => b.doc.score - a.doc.score || a.order - b.order)
    .map(({ doc }) => doc);
}

export class VectorOnlyStrategy implements RetrievalStrategy {
  readonly name = "vector";

  constructor(private readonly topK: number) {}

  async retrieve(query: string, vectorStore: VectorStore): Promise<RetrievedDocument[]> {
    const results = await vectorStore.query(query, this.topK);
    return byScoreDescending(results).slice(0, this.topK);
  }
}

export interface RerankOptions {
  topK: number;
  candidateMultiplier?: number;
}

/**
 * Over-fetches `topK * candidateMultiplier` candidates, re-scores each against the
 * query with the pairwise relevance model and keeps the best `topK`.
 */
export class RerankStrategy implements RetrievalStrategy {
  readonly name: RetrievalStrategyName = "rerank";
  private readonly topK: number;
  private readonly candidateMultiplier: number;

  constructor(
    private readonly scorer: RelevanceScorer,
    options: RerankOptions
  ) {
    this.topK = options.topK;
    this.candidateMultiplier = options.candidateMultiplier ?? 4;
  }

  async retrieve(query: string, vectorStore: VectorStore): Promise<RetrievedDocument[]> {
    const candidates = await vectorStore.query(query, this.topK * this.candidateMultiplier);
    if (candidates.length === 0) {
      return [];
    }

    const scores = await this.scorer.scorePairs(
      query,
      candidates.map((doc) => doc.text)
    );
    if (scores.length !== candidates.length) {
      throw new Error(
        `Relevance scorer returned ${scores.length} scores for ${candidates.length} candidates`
      );
    }

    const rescored = candidates.map((doc, index) => ({ ...doc, score: scores[index] ?? 0 }));
    return byScoreDescending(rescored).slice(0, this.topK);
  }
}

export interface GraphContextualOptions {
  cacheSize?: number;
}

/**
 * Decorates another strategy with each candidate's ancestor path
 * ("Chapter: ... Heading: ... Subheading: ...").
 */
export class GraphContextualStrategy implements RetrievalStrategy {
  readonly name = "graph_contextual";
  private readonly cache: LruCache<string>;

  constructor(
    private readonly graphStore: TaxonomyGraphStore,
    private readonly base: RetrievalStrategy,
    options: GraphContextualOptions = {}
  ) {
    this.cache = new LruCache<string>(Math.max(128, options.cacheSize ?? 256));
  }

  async retrieve(query: string, vectorStore: VectorStore): Promise<RetrievedDocument[]> {
    const results = await this.base.retrieve(query, vectorStore);
    return results.map((doc) => {
      const hsnCode = doc.metadata.hsnCode;
      return hsnCode ? { ...doc, graphContext: this.getGraphContext(hsnCode) } : doc;
    });
  }

  getGraphContext(hsnCode: string): string {
    const graph = this.graphStore.asTraversable();
    if (!graph) {
      return GRAPH_CONTEXT_UNAVAILABLE;
    }

    const cached = this.cache.get(hsnCode);
    if (cached !== undefined) {
      return cached;
    }

    const context = describeAncestors(graph, codeNodeId(hsnCode));
    this.cache.set(hsnCode, context);
    return context;
  }

  cacheStats(): { size: number; capacity: number; hits: number; misses: number } {
    return { size: this.cache.size(), capacity: this.cache.capacity(), ...this.cache.stats() };
  }
}

/**
 * Walks hierarchy parents upward from `nodeId`, following the first hierarchy in-edge
 * at each step, and renders the non-code ancestors root first.
 */
export function describeAncestors(graph: TraversableGraph, nodeId: string): string {
  if (!graph.getNode(nodeId)) {
    return GRAPH_CONTEXT_NOT_FOUND;
  }

  const path: string[] = [];
  const visited = new Set<string>();
  let current: string | undefined = nodeId;

  while (current !== undefined && !visited.has(current)) {
    visited.add(current);
    path.push(current);
    current = graph.getInEdges(current).find((item) => isHierarchyRelation(item.relation))?.sourceId;
  }

  return path
    .reverse()
    .flatMap((id) => {
      const node = graph.getNode(id);
      return node && node.label !== "Code" ? [`${node.label}: ${node.description}`] : [];
    })
    .join(". ");
}

export interface StrategyDependencies {
  graphStore: TaxonomyGraphStore;
  scorer: RelevanceScorer;
  topK: number;
  candidateMultiplier?: number;
  cacheSize?: number;
}

export function isRetrievalStrategyName(name: string): name is RetrievalStrategyName {
  return RETRIEVAL_STRATEGY_NAMES.some((item) => item === name);
}

export function createRetrievalStrategy(name: string, deps: StrategyDependencies): RetrievalStrategy {
  if (!isRetrievalStrategyName(name)) {
    throw new ConfigurationError(
      `Unknown retrieval strategy "${name}". Expected one of: ${RETRIEVAL_STRATEGY_NAMES.join(", ")}`
    );
  }

  const rerankOptions: RerankOptions = { topK: deps.topK };
  if (deps.candidateMultiplier !== undefined) {
    rerankOptions.candidateMultiplier = deps.candidateMultiplier;
  }
  const contextOptions: GraphContextualOptions = {};
  if (deps.cacheSize !== undefined) {
    contextOptions.cacheSize = deps.cacheSize;
  }

  log.info({ strategy: name, topK: deps.topK }, "Retrieval strategy selected");

  switch (name) {
    case "vector":
      return new VectorOnlyStrategy(deps.topK);
    case "rerank":
      return new RerankStrategy(deps.scorer, rerankOptions);
    case "graph_contextual":
      return new GraphContextualStrategy(
        deps.graphStore,
        new RerankStrategy(deps.scorer, rerankOptions),
        contextOptions
      );
  }
}
