import { beforeEach, describe, expect, it } from "vitest";
import type { GraphEdge, GraphNode, TraversableGraph } from "@taxograph/shared";
import { TaxonomyGraphBuilder } from "../../../src/graph/TaxonomyGraphBuilder.js";
import { toRecords } from "../../../src/ingest/documents.js";
import {
  GRAPH_CONTEXT_NOT_FOUND,
  GRAPH_CONTEXT_UNAVAILABLE,
  GraphContextualStrategy,
  RerankStrategy,
  VectorOnlyStrategy,
  createRetrievalStrategy,
  describeAncestors
} from "../../../src/retrieval/strategies.js";
import { InMemoryGraphStore } from "../../../src/store/InMemoryGraphStore.js";
import { ConfigurationError } from "../../../src/utils/errors.js";
import { FakeLLMService } from "../../helpers/FakeLLMService.js";
import { FakeVectorStore } from "../../helpers/FakeVectorStore.js";
import {
  FIXTURE_DOCUMENTS,
  latexOther,
  latexPrevulcanised,
  makeDocument,
  rawCotton,
  retrieved,
  smokedSheets
} from "../../helpers/fixtures.js";
import { withoutTraversal } from "../../helpers/opaqueGraphStore.js";

const LATEX_CONTEXT =
  "Chapter: Rubber and articles thereof. Heading: Natural rubber in primary forms. Subheading: Natural rubber latex";
const COTTON_CONTEXT = "Chapter: Cotton. Heading: Cotton, not carded or combed. Subheading: Raw cotton";

describe("VectorOnlyStrategy", () => {
  it("returns at most top-k results ordered by score", async () => {
    const vectorStore = new FakeVectorStore([
      retrieved(latexPrevulcanised, 0.5),
      retrieved(latexOther, 0.9),
      retrieved(smokedSheets, 0.7)
    ]);

    const results = await new VectorOnlyStrategy(2).retrieve("latex", vectorStore);

    expect(vectorStore.requestedTopK).toEqual([2]);
    expect(results.map((doc) => [doc.metadata.hsnCode, doc.score])).toEqual([
      ["40011020", 0.9],
      ["40011010", 0.5]
    ]);
  });
});

describe("RerankStrategy", () => {
  it("over-fetches candidates and keeps the best re-scored top-k", async () => {
    const candidates = [
      retrieved(latexPrevulcanised, 0.95),
      retrieved(latexOther, 0.9),
      retrieved(smokedSheets, 0.85),
      retrieved(rawCotton, 0.8)
    ];
    const vectorStore = new FakeVectorStore(candidates);
    const scorer = new FakeLLMService({ scoresFor: () => [0.1, 0.9, 0.4, 0.8] });

    const results = await new RerankStrategy(scorer, { topK: 2, candidateMultiplier: 3 }).retrieve(
      "cotton",
      vectorStore
    );

    expect(vectorStore.requestedTopK).toEqual([6]);
    expect(results.map((doc) => [doc.metadata.hsnCode, doc.score])).toEqual([
      ["40011020", 0.9],
      ["52010011", 0.8]
    ]);
    expect(candidates[0]?.score).toBe(0.95);
    expect(scorer.scoredQueries).toEqual(["cotton"]);
  });

  it("uses a multiplier of four by default", async () => {
    const vectorStore = new FakeVectorStore([]);
    await new RerankStrategy(new FakeLLMService(), { topK: 3 }).retrieve("anything", vectorStore);

    expect(vectorStore.requestedTopK).toEqual([12]);
  });

  it("skips the scorer when there are no candidates", async () => {
    const scorer = new FakeLLMService();
    const results = await new RerankStrategy(scorer, { topK: 2 }).retrieve("none", new FakeVectorStore());

    expect(results).toEqual([]);
    expect(scorer.scoredQueries).toEqual([]);
  });

  it("fails when the scorer returns the wrong number of scores", async () => {
    const vectorStore = new FakeVectorStore([retrieved(latexOther, 0.7), retrieved(rawCotton, 0.6)]);
    const scorer = new FakeLLMService({ scoresFor: () => [0.5] });

    await expect(new RerankStrategy(scorer, { topK: 2 }).retrieve("latex", vectorStore)).rejects.toThrow(
      "Relevance scorer returned 1 scores for 2 candidates"
    );
  });
});

describe("GraphContextualStrategy", () => {
  let store: InMemoryGraphStore;

  beforeEach(async () => {
    store = new InMemoryGraphStore();
    const builder = new TaxonomyGraphBuilder(store);
    await builder.build(toRecords(FIXTURE_DOCUMENTS));
    await builder.enrichSiblings();
  });

  it("attaches the ancestor path to each retrieved code", async () => {
    const vectorStore = new FakeVectorStore([
      retrieved(latexPrevulcanised, 0.9),
      retrieved(rawCotton, 0.6)
    ]);
    const strategy = new GraphContextualStrategy(store, new VectorOnlyStrategy(2));

    const results = await strategy.retrieve("latex", vectorStore);

    expect(results.map((doc) => doc.graphContext)).toEqual([LATEX_CONTEXT, COTTON_CONTEXT]);
    expect(results.map((doc) => doc.score)).toEqual([0.9, 0.6]);
  });

  it("leaves documents without a code untouched", async () => {
    const uncoded = retrieved(makeDocument("40011010", "Loose text", { hsnCode: "" }), 0.7);
    const strategy = new GraphContextualStrategy(store, new VectorOnlyStrategy(1));

    const [result] = await strategy.retrieve("text", new FakeVectorStore([uncoded]));

    expect(result).toBeDefined();
    expect(result && "graphContext" in result).toBe(false);
  });

  it("caches contexts per code", () => {
    const strategy = new GraphContextualStrategy(store, new VectorOnlyStrategy(1));

    expect(strategy.getGraphContext("40011010")).toBe(LATEX_CONTEXT);
    expect(strategy.getGraphContext("40011010")).toBe(LATEX_CONTEXT);
    expect(strategy.cacheStats()).toEqual({ size: 1, capacity: 256, hits: 1, misses: 1 });
  });

  it("never sizes the cache below 128 entries", () => {
    const strategy = new GraphContextualStrategy(store, new VectorOnlyStrategy(1), { cacheSize: 10 });
    expect(strategy.cacheStats().capacity).toBe(128);
  });

  it("follows only the first hierarchy parent", async () => {
    await store.addEdge({
      sourceId: "sub_400121",
      targetId: "code_40011010",
      relation: "HAS_CODE",
      properties: {}
    });
    const strategy = new GraphContextualStrategy(store, new VectorOnlyStrategy(1));

    expect(strategy.getGraphContext("40011010")).toBe(LATEX_CONTEXT);
  });

  it("reports codes missing from the graph", () => {
    const strategy = new GraphContextualStrategy(store, new VectorOnlyStrategy(1));
    expect(strategy.getGraphContext("99999999")).toBe(GRAPH_CONTEXT_NOT_FOUND);
  });

  it("returns a placeholder when the backend cannot be traversed in process", () => {
    const strategy = new GraphContextualStrategy(withoutTraversal(store), new VectorOnlyStrategy(1));
    expect(strategy.getGraphContext("40011010")).toBe(GRAPH_CONTEXT_UNAVAILABLE);
  });
});

describe("describeAncestors", () => {
  it("stops when the parent chain loops back", () => {
    const nodes: Record<string, GraphNode> = {
      code_x: { id: "code_x", label: "Code", description: "Item", properties: {} },
      sub_a: { id: "sub_a", label: "Subheading", description: "A", properties: {} },
      head_b: { id: "head_b", label: "Heading", description: "B", properties: {} }
    };
    const parents: Record<string, GraphEdge> = {
      code_x: { sourceId: "sub_a", targetId: "code_x", relation: "HAS_CODE", properties: {} },
      sub_a: { sourceId: "head_b", targetId: "sub_a", relation: "HAS_SUBHEADING", properties: {} },
      head_b: { sourceId: "sub_a", targetId: "head_b", relation: "HAS_HEADING", properties: {} }
    };
    const graph: TraversableGraph = {
      getNode: (id) => nodes[id],
      getInEdges: (id) => {
        const parent = parents[id];
        return parent ? [parent] : [];
      }
    };

    expect(describeAncestors(graph, "code_x")).toBe("Heading: B. Subheading: A");
  });
});

describe("createRetrievalStrategy", () => {
  const deps = () => ({
    graphStore: new InMemoryGraphStore(),
    scorer: new FakeLLMService(),
    topK: 5
  });

  it("builds each named strategy", () => {
    expect(createRetrievalStrategy("vector", deps())).toBeInstanceOf(VectorOnlyStrategy);
    expect(createRetrievalStrategy("rerank", deps())).toBeInstanceOf(RerankStrategy);
    expect(createRetrievalStrategy("graph_contextual", deps())).toBeInstanceOf(GraphContextualStrategy);
  });

  it("rejects unknown strategy names", () => {
    expect(() => createRetrievalStrategy("keyword", deps())).toThrow(ConfigurationError);
    expect(() => createRetrievalStrategy("keyword", deps())).toThrow(
      'Unknown retrieval strategy "keyword". Expected one of: vector, rerank, graph_contextual'
    );
  });
});
