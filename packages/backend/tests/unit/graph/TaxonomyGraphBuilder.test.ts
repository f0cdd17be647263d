import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  TaxonomyGraphBuilder,
  chapterNodeId,
  codeNodeId,
  subheadingNodeId
} from "../../../src/graph/TaxonomyGraphBuilder.js";
import { toRecords } from "../../../src/ingest/documents.js";
import { InMemoryGraphStore } from "../../../src/store/InMemoryGraphStore.js";
import { FakeLLMService } from "../../helpers/FakeLLMService.js";
import { FIXTURE_DOCUMENTS } from "../../helpers/fixtures.js";
import { withoutTraversal } from "../../helpers/opaqueGraphStore.js";

describe("TaxonomyGraphBuilder", () => {
  let store: InMemoryGraphStore;
  let builder: TaxonomyGraphBuilder;
  let dir: string | null = null;

  beforeEach(() => {
    store = new InMemoryGraphStore();
    builder = new TaxonomyGraphBuilder(store);
  });

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  it("builds the four-level hierarchy with shared ancestors merged", async () => {
    const report = await builder.build(toRecords(FIXTURE_DOCUMENTS));

    expect(report).toEqual({ recordsProcessed: 4, nodesCreated: 11, edgesCreated: 9 });
    expect(await store.getStats()).toEqual({
      nodeCount: 11,
      edgeCount: 9,
      nodeTypeDistribution: { Chapter: 2, Heading: 2, Subheading: 3, Code: 4 },
      edgeTypeDistribution: { HAS_HEADING: 2, HAS_SUBHEADING: 3, HAS_CODE: 4 }
    });

    const code = await store.getNode(codeNodeId("40011010"));
    expect(code).toEqual({
      id: "code_40011010",
      label: "Code",
      description: "Prevulcanised natural rubber latex",
      properties: { hsnCode: "40011010" }
    });
    expect((await store.getNode(chapterNodeId("40")))?.properties).toEqual({ code: "40" });
  });

  it("leaves the graph unchanged when the same records are built again", async () => {
    await builder.build(toRecords(FIXTURE_DOCUMENTS));
    const second = await builder.build(toRecords(FIXTURE_DOCUMENTS));

    expect(second).toEqual({ recordsProcessed: 4, nodesCreated: 0, edgesCreated: 0 });
    expect((await store.getStats()).nodeCount).toBe(11);
  });

  it("falls back to a placeholder for empty descriptions", async () => {
    const [record] = toRecords(FIXTURE_DOCUMENTS);
    if (!record) {
      throw new Error("fixture missing");
    }
    await builder.build([{ ...record, itemDescription: "" }]);

    expect((await store.getNode("code_40011010"))?.description).toBe("Not specified");
  });

  it("links codes under the same subheading as siblings in both directions", async () => {
    await builder.build(toRecords(FIXTURE_DOCUMENTS));

    expect(await builder.enrichSiblings()).toBe(2);
    expect(await builder.enrichSiblings()).toBe(0);

    const siblings = (await store.getInEdges("code_40011020")).filter(
      (item) => item.relation === "SIBLING_OF"
    );
    expect(siblings.map((item) => item.sourceId)).toEqual(["code_40011010"]);
    expect(await store.getNeighbors("code_40012100", "in")).toHaveLength(1);
  });

  it("adds similarity edges only for pairs strictly above the threshold", async () => {
    await builder.build(toRecords(FIXTURE_DOCUMENTS));
    const embeddings = new FakeLLMService({
      embeddingFor: (text) => (text.includes("latex") ? [1, 0] : [0, 1])
    });

    expect(await builder.enrichSimilarity(embeddings, 1)).toBe(0);
    expect(await builder.enrichSimilarity(embeddings, 0.85)).toBe(2);

    const similar = (await store.getInEdges("code_40011020")).find(
      (item) => item.relation === "SIMILAR_TO"
    );
    expect(similar).toEqual({
      sourceId: "code_40011010",
      targetId: "code_40011020",
      relation: "SIMILAR_TO",
      properties: { score: 1 }
    });
    expect(embeddings.embeddedBatches[0]).toEqual([
      "Prevulcanised natural rubber latex",
      "Other natural rubber latex",
      "Smoked sheets of natural rubber",
      "Raw cotton, short staple"
    ]);
  });

  it("skips similarity enrichment with fewer than two codes", async () => {
    const embeddings = new FakeLLMService();
    expect(await builder.enrichSimilarity(embeddings, 0.5)).toBe(0);
    expect(embeddings.embeddedBatches).toEqual([]);
  });

  it("reports codes without a subheading parent or with several hierarchy parents", async () => {
    await builder.build(toRecords(FIXTURE_DOCUMENTS));
    expect(await builder.validateIntegrity()).toEqual({ valid: true, checkedCodes: 4, violations: [] });

    await store.addNode({ id: "code_99999999", label: "Code", description: "Orphan", properties: {} });
    await store.addEdge({
      sourceId: subheadingNodeId("400121"),
      targetId: codeNodeId("40011010"),
      relation: "HAS_CODE",
      properties: {}
    });

    const report = await builder.validateIntegrity();
    expect(report.valid).toBe(false);
    expect(report.checkedCodes).toBe(5);
    expect(report.violations).toEqual([
      {
        nodeId: "code_40011010",
        kind: "multiple_hierarchy_parents",
        message: "Node code_40011010 has 2 hierarchy parents: sub_400110, sub_400121"
      },
      {
        nodeId: "code_99999999",
        kind: "missing_subheading_parent",
        message: "Node code_99999999 has no Subheading parent"
      }
    ]);
  });

  it("walks the hierarchy up and down from a code", async () => {
    await builder.build(toRecords(FIXTURE_DOCUMENTS));

    const parents = await builder.traverseHierarchy("40011010", "up");
    expect(parents.map((item) => item.id)).toEqual(["sub_400110"]);
    expect(await builder.traverseHierarchy("40011010", "down")).toEqual([]);

    const context = await builder.getContextSubgraph("52010011");
    expect(context.nodes.map((item) => item.id)).toEqual(["code_52010011", "sub_520100"]);
  });

  it("ignores sibling and similarity edges when walking the hierarchy", async () => {
    await builder.build(toRecords(FIXTURE_DOCUMENTS));
    expect(await builder.enrichSiblings()).toBe(2);
    await builder.enrichSimilarity(new FakeLLMService({ embeddingFor: () => [1, 0] }), 0.5);

    const parents = await builder.traverseHierarchy("40011010", "up");
    expect(parents.map((item) => item.id)).toEqual(["sub_400110"]);
    expect(await builder.traverseHierarchy("40011020", "down")).toEqual([]);
  });

  it("rejects an embedding batch that does not match the code count", async () => {
    await builder.build(toRecords(FIXTURE_DOCUMENTS));
    const shortBatch = {
      generateEmbeddings: async (texts: string[]) => texts.slice(1).map(() => [1, 0])
    };

    await expect(builder.enrichSimilarity(shortBatch, 0.5)).rejects.toThrow(
      "Embedding count mismatch: expected 4, received 3"
    );
    expect((await store.getStats()).edgeTypeDistribution.SIMILAR_TO).toBeUndefined();
  });

  it("writes a visualization only for traversable backends", async () => {
    await builder.build(toRecords(FIXTURE_DOCUMENTS));
    dir = await mkdtemp(join(tmpdir(), "taxonomy-viz-"));
    const target = join(dir, "graph.html");

    expect(await builder.writeVisualization(target)).toBe(true);
    expect(await readFile(target, "utf8")).toContain(`"id":"code_52010011"`);

    const remote = new TaxonomyGraphBuilder(withoutTraversal(store));
    expect(await remote.writeVisualization(join(dir, "remote.html"))).toBe(false);
  });
});
