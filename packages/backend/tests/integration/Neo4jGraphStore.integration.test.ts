import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { GenericContainer, type StartedTestContainer } from "testcontainers";
import { TaxonomyGraphBuilder } from "../../src/graph/TaxonomyGraphBuilder.js";
import { toRecords } from "../../src/ingest/documents.js";
import { Neo4jGraphStore } from "../../src/store/Neo4jGraphStore.js";
import { Neo4jConnection } from "../../src/store/neo4jSupport.js";
import { Neo4jVectorStore } from "../../src/vector/Neo4jVectorStore.js";
import { FakeLLMService } from "../helpers/FakeLLMService.js";
import { FIXTURE_DOCUMENTS } from "../helpers/fixtures.js";

const runIntegration = process.env.RUN_NEO4J_INTEGRATION === "true";

describe.skipIf(!runIntegration)("Neo4j backends integration", () => {
  let container: StartedTestContainer;
  let connection: Neo4jConnection;
  let store: Neo4jGraphStore;

  beforeAll(async () => {
    container = await new GenericContainer("neo4j:5.26.0")
      .withEnvironment({
        NEO4J_AUTH: "neo4j/testpassword"
      })
      .withExposedPorts(7687)
      .start();

    connection = new Neo4jConnection({
      uri: `bolt://${container.getHost()}:${container.getMappedPort(7687)}`,
      user: "neo4j",
      password: "testpassword"
    });
    store = new Neo4jGraphStore(connection);
    await store.connect();
  }, 120_000);

  afterAll(async () => {
    await store?.disconnect();
    await container?.stop();
  });

  it("builds the taxonomy hierarchy idempotently", async () => {
    const builder = new TaxonomyGraphBuilder(store);
    await builder.optimize();

    const first = await builder.build(toRecords(FIXTURE_DOCUMENTS));
    expect(first).toEqual({ recordsProcessed: 4, nodesCreated: 11, edgesCreated: 9 });

    const second = await builder.build(toRecords(FIXTURE_DOCUMENTS));
    expect(second).toEqual({ recordsProcessed: 4, nodesCreated: 0, edgesCreated: 0 });

    const stats = await store.getStats();
    expect(stats.nodeCount).toBe(11);
    expect(stats.edgeTypeDistribution.HAS_CODE).toBe(4);
  });

  it("answers neighbor, hierarchy and integrity queries", async () => {
    const builder = new TaxonomyGraphBuilder(store);

    const children = await store.getNeighbors("sub_400110", "out");
    expect(children.map((node) => node.id).sort()).toEqual(["code_40011010", "code_40011020"]);

    const parents = await builder.traverseHierarchy("40011010", "up");
    expect(parents.map((node) => node.id)).toEqual(["sub_400110"]);

    const integrity = await builder.validateIntegrity();
    expect(integrity.valid).toBe(true);
    expect(integrity.checkedCodes).toBe(4);

    expect(store.asTraversable()).toBeNull();
  });

  it("indexes documents for vector search", async () => {
    const embeddings = new FakeLLMService({
      embeddingFor: (text) => (text.includes("latex") ? [1, 0] : [0, 1])
    });
    const vectorStore = new Neo4jVectorStore(connection, embeddings, 2);
    await vectorStore.initialize(FIXTURE_DOCUMENTS);

    const results = await retry(async () => {
      const found = await vectorStore.query("rubber latex", 2);
      if (found.length < 2) {
        throw new Error("vector index not populated yet");
      }
      return found;
    });

    expect(results.map((doc) => doc.metadata.hsnCode).sort()).toEqual(["40011010", "40011020"]);
    for (const doc of results) {
      expect(doc.score).toBeCloseTo(1, 5);
    }

    const widened = await vectorStore.query("rubber latex", 4);
    expect(widened[2]?.score).toBeCloseTo(0, 5);
    expect((await vectorStore.getDocument("hsn_52010011"))?.metadata.chapter).toBe("52");
  });
});

async function retry<T>(fn: () => Promise<T>, attempts = 8, delayMs = 500): Promise<T> {
  let latestError: unknown;
  for (let i = 0; i < attempts; i += 1) {
    try {
      return await fn();
    } catch (error) {
      latestError = error;
      await new Promise((resolve) => {
        setTimeout(resolve, delayMs);
      });
    }
  }
  throw latestError;
}
