import neo4j, { type Node } from "neo4j-driver";
import type { RetrievedDocument, TaxonomyDocument, VectorStore } from "@taxograph/shared";
import { parseMetadata } from "../ingest/documents.js";
import type { EmbeddingProvider } from "../services/llmTypes.js";
import { Neo4jConnection, parseJsonRecord, toNumber, toText } from "../store/neo4jSupport.js";
import { childLogger } from "../utils/logger.js";
import { cosineFromIndexScore } from "./similarity.js";

const log = childLogger("Neo4jVectorStore");

const INDEX_NAME = "taxonomy_document_embedding";
const WRITE_BATCH_SIZE = 200;

/**
 * Vector index kept beside the taxonomy graph. Documents are `TaxonomyDocument` nodes
 * holding their text, JSON metadata and embedding; ranking is delegated to the
 * database's cosine vector index.
 */
export class Neo4jVectorStore implements VectorStore {
  readonly backendName = "neo4j";

  constructor(
    private readonly connection: Neo4jConnection,
    private readonly embeddings: EmbeddingProvider,
    private readonly dimensions: number
  ) {}

  async initialize(documents: TaxonomyDocument[]): Promise<void> {
    await this.connection.connect();
    await this.ensureIndex();

    const vectors = await this.embeddings.generateEmbeddings(documents.map((doc) => doc.text));
    if (vectors.length !== documents.length) {
      throw new Error(
        `Embedding count mismatch: expected ${documents.length}, received ${vectors.length}`
      );
    }

    const rows = documents.map((doc, index) => ({
      id: doc.id,
      text: doc.text,
      metadata: JSON.stringify(doc.metadata),
      embedding: vectors[index] ?? []
    }));

    await this.connection.withSession("WRITE", async (session) => {
      for (let start = 0; start < rows.length; start += WRITE_BATCH_SIZE) {
        await session.run(
          `
          UNWIND $rows AS row
          MERGE (d:TaxonomyDocument {id: row.id})
          SET
            d.text = row.text,
            d.metadata = row.metadata,
            d.embedding = row.embedding
          `,
          { rows: rows.slice(start, start + WRITE_BATCH_SIZE) }
        );
      }
    });

    log.info({ count: documents.length }, "Neo4j vector index loaded");
  }

  async query(text: string, topK: number): Promise<RetrievedDocument[]> {
    if (topK <= 0) {
      return [];
    }

    const [vector] = await this.embeddings.generateEmbeddings([text]);
    if (!vector || vector.length === 0) {
      return [];
    }

    return this.connection.withSession("READ", async (session) => {
      const result = await session.run(
        `
        CALL db.index.vector.queryNodes('${INDEX_NAME}', $k, $vector)
        YIELD node, score
        RETURN node, score
        ORDER BY score DESC
        `,
        { vector, k: neo4j.int(topK) }
      );

      return result.records.map((record) => ({
        ...this.mapDocument(record.get("node") as Node),
        score: cosineFromIndexScore(toNumber(record.get("score")))
      }));
    });
  }

  async getDocument(id: string): Promise<TaxonomyDocument | null> {
    return this.connection.withSession("READ", async (session) => {
      const result = await session.run(
        `
        MATCH (d:TaxonomyDocument {id: $id})
        RETURN d
        LIMIT 1
        `,
        { id }
      );
      const record = result.records[0];
      return record ? this.mapDocument(record.get("d") as Node) : null;
    });
  }

  healthCheck(): Promise<boolean> {
    return this.connection.healthCheck();
  }

  private async ensureIndex(): Promise<void> {
    const dimension = Math.max(1, Math.floor(this.dimensions));

    await this.connection.withSession("WRITE", async (session) => {
      await session.run(
        `CREATE CONSTRAINT taxonomy_document_id_unique IF NOT EXISTS FOR (d:TaxonomyDocument) REQUIRE d.id IS UNIQUE`
      );
      await session.run(
        `
        CREATE VECTOR INDEX ${INDEX_NAME} IF NOT EXISTS
        FOR (d:TaxonomyDocument) ON (d.embedding)
        OPTIONS {indexConfig: {\`vector.dimensions\`: ${dimension}, \`vector.similarity_function\`: 'cosine'}}
        `
      );
    });
  }

  private mapDocument(node: Node): TaxonomyDocument {
    const props = node.properties as Record<string, unknown>;
    return {
      id: toText(props.id, ""),
      text: toText(props.text, ""),
      metadata: parseMetadata(parseJsonRecord(props.metadata))
    };
  }
}
