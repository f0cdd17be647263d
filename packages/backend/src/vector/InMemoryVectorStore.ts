import type { RetrievedDocument, TaxonomyDocument, VectorStore } from "@taxograph/shared";
import type { EmbeddingProvider } from "../services/llmTypes.js";
import { childLogger } from "../utils/logger.js";
import { cosineSimilarity } from "./similarity.js";

const log = childLogger("InMemoryVectorStore");

interface IndexedDocument {
  document: TaxonomyDocument;
  embedding: number[];
}

/**
 * Brute-force cosine index over document embeddings. Scores are `1 - cosine distance`,
 * i.e. the cosine similarity itself; ties keep load order.
 */
export class InMemoryVectorStore implements VectorStore {
  readonly backendName = "memory";

  private entries: IndexedDocument[] = [];
  private readonly byId = new Map<string, TaxonomyDocument>();

  constructor(private readonly embeddings: EmbeddingProvider) {}

  async initialize(documents: TaxonomyDocument[]): Promise<void> {
    const vectors = await this.embeddings.generateEmbeddings(documents.map((doc) => doc.text));
    if (vectors.length !== documents.length) {
      throw new Error(
        `Embedding count mismatch: expected ${documents.length}, received ${vectors.length}`
      );
    }

    this.entries = documents.map((document, index) => ({
      document,
      embedding: vectors[index] ?? []
    }));
    this.byId.clear();
    for (const document of documents) {
      this.byId.set(document.id, document);
    }
    log.info({ count: documents.length }, "Vector index initialized");
  }

  async query(text: string, topK: number): Promise<RetrievedDocument[]> {
    if (topK <= 0 || this.entries.length === 0) {
      return [];
    }

    const [queryVector] = await this.embeddings.generateEmbeddings([text]);
    if (!queryVector) {
      return [];
    }

    return this.entries
      .map((entry, order) => ({
        entry,
        order,
        score: cosineSimilarity(queryVector, entry.embedding)
      }))
      .sort((a, b) => b.score - a.score || a.order - b.order)
      .slice(0, topK)
      .map(({ entry, score }) => ({
        id: entry.document.id,
        text: entry.document.text,
        metadata: { ...entry.document.metadata },
        score
      }));
  }

  async getDocument(id: string): Promise<TaxonomyDocument | null> {
    return this.byId.get(id) ?? null;
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  size(): number {
    return this.entries.length;
  }
}
