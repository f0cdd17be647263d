import type {
  ClassificationResultResponse,
  RetrievedDocument,
  TaxonomyDocument,
  VectorStore
} from "@taxograph/shared";
import { documentIdForCode } from "../ingest/documents.js";
import { buildClassificationPrompt } from "../prompts/index.js";
import type { RetrievalStrategy } from "../retrieval/strategies.js";
import { UpstreamServiceError } from "../utils/errors.js";
import { childLogger } from "../utils/logger.js";
import type { GenerationBackend } from "./llmTypes.js";

const log = childLogger("ClassificationService");

export interface ClassificationServiceLike {
  retrieveDocuments(query: string): Promise<RetrievedDocument[]>;
  generateFromDocs(query: string, documents: RetrievedDocument[]): Promise<ClassificationResultResponse>;
  lookupDocument(hsnCode: string): Promise<TaxonomyDocument | null>;
}

async function timed<T>(fn: () => Promise<T>): Promise<{ value: T; elapsedMs: number }> {
  const start = performance.now();
  const value = await fn();
  return { value, elapsedMs: performance.now() - start };
}

/**
 * Retrieval and generation steps behind the dialogue engine. Collaborator failures
 * are rethrown as `UpstreamServiceError` so the caller can abort the turn.
 */
export class ClassificationService implements ClassificationServiceLike {
  constructor(
    private readonly vectorStore: VectorStore,
    private readonly generator: GenerationBackend,
    private readonly strategy: RetrievalStrategy
  ) {}

  get strategyName(): string {
    return this.strategy.name;
  }

  async initializeVectorStore(documents: TaxonomyDocument[]): Promise<void> {
    try {
      await this.vectorStore.initialize(documents);
    } catch (error) {
      throw new UpstreamServiceError("vector_store", error);
    }
  }

  async retrieveDocuments(query: string): Promise<RetrievedDocument[]> {
    try {
      const { value, elapsedMs } = await timed(() => this.strategy.retrieve(query, this.vectorStore));
      log.info(
        { strategy: this.strategy.name, results: value.length, retrievalMs: Math.round(elapsedMs) },
        "Retrieval finished"
      );
      return value;
    } catch (error) {
      throw error instanceof UpstreamServiceError ? error : new UpstreamServiceError("retrieval", error);
    }
  }

  async generateFromDocs(
    query: string,
    documents: RetrievedDocument[]
  ): Promise<ClassificationResultResponse> {
    const prompt = buildClassificationPrompt(query, documents);

    let generated: { value: string; elapsedMs: number };
    try {
      generated = await timed(() => this.generator.generate(prompt));
    } catch (error) {
      throw new UpstreamServiceError("generation", error);
    }

    log.info(
      { backend: this.generator.backendName, generationMs: Math.round(generated.elapsedMs) },
      "Generation finished"
    );
    return buildStructuredResponse(generated.value, documents);
  }

  async lookupDocument(hsnCode: string): Promise<TaxonomyDocument | null> {
    try {
      return await this.vectorStore.getDocument(documentIdForCode(hsnCode));
    } catch (error) {
      throw new UpstreamServiceError("vector_store", error);
    }
  }
}

export function buildStructuredResponse(
  generatedText: string,
  documents: RetrievedDocument[]
): ClassificationResultResponse {
  const topScore = documents[0]?.score ?? 0;
  return {
    type: "classification_result",
    summary: generatedText,
    topMatches: documents.map((doc) => {
      const match: ClassificationResultResponse["topMatches"][number] = {
        hsnCode: doc.metadata.hsnCode,
        description: doc.metadata.itemDescription,
        retrievalScore: doc.score,
        metadata: doc.metadata
      };
      if (doc.graphContext !== undefined) {
        match.graphContext = doc.graphContext;
      }
      return match;
    }),
    confidence: topScore > 0.85 ? "High" : "Medium"
  };
}
