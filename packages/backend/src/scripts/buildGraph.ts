import { appConfig, resolveDataPath } from "../config.js";
import { TaxonomyGraphBuilder } from "../graph/TaxonomyGraphBuilder.js";
import { loadDocuments, toRecords } from "../ingest/documents.js";
import { createGraphStore, getLLMServiceSingleton, shutdownRuntime } from "../runtime/graphRuntime.js";
import { logger } from "../utils/logger.js";

function parseArg(name: string): string | undefined {
  const prefix = `--${name}=`;
  const value = process.argv.find((arg) => arg.startsWith(prefix));
  return value ? value.slice(prefix.length) : undefined;
}

async function main(): Promise<void> {
  const documentsPath = resolveDataPath(parseArg("documents") ?? appConfig.DOCUMENTS_PATH);
  const exportPath = resolveDataPath(parseArg("export") ?? appConfig.GRAPH_EXPORT_PATH);
  const visualizationPath = resolveDataPath(
    parseArg("visualization") ?? appConfig.GRAPH_VISUALIZATION_PATH
  );
  const withSimilarity =
    process.argv.includes("--similarity") || appConfig.SIMILARITY_ENRICHMENT_ENABLED;

  const store = createGraphStore(parseArg("backend") ?? appConfig.GRAPH_BACKEND);
  const builder = new TaxonomyGraphBuilder(store);

  try {
    await store.connect();
    const documents = await loadDocuments(documentsPath);

    await builder.optimize();
    const report = await builder.build(toRecords(documents));
    const siblingEdges = await builder.enrichSiblings();
    const llmService = getLLMServiceSingleton();
    const similarityEdges = withSimilarity
      ? await builder.enrichSimilarity(llmService, appConfig.SIMILARITY_THRESHOLD)
      : 0;
    const integrity = await builder.validateIntegrity();
    const stats = await builder.getStatistics();

    await builder.exportGraph(exportPath);
    const visualized = await builder.writeVisualization(visualizationPath);

    console.log("Taxonomy Graph Build Summary");
    console.log(`backend: ${store.backendName}`);
    console.log(`records: ${report.recordsProcessed}`);
    console.log(`nodes created: ${report.nodesCreated}`);
    console.log(`hierarchy edges created: ${report.edgesCreated}`);
    console.log(`sibling edges created: ${siblingEdges}`);
    console.log(`similarity edges created: ${similarityEdges}`);
    console.log(`total nodes: ${stats.nodeCount}`);
    console.log(`total edges: ${stats.edgeCount}`);
    console.log(`integrity: ${integrity.valid ? "ok" : `${integrity.violations.length} violation(s)`}`);
    console.log(`graphml: ${exportPath}`);
    if (visualized) {
      console.log(`visualization: ${visualizationPath}`);
    }

    const usage = llmService.getUsageRecords?.() ?? [];
    if (usage.length > 0) {
      const tokens = usage.reduce((sum, record) => sum + record.promptTokens, 0);
      const cost = usage.reduce((sum, record) => sum + record.estimatedCost, 0);
      console.log(`embedding tokens: ${tokens} (est. $${cost.toFixed(4)})`);
    }
  } finally {
    await store.disconnect();
    await shutdownRuntime();
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "Graph build failed");
  process.exit(1);
});
