import type { ServiceCheckStatus, TaxonomyGraphStore, VectorStore } from "@taxograph/shared";
import { appConfig } from "../config.js";
import type { LLMServiceLike } from "../services/llmTypes.js";
import { childLogger } from "../utils/logger.js";
import {
  ensureGraphStoreConnected,
  getGraphStoreSingleton,
  getLLMServiceSingleton,
  getVectorStoreSingleton
} from "./graphRuntime.js";

const log = childLogger("connectivity");

export function isNeo4jConfigured(): boolean {
  return (
    appConfig.NEO4J_URI.trim().length > 0 &&
    appConfig.NEO4J_USER.trim().length > 0 &&
    appConfig.NEO4J_PASSWORD.trim().length > 0
  );
}

interface GraphStoreCheckOptions {
  store?: TaxonomyGraphStore;
  ensureStoreConnected?: () => Promise<void>;
}

export async function checkGraphStoreConnection(
  options: GraphStoreCheckOptions = {}
): Promise<ServiceCheckStatus> {
  const store = options.store ?? getGraphStoreSingleton();
  if (store.backendName === "neo4j" && !isNeo4jConfigured()) {
    return "not_configured";
  }

  const ensureStoreConnected =
    options.ensureStoreConnected ??
    (options.store ? () => store.connect() : () => ensureGraphStoreConnected(store));

  try {
    await ensureStoreConnected();
    return (await store.healthCheck()) ? "ok" : "failed";
  } catch (error) {
    log.warn({ err: error, backend: store.backendName }, "Graph store health check failed");
    return "failed";
  }
}

export async function checkVectorStoreConnection(
  store: VectorStore = getVectorStoreSingleton()
): Promise<ServiceCheckStatus> {
  if (store.backendName === "neo4j" && !isNeo4jConfigured()) {
    return "not_configured";
  }

  try {
    return (await store.healthCheck()) ? "ok" : "failed";
  } catch (error) {
    log.warn({ err: error, backend: store.backendName }, "Vector store health check failed");
    return "failed";
  }
}

export async function checkLlmConnection(
  llmService: LLMServiceLike = getLLMServiceSingleton()
): Promise<ServiceCheckStatus> {
  if (!llmService.isConfigured()) {
    return "not_configured";
  }

  if (llmService.getCircuitState?.() === "open") {
    return "failed";
  }

  return (await llmService.healthCheck()) ? "ok" : "failed";
}
