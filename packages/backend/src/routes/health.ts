import { Router } from "express";
import type { HealthResponse, ServiceCheckStatus } from "@taxograph/shared";
import {
  checkGraphStoreConnection,
  checkLlmConnection,
  checkVectorStoreConnection
} from "../runtime/connectivity.js";

interface CreateHealthRouterOptions {
  checkGraphStore?: () => Promise<ServiceCheckStatus>;
  checkVectorStore?: () => Promise<ServiceCheckStatus>;
  checkLlm?: () => Promise<ServiceCheckStatus>;
  startTime?: number;
}

export function createHealthRouter(options: CreateHealthRouterOptions = {}): Router {
  const checkGraphStore = options.checkGraphStore ?? (() => checkGraphStoreConnection());
  const checkVectorStore = options.checkVectorStore ?? (() => checkVectorStoreConnection());
  const checkLlm = options.checkLlm ?? (() => checkLlmConnection());
  const startTime = options.startTime ?? Date.now();

  const healthRouter = Router();

  healthRouter.get("/", async (_req, res) => {
    const [graphStore, vectorStore, llm] = await Promise.all([
      checkGraphStore(),
      checkVectorStore(),
      checkLlm()
    ]);
    const status: HealthResponse["status"] = [graphStore, vectorStore, llm].includes("failed")
      ? "degraded"
      : "ok";

    const mem = process.memoryUsage();
    const response: HealthResponse = {
      status,
      timestamp: new Date().toISOString(),
      uptimeSec: Math.max(0, Math.floor((Date.now() - startTime) / 1000)),
      checks: {
        graphStore,
        vectorStore,
        llm
      },
      memoryUsage: {
        rss: mem.rss,
        heapUsed: mem.heapUsed,
        heapTotal: mem.heapTotal
      }
    };
    res.json(response);
  });

  return healthRouter;
}

export const healthRouter = createHealthRouter();
