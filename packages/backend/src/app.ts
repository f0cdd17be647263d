import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import type { ApiErrorResponse } from "@taxograph/shared";
import { appConfig } from "./config.js";
import { requestLogger } from "./middleware/logger.js";
import { apiRateLimiter } from "./middleware/rateLimiter.js";
import { graphRouter } from "./routes/graph.js";
import { healthRouter } from "./routes/health.js";
import { sessionsRouter } from "./routes/sessions.js";
import { logger } from "./utils/logger.js";

export const app = express();

app.use(requestLogger);
app.use(
  cors({
    origin: appConfig.CORS_ORIGIN,
    exposedHeaders: ["x-request-id", "x-total-count"]
  })
);
app.use(express.json({ limit: "64kb" }));

app.use("/api/sessions", apiRateLimiter, sessionsRouter);
app.use("/api/graph", apiRateLimiter, graphRouter);
app.use("/api/health", healthRouter);

app.use((_req, res) => {
  const response: ApiErrorResponse = { error: "Route not found" };
  res.status(404).json(response);
});

app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  logger.error({ err }, "Unhandled error");
  const response: ApiErrorResponse = { error: "Internal server error" };
  res.status(500).json(response);
});
