import { randomUUID } from "node:crypto";
import type { RequestHandler } from "express";
import { childLogger } from "../utils/logger.js";

const log = childLogger("http");

export const requestLogger: RequestHandler = (req, res, next) => {
  const startedAt = process.hrtime.bigint();
  const requestId = req.get("x-request-id") ?? randomUUID();
  res.setHeader("x-request-id", requestId);

  res.on("finish", () => {
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1_000_000;
    const entry = {
      requestId,
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      durationMs: Math.round(durationMs * 10) / 10
    };
    if (res.statusCode >= 500) {
      log.error(entry, "HTTP request failed");
    } else {
      log.info(entry, "HTTP request");
    }
  });

  next();
};
