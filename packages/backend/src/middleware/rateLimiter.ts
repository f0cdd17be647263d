import rateLimit from "express-rate-limit";
import type { ApiErrorResponse } from "@taxograph/shared";
import { appConfig } from "../config.js";

const rateLimitedResponse: ApiErrorResponse = {
  error: "Too many requests, please slow down"
};

/** Applied to the query endpoints only; health probes stay unthrottled. */
export const apiRateLimiter = rateLimit({
  windowMs: appConfig.RATE_LIMIT_WINDOW_MS,
  limit: appConfig.RATE_LIMIT_MAX,
  standardHeaders: "draft-7",
  legacyHeaders: false,
  message: rateLimitedResponse
});
