import pino, { type Logger } from "pino";
import { appConfig } from "../config.js";

export const logger = pino({
  level: appConfig.LOG_LEVEL,
  base: { service: "taxograph" }
});

export function childLogger(component: string): Logger {
  return logger.child({ component });
}
