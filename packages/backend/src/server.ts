import { app } from "./app.js";
import { appConfig } from "./config.js";
import { ensureRuntimeReady, shutdownRuntime } from "./runtime/graphRuntime.js";
import { logger } from "./utils/logger.js";

async function main(): Promise<void> {
  const runtime = await ensureRuntimeReady();

  const server = app.listen(appConfig.PORT, () => {
    logger.info(
      { documents: runtime.documentCount, strategy: runtime.strategy.name },
      `Taxograph backend is running on http://localhost:${appConfig.PORT}`
    );
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, "Shutting down");
    server.close(() => {
      shutdownRuntime()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error({ err: error }, "Shutdown failed");
          process.exit(1);
        });
    });
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "Failed to start backend");
  process.exit(1);
});
