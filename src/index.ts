import "dotenv/config";

import { createApp } from "./app";
import { loadConfig } from "./config/env";
import { createConsentBackend } from "./consentTwilio/stores/createConsentBackend";
import { BackgroundTaskRunner } from "./utils/backgroundTasks";
import logger from "./utils/logger";

async function main(): Promise<void> {
  const config = loadConfig();
  const store = await createConsentBackend(config.store);
  const tasks = new BackgroundTaskRunner(config.backgroundConcurrency);
  const app = createApp({ config, store, tasks });

  const server = app.listen(config.port, () => {
    logger.info(`Server running on port ${config.port}`, { backend: config.store.kind });
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received; draining background tasks`, tasks.stats());
    server.close(() => {
      tasks
        .onIdle()
        .then(() => {
          logger.info("Shutdown complete");
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error(`Shutdown failed: ${String(err)}`);
          process.exit(1);
        });
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  logger.error("Failed to start server", {
    errorMessage: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  process.exit(1);
});
