import { serve } from "@hono/node-server";
import { loadConfig } from "./config";
import { createContainer } from "./container";
import { createApp } from "./index";
import { logger } from "./utils/logger";

const config = loadConfig();
const container = createContainer(config);
const app = createApp(container);

logger.info(`Server is starting on port ${config.PORT}`);

const server = serve({ fetch: app.fetch, port: config.PORT }, (info) => {
  logger.info({ port: info.port, store: config.STORE_DRIVER }, "Server listening");
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, "Shutting down");

  server.close();
  await container.close();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exitCode = 1;
    });
  });
}
