import "dotenv/config";

import { loadConfig } from "../config.js";
import { createEngine } from "../engine/factory.js";
import { createApp } from "./app.js";
import { logger, serializeError } from "./logger.js";

async function main() {
  const config = loadConfig();
  const engine = await createEngine(config);
  const app = createApp(engine, config);

  const server = app.listen(config.server.port, () => {
    logger.info("Valuation API listening", {
      port: config.server.port,
      apiUrl: `http://localhost:${config.server.port}`,
      apiPrefix: config.server.apiPrefix,
    });
  });

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    server.close();
    engine.close().catch((error: unknown) => {
      logger.error("Failed to release engine resources", { error: serializeError(error) });
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  logger.error("Startup failed", { error: serializeError(error) });
  process.exit(1);
});
