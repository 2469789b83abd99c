/**
 * API Entry Point
 */

import "reflect-metadata"; // Must be first import for TSyringe
import "dotenv/config";

import { container, DIContainer } from "./di/Container";
import { TYPES } from "./di/types";
import { IConfig } from "./shared/config/IConfig";
import { ILogger } from "./infrastructure/logging/ILogger";
import { loadTermIndex } from "./infrastructure/search/TermIndexLoader";
import { createApp } from "./presentation/http/createApp";

async function bootstrap() {
  DIContainer.initialize();

  const config = container.resolve<IConfig>(TYPES.Config);
  const logger = container.resolve<ILogger>(TYPES.Logger);

  logger.info("Starting lexicon API server...");

  const termIndex = await loadTermIndex(config.termIndexPath, logger);
  DIContainer.registerIndexSearcher(termIndex);

  const app = createApp();

  app.listen(config.port, () => {
    logger.info("Lexicon API server started", {
      port: config.port,
      env: config.nodeEnv,
    });
  });
}

bootstrap().catch((error) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
