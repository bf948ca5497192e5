#!/usr/bin/env node
import 'dotenv/config';
import { loadAndValidateConfig } from './config/index.js';
import { startApiServer, shutdownApiServer } from './api/server.js';
import { createLineupServices } from './setup.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const config = loadAndValidateConfig();
  logger.setLevel(config.logLevel);

  const services = await createLineupServices(config);
  logger.info(`Vision model: ${services.visionProvider.getModelInfo().name}`);

  const { server } = await startApiServer(
    {
      extractionService: services.extractionService,
      uploadStore: services.uploadStore
    },
    {
      port: config.server.port,
      host: config.server.host,
      corsOrigins: config.server.corsOrigins,
      maxFileSizeBytes: config.uploads.maxFileSizeBytes,
      cdnBaseUrl: config.cdnBaseUrl
    }
  );

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}`);
    shutdownApiServer(server)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error during shutdown', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.error('Failed to start lineup extractor', error);
  process.exit(1);
});
