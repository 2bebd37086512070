/**
 * API server entry point
 * Loads the source files, then starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { createLogger, createModuleLogger, prettyTransport } from './infra/logger/index.js';
import { loadEpiDataset } from './modules/epi-dataset/index.js';
import { makeGazetteerRepo } from './modules/gazetteer/index.js';
import { makeObservationRepo } from './modules/observations/index.js';

const getVersion = (): string => process.env['APP_VERSION'] ?? '0.1.0';

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  // Create logger
  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  logger.info({ config: { server: config.server, sources: config.sources } }, 'Starting API server');

  // Load both sources before accepting traffic; the dataset is immutable afterwards
  const loaded = await loadEpiDataset({
    observationRepo: makeObservationRepo({ filePath: config.sources.timeSeriesPath }),
    gazetteerRepo: makeGazetteerRepo({ filePath: config.sources.gazetteerPath }),
    logger: createModuleLogger(logger, 'epi-dataset'),
  });

  if (loaded.isErr()) {
    logger.fatal({ err: loaded.error }, `[${loaded.error.type}] ${loaded.error.message}`);
    process.exit(1);
  }

  // Build application - let Fastify create its own logger based on config
  const app = await buildApp({
    fastifyOptions: {
      logger: {
        level: config.logger.level,
        ...(config.logger.pretty && { transport: prettyTransport }),
      },
      disableRequestLogging: false,
    },
    deps: {
      dataset: loaded.value,
      config,
    },
    version: getVersion(),
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  // Start server
  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
