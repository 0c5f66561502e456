/**
 * API server entry point
 * Starts the Fastify HTTP server with the default health reporter
 */

import os from 'node:os';

import { buildApp } from './app.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { createLogger } from './infra/logger/index.js';
import { makeBaseHealthReporter } from './modules/health/index.js';

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    name: config.service.name,
    pretty: config.logger.pretty,
  });

  logger.info({ config: { server: config.server, service: config.service } }, 'Starting API server');

  const reporter = makeBaseHealthReporter({
    serviceName: config.service.name,
    version: config.service.version,
    environment: config.service.environment,
    gitCommit: config.service.gitCommit,
    buildTime: config.service.buildTime,
    hostname: config.service.hostname ?? os.hostname(),
  });

  const app = await buildApp({
    fastifyOptions: {
      loggerInstance: logger,
      disableRequestLogging: false,
    },
    deps: { reporter },
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
