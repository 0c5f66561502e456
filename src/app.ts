/**
 * Fastify application factory
 * Creates and configures the Fastify instance with the health routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { makeHealthRoutes, type HealthReporter } from './modules/health/index.js';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  reporter: HealthReporter;
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps: AppDeps;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps } = options;

  const app = fastifyLib({
    ...fastifyOptions,
  });

  // Register health routes
  await app.register(makeHealthRoutes({ reporter: deps.reporter }));

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    // Handle validation errors
    if (error.validation != null) {
      return reply.status(400).send({ error: `Request validation failed: ${error.message}` });
    }

    // Handle known HTTP errors
    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: error.message });
    }

    // Handle unexpected errors
    return reply.status(500).send({ error: 'An unexpected error occurred' });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      error: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
