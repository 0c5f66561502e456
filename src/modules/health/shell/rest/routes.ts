/**
 * Health check routes
 * Exposes a HealthReporter for orchestrators, load balancers and scrapers
 *
 * Endpoints:
 * - GET /health       - Overall health (200 healthy, 503 unhealthy)
 * - GET /health/live  - Liveness probe (200 alive, 503 not alive)
 * - GET /health/ready - Readiness probe (200 ready, 503 not ready)
 * - GET /status       - Build and runtime information
 * - GET /metrics      - Prometheus text exposition
 *
 * Any reporter error answers 500 with `{ "error": "<message>" }`.
 */

import { getHttpStatusForError, type HealthReporterError } from '../../core/errors.js';
import {
  ErrorResponseSchema,
  HealthResponseSchema,
  LivenessResponseSchema,
  METRICS_CONTENT_TYPE,
  ReadinessResponseSchema,
  StatusResponseSchema,
} from '../../core/types.js';

import type { HealthReporter, ReportContext } from '../../core/ports.js';
import type { FastifyPluginAsync, FastifyReply, FastifyRequest, HTTPMethods } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeHealthRoutesDeps {
  reporter: HealthReporter;
}

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const HEALTH_ROUTE_PATHS = [
  '/health',
  '/health/live',
  '/health/ready',
  '/status',
  '/metrics',
] as const;

/**
 * Every method Fastify routes by default, except GET and HEAD.
 * HEAD is served by Fastify's automatic head routes.
 */
export const METHOD_NOT_ALLOWED_METHODS: HTTPMethods[] = [
  'POST',
  'PUT',
  'PATCH',
  'DELETE',
  'OPTIONS',
  'TRACE',
  'SEARCH',
  'PROPFIND',
  'PROPPATCH',
  'MKCOL',
  'COPY',
  'MOVE',
  'LOCK',
  'UNLOCK',
  'REPORT',
  'MKCALENDAR',
];

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Builds the report context for one request.
 * The signal aborts when the connection closes before the response is written.
 */
function makeReportContext(reply: FastifyReply): ReportContext {
  const controller = new AbortController();

  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) {
      controller.abort(new Error('client closed the connection'));
    }
  });

  return { signal: controller.signal };
}

/**
 * Sends a reporter error as `{ error }` with its mapped status code.
 */
function sendReporterError(
  request: FastifyRequest,
  reply: FastifyReply,
  error: HealthReporterError
) {
  request.log.error({ err: error.cause, errorType: error.type }, error.message);

  return reply.status(getHttpStatusForError(error)).send({ error: error.message });
}

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Factory function to create health routes with dependencies
 */
export const makeHealthRoutes = (deps: MakeHealthRoutesDeps): FastifyPluginAsync => {
  const { reporter } = deps;

  return async (fastify) => {
    fastify.get(
      '/health',
      {
        schema: {
          response: {
            200: HealthResponseSchema,
            503: HealthResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await reporter.getHealth(makeReportContext(reply));

        if (result.isErr()) {
          return sendReporterError(request, reply, result.error);
        }

        const httpStatus = result.value.status === 'healthy' ? 200 : 503;
        return reply.status(httpStatus).send(result.value);
      }
    );

    /**
     * GET /health/live - Liveness probe
     *
     * Does NOT check dependencies - that is the readiness probe's job.
     * A 503 here tells the orchestrator to restart the process.
     */
    fastify.get(
      '/health/live',
      {
        schema: {
          response: {
            200: LivenessResponseSchema,
            503: LivenessResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await reporter.getLiveness(makeReportContext(reply));

        if (result.isErr()) {
          return sendReporterError(request, reply, result.error);
        }

        return reply.status(result.value.alive ? 200 : 503).send(result.value);
      }
    );

    /**
     * GET /health/ready - Readiness probe
     *
     * Returns 503 if any dependency check reports a non-ready outcome.
     * The orchestrator stops sending traffic but does NOT restart the process.
     */
    fastify.get(
      '/health/ready',
      {
        schema: {
          response: {
            200: ReadinessResponseSchema,
            503: ReadinessResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await reporter.getReadiness(makeReportContext(reply));

        if (result.isErr()) {
          return sendReporterError(request, reply, result.error);
        }

        return reply.status(result.value.ready ? 200 : 503).send(result.value);
      }
    );

    fastify.get(
      '/status',
      {
        schema: {
          response: {
            200: StatusResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await reporter.getStatus(makeReportContext(reply));

        if (result.isErr()) {
          return sendReporterError(request, reply, result.error);
        }

        return reply.status(200).send(result.value);
      }
    );

    // No 200 schema: the metrics body is sent as raw text
    fastify.get(
      '/metrics',
      {
        schema: {
          response: {
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await reporter.getMetrics(makeReportContext(reply));

        if (result.isErr()) {
          return sendReporterError(request, reply, result.error);
        }

        return reply.status(200).type(METRICS_CONTENT_TYPE).send(result.value);
      }
    );

    for (const url of HEALTH_ROUTE_PATHS) {
      fastify.route({
        method: METHOD_NOT_ALLOWED_METHODS,
        url,
        handler: async (request, reply) => {
          return reply
            .status(405)
            .header('allow', 'GET, HEAD')
            .send({ error: `Method ${request.method} not allowed` });
        },
      });
    }
  };
};
