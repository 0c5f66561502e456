/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Integer({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Service identity reported by GET /status
  SERVICE_NAME: Type.String({ minLength: 1, default: 'service' }),
  SERVICE_VERSION: Type.String({ minLength: 1, default: '0.1.0' }),
  SERVICE_ENVIRONMENT: Type.String({ minLength: 1 }),
  SERVICE_HOSTNAME: Type.Optional(Type.String()),
  GIT_COMMIT: Type.Optional(Type.String()),
  BUILD_TIME: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

const optional = (value: string | undefined): string | undefined =>
  value === undefined || value === '' ? undefined : value;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const nodeEnv = env['NODE_ENV'] ?? 'development';
  const hostname = optional(env['SERVICE_HOSTNAME']);
  const gitCommit = optional(env['GIT_COMMIT']);
  const buildTime = optional(env['BUILD_TIME']);
  const rawEnv = {
    NODE_ENV: nodeEnv,
    PORT: env['PORT'] != null && env['PORT'] !== '' ? Number(env['PORT']) : 3000,
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    SERVICE_NAME: env['SERVICE_NAME'] ?? 'service',
    SERVICE_VERSION: env['SERVICE_VERSION'] ?? env['APP_VERSION'] ?? '0.1.0',
    SERVICE_ENVIRONMENT: env['SERVICE_ENVIRONMENT'] ?? nodeEnv,
    ...(hostname !== undefined && { SERVICE_HOSTNAME: hostname }),
    ...(gitCommit !== undefined && { GIT_COMMIT: gitCommit }),
    ...(buildTime !== undefined && { BUILD_TIME: buildTime }),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  if (rawEnv.BUILD_TIME !== undefined && Number.isNaN(Date.parse(rawEnv.BUILD_TIME))) {
    throw new Error(
      `Invalid environment configuration: /BUILD_TIME: Expected a date, got '${rawEnv.BUILD_TIME}'`
    );
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  service: {
    name: env.SERVICE_NAME,
    version: env.SERVICE_VERSION,
    environment: env.SERVICE_ENVIRONMENT,
    /** Falls back to the machine hostname at startup when unset */
    hostname: env.SERVICE_HOSTNAME,
    gitCommit: env.GIT_COMMIT,
    buildTime: env.BUILD_TIME !== undefined ? new Date(env.BUILD_TIME) : undefined,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
