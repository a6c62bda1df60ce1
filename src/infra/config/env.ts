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
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

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

  // Platform
  METABASE_URL: Type.String({ pattern: '^https?://' }),
  METABASE_API_KEY: Type.Optional(Type.String({ minLength: 1 })),
  METABASE_USERNAME: Type.Optional(Type.String({ minLength: 1 })),
  METABASE_PASSWORD: Type.Optional(Type.String({ minLength: 1 })),
  REQUEST_TIMEOUT_MS: Type.Integer({ default: 30_000, minimum: 1 }),

  // Tool responses
  RESPONSE_SIZE_LIMIT: Type.Integer({ default: 100_000, minimum: 1 }),
});

export type Env = Static<typeof EnvSchema>;

const parseInteger = (value: string | undefined, fallback: number): number =>
  value != null && value !== '' ? Number(value) : fallback;

const optional = (value: string | undefined): string | undefined =>
  value != null && value !== '' ? value : undefined;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    METABASE_URL: env['METABASE_URL'],
    METABASE_API_KEY: optional(env['METABASE_API_KEY']),
    METABASE_USERNAME: optional(env['METABASE_USERNAME']),
    METABASE_PASSWORD: optional(env['METABASE_PASSWORD']),
    REQUEST_TIMEOUT_MS: parseInteger(env['REQUEST_TIMEOUT_MS'], 30_000),
    RESPONSE_SIZE_LIMIT: parseInteger(env['RESPONSE_SIZE_LIMIT'], 100_000),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  const hasCredentials =
    rawEnv.METABASE_USERNAME !== undefined && rawEnv.METABASE_PASSWORD !== undefined;
  if (rawEnv.METABASE_API_KEY === undefined && !hasCredentials) {
    throw new Error(
      'Invalid environment configuration: set METABASE_API_KEY or both METABASE_USERNAME and METABASE_PASSWORD'
    );
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV === 'development',
  },
  platform: {
    baseUrl: env.METABASE_URL,
    apiKey: env.METABASE_API_KEY,
    username: env.METABASE_USERNAME,
    password: env.METABASE_PASSWORD,
    timeoutMs: env.REQUEST_TIMEOUT_MS,
    /** API key auth takes precedence over a session login */
    authMode: env.METABASE_API_KEY !== undefined ? ('api-key' as const) : ('session' as const),
  },
  mcp: {
    /** Responses longer than this (characters) are replaced by an error */
    responseSizeLimit: env.RESPONSE_SIZE_LIMIT,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
