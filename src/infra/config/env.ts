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
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
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

  // Source files
  TIME_SERIES_PATH: Type.String({ minLength: 1 }),
  GAZETTEER_PATH: Type.String({ minLength: 1 }),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),
  CLIENT_BASE_URL: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

const DEFAULT_TIME_SERIES_PATH = './data/us-counties.csv';
const DEFAULT_GAZETTEER_PATH = './data/us-cities.csv';

const nonEmpty = (value: string | undefined): string | undefined =>
  value !== undefined && value !== '' ? value : undefined;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const allowedOrigins = nonEmpty(env['ALLOWED_ORIGINS']);
  const clientBaseUrl = nonEmpty(env['CLIENT_BASE_URL']);

  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: env['PORT'] != null && env['PORT'] !== '' ? Number.parseInt(env['PORT'], 10) : 3000,
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    TIME_SERIES_PATH: nonEmpty(env['TIME_SERIES_PATH']) ?? DEFAULT_TIME_SERIES_PATH,
    GAZETTEER_PATH: nonEmpty(env['GAZETTEER_PATH']) ?? DEFAULT_GAZETTEER_PATH,
    ...(allowedOrigins !== undefined && { ALLOWED_ORIGINS: allowedOrigins }),
    ...(clientBaseUrl !== undefined && { CLIENT_BASE_URL: clientBaseUrl }),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
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
  sources: {
    /** Daily cumulative counts per county */
    timeSeriesPath: env.TIME_SERIES_PATH,
    /** Static city/county/state reference table */
    gazetteerPath: env.GAZETTEER_PATH,
  },
  cors: {
    allowedOrigins: env.ALLOWED_ORIGINS,
    clientBaseUrl: env.CLIENT_BASE_URL,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
