/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { makeGraphQLPlugin } from '../infra/graphql/index.js';
import { BaseSchema } from '../infra/graphql/schema.js';
import { registerCors } from '../infra/plugins/index.js';
import {
  makeCaseAnalyticsResolvers,
  CaseAnalyticsSchema,
} from '../modules/case-analytics/index.js';
import {
  makeHealthRoutes,
  makeHealthResolvers,
  makeDatasetHealthChecker,
  healthSchema,
  type HealthChecker,
} from '../modules/health/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { EpiDataset } from '../modules/epi-dataset/index.js';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  /** Loaded once at startup, before the app is built */
  dataset: EpiDataset;
  config: AppConfig;
  /** Checkers run in addition to the dataset checker */
  healthCheckers?: HealthChecker[];
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps?: Partial<AppDeps>; // Allow partial for tests/defaults, but runtime needs them
  version?: string | undefined;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps = {}, version } = options;

  if (deps.dataset === undefined || deps.config === undefined) {
    throw new Error('Missing required dependencies: dataset, config');
  }

  const dataset = deps.dataset;
  const config = deps.config;

  // Create Fastify instance
  const app = fastifyLib({
    ...fastifyOptions,
  });

  // Register CORS plugin
  await registerCors(app, config);

  // Health routes
  const checkers = [makeDatasetHealthChecker(dataset), ...(deps.healthCheckers ?? [])];
  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers,
      dataset,
    })
  );

  // Setup GraphQL
  const healthResolvers = makeHealthResolvers({
    ...(version !== undefined && { version }),
    checkers,
    dataset,
  });
  const caseAnalyticsResolvers = makeCaseAnalyticsResolvers({ dataset });

  await app.register(
    makeGraphQLPlugin({
      schema: [BaseSchema, healthSchema, CaseAnalyticsSchema],
      resolvers: [healthResolvers, caseAnalyticsResolvers],
      isProduction: config.server.isProduction,
    })
  );

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    // Handle validation errors
    if (error.validation != null) {
      return reply.status(400).send({
        error: 'ValidationError',
        message: 'Request validation failed',
        details: error.validation,
      });
    }

    // Handle known HTTP errors
    if (error.statusCode != null) {
      return reply.status(error.statusCode).send({
        error: error.name,
        message: error.message,
      });
    }

    // Handle unexpected errors
    return reply.status(500).send({
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
