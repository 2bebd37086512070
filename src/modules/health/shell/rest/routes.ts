/**
 * Health check routes
 *
 * - GET /health/live    - the process is up
 * - GET /health/ready   - every checker passed; 503 when a critical one failed
 * - GET /health/dataset - counts from the startup load
 */

import {
  DatasetSummarySchema,
  LivenessResponseSchema,
  ReadinessResponseSchema,
  type DatasetSummary,
  type LivenessResponse,
  type ReadinessResponse,
} from '../../core/types.js';
import {
  getDatasetSummary,
  type GetDatasetSummaryDeps,
} from '../../core/usecases/get-dataset-summary.js';
import { getReadiness, type GetReadinessDeps } from '../../core/usecases/get-readiness.js';

import type { FastifyPluginAsync } from 'fastify';

export interface MakeHealthRoutesDeps extends Partial<GetReadinessDeps> {
  /** Serves /health/dataset when present */
  dataset?: GetDatasetSummaryDeps;
}

/**
 * Factory function to create health routes with dependencies
 */
export const makeHealthRoutes = (deps: MakeHealthRoutesDeps = {}): FastifyPluginAsync => {
  const { version, checkers = [], dataset } = deps;
  const startTime = Date.now();

  return async (fastify) => {
    fastify.get<{ Reply: LivenessResponse }>(
      '/health/live',
      { schema: { response: { 200: LivenessResponseSchema } } },
      async (_request, reply) => reply.status(200).send({ status: 'ok' })
    );

    fastify.get<{ Reply: ReadinessResponse }>(
      '/health/ready',
      {
        schema: {
          response: {
            200: ReadinessResponseSchema,
            503: ReadinessResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        const response = await getReadiness(
          { version, checkers },
          {
            uptime: Math.floor((Date.now() - startTime) / 1000),
            timestamp: new Date().toISOString(),
          }
        );

        return reply.status(response.status === 'unhealthy' ? 503 : 200).send(response);
      }
    );

    if (dataset !== undefined) {
      fastify.get<{ Reply: DatasetSummary }>(
        '/health/dataset',
        { schema: { response: { 200: DatasetSummarySchema } } },
        async (_request, reply) => reply.status(200).send(getDatasetSummary(dataset))
      );
    }
  };
};
