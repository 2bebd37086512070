/**
 * Health module exports
 */

export { makeHealthRoutes, type MakeHealthRoutesDeps } from './shell/rest/routes.js';
export { makeHealthResolvers, type MakeHealthResolversDeps } from './shell/graphql/resolvers.js';
export { schema as healthSchema } from './shell/graphql/schema.js';
export { makeDatasetHealthChecker, type DatasetHealthCheckerOptions } from './shell/checkers/index.js';

export { getReadiness, type GetReadinessDeps } from './core/usecases/get-readiness.js';
export {
  getDatasetSummary,
  type GetDatasetSummaryDeps,
} from './core/usecases/get-dataset-summary.js';

export type { HealthChecker } from './core/ports.js';
export type {
  DatasetSummary,
  HealthCheckResult,
  LivenessResponse,
  ReadinessResponse,
  ReadinessStatus,
} from './core/types.js';
