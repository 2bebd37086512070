import { Type, type Static } from '@sinclair/typebox';

/**
 * Individual health check result
 */
export const HealthCheckResultSchema = Type.Object({
  name: Type.String({ description: 'Name of the component being checked' }),
  status: Type.Union([Type.Literal('healthy'), Type.Literal('unhealthy')]),
  message: Type.Optional(Type.String({ description: 'Additional status message' })),
  latencyMs: Type.Optional(Type.Number({ description: 'Check latency in milliseconds' })),
  critical: Type.Optional(
    Type.Boolean({ description: 'Whether a failure makes the service unhealthy (default true)' })
  ),
});

export type HealthCheckResult = Static<typeof HealthCheckResultSchema>;

/**
 * Liveness check response - indicates if the process is running
 */
export const LivenessResponseSchema = Type.Object({
  status: Type.Literal('ok'),
});

export type LivenessResponse = Static<typeof LivenessResponseSchema>;

export const ReadinessStatusSchema = Type.Union([
  Type.Literal('ok'),
  Type.Literal('degraded'),
  Type.Literal('unhealthy'),
]);

export type ReadinessStatus = Static<typeof ReadinessStatusSchema>;

/**
 * Readiness check response - indicates if the service can handle requests
 */
export const ReadinessResponseSchema = Type.Object({
  status: ReadinessStatusSchema,
  timestamp: Type.String({ format: 'date-time' }),
  version: Type.Optional(Type.String()),
  uptime: Type.Number({ description: 'Process uptime in seconds' }),
  checks: Type.Array(HealthCheckResultSchema),
});

export type ReadinessResponse = Static<typeof ReadinessResponseSchema>;

/**
 * Rows dropped during normalization, by reason
 */
export const DroppedRowsSchema = Type.Object({
  UNKNOWN_COUNTY: Type.Integer({ minimum: 0 }),
  UNRESOLVED_SPECIAL_CASE: Type.Integer({ minimum: 0 }),
  UNRESOLVABLE_LOCATION: Type.Integer({ minimum: 0 }),
  INVALID_DATE: Type.Integer({ minimum: 0 }),
});

/**
 * What the startup load produced
 */
export const DatasetSummarySchema = Type.Object({
  rawRows: Type.Integer({ description: 'Time-series rows that passed CSV validation' }),
  gazetteerRows: Type.Integer(),
  observations: Type.Integer({ description: 'Rows kept after normalization' }),
  locations: Type.Integer({ description: 'Distinct county/state keys' }),
  periods: Type.Integer(),
  latestDate: Type.Union([Type.String(), Type.Null()]),
  latestPeriod: Type.Union([Type.String(), Type.Null()]),
  dropped: DroppedRowsSchema,
  warnings: Type.Integer({ description: 'Data-integrity warnings raised during the load' }),
});

export type DatasetSummary = Static<typeof DatasetSummarySchema>;
