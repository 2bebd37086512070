import { determineOverallStatus, mapCheckResults } from '../logic.js';

import type { HealthChecker } from '../ports.js';
import type { ReadinessResponse } from '../types.js';

export interface GetReadinessDeps {
  checkers: HealthChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

/**
 * Use case to determine system readiness.
 * Executes all health checkers and aggregates the results.
 */
export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const { checkers, version } = deps;
  const { uptime, timestamp } = input;

  const results = await Promise.allSettled(checkers.map((checker) => checker()));
  const checks = mapCheckResults(results);

  return {
    status: determineOverallStatus(checks),
    timestamp,
    uptime,
    checks,
    ...(version !== undefined && { version }),
  };
}
