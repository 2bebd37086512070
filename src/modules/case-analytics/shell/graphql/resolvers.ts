/**
 * Case Analytics GraphQL Resolvers
 *
 * Not-found outcomes (unknown city, out-of-range period) resolve to null; they
 * are logged at debug level and never surface as GraphQL errors.
 */

import { getCountyMap } from '../../core/usecases/get-county-map.js';
import { getCountySnapshot } from '../../core/usecases/get-county-snapshot.js';
import { getDailySeries } from '../../core/usecases/get-daily-series.js';
import { getMonthlySeries } from '../../core/usecases/get-monthly-series.js';
import { getNationalSnapshot } from '../../core/usecases/get-national-snapshot.js';
import { getPeriodCatalog } from '../../core/usecases/get-period-catalog.js';
import { getStateSnapshot } from '../../core/usecases/get-state-snapshot.js';
import { listCities } from '../../core/usecases/list-cities.js';
import { resolveCityQuery } from '../../core/usecases/resolve-city-query.js';

import type { CaseAnalyticsError } from '../../core/errors.js';
import type { DailyPoint } from '../../core/types.js';
import type { CaseAnalyticsDeps } from '../../core/usecases/deps.js';
import type { IResolvers, MercuriusContext } from 'mercurius';
import type { Result } from 'neverthrow';

// ============================================================================
// Types
// ============================================================================

export type MakeCaseAnalyticsResolversDeps = CaseAnalyticsDeps;

interface CountyArgs {
  countyStateKey: string;
}

interface PeriodArgs {
  periodOrdinal: number;
}

interface GqlDailySeriesPoint {
  date: string;
  period: string;
  cases: number;
  deaths: number;
  newCases: number;
  newDeaths: number;
}

// ============================================================================
// Helpers
// ============================================================================

export const DEFAULT_CITY_LIMIT = 20;
export const MAX_CITY_LIMIT = 100;

const clampLimit = (limit: number | null | undefined): number =>
  Math.min(MAX_CITY_LIMIT, Math.max(0, limit ?? DEFAULT_CITY_LIMIT));

/**
 * Unwraps a use-case result, mapping any error to null.
 */
const valueOrNull = <T, E extends CaseAnalyticsError>(
  result: Result<T, E>,
  context: MercuriusContext,
  args: object
): T | null => {
  if (result.isErr()) {
    context.reply.log.debug(
      { err: result.error, args },
      `[${result.error.type}] ${result.error.message}`
    );
    return null;
  }
  return result.value;
};

const toGqlDailyPoint = (point: DailyPoint): GqlDailySeriesPoint => ({
  date: point.date,
  period: point.periodKey,
  cases: point.cases,
  deaths: point.deaths,
  newCases: point.newCases,
  newDeaths: point.newDeaths,
});

// ============================================================================
// Resolver Factory
// ============================================================================

/**
 * Creates case analytics resolvers over a loaded dataset.
 */
export const makeCaseAnalyticsResolvers = (deps: MakeCaseAnalyticsResolversDeps): IResolvers => {
  return {
    Query: {
      periodCatalog: () => getPeriodCatalog(deps),

      cities: (_parent: unknown, args: { search?: string | null; limit?: number | null }) =>
        listCities(deps, {
          search: args.search ?? undefined,
          limit: clampLimit(args.limit),
        }),

      resolveCity: (_parent: unknown, args: { city: string }, context: MercuriusContext) =>
        valueOrNull(resolveCityQuery(deps, args), context, args),

      countySnapshot: (
        _parent: unknown,
        args: CountyArgs & PeriodArgs,
        context: MercuriusContext
      ) => valueOrNull(getCountySnapshot(deps, args), context, args),

      stateSnapshot: (
        _parent: unknown,
        args: { state: string } & PeriodArgs,
        context: MercuriusContext
      ) => valueOrNull(getStateSnapshot(deps, args), context, args),

      nationalSnapshot: (_parent: unknown, args: PeriodArgs, context: MercuriusContext) =>
        valueOrNull(getNationalSnapshot(deps, args), context, args),

      monthlySeries: (_parent: unknown, args: CountyArgs) => getMonthlySeries(deps, args),

      dailySeries: (_parent: unknown, args: CountyArgs) =>
        getDailySeries(deps, args).map(toGqlDailyPoint),

      countyMap: (_parent: unknown, args: PeriodArgs, context: MercuriusContext) =>
        valueOrNull(getCountyMap(deps, args), context, args),
    },
  };
};
