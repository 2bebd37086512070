/**
 * Integration tests for the case-analytics GraphQL API
 */

import { describe, expect, it, beforeAll, afterAll } from 'vitest';

import { createApp } from '@/app/build-app.js';

import { makeTestConfig, makeTestDataset, kingRow, makeRawObservation } from '../fixtures/builders.js';

import type { FastifyInstance } from 'fastify';

interface GraphQLBody {
  data?: Record<string, unknown> | null;
  errors?: { message: string }[];
}

describe('GraphQL API', () => {
  let app: FastifyInstance;

  const query = async (source: string, variables: Record<string, unknown> = {}) => {
    const response = await app.inject({
      method: 'POST',
      url: '/graphql',
      payload: { query: source, variables },
    });
    expect(response.statusCode).toBe(200);
    const body: GraphQLBody = response.json();
    return body;
  };

  beforeAll(async () => {
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: {
        config: makeTestConfig(),
        dataset: makeTestDataset({
          observations: [
            kingRow('2020-03-01', 10),
            kingRow('2020-03-02', 15),
            kingRow('2020-03-03', 15),
            kingRow('2020-04-04', 40, 2),
            makeRawObservation({
              date: '2020-04-04',
              county: 'Kansas City',
              state: 'Missouri',
              fips: null,
              cases: 12,
              deaths: 1,
            }),
            makeRawObservation({ date: '2020-04-04', county: 'Unknown', fips: null, cases: 3 }),
          ],
        }),
      },
    });
  });

  afterAll(async () => {
    await app.close();
  });

  it('serves the period catalog', async () => {
    const body = await query('{ periodCatalog { periods { ordinal label } latestOrdinal latestLabel } }');

    expect(body).toEqual({
      data: {
        periodCatalog: {
          periods: [
            { ordinal: 1, label: 'Mar, 2020' },
            { ordinal: 2, label: 'Apr, 2020' },
          ],
          latestOrdinal: 2,
          latestLabel: 'Apr, 2020',
        },
      },
    });
  });

  it('lists and resolves cities', async () => {
    const body = await query(`
      {
        cities(search: "kansas", limit: 1) { cityKey }
        resolveCity(city: "Kansas City, MO") { countyStateKey fips }
        missing: resolveCity(city: "Atlantis, ZZ") { countyStateKey }
      }
    `);

    expect(body.errors).toBeUndefined();
    expect(body.data).toEqual({
      cities: [{ cityKey: 'Kansas City, MO' }],
      resolveCity: { countyStateKey: 'Jackson, Missouri', fips: '29095' },
      missing: null,
    });
  });

  it('returns a county snapshot, or null for an unknown period', async () => {
    const body = await query(
      `
      query Snapshot($key: String!) {
        current: countySnapshot(countyStateKey: $key, periodOrdinal: 2) {
          mode cumulativeCases cumulativeDeaths asOfDate hasData
        }
        past: countySnapshot(countyStateKey: $key, periodOrdinal: 1) {
          mode cumulativeCases pctChangeCases asOfDate
        }
        outOfRange: countySnapshot(countyStateKey: $key, periodOrdinal: 7) { mode }
      }
    `,
      { key: 'King, Washington' }
    );

    // March: 15 new cases of an eventual 40
    expect(body.errors).toBeUndefined();
    expect(body.data).toEqual({
      current: {
        mode: 'CURRENT',
        cumulativeCases: 40,
        cumulativeDeaths: 2,
        asOfDate: '2020-04-04',
        hasData: true,
      },
      past: {
        mode: 'HISTORICAL',
        cumulativeCases: 15,
        pctChangeCases: 62.5,
        asOfDate: '2020-03-03',
      },
      outOfRange: null,
    });
  });

  it('aggregates state and national totals', async () => {
    const body = await query(`
      {
        stateSnapshot(state: "Missouri", periodOrdinal: 2) { totalCases totalDeaths countyCount }
        nationalSnapshot(periodOrdinal: 2) { totalCases stateCount countyCount }
      }
    `);

    expect(body.data).toEqual({
      stateSnapshot: { totalCases: 12, totalDeaths: 1, countyCount: 1 },
      nationalSnapshot: { totalCases: 52, stateCount: 2, countyCount: 2 },
    });
  });

  it('serves monthly and daily series', async () => {
    const body = await query(`
      {
        monthlySeries(countyStateKey: "King, Washington") { period newCases }
        dailySeries(countyStateKey: "King, Washington") { date newCases }
      }
    `);

    expect(body.data).toEqual({
      monthlySeries: [
        { period: 'Mar, 2020', newCases: 15 },
        { period: 'Apr, 2020', newCases: 25 },
      ],
      dailySeries: [
        { date: '2020-03-01', newCases: 10 },
        { date: '2020-03-02', newCases: 5 },
        { date: '2020-03-03', newCases: 0 },
        { date: '2020-04-04', newCases: 25 },
      ],
    });
  });

  it('serves the county map, or null for an unknown period', async () => {
    const body = await query(`
      {
        countyMap(periodOrdinal: 2) { fips countyStateKey casesPerThousand }
        none: countyMap(periodOrdinal: 0) { fips }
      }
    `);

    expect(body.data).toEqual({
      countyMap: [
        { fips: '29095', countyStateKey: 'Jackson, Missouri', casesPerThousand: 0.012 },
        { fips: '53033', countyStateKey: 'King, Washington', casesPerThousand: 0.04 },
      ],
      none: null,
    });
  });

  it('answers health queries', async () => {
    const body = await query(
      '{ health ready { status checks { name status } } datasetSummary { observations dropped { UNKNOWN_COUNTY } } }'
    );

    expect(body.data).toEqual({
      health: 'ok',
      ready: { status: 'ok', checks: [{ name: 'dataset', status: 'healthy' }] },
      datasetSummary: { observations: 5, dropped: { UNKNOWN_COUNTY: 1 } },
    });
  });

  it('reports validation errors for unknown fields', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/graphql',
      payload: { query: '{ notAField }' },
    });

    expect(response.statusCode).toBe(400);
    const body: GraphQLBody = response.json();
    expect(body.errors?.[0]?.message).toBe('Cannot query field "notAField" on type "Query".');
  });
});
