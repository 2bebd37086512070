import { describe, expect, it } from 'vitest';

import { createGazetteerIndex } from '@/modules/gazetteer/index.js';
import {
  RESERVED_COUNTY_LABELS,
  normalizeObservation,
  normalizeObservations,
} from '@/modules/observations/index.js';

import { DEFAULT_GAZETTEER, makeRawObservation } from '../../fixtures/builders.js';

const gazetteer = createGazetteerIndex(DEFAULT_GAZETTEER);

const MIXED_ROWS = [
  makeRawObservation({ cases: 3 }),
  makeRawObservation({ county: 'Unknown', fips: null }),
  makeRawObservation({ county: 'Unknown', fips: '53999' }),
  makeRawObservation({ county: 'New York City', state: 'New York', fips: null }),
  makeRawObservation({ county: 'New York City', state: 'New York', fips: '36998' }),
  makeRawObservation({ county: 'Kansas City', state: 'Missouri', fips: null }),
  makeRawObservation({ county: 'Joplin', state: 'Missouri', fips: null }),
  makeRawObservation({ county: 'Joplin', state: 'Kansas', fips: null }),
  makeRawObservation({ county: 'Cook', state: 'Illinois', fips: null }),
];

describe('normalizeObservation', () => {
  it('passes an ordinary county row through with derived fields', () => {
    const outcome = normalizeObservation(
      makeRawObservation({ date: '2020-03-15', cases: 1500, deaths: 12 }),
      gazetteer
    );

    expect(outcome).toEqual({
      kind: 'emit',
      observation: {
        date: '2020-03-15',
        county: 'King',
        state: 'Washington',
        fips: '53033',
        cases: 1500,
        deaths: 12,
        countyStateKey: 'King, Washington',
        periodKey: 'Mar, 2020',
        casesPerThousand: 1.5,
      },
    });
  });

  it('drops Unknown without a FIPS code', () => {
    const outcome = normalizeObservation(
      makeRawObservation({ county: 'Unknown', fips: null }),
      gazetteer
    );

    expect(outcome).toEqual({ kind: 'drop', reason: 'UNKNOWN_COUNTY' });
  });

  it('drops Unknown even when the row carries a FIPS code', () => {
    const outcome = normalizeObservation(makeRawObservation({ county: 'Unknown' }), gazetteer);

    expect(outcome).toEqual({ kind: 'drop', reason: 'UNRESOLVABLE_LOCATION' });
  });

  it('drops an ordinary county without a FIPS code', () => {
    const outcome = normalizeObservation(makeRawObservation({ fips: null }), gazetteer);

    expect(outcome).toEqual({ kind: 'drop', reason: 'UNRESOLVABLE_LOCATION' });
  });

  it('drops a row whose date does not exist', () => {
    const outcome = normalizeObservation(makeRawObservation({ date: '2021-02-30' }), gazetteer);

    expect(outcome).toEqual({ kind: 'drop', reason: 'INVALID_DATE' });
  });

  it.each([
    ['New York City', 'New York', 'New York', '36061'],
    ['Kansas City', 'Missouri', 'Jackson', '29095'],
    ['Joplin', 'Missouri', 'Jasper', '29097'],
  ])('attributes %s to its county', (label, state, county, fips) => {
    const outcome = normalizeObservation(
      makeRawObservation({ county: label, state, fips: null, cases: 100 }),
      gazetteer
    );

    expect(outcome.kind).toBe('emit');
    if (outcome.kind === 'emit') {
      expect(outcome.observation.county).toBe(county);
      expect(outcome.observation.state).toBe(state);
      expect(outcome.observation.fips).toBe(fips);
      expect(outcome.observation.countyStateKey).toBe(`${county}, ${state}`);
    }
  });

  it('remaps a special-case city even when the row has its own FIPS code', () => {
    const outcome = normalizeObservation(
      makeRawObservation({ county: 'Kansas City', state: 'Missouri', fips: '99999' }),
      gazetteer
    );

    expect(outcome.kind === 'emit' && outcome.observation.fips).toBe('29095');
  });

  it('drops a special-case city the gazetteer cannot resolve, with a warning', () => {
    const outcome = normalizeObservation(
      makeRawObservation({ date: '2020-04-01', county: 'New York City', state: 'New York', fips: null }),
      createGazetteerIndex([])
    );

    expect(outcome).toEqual({
      kind: 'drop',
      reason: 'UNRESOLVED_SPECIAL_CASE',
      warning: {
        type: 'UNRESOLVED_SPECIAL_CASE',
        city: 'New York City',
        state: 'New York',
        date: '2020-04-01',
        message: "Could not resolve a FIPS code for 'New York City' (New York) on 2020-04-01; row dropped",
      },
    });
  });
});

describe('normalizeObservations', () => {
  it('keeps source order and counts drops by reason', () => {
    const report = normalizeObservations(
      [
        makeRawObservation({ date: '2020-03-02', cases: 2 }),
        makeRawObservation({ county: 'Unknown', fips: null }),
        makeRawObservation({ date: '2020-03-01', cases: 1 }),
        makeRawObservation({ county: 'Unknown', fips: null }),
        makeRawObservation({ county: 'Joplin', state: 'Missouri', fips: null }),
        makeRawObservation({ date: '2020-13-01' }),
      ],
      gazetteer
    );

    expect(report.observations.map((o) => `${o.countyStateKey}@${o.date}`)).toEqual([
      'King, Washington@2020-03-02',
      'King, Washington@2020-03-01',
      'Jasper, Missouri@2020-03-01',
    ]);
    expect(report.dropped).toEqual({
      UNKNOWN_COUNTY: 2,
      UNRESOLVED_SPECIAL_CASE: 0,
      UNRESOLVABLE_LOCATION: 0,
      INVALID_DATE: 1,
    });
    expect(report.warnings).toEqual([]);
  });

  it('collects one warning per unresolved special-case row', () => {
    const report = normalizeObservations(
      [
        makeRawObservation({ county: 'Joplin', state: 'Missouri', fips: null }),
        makeRawObservation({ date: '2020-03-02', county: 'Joplin', state: 'Missouri', fips: null }),
      ],
      createGazetteerIndex([])
    );

    expect(report.observations).toEqual([]);
    expect(report.dropped.UNRESOLVED_SPECIAL_CASE).toBe(2);
    expect(report.warnings.map((w) => w.type)).toEqual([
      'UNRESOLVED_SPECIAL_CASE',
      'UNRESOLVED_SPECIAL_CASE',
    ]);
  });
});

describe('normalized observations', () => {
  it('always carry a five-digit FIPS code and a real county name', () => {
    const { observations } = normalizeObservations(MIXED_ROWS, gazetteer);

    expect(observations.map((observation) => observation.countyStateKey)).toEqual([
      'King, Washington',
      'New York, New York',
      'New York, New York',
      'Jackson, Missouri',
      'Jasper, Missouri',
    ]);
    for (const observation of observations) {
      expect(observation.fips).toMatch(/^\d{5}$/);
      expect(RESERVED_COUNTY_LABELS.has(observation.county)).toBe(false);
    }
  });
});
