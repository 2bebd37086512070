import { describe, expect, it } from 'vitest';

import { buildEpiDataset } from '@/modules/epi-dataset/index.js';
import { RESERVED_COUNTY_LABELS } from '@/modules/observations/index.js';

import {
  DEFAULT_GAZETTEER,
  kingRow,
  makeRawObservation,
  makeTestDataset,
} from '../../fixtures/builders.js';

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

describe('buildEpiDataset', () => {
  const dataset = buildEpiDataset({
    observations: {
      records: [
        kingRow('2020-03-01', 1),
        kingRow('2020-04-01', 4),
        makeRawObservation({ county: 'Unknown', fips: null }),
        makeRawObservation({ county: 'Kansas City', state: 'Missouri', fips: null, cases: 2 }),
      ],
      issues: [{ line: 7, message: '/cases: Expected string to match' }],
    },
    gazetteer: {
      records: [...DEFAULT_GAZETTEER],
      issues: [{ line: 2, message: '/city: Expected string length greater or equal to 1' }],
    },
  });

  it('indexes the normalized observations', () => {
    expect(dataset.store.locationCount).toBe(2);
    expect(dataset.periods.entries().map((entry) => entry.label)).toEqual([
      'Mar, 2020',
      'Apr, 2020',
    ]);
    expect(dataset.gazetteer.size).toBe(6);
  });

  it('reports counts, drops and warnings', () => {
    expect(dataset.report).toEqual({
      rawRows: 4,
      gazetteerRows: 6,
      observations: 3,
      dropped: {
        UNKNOWN_COUNTY: 1,
        UNRESOLVED_SPECIAL_CASE: 0,
        UNRESOLVABLE_LOCATION: 0,
        INVALID_DATE: 0,
      },
      warnings: [
        {
          type: 'MALFORMED_ROW',
          source: 'gazetteer',
          line: 2,
          message: 'Skipped gazetteer line 2: /city: Expected string length greater or equal to 1',
        },
        {
          type: 'MALFORMED_ROW',
          source: 'time-series',
          line: 7,
          message: 'Skipped time-series line 7: /cases: Expected string to match',
        },
      ],
    });
  });

  it('is frozen', () => {
    expect(Object.isFrozen(dataset)).toBe(true);
  });
});

describe('a dataset built from mixed rows', () => {
  it('indexes only real counties with FIPS codes', () => {
    const dataset = makeTestDataset({ observations: MIXED_ROWS });

    const peaks = dataset.periods
      .entries()
      .flatMap((entry) => dataset.store.allInPeriod(entry.label));

    expect(peaks.map((peak) => [peak.countyStateKey, peak.fips])).toEqual([
      ['Jackson, Missouri', '29095'],
      ['Jasper, Missouri', '29097'],
      ['King, Washington', '53033'],
      ['New York, New York', '36061'],
    ]);
    for (const peak of peaks) {
      expect(RESERVED_COUNTY_LABELS.has(peak.county)).toBe(false);
    }
    expect(dataset.report.dropped).toEqual({
      UNKNOWN_COUNTY: 1,
      UNRESOLVED_SPECIAL_CASE: 1,
      UNRESOLVABLE_LOCATION: 2,
      INVALID_DATE: 0,
    });
  });
});
