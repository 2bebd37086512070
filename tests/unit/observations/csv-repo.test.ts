import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { parseCsv } from '@/infra/csv/index.js';
import {
  OBSERVATION_COLUMNS,
  makeObservationRepo,
  toRawObservations,
} from '@/modules/observations/index.js';

const HEADER = 'date,county,state,fips,cases,deaths';

const parseRows = (lines: string[]) =>
  parseCsv([HEADER, ...lines].join('\n'), OBSERVATION_COLUMNS, 'counties.csv')._unsafeUnwrap()
    .rows;

describe('toRawObservations', () => {
  it('converts counts and normalizes FIPS codes', () => {
    const load = toRawObservations(
      parseRows([
        '2020-03-01,Autauga,Alabama,1001,3,0',
        '2020-03-01,New York City,New York,,120,',
      ])
    );

    expect(load.issues).toEqual([]);
    expect(load.records).toEqual([
      { date: '2020-03-01', county: 'Autauga', state: 'Alabama', fips: '01001', cases: 3, deaths: 0 },
      { date: '2020-03-01', county: 'New York City', state: 'New York', fips: null, cases: 120, deaths: 0 },
    ]);
  });

  it('reports malformed rows by source line and keeps the rest', () => {
    const load = toRawObservations(
      parseRows([
        '03/01/2020,King,Washington,53033,1,0',
        '2020-02-30,King,Washington,53033,1,0',
        '2020-03-01,King,Washington,53033,-4,0',
        '2020-03-02,King,Washington,53033,5,1',
      ])
    );

    expect(load.records).toHaveLength(1);
    expect(load.records[0]?.date).toBe('2020-03-02');
    expect(load.issues.map((issue) => issue.line)).toEqual([2, 3, 4]);
    expect(load.issues[1]?.message).toBe("/date: '2020-02-30' is not a calendar date");
  });

  it('rejects counts beyond the safe integer range', () => {
    const load = toRawObservations(parseRows(['2020-03-01,King,Washington,53033,99999999999999999,0']));

    expect(load.records).toEqual([]);
    expect(load.issues).toEqual([{ line: 2, message: 'counts exceed the safe integer range' }]);
  });
});

const writeSource = async (contents: string): Promise<string> => {
  const dir = await mkdtemp(path.join(tmpdir(), 'observations-'));
  const filePath = path.join(dir, 'counties.csv');
  await writeFile(filePath, contents, 'utf8');
  return filePath;
};

describe('makeObservationRepo', () => {
  it('skips a row with a missing field and reports it with the schema issues', async () => {
    const filePath = await writeSource(
      [
        HEADER,
        '2020-03-01,King,Washington,53033,1,0',
        '2020-03-02,King,Washington,53033,2',
        '2020-03-03,King,Washington,53033,x,0',
        '2020-03-04,King,Washington,53033,4,0',
      ].join('\n')
    );

    const load = (await makeObservationRepo({ filePath }).load())._unsafeUnwrap();

    expect(load.records.map((record) => record.date)).toEqual(['2020-03-01', '2020-03-04']);
    expect(load.issues.map((issue) => issue.line)).toEqual([3, 4]);
    expect(load.issues[0]?.message).toBe('expected 6 fields, got 5');
  });

  it('loads the bundled sample time series', async () => {
    const load = (await makeObservationRepo({ filePath: './data/us-counties.csv' }).load())._unsafeUnwrap();

    expect(load.issues).toEqual([]);
    expect(load.records[0]).toEqual({
      date: '2020-03-01',
      county: 'Cook',
      state: 'Illinois',
      fips: '17031',
      cases: 5,
      deaths: 0,
    });
  });

  it('fails with MISSING_COLUMN when the header lacks a column', async () => {
    const load = await makeObservationRepo({ filePath: './data/us-cities.csv' }).load();

    expect(load._unsafeUnwrapErr().type).toBe('MISSING_COLUMN');
  });
});
