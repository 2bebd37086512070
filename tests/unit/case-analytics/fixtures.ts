/**
 * Datasets shared by the case-analytics tests.
 */

import { makeRawObservation, kingRow, makeTestDataset } from '../../fixtures/builders.js';

/**
 * King County reports through March and April; April is the latest period.
 *
 * New cases: Mar 10, 30 | Apr 60, 20, 30, 80 (cumulative 230)
 * New deaths: Mar 0, 1 | Apr 1, 0, 1, 2 (cumulative 5)
 */
export const KING_ROWS = [
  kingRow('2020-03-20', 10, 0),
  kingRow('2020-03-31', 40, 1),
  kingRow('2020-04-18', 100, 2),
  kingRow('2020-04-20', 120, 2),
  kingRow('2020-04-24', 150, 3),
  kingRow('2020-04-30', 230, 5),
];

export const makeKingDataset = () => makeTestDataset({ observations: KING_ROWS });

/**
 * King County plus Missouri counties that stop reporting in March, and a
 * single May report from Cook County so that March and April are historical.
 * Periods: Mar (1), Apr (2), May (3).
 */
export const makeMultiCountyDataset = () =>
  makeTestDataset({
    observations: [
      ...KING_ROWS,
      makeRawObservation({
        date: '2020-03-10',
        county: 'Jackson',
        state: 'Missouri',
        fips: '29095',
        cases: 5,
      }),
      makeRawObservation({
        date: '2020-03-15',
        county: 'Joplin',
        state: 'Missouri',
        fips: null,
        cases: 7,
        deaths: 1,
      }),
      makeRawObservation({
        date: '2020-05-05',
        county: 'Cook',
        state: 'Illinois',
        fips: '17031',
        cases: 1,
      }),
    ],
  });
