/**
 * County labels in the time series that do not denote a county.
 */

export const UNKNOWN_COUNTY_LABEL = 'Unknown';

export interface SpecialCaseCity {
  /** Label used in the time series' county column */
  label: string;
  /** City name to look up in the gazetteer */
  gazetteerCity: string;
  /** County the city's counts are attributed to */
  county: string;
  state: string;
}

export const SPECIAL_CASE_CITIES: readonly SpecialCaseCity[] = [
  { label: 'New York City', gazetteerCity: 'New York', county: 'New York', state: 'New York' },
  { label: 'Kansas City', gazetteerCity: 'Kansas City', county: 'Jackson', state: 'Missouri' },
  { label: 'Joplin', gazetteerCity: 'Joplin', county: 'Jasper', state: 'Missouri' },
];

const specialCaseByLabel = new Map(SPECIAL_CASE_CITIES.map((city) => [city.label, city]));

export const RESERVED_COUNTY_LABELS: ReadonlySet<string> = new Set([
  UNKNOWN_COUNTY_LABEL,
  ...SPECIAL_CASE_CITIES.map((city) => city.label),
]);

export const findSpecialCase = (countyLabel: string): SpecialCaseCity | undefined =>
  specialCaseByLabel.get(countyLabel);

export const isReservedCountyLabel = (countyLabel: string): boolean =>
  RESERVED_COUNTY_LABELS.has(countyLabel);
