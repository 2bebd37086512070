/**
 * Composite location keys shared by the gazetteer and the time series.
 */

/**
 * County/state key used to join the two sources, e.g. "Jackson, Missouri".
 */
export const toCountyStateKey = (county: string, state: string): string => `${county}, ${state}`;

/**
 * City picker label, e.g. "Kansas City, MO".
 */
export const toCityKey = (city: string, stateAbbr: string): string => `${city}, ${stateAbbr}`;

/**
 * FIPS codes are 5 digits; some sources drop the leading zero ("1001" for 01001).
 * Returns null for an empty cell.
 */
export const normalizeFips = (value: string | undefined | null): string | null => {
  if (value == null) {
    return null;
  }
  const trimmed = value.trim();
  if (trimmed === '') {
    return null;
  }
  // Gazetteer exports sometimes write codes as floats ("1001.0")
  const integerPart = trimmed.replace(/\.0+$/, '');
  return integerPart.padStart(5, '0');
};
