/**
 * Calendar helpers for daily observations and month periods.
 *
 * Dates travel through the system as ISO 8601 calendar dates (YYYY-MM-DD).
 * Arithmetic goes through UTC day numbers so that DST never shifts a window.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * English three-letter month abbreviations used in period labels.
 */
export const MONTH_ABBREVIATIONS = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec',
] as const;

export interface CalendarDate {
  year: number;
  /** 1-based month */
  month: number;
  day: number;
}

/**
 * Parses a YYYY-MM-DD string. Returns null for malformed or impossible dates
 * (e.g. 2021-02-30).
 */
export function parseIsoDate(value: string): CalendarDate | null {
  const match = ISO_DATE_PATTERN.exec(value.trim());
  if (match === null) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  const probe = new Date(Date.UTC(year, month - 1, day));
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return null;
  }

  return { year, month, day };
}

export function isIsoDate(value: string): boolean {
  return parseIsoDate(value) !== null;
}

/**
 * Days since the Unix epoch for a YYYY-MM-DD string.
 * Callers pass validated dates; a malformed string yields NaN.
 */
export function toDayNumber(isoDate: string): number {
  return Math.floor(Date.parse(`${isoDate}T00:00:00Z`) / MS_PER_DAY);
}

/**
 * Month period label, e.g. "Mar, 2020".
 */
export function toPeriodKey(date: CalendarDate): string {
  const abbreviation = MONTH_ABBREVIATIONS[date.month - 1] ?? String(date.month);
  return `${abbreviation}, ${String(date.year)}`;
}

/**
 * Month period label for an ISO date string; null when the date is malformed.
 */
export function periodKeyOf(isoDate: string): string | null {
  const parsed = parseIsoDate(isoDate);
  return parsed === null ? null : toPeriodKey(parsed);
}
