import { err, ok, type Result } from 'neverthrow';

import {
  createPeriodLabelNotFoundError,
  createPeriodOrdinalNotFoundError,
  type PeriodNotFoundError,
} from './errors.js';

export interface PeriodEntry {
  /** 1-based slider position */
  ordinal: number;
  /** "Mon, YYYY" */
  label: string;
}

/**
 * Bijective ordinal ↔ label mapping over the month periods present in the data.
 */
export interface PeriodCatalog {
  readonly size: number;
  entries(): readonly PeriodEntry[];
  labelFor(ordinal: number): Result<string, PeriodNotFoundError>;
  ordinalFor(label: string): Result<number, PeriodNotFoundError>;
  /** N, or 0 for an empty catalog */
  latestOrdinal(): number;
}

export interface DatedPeriod {
  date: string;
  periodKey: string;
}

/**
 * Assigns ordinals 1..N to distinct periods in first-encounter order of the
 * date-sorted rows. The sort is stable, so a date-sorted source is scanned in
 * its own order.
 */
export const createPeriodCatalog = (rows: readonly DatedPeriod[]): PeriodCatalog => {
  const sorted = [...rows].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

  const entries: PeriodEntry[] = [];
  const ordinalByLabel = new Map<string, number>();

  for (const row of sorted) {
    if (ordinalByLabel.has(row.periodKey)) {
      continue;
    }
    const ordinal = entries.length + 1;
    ordinalByLabel.set(row.periodKey, ordinal);
    entries.push({ ordinal, label: row.periodKey });
  }

  return {
    size: entries.length,

    entries() {
      return entries;
    },

    labelFor(ordinal) {
      const entry = Number.isInteger(ordinal) ? entries[ordinal - 1] : undefined;
      return entry !== undefined
        ? ok(entry.label)
        : err(createPeriodOrdinalNotFoundError(ordinal, entries.length));
    },

    ordinalFor(label) {
      const ordinal = ordinalByLabel.get(label);
      return ordinal !== undefined ? ok(ordinal) : err(createPeriodLabelNotFoundError(label));
    },

    latestOrdinal() {
      return entries.length;
    },
  };
};
