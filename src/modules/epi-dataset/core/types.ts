import type { GazetteerIndex } from '../../gazetteer/index.js';
import type { DataIntegrityWarning, DropReason } from '../../observations/index.js';
import type { PeriodCatalog } from '../../periods/index.js';
import type { TimeSeriesStore } from '../../time-series/index.js';

/**
 * What the load kept, dropped and warned about.
 */
export interface LoadReport {
  /** Time-series rows that passed CSV validation */
  rawRows: number;
  /** Gazetteer rows that passed CSV validation */
  gazetteerRows: number;
  /** Rows that survived normalization */
  observations: number;
  dropped: Record<DropReason, number>;
  warnings: DataIntegrityWarning[];
}

/**
 * The immutable lookup tables every query runs against. Built once at startup
 * and passed explicitly to the query layer.
 */
export interface EpiDataset {
  readonly gazetteer: GazetteerIndex;
  readonly store: TimeSeriesStore;
  readonly periods: PeriodCatalog;
  readonly report: LoadReport;
}
