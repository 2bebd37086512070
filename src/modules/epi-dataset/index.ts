/**
 * Epi Dataset Module Public API
 *
 * Builds the immutable lookup tables (gazetteer, time series, periods) once at startup.
 */

export type { EpiDataset, LoadReport } from './core/types.js';
export { buildEpiDataset, type EpiDatasetSources } from './core/build-dataset.js';
export { loadEpiDataset, type LoadEpiDatasetDeps } from './shell/loader.js';
