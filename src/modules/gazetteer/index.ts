/**
 * Gazetteer Module Public API
 *
 * City → county/state reference table and its lookups.
 */

export type {
  GazetteerEntry,
  GazetteerRow,
  CityLocation,
  ListCitiesInput,
} from './core/types.js';
export { GazetteerRowSchema, GAZETTEER_COLUMNS } from './core/types.js';

export type {
  GazetteerError,
  CityNotFoundError,
  CountyFipsNotFoundError,
  CityFipsNotFoundError,
} from './core/errors.js';
export {
  createCityNotFoundError,
  createCountyFipsNotFoundError,
  createCityFipsNotFoundError,
} from './core/errors.js';

export type { GazetteerRepository } from './core/ports.js';

export { createGazetteerIndex, type GazetteerIndex } from './core/gazetteer-index.js';

export {
  makeGazetteerRepo,
  toGazetteerEntries,
  type GazetteerRepoOptions,
} from './shell/repo/csv-repo.js';
