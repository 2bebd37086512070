/**
 * Health checker factories
 */

export { makeDatasetHealthChecker, type DatasetHealthCheckerOptions } from './dataset-checker.js';
