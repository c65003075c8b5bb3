// Column mapping types
export type { ColumnMapping } from './column-mapping.js';

// Matching result types
export type { ColumnMatchingResult, MatchingStatistics } from './matching-result.js';

// Configuration types
export type {
  ModelConfiguration,
  ProviderConfiguration,
  ProviderParameters,
} from './configuration.js';
export { MODEL_CONFIGURATION_DEFAULTS } from './configuration.js';
