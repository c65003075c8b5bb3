export * from './types/index.js';

export {
  isValidColumnMapping,
  mappingMatchesHeader,
  targetColumnForHeader,
  findMappingForHeader,
  areMappingsEquivalent,
  formatMappingForPrompt,
} from './column-mapping.js';

export {
  CONFIRMED_MAPPING_REASONING,
  NO_MATCH_REASONING,
  isValidMatchingResult,
  createDefaultResult,
  createConfirmedResult,
} from './matching-result.js';

export { aggregateResults } from './statistics.js';

export { isValidProviderConfiguration, isValidModelConfiguration } from './configuration.js';
