import type { ColumnMatchingResult, MatchingStatistics } from './types/index.js';

/**
 * Compute aggregate statistics for a result sequence.
 * Results without a finite confidence are left out of the average.
 */
export function aggregateResults(results: readonly ColumnMatchingResult[]): MatchingStatistics {
  const matchedHeadersCount = results.length;

  let totalConfidence = 0;
  let scoredCount = 0;
  let existingMappingsUsedCount = 0;

  for (const result of results) {
    if (Number.isFinite(result.confidencePercentage)) {
      totalConfidence += result.confidencePercentage;
      scoredCount++;
    }
    if (result.usedExistingMapping) {
      existingMappingsUsedCount++;
    }
  }

  return {
    matchedHeadersCount,
    averageConfidence: scoredCount > 0 ? totalConfidence / scoredCount : 0,
    existingMappingsUsedCount,
    existingMappingUtilizationRate:
      matchedHeadersCount > 0 ? (existingMappingsUsedCount / matchedHeadersCount) * 100 : 0,
  };
}
