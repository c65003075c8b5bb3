import type { ColumnMapping, ColumnMatchingResult } from './types/index.js';

export const CONFIRMED_MAPPING_REASONING = 'Confirmed existing mapping';
export const NO_MATCH_REASONING = 'No match found';

/**
 * A result is valid when every required field is present and in range and it
 * has not been explicitly flagged invalid.
 */
export function isValidMatchingResult(result: ColumnMatchingResult): boolean {
  return (
    result.sourceHeader.trim() !== '' &&
    result.matchedTargetHeader.trim() !== '' &&
    Number.isFinite(result.confidencePercentage) &&
    result.confidencePercentage >= 0 &&
    result.confidencePercentage <= 100 &&
    result.reasoning.trim() !== '' &&
    result.valid !== false
  );
}

/**
 * Zero-confidence placeholder for a header that could not be matched.
 */
export function createDefaultResult(sourceHeader: string, reasoning: string): ColumnMatchingResult {
  return {
    sourceHeader,
    matchedTargetHeader: '',
    confidencePercentage: 0,
    reasoning,
    usedExistingMapping: false,
  };
}

export function createConfirmedResult(sourceHeader: string, mapping: ColumnMapping): ColumnMatchingResult {
  return {
    sourceHeader,
    matchedTargetHeader: mapping.targetColumn,
    confidencePercentage: 100,
    reasoning: CONFIRMED_MAPPING_REASONING,
    usedExistingMapping: true,
  };
}
