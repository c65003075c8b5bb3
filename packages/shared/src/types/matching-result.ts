// Per-header output of a matching run

export interface ColumnMatchingResult {
  sourceHeader: string;
  matchedTargetHeader: string;
  confidencePercentage: number;     // 0-100, 100 reserved for confirmed mappings
  reasoning: string;
  usedExistingMapping: boolean;
  /** Tri-state override: unset or true means valid, false forces invalid */
  valid?: boolean;
}

/**
 * Aggregate statistics computed over the final result sequence.
 */
export interface MatchingStatistics {
  matchedHeadersCount: number;
  averageConfidence: number;
  existingMappingsUsedCount: number;
  existingMappingUtilizationRate: number;
}
