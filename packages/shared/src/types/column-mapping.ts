// Confirmed source → target column pairings supplied by the caller

/**
 * A previously confirmed mapping from a source column to a target column.
 * Used both to bypass the AI backend and as few-shot context in prompts.
 */
export interface ColumnMapping {
  targetColumn: string;
  sourceColumn: string;
  context?: string;
  /** Tri-state override: unset or true means valid, false forces invalid */
  valid?: boolean;
}
