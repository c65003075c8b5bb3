import type { ColumnMapping } from './types/index.js';

function isBlank(value: string | undefined | null): boolean {
  return value === undefined || value === null || value.trim() === '';
}

function normalizeHeader(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * A mapping is usable when both columns are non-blank and it has not been
 * explicitly flagged invalid.
 */
export function isValidColumnMapping(mapping: ColumnMapping): boolean {
  return !isBlank(mapping.targetColumn) && !isBlank(mapping.sourceColumn) && mapping.valid !== false;
}

/**
 * Check whether a mapping applies to a source header (trimmed, case-insensitive).
 */
export function mappingMatchesHeader(mapping: ColumnMapping, sourceHeader: string): boolean {
  return normalizeHeader(mapping.sourceColumn) === normalizeHeader(sourceHeader);
}

export function targetColumnForHeader(mapping: ColumnMapping, sourceHeader: string): string | undefined {
  return mappingMatchesHeader(mapping, sourceHeader) ? mapping.targetColumn : undefined;
}

/**
 * Find the first mapping that applies to a source header.
 */
export function findMappingForHeader(
  mappings: readonly ColumnMapping[],
  sourceHeader: string
): ColumnMapping | undefined {
  return mappings.find((mapping) => mappingMatchesHeader(mapping, sourceHeader));
}

export function areMappingsEquivalent(a: ColumnMapping, b: ColumnMapping): boolean {
  return (
    a.targetColumn.toLowerCase() === b.targetColumn.toLowerCase() &&
    a.sourceColumn.toLowerCase() === b.sourceColumn.toLowerCase()
  );
}

/**
 * Render a mapping as a few-shot example line: "source" → "target" (context)
 */
export function formatMappingForPrompt(mapping: ColumnMapping): string {
  const line = `"${mapping.sourceColumn}" → "${mapping.targetColumn}"`;
  return isBlank(mapping.context) ? line : `${line} (${mapping.context})`;
}
