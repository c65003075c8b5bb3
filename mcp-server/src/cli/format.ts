import type { ColumnMatchingResult, MatchingStatistics } from '@colmatch/shared';
import type { ProviderSummary } from '../providers/types.js';

export function formatPercent(value: number): string {
  return Number.isInteger(value) ? `${value}%` : `${value.toFixed(1)}%`;
}

export function formatResultLine(result: ColumnMatchingResult): string {
  const target = result.matchedTargetHeader || '(no match)';
  const origin = result.usedExistingMapping ? ' [existing mapping]' : '';
  return `${result.sourceHeader} → ${target} (${formatPercent(result.confidencePercentage)})${origin}: ${result.reasoning}`;
}

export function formatSummary(statistics: MatchingStatistics, providerName: string): string[] {
  return [
    `Provider: ${providerName}`,
    `Headers matched: ${statistics.matchedHeadersCount}`,
    `Average confidence: ${formatPercent(statistics.averageConfidence)}`,
    `Existing mappings used: ${statistics.existingMappingsUsedCount} (${formatPercent(statistics.existingMappingUtilizationRate)})`,
  ];
}

export function formatProviders(providers: readonly ProviderSummary[]): string[] {
  return providers.flatMap((provider) => [
    `${provider.providerId} (${provider.displayName})`,
    ...provider.supportedModels.map((model) => `  - ${model}`),
  ]);
}

/**
 * Parse repeated `key=value` options into a parameter map.
 */
export function collectParameter(value: string, previous: Record<string, string> = {}): Record<string, string> {
  const separator = value.indexOf('=');
  if (separator <= 0) {
    throw new Error(`Expected key=value, got "${value}"`);
  }
  return { ...previous, [value.slice(0, separator).trim()]: value.slice(separator + 1) };
}

export function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new Error(`Expected a number, got "${value}"`);
  }
  return parsed;
}
