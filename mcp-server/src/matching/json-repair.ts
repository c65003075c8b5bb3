/**
 * Textual repairs applied once to a model reply that failed to parse.
 *
 * The rule set is kept small on purpose; each rule is exported for testing.
 */

export type RepairRule = (text: string) => string;

export const stripTrailingCommas: RepairRule = (text) =>
  text.replace(/,\s*]/g, ']').replace(/,\s*}/g, '}');

export const collapseWhitespace: RepairRule = (text) => text.replace(/\s+/g, ' ');

/**
 * Typographic double quotes are a common drift in model output. Only quotes
 * in delimiter positions are rewritten: after `{ [ , :` or before
 * `} ] , :`, optionally across whitespace. Quotes inside string values stay.
 */
export const normalizeQuotes: RepairRule = (text) =>
  text.replace(/([{[,:]\s*)[“”„‟]/g, '$1"').replace(/[“”„‟](?=\s*[}\],:])/g, '"');

export const REPAIR_RULES: readonly RepairRule[] = [stripTrailingCommas, collapseWhitespace, normalizeQuotes];

export function repairJson(text: string): string {
  return REPAIR_RULES.reduce((current, rule) => rule(current), text);
}
