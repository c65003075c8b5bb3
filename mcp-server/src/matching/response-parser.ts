import { z } from 'zod';
import type { ColumnMatchingResult } from '@colmatch/shared';
import { NoJsonFoundError, UnparseableResponseError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { repairJson } from './json-repair.js';

const log = createLogger('response-parser');

const NO_JSON_PREVIEW_LENGTH = 100;
const UNPARSEABLE_PREVIEW_LENGTH = 200;
/** Closing braces tried during salvage, counted from the end of the reply. */
export const MAX_SALVAGE_CANDIDATES = 64;

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function preview(text: string, length: number): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}

function tryParseObject(text: string): JsonObject | undefined {
  try {
    const value: unknown = JSON.parse(text);
    return isJsonObject(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Pull the first JSON object out of a model reply.
 *
 * 1. Slice from the first `{` to the first `}` after it and parse, repairing once on failure.
 * 2. Otherwise try each `}` from the end backward as the closing brace, up to
 *    MAX_SALVAGE_CANDIDATES of them.
 */
export function extractJsonObject(text: string): JsonObject {
  const start = text.indexOf('{');
  if (start === -1) {
    throw new NoJsonFoundError(
      `No JSON object found in response: ${preview(text, NO_JSON_PREVIEW_LENGTH)}`,
      { operation: 'parseResponse' }
    );
  }

  const firstClose = text.indexOf('}', start);
  if (firstClose !== -1) {
    const candidate = text.slice(start, firstClose + 1);
    const parsed = tryParseObject(candidate);
    if (parsed) return parsed;

    const repaired = repairJson(candidate);
    if (repaired !== candidate) {
      const repairedParsed = tryParseObject(repaired);
      if (repairedParsed) {
        log.debug('Parsed response after repair');
        return repairedParsed;
      }
    }
    log.debug('Complete-object parse failed, attempting salvage');
  }

  let attempts = 0;
  for (
    let close = text.lastIndexOf('}');
    close > start && attempts < MAX_SALVAGE_CANDIDATES;
    close = text.lastIndexOf('}', close - 1), attempts++
  ) {
    const salvaged = tryParseObject(text.slice(start, close + 1));
    if (salvaged) {
      log.debug(`Salvaged JSON object ending at offset ${close}`);
      return salvaged;
    }
  }

  throw new UnparseableResponseError(
    `Unable to parse JSON from response: ${preview(text, UNPARSEABLE_PREVIEW_LENGTH)}`,
    { operation: 'parseResponse' }
  );
}

const TextField = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value))
  .optional()
  .catch(undefined);

const FlagField = z
  .union([
    z.boolean(),
    z.string().transform((value) => value.trim().toLowerCase() === 'true'),
    z.number().transform((value) => value !== 0),
  ])
  .optional()
  .catch(undefined);

const MatchResponseSchema = z.object({
  sourceHeader: TextField,
  matchedTargetHeader: TextField,
  confidencePercentage: z.coerce.number().finite().catch(0),
  reasoning: TextField,
  usedExistingMapping: FlagField,
  // Older prompts asked for this spelling
  usedReferenceMapping: FlagField,
});

/**
 * Map a parsed reply onto a result, falling back to the requested header
 * and neutral defaults for anything missing or mistyped.
 */
export function toMatchingResult(parsed: JsonObject, sourceHeader: string): ColumnMatchingResult {
  const fields = MatchResponseSchema.parse(parsed);
  const echoedHeader = fields.sourceHeader?.trim() ? fields.sourceHeader : undefined;

  return {
    sourceHeader: echoedHeader ?? sourceHeader,
    matchedTargetHeader: fields.matchedTargetHeader ?? '',
    confidencePercentage: fields.confidencePercentage,
    reasoning: fields.reasoning ?? '',
    usedExistingMapping: (fields.usedExistingMapping ?? false) || (fields.usedReferenceMapping ?? false),
  };
}

export function parseMatchingResponse(responseText: string, sourceHeader: string): ColumnMatchingResult {
  return toMatchingResult(extractJsonObject(responseText), sourceHeader);
}
