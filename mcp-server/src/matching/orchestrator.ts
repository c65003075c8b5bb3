import {
  NO_MATCH_REASONING,
  createConfirmedResult,
  createDefaultResult,
  findMappingForHeader,
  isValidColumnMapping,
  isValidMatchingResult,
  isValidModelConfiguration,
  type ColumnMapping,
  type ColumnMatchingResult,
  type ModelConfiguration,
} from '@colmatch/shared';
import { ValidationError, errorMessage } from '../errors.js';
import type { MatchingProvider } from '../providers/types.js';
import { createLogger } from '../utils/logger.js';
import { buildMatchingPrompt } from './prompt-builder.js';
import { parseMatchingResponse } from './response-parser.js';

const log = createLogger('orchestrator');

export interface MatchRequest {
  sourceHeaders: readonly string[];
  targetHeaders: readonly string[];
  existingMappings: readonly ColumnMapping[];
  industryContext?: string;
  modelConfig: ModelConfiguration;
}

type HeaderOutcome =
  | { kind: 'parsed'; result: ColumnMatchingResult }
  | { kind: 'failed'; result: ColumnMatchingResult };

function validateRequest(request: MatchRequest, provider: MatchingProvider): void {
  const problems: string[] = [];

  if (request.sourceHeaders.length === 0) {
    problems.push('sourceHeaders must not be empty');
  } else if (request.sourceHeaders.some((header) => header.trim() === '')) {
    problems.push('sourceHeaders must not contain blank values');
  }

  if (request.targetHeaders.length === 0) {
    problems.push('targetHeaders must not be empty');
  } else if (request.targetHeaders.some((header) => header.trim() === '')) {
    problems.push('targetHeaders must not contain blank values');
  }

  if (!isValidModelConfiguration(request.modelConfig)) {
    problems.push('model configuration is out of range');
  } else if (!provider.supportedModels().has(request.modelConfig.modelId)) {
    problems.push(
      `model ${request.modelConfig.modelId} is not supported by ${provider.displayName()} ` +
        `(supported: ${[...provider.supportedModels()].join(', ')})`
    );
  }

  if (problems.length > 0) {
    throw new ValidationError(problems.join('; '), { providerId: provider.id(), operation: 'match' });
  }
}

async function matchUnmappedHeader(
  sourceHeader: string,
  request: MatchRequest,
  mappings: readonly ColumnMapping[],
  provider: MatchingProvider
): Promise<HeaderOutcome> {
  try {
    const prompt = buildMatchingPrompt({
      sourceHeader,
      targetHeaders: request.targetHeaders,
      existingMappings: mappings,
      industryContext: request.industryContext,
    });
    const response = await provider.sendRequest(prompt, request.modelConfig);
    const parsed = parseMatchingResponse(response, sourceHeader);

    if (parsed.sourceHeader !== sourceHeader) {
      log.warn(`Model echoed header "${parsed.sourceHeader}" for "${sourceHeader}", keeping the requested header`);
    }
    return { kind: 'parsed', result: { ...parsed, sourceHeader } };
  } catch (error) {
    log.warn(`Matching failed for "${sourceHeader}": ${errorMessage(error)}`);
    return { kind: 'failed', result: createDefaultResult(sourceHeader, `Processing failed: ${errorMessage(error)}`) };
  }
}

/**
 * Append a no-match default for every header occurrence not covered by a result.
 */
export function ensureCoverage(
  sourceHeaders: readonly string[],
  results: readonly ColumnMatchingResult[]
): ColumnMatchingResult[] {
  const remaining = new Map<string, number>();
  for (const result of results) {
    remaining.set(result.sourceHeader, (remaining.get(result.sourceHeader) ?? 0) + 1);
  }

  const covered = [...results];
  for (const header of sourceHeaders) {
    const count = remaining.get(header) ?? 0;
    if (count > 0) {
      remaining.set(header, count - 1);
    } else {
      log.warn(`No result for "${header}", inserting default`);
      covered.push(createDefaultResult(header, NO_MATCH_REASONING));
    }
  }
  return covered;
}

/**
 * Match every source header to a target header.
 *
 * Headers covered by an existing mapping are confirmed without calling the
 * provider. The rest are sent one at a time; a failure on one header
 * degrades only that header's result.
 */
export async function matchColumns(
  request: MatchRequest,
  provider: MatchingProvider
): Promise<ColumnMatchingResult[]> {
  validateRequest(request, provider);

  const mappings = request.existingMappings.filter((mapping) => {
    const valid = isValidColumnMapping(mapping);
    if (!valid) {
      log.warn(`Skipping invalid mapping "${mapping.sourceColumn}" → "${mapping.targetColumn}"`);
    }
    return valid;
  });

  const confirmed: ColumnMatchingResult[] = [];
  const unmapped: string[] = [];
  for (const header of request.sourceHeaders) {
    const mapping = findMappingForHeader(mappings, header);
    if (mapping) {
      confirmed.push(createConfirmedResult(header, mapping));
    } else {
      unmapped.push(header);
    }
  }

  log.info(
    `Matching ${request.sourceHeaders.length} headers with ${provider.displayName()}: ` +
      `${confirmed.length} confirmed, ${unmapped.length} to infer`
  );

  const inferred: ColumnMatchingResult[] = [];
  for (const [index, header] of unmapped.entries()) {
    log.debug(`Processing header ${index + 1}/${unmapped.length}: "${header}"`);
    const outcome = await matchUnmappedHeader(header, request, mappings, provider);

    if (outcome.kind === 'parsed' && !isValidMatchingResult(outcome.result)) {
      log.warn(`Discarding invalid result for "${header}"`);
      inferred.push(createDefaultResult(header, NO_MATCH_REASONING));
    } else {
      inferred.push(outcome.result);
    }
  }

  return ensureCoverage(request.sourceHeaders, [...confirmed, ...inferred]);
}
