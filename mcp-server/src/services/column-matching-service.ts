/**
 * Host-facing matching workflow.
 *
 * Turns loosely typed host input into provider and model configuration,
 * resolves the provider, runs the orchestrator and aggregates statistics,
 * recording one artifact per step.
 */

import {
  aggregateResults,
  type ColumnMapping,
  type ColumnMatchingResult,
  type MatchingStatistics,
  type ProviderParameters,
} from '@colmatch/shared';
import { ValidationError, errorMessage, isFatalError, toUserMessage } from '../errors.js';
import { matchColumns } from '../matching/orchestrator.js';
import type { ProviderRegistry } from '../providers/registry.js';
import type { ProviderSummary } from '../providers/types.js';
import { createLogger } from '../utils/logger.js';
import { parseExistingMappingsJson } from './mapping-loader.js';
import { buildProviderConfiguration, createModelConfiguration } from './provider-configuration.js';
import { StageRecorder, type StageArtifact } from './stage-artifacts.js';

const log = createLogger('matching-service');

export interface ColumnMatchingRequest {
  providerId: string;
  providerName?: string | null;
  providerParameters?: ProviderParameters | null;
  providerParameterKeys?: ReadonlyArray<string | null> | null;
  providerParameterValues?: ReadonlyArray<string | null> | null;
  accessKeyId?: string | null;
  secretAccessKey?: string | null;

  modelId: string;
  temperature?: number | null;
  maxTokens?: number | null;
  topP?: number | null;
  topK?: number | null;

  sourceHeaders: readonly string[];
  targetHeaders: readonly string[];
  /** JSON array of mapping objects or column names. */
  existingMappingsJson?: string | null;
  existingMappings?: readonly ColumnMapping[];
  industryContext?: string | null;
}

export type ColumnMatchingOutcome =
  | {
      success: true;
      results: ColumnMatchingResult[];
      statistics: MatchingStatistics;
      usedProviderName: string;
      artifacts: StageArtifact[];
    }
  | {
      success: false;
      errorMessage: string;
      artifacts: StageArtifact[];
    };

export interface RunColumnMatchingOptions {
  registry: ProviderRegistry;
  onStageComplete?: (artifact: StageArtifact) => void;
}

export async function runColumnMatching(
  request: ColumnMatchingRequest,
  options: RunColumnMatchingOptions
): Promise<ColumnMatchingOutcome> {
  const stages = new StageRecorder(options.onStageComplete);

  try {
    await stages.run(
      'validate-input',
      () => {
        if (request.targetHeaders.length === 0) {
          throw new ValidationError('Target headers are required', { operation: 'validate-input' });
        }
        if (request.sourceHeaders.length === 0) {
          throw new ValidationError('Source headers are required', { operation: 'validate-input' });
        }
      },
      () => ({
        summary: `${request.sourceHeaders.length} source headers, ${request.targetHeaders.length} target headers`,
        details: {
          sourceHeaderCount: request.sourceHeaders.length,
          targetHeaderCount: request.targetHeaders.length,
        },
      })
    );

    const { providerConfig, modelConfig } = await stages.run(
      'configure',
      () => ({
        providerConfig: buildProviderConfiguration({
          providerId: request.providerId,
          providerName: request.providerName,
          parameters: request.providerParameters,
          parameterKeys: request.providerParameterKeys,
          parameterValues: request.providerParameterValues,
          accessKeyId: request.accessKeyId,
          secretAccessKey: request.secretAccessKey,
        }),
        modelConfig: createModelConfiguration({
          modelId: request.modelId,
          temperature: request.temperature,
          maxTokens: request.maxTokens,
          topP: request.topP,
          topK: request.topK,
        }),
      }),
      ({ providerConfig, modelConfig }) => ({
        summary: `${providerConfig.providerName} with model ${modelConfig.modelId}`,
        details: {
          providerId: providerConfig.providerId,
          parameterCount: Object.keys(providerConfig.parameters).length,
          modelConfig,
        },
      })
    );

    const provider = await stages.run(
      'resolve-provider',
      () => options.registry.resolve(providerConfig.providerId, providerConfig),
      (resolved) => ({ summary: `Resolved ${resolved.displayName()}` })
    );

    const existingMappings = await stages.run(
      'load-mappings',
      () => [...(request.existingMappings ?? []), ...parseExistingMappingsJson(request.existingMappingsJson)],
      (mappings) => ({ summary: `${mappings.length} existing mappings`, details: { mappingCount: mappings.length } })
    );

    const results = await stages.run(
      'match',
      () =>
        matchColumns(
          {
            sourceHeaders: request.sourceHeaders,
            targetHeaders: request.targetHeaders,
            existingMappings,
            industryContext: request.industryContext ?? undefined,
            modelConfig,
          },
          provider
        ),
      (matched) => ({ summary: `${matched.length} results`, details: { resultCount: matched.length } })
    );

    const statistics = await stages.run(
      'aggregate',
      () => aggregateResults(results),
      (stats) => ({
        summary: `Average confidence ${stats.averageConfidence.toFixed(1)}%, ${stats.existingMappingsUsedCount} from existing mappings`,
        details: { ...stats },
      })
    );

    return {
      success: true,
      results,
      statistics,
      usedProviderName: provider.displayName(),
      artifacts: stages.list(),
    };
  } catch (error) {
    if (isFatalError(error)) {
      log.warn(`Column matching aborted: ${errorMessage(error)}`);
    } else {
      log.error('Unexpected failure during column matching:', error);
    }
    return {
      success: false,
      errorMessage: toUserMessage(error),
      artifacts: stages.list(),
    };
  }
}

export function listAvailableProviders(registry: ProviderRegistry): ProviderSummary[] {
  return registry.describe();
}
