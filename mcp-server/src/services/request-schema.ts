import { z } from 'zod';
import type { ServerConfig } from '../config.js';
import { providerParametersFromConfig } from '../config.js';
import { ANTHROPIC_MODELS, ANTHROPIC_PROVIDER_ID } from '../providers/anthropic-provider.js';
import { OPENAI_PROVIDER_ID } from '../providers/openai-provider.js';
import type { ColumnMatchingRequest } from './column-matching-service.js';

const DEFAULT_MODEL_BY_PROVIDER: Record<string, string> = {
  [OPENAI_PROVIDER_ID]: 'gpt-4o-mini',
  [ANTHROPIC_PROVIDER_ID]: ANTHROPIC_MODELS[1],
};

const ColumnMappingSchema = z.object({
  targetColumn: z.string(),
  sourceColumn: z.string(),
  context: z.string().optional(),
  valid: z.boolean().optional(),
});

/**
 * Body of a matching request from HTTP or MCP. Provider and model fall back
 * to the server configuration.
 */
export const MatchRequestBodySchema = z.object({
  providerId: z.string().trim().min(1).optional(),
  providerName: z.string().nullish(),
  providerParameters: z.record(z.string()).nullish(),
  providerParameterKeys: z.array(z.string().nullable()).nullish(),
  providerParameterValues: z.array(z.string().nullable()).nullish(),
  accessKeyId: z.string().nullish(),
  secretAccessKey: z.string().nullish(),
  modelId: z.string().trim().min(1).optional(),
  temperature: z.number().nullish(),
  maxTokens: z.number().nullish(),
  topP: z.number().nullish(),
  topK: z.number().nullish(),
  sourceHeaders: z.array(z.string()).min(1),
  targetHeaders: z.array(z.string()).min(1),
  existingMappingsJson: z.string().nullish(),
  existingMappings: z.array(ColumnMappingSchema).optional(),
  industryContext: z.string().nullish(),
});

export type MatchRequestBody = z.infer<typeof MatchRequestBodySchema>;

export function defaultModelFor(providerId: string, config: ServerConfig): string {
  return config.defaultModel ?? DEFAULT_MODEL_BY_PROVIDER[providerId] ?? '';
}

export function toColumnMatchingRequest(body: MatchRequestBody, config: ServerConfig): ColumnMatchingRequest {
  const providerId = body.providerId ?? config.defaultProvider;

  return {
    ...body,
    providerId,
    providerParameters: {
      ...providerParametersFromConfig(config, providerId),
      ...(body.providerParameters ?? {}),
    },
    modelId: body.modelId ?? defaultModelFor(providerId, config),
    temperature: body.temperature ?? config.defaultTemperature,
    maxTokens: body.maxTokens ?? config.defaultMaxTokens,
  };
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`);
}
