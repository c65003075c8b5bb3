import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import type { AppContext } from '../context.js';
import { errorMessage } from '../errors.js';
import { listAvailableProviders, runColumnMatching } from '../services/column-matching-service.js';
import { MatchRequestBodySchema, formatIssues, toColumnMatchingRequest } from '../services/request-schema.js';

export const TOOL_NAMES = ['match_columns', 'list_providers'] as const;

export function createTools(): Tool[] {
  return [
    {
      name: 'match_columns',
      description:
        'Match source column headers to target column headers with an AI backend. Headers covered by existing mappings are confirmed at 100% confidence; the rest are inferred one at a time. Returns per-header results with confidence and reasoning plus aggregate statistics.',
      inputSchema: {
        type: 'object',
        properties: {
          sourceHeaders: {
            type: 'array',
            items: { type: 'string' },
            description: 'Column headers from the incoming table',
          },
          targetHeaders: {
            type: 'array',
            items: { type: 'string' },
            description: 'Column headers of the destination schema',
          },
          existingMappings: {
            type: 'array',
            items: {
              type: 'object',
              properties: {
                targetColumn: { type: 'string' },
                sourceColumn: { type: 'string' },
                context: { type: 'string' },
              },
              required: ['targetColumn', 'sourceColumn'],
            },
            description: 'Previously confirmed source to target pairs',
          },
          existingMappingsJson: {
            type: 'string',
            description: 'Existing mappings as a JSON array of mapping objects or column names',
          },
          industryContext: {
            type: 'string',
            description: 'Free-text description of the domain, e.g. "retail inventory"',
          },
          providerId: {
            type: 'string',
            description: 'Backend to use (see list_providers). Defaults to the server setting.',
          },
          providerParameters: {
            type: 'object',
            additionalProperties: { type: 'string' },
            description: 'Backend parameters such as apiKey or baseURL',
          },
          modelId: {
            type: 'string',
            description: 'Model to use. Must be one of the provider\'s supported models.',
          },
          temperature: { type: 'number', minimum: 0, maximum: 2 },
          maxTokens: { type: 'integer', minimum: 1, maximum: 100000 },
          topP: { type: 'number', minimum: 0, maximum: 1 },
          topK: { type: 'integer', minimum: 1 },
        },
        required: ['sourceHeaders', 'targetHeaders'],
      },
    },
    {
      name: 'list_providers',
      description: 'List the available AI backends and the models each supports.',
      inputSchema: {
        type: 'object',
        properties: {},
      },
    },
  ];
}

function textResult(value: unknown, isError = false): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

export async function handleToolCall(
  context: AppContext,
  name: string,
  args: Record<string, unknown>
): Promise<CallToolResult> {
  try {
    switch (name) {
      case 'match_columns': {
        const parsed = MatchRequestBodySchema.safeParse(args);
        if (!parsed.success) {
          return textResult({ error: 'Invalid arguments', issues: formatIssues(parsed.error) }, true);
        }
        const outcome = await runColumnMatching(toColumnMatchingRequest(parsed.data, context.config), {
          registry: context.registry,
        });
        return textResult(outcome, !outcome.success);
      }
      case 'list_providers':
        return textResult({ providers: listAvailableProviders(context.registry) });
      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  } catch (error) {
    return textResult({ error: errorMessage(error) }, true);
  }
}
