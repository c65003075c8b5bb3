import { createHash } from 'crypto';
import { z } from 'zod';
import {
  MODEL_CONFIGURATION_DEFAULTS,
  type ModelConfiguration,
  type ProviderConfiguration,
  type ProviderParameters,
} from '@colmatch/shared';
import { ValidationError } from '../errors.js';
import { createLogger, maskSecrets } from '../utils/logger.js';

const log = createLogger('provider-config');

export interface ProviderConfigurationInput {
  providerId: string;
  providerName?: string | null;
  parameters?: ProviderParameters | null;
  /** Parallel to parameterValues. */
  parameterKeys?: ReadonlyArray<string | null> | null;
  parameterValues?: ReadonlyArray<string | null> | null;
  accessKeyId?: string | null;
  secretAccessKey?: string | null;
}

function nonBlank(value: string | null | undefined): string | undefined {
  return value && value.trim() !== '' ? value : undefined;
}

/**
 * Assemble a provider configuration from host inputs.
 *
 * Later sources win: explicit parameters, then key/value arrays, then the
 * credential shortcuts.
 */
export function buildProviderConfiguration(input: ProviderConfigurationInput): ProviderConfiguration {
  const providerId = input.providerId.trim();
  if (!providerId) {
    throw new ValidationError('providerId is required', { operation: 'buildProviderConfiguration' });
  }

  const accessKeyId = nonBlank(input.accessKeyId);
  const secretAccessKey = nonBlank(input.secretAccessKey);
  if (accessKeyId && !secretAccessKey) {
    throw new ValidationError('secretAccessKey is required when accessKeyId is provided', {
      providerId,
      operation: 'buildProviderConfiguration',
    });
  }
  if (secretAccessKey && !accessKeyId) {
    throw new ValidationError('accessKeyId is required when secretAccessKey is provided', {
      providerId,
      operation: 'buildProviderConfiguration',
    });
  }

  const parameters: ProviderParameters = { ...(input.parameters ?? {}) };

  const keys = input.parameterKeys;
  const values = input.parameterValues;
  if (keys && values) {
    if (keys.length !== values.length) {
      throw new ValidationError(
        `Provider parameter keys and values must have the same length (keys=${keys.length}, values=${values.length})`,
        { providerId, operation: 'buildProviderConfiguration' }
      );
    }
    keys.forEach((key, index) => {
      const value = values[index];
      if (key === null || value === null || value === undefined) {
        log.warn(`Skipping parameter at index ${index}: key or value is null`);
        return;
      }
      parameters[key] = value;
    });
  } else if (keys || values) {
    log.warn('Provider parameter keys and values must be supplied together, ignoring them');
  }

  if (accessKeyId && secretAccessKey) {
    parameters.accessKeyId = accessKeyId;
    parameters.secretAccessKey = secretAccessKey;
  }

  const config: ProviderConfiguration = {
    providerId,
    providerName: nonBlank(input.providerName)?.trim() ?? providerId,
    parameters,
  };
  log.debug(`Provider configuration for ${providerId}:`, maskSecrets(parameters));
  return config;
}

/**
 * SHA-256 over a key-sorted rendering of the configuration.
 */
export function configurationFingerprint(config: ProviderConfiguration): string {
  const sortedParameters = Object.keys(config.parameters)
    .sort()
    .map((key) => [key, config.parameters[key]]);
  const canonical = JSON.stringify([config.providerId, config.providerName, sortedParameters]);
  return createHash('sha256').update(canonical).digest('hex');
}

export const ModelConfigurationInputSchema = z.object({
  modelId: z.string().trim().min(1, 'modelId is required'),
  temperature: z.number().min(0).max(2).nullish(),
  maxTokens: z.number().int().min(1).max(100000).nullish(),
  topP: z.number().min(0).max(1).nullish(),
  topK: z.number().int().positive().nullish(),
});

export type ModelConfigurationInput = z.input<typeof ModelConfigurationInputSchema>;

/**
 * Apply defaults to absent fields and validate every range, reporting all
 * failing fields at once.
 */
export function createModelConfiguration(input: ModelConfigurationInput): ModelConfiguration {
  const parsed = ModelConfigurationInputSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid model configuration: ${details}`, {
      operation: 'createModelConfiguration',
    });
  }

  const values = parsed.data;
  return {
    modelId: values.modelId,
    temperature: values.temperature ?? MODEL_CONFIGURATION_DEFAULTS.temperature,
    maxTokens: values.maxTokens ?? MODEL_CONFIGURATION_DEFAULTS.maxTokens,
    topP: values.topP ?? MODEL_CONFIGURATION_DEFAULTS.topP,
    topK: values.topK ?? MODEL_CONFIGURATION_DEFAULTS.topK,
  };
}
