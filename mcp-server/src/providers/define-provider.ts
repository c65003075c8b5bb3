import {
  isValidProviderConfiguration,
  type ModelConfiguration,
  type ProviderConfiguration,
} from '@colmatch/shared';
import {
  ColumnMatchingError,
  ConfigInvalidError,
  MissingCredentialsError,
  TransportError,
  errorMessage,
} from '../errors.js';
import type { MatchingProvider, ProviderFactory } from './types.js';

export interface ProviderDefinition<Client> {
  id: string;
  displayName: string;
  models: readonly string[];
  /** Build a client from the configuration, throwing ConfigInvalidError when it is unusable. */
  connect(config: ProviderConfiguration): Client;
  send(client: Client, prompt: string, modelConfig: ModelConfiguration): Promise<string>;
}

/**
 * Assemble a provider from its backend-specific pieces.
 */
export function defineProvider<Client>(definition: ProviderDefinition<Client>): ProviderFactory {
  const models: ReadonlySet<string> = new Set(definition.models);

  return (): MatchingProvider => {
    let state: { config: ProviderConfiguration; client: Client } | undefined;

    return {
      id: () => definition.id,
      displayName: () => definition.displayName,
      supportedModels: () => models,

      isReady: () => state !== undefined && isValidProviderConfiguration(state.config),

      validateConfiguration(config) {
        state = undefined;
        if (!isValidProviderConfiguration(config)) {
          throw new ConfigInvalidError('providerId and providerName are required', {
            providerId: definition.id,
            operation: 'validateConfiguration',
          });
        }
        const client = definition.connect(config);
        state = { config, client };
      },

      async sendRequest(prompt, modelConfig) {
        if (!state) {
          throw new TransportError('Provider has not been configured', {
            providerId: definition.id,
            operation: 'sendRequest',
          });
        }
        try {
          return await definition.send(state.client, prompt, modelConfig);
        } catch (error) {
          if (error instanceof ColumnMatchingError) throw error;
          throw new TransportError(`${definition.displayName} request failed: ${errorMessage(error)}`, {
            providerId: definition.id,
            operation: 'sendRequest',
            cause: error,
          });
        }
      },
    };
  };
}

/**
 * Read a required string parameter, throwing MissingCredentialsError when absent.
 */
export function requireParameter(config: ProviderConfiguration, name: string, providerId: string): string {
  const value = config.parameters[name]?.trim();
  if (!value) {
    throw new MissingCredentialsError(name, {
      providerId,
      operation: 'validateConfiguration',
    });
  }
  return value;
}

export function optionalParameter(config: ProviderConfiguration, name: string): string | undefined {
  const value = config.parameters[name]?.trim();
  return value ? value : undefined;
}

export function optionalIntegerParameter(
  config: ProviderConfiguration,
  name: string,
  providerId: string
): number | undefined {
  const value = optionalParameter(config, name);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigInvalidError(`Parameter "${name}" must be a positive integer, got "${value}"`, {
      providerId,
      operation: 'validateConfiguration',
    });
  }
  return parsed;
}
