import type { ModelConfiguration, ProviderConfiguration } from '@colmatch/shared';

/**
 * Sends one prompt to a backend and returns the raw reply text.
 */
export type Transport = (prompt: string, modelConfig: ModelConfiguration) => Promise<string>;

export interface MatchingProvider {
  id(): string;
  displayName(): string;
  /** True once validated and while the stored configuration stays valid. */
  isReady(): boolean;
  supportedModels(): ReadonlySet<string>;
  /** Throws ConfigInvalidError when backend parameters are missing or malformed. */
  validateConfiguration(config: ProviderConfiguration): void;
  sendRequest: Transport;
}

export type ProviderFactory = () => MatchingProvider;

export interface ProviderSummary {
  providerId: string;
  displayName: string;
  supportedModels: string[];
}
