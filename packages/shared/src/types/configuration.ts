// Model and provider configuration shared by every backend

export interface ModelConfiguration {
  modelId: string;
  temperature: number;              // 0.0-2.0
  maxTokens: number;                // 1-100000
  topP: number;                     // 0.0-1.0
  topK: number;                     // > 0
}

export const MODEL_CONFIGURATION_DEFAULTS = {
  temperature: 0.3,
  maxTokens: 4000,
  topP: 1.0,
  topK: 50,
} as const;

/**
 * Backend-specific parameters (credentials, region, API keys) are opaque to
 * the matching engine and only interpreted by the provider that owns them.
 */
export type ProviderParameters = Record<string, string>;

export interface ProviderConfiguration {
  providerId: string;
  providerName: string;
  parameters: ProviderParameters;
}
