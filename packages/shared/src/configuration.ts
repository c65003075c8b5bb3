import type { ModelConfiguration, ProviderConfiguration } from './types/index.js';

export function isValidProviderConfiguration(config: ProviderConfiguration): boolean {
  return config.providerId.trim() !== '' && config.providerName.trim() !== '';
}

export function isValidModelConfiguration(config: ModelConfiguration): boolean {
  return (
    config.modelId.trim() !== '' &&
    config.temperature >= 0 &&
    config.temperature <= 2 &&
    Number.isInteger(config.maxTokens) &&
    config.maxTokens >= 1 &&
    config.maxTokens <= 100000 &&
    config.topP >= 0 &&
    config.topP <= 1 &&
    Number.isInteger(config.topK) &&
    config.topK > 0
  );
}
