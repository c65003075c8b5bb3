import { ProviderRegistry } from './registry.js';
import { ANTHROPIC_PROVIDER_ID, createAnthropicProvider } from './anthropic-provider.js';
import { OPENAI_PROVIDER_ID, createOpenAIProvider } from './openai-provider.js';

export { ProviderRegistry } from './registry.js';
export { defineProvider, requireParameter, optionalParameter, optionalIntegerParameter } from './define-provider.js';
export type { ProviderDefinition } from './define-provider.js';
export type { MatchingProvider, ProviderFactory, ProviderSummary, Transport } from './types.js';
export { OPENAI_PROVIDER_ID, OPENAI_MODELS, createOpenAIProvider } from './openai-provider.js';
export { ANTHROPIC_PROVIDER_ID, ANTHROPIC_MODELS, createAnthropicProvider } from './anthropic-provider.js';

/**
 * Registry with every built-in backend registered.
 */
export function createDefaultRegistry(): ProviderRegistry {
  return new ProviderRegistry()
    .register(OPENAI_PROVIDER_ID, createOpenAIProvider)
    .register(ANTHROPIC_PROVIDER_ID, createAnthropicProvider);
}
