import Anthropic from '@anthropic-ai/sdk';
import { TransportError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { defineProvider, optionalIntegerParameter, optionalParameter, requireParameter } from './define-provider.js';

const log = createLogger('anthropic');

export const ANTHROPIC_PROVIDER_ID = 'anthropic';

export const ANTHROPIC_MODELS = [
  'claude-3-5-sonnet-20241022',
  'claude-3-5-haiku-20241022',
  'claude-3-opus-20240229',
  'claude-3-haiku-20240307',
] as const;

/**
 * Messages API backend. Parameters: apiKey (required), baseURL, timeoutMs.
 */
export const createAnthropicProvider = defineProvider<Anthropic>({
  id: ANTHROPIC_PROVIDER_ID,
  displayName: 'Anthropic',
  models: ANTHROPIC_MODELS,

  connect(config) {
    const apiKey = requireParameter(config, 'apiKey', ANTHROPIC_PROVIDER_ID);
    return new Anthropic({
      apiKey,
      baseURL: optionalParameter(config, 'baseURL'),
      timeout: optionalIntegerParameter(config, 'timeoutMs', ANTHROPIC_PROVIDER_ID),
    });
  },

  async send(client, prompt, modelConfig) {
    const response = await client.messages.create({
      model: modelConfig.modelId,
      max_tokens: modelConfig.maxTokens,
      temperature: modelConfig.temperature,
      top_p: modelConfig.topP,
      top_k: modelConfig.topK,
      messages: [{ role: 'user', content: prompt }],
    });

    if (response.stop_reason === 'max_tokens') {
      log.warn(`Response truncated at ${modelConfig.maxTokens} tokens, attempting salvage`);
    }

    const text = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');

    if (!text) {
      throw new TransportError('Anthropic returned an empty response', {
        providerId: ANTHROPIC_PROVIDER_ID,
        operation: 'sendRequest',
      });
    }
    return text;
  },
});
