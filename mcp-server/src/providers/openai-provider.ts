import OpenAI from 'openai';
import { TransportError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { defineProvider, optionalIntegerParameter, optionalParameter, requireParameter } from './define-provider.js';

const log = createLogger('openai');

export const OPENAI_PROVIDER_ID = 'openai';

export const OPENAI_MODELS = ['gpt-4o', 'gpt-4o-mini', 'gpt-4-turbo', 'gpt-4', 'gpt-3.5-turbo'] as const;

/**
 * Chat completions backend. Parameters: apiKey (required), organization,
 * baseURL, timeoutMs.
 */
export const createOpenAIProvider = defineProvider<OpenAI>({
  id: OPENAI_PROVIDER_ID,
  displayName: 'OpenAI',
  models: OPENAI_MODELS,

  connect(config) {
    const apiKey = requireParameter(config, 'apiKey', OPENAI_PROVIDER_ID);
    return new OpenAI({
      apiKey,
      organization: optionalParameter(config, 'organization'),
      baseURL: optionalParameter(config, 'baseURL'),
      timeout: optionalIntegerParameter(config, 'timeoutMs', OPENAI_PROVIDER_ID),
    });
  },

  async send(client, prompt, modelConfig) {
    const response = await client.chat.completions.create({
      model: modelConfig.modelId,
      max_tokens: modelConfig.maxTokens,
      temperature: modelConfig.temperature,
      top_p: modelConfig.topP,
      messages: [{ role: 'user', content: prompt }],
    });

    const choice = response.choices[0];
    if (!choice) {
      throw new TransportError('OpenAI returned no choices', {
        providerId: OPENAI_PROVIDER_ID,
        operation: 'sendRequest',
      });
    }

    if (choice.finish_reason === 'length') {
      log.warn(`Response truncated at ${modelConfig.maxTokens} tokens, attempting salvage`);
    }

    const content = choice.message.content;
    if (!content) {
      throw new TransportError('OpenAI returned an empty response', {
        providerId: OPENAI_PROVIDER_ID,
        operation: 'sendRequest',
      });
    }
    return content;
  },
});
