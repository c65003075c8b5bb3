import { beforeEach, describe, it, expect, vi } from 'vitest';
import { createOpenAIProvider } from './openai-provider.js';
import { ConfigInvalidError, TransportError } from '../errors.js';

const mocks = vi.hoisted(() => ({
  create: vi.fn(),
  constructed: [] as unknown[],
}));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create: mocks.create } };

    constructor(options: unknown) {
      mocks.constructed.push(options);
    }
  },
}));

const modelConfig = { modelId: 'gpt-4o-mini', temperature: 0.3, maxTokens: 4000, topP: 1, topK: 50 };

function configuredProvider(parameters: Record<string, string> = { apiKey: 'test-secret' }) {
  const provider = createOpenAIProvider();
  provider.validateConfiguration({ providerId: 'openai', providerName: 'OpenAI', parameters });
  return provider;
}

describe('OpenAI provider', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mocks.constructed.length = 0;
  });

  it('describes itself', () => {
    const provider = createOpenAIProvider();
    expect(provider.id()).toBe('openai');
    expect(provider.displayName()).toBe('OpenAI');
    expect(provider.supportedModels().has('gpt-4o')).toBe(true);
    expect(provider.isReady()).toBe(false);
  });

  describe('validateConfiguration', () => {
    it('requires an API key', () => {
      const provider = createOpenAIProvider();
      expect(() =>
        provider.validateConfiguration({ providerId: 'openai', providerName: 'OpenAI', parameters: {} })
      ).toThrow(ConfigInvalidError);
      expect(provider.isReady()).toBe(false);
    });

    it('passes client options through', () => {
      const provider = configuredProvider({
        apiKey: 'test-secret',
        baseURL: 'http://localhost:9999/v1',
        timeoutMs: '5000',
      });

      expect(provider.isReady()).toBe(true);
      expect(mocks.constructed).toEqual([
        { apiKey: 'test-secret', organization: undefined, baseURL: 'http://localhost:9999/v1', timeout: 5000 },
      ]);
    });

    it('rejects a malformed timeout', () => {
      expect(() => configuredProvider({ apiKey: 'test-secret', timeoutMs: 'soon' })).toThrow(
        'Parameter "timeoutMs" must be a positive integer, got "soon"'
      );
    });
  });

  describe('sendRequest', () => {
    it('sends a single user message with the model settings', async () => {
      mocks.create.mockResolvedValueOnce({
        choices: [{ finish_reason: 'stop', message: { content: '{"a":1}' } }],
      });

      const text = await configuredProvider().sendRequest('match this', modelConfig);

      expect(text).toBe('{"a":1}');
      expect(mocks.create).toHaveBeenCalledWith({
        model: 'gpt-4o-mini',
        max_tokens: 4000,
        temperature: 0.3,
        top_p: 1,
        messages: [{ role: 'user', content: 'match this' }],
      });
    });

    it('returns truncated text for salvage', async () => {
      mocks.create.mockResolvedValueOnce({
        choices: [{ finish_reason: 'length', message: { content: '{"a":1' } }],
      });

      await expect(configuredProvider().sendRequest('p', modelConfig)).resolves.toBe('{"a":1');
    });

    it('fails on an empty choice list', async () => {
      mocks.create.mockResolvedValueOnce({ choices: [] });

      await expect(configuredProvider().sendRequest('p', modelConfig)).rejects.toThrow(
        new TransportError('OpenAI returned no choices')
      );
    });

    it('fails on empty content', async () => {
      mocks.create.mockResolvedValueOnce({
        choices: [{ finish_reason: 'stop', message: { content: null } }],
      });

      await expect(configuredProvider().sendRequest('p', modelConfig)).rejects.toThrow(
        'OpenAI returned an empty response'
      );
    });

    it('wraps SDK failures', async () => {
      const cause = new Error('429 rate limited');
      mocks.create.mockRejectedValueOnce(cause);

      const error: unknown = await configuredProvider()
        .sendRequest('p', modelConfig)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ message: 'OpenAI request failed: 429 rate limited', providerId: 'openai', cause });
    });

    it('refuses to send before configuration', async () => {
      await expect(createOpenAIProvider().sendRequest('p', modelConfig)).rejects.toThrow(
        'Provider has not been configured'
      );
      expect(mocks.create).not.toHaveBeenCalled();
    });
  });
});
