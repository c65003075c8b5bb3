import { describe, it, expect } from 'vitest';
import { aggregateResults, type ColumnMatchingResult } from '@colmatch/shared';
import { ensureCoverage, matchColumns, type MatchRequest } from './orchestrator.js';
import { ValidationError } from '../errors.js';
import { fakeProviderConfiguration, reply, scriptedProvider } from '../testing/scripted-provider.js';

const modelConfig = { modelId: 'fake-model', temperature: 0.3, maxTokens: 4000, topP: 1, topK: 50 };

function request(overrides: Partial<MatchRequest> = {}): MatchRequest {
  return {
    sourceHeaders: ['Qty', 'Desc'],
    targetHeaders: ['Quantity', 'Description'],
    existingMappings: [],
    modelConfig,
    ...overrides,
  };
}

function providerFor(replies: Array<string | Error>) {
  const scripted = scriptedProvider(replies);
  const provider = scripted.factory();
  provider.validateConfiguration(fakeProviderConfiguration());
  return { provider, prompts: scripted.prompts };
}

describe('matchColumns', () => {
  it('matches each header through the provider', async () => {
    const { provider, prompts } = providerFor([
      reply('Qty', 'Quantity', 90, 'abbreviation'),
      reply('Desc', 'Description', 92, 'synonym'),
    ]);

    const results = await matchColumns(request(), provider);
    const stats = aggregateResults(results);

    expect(results).toHaveLength(2);
    expect(results.map((r) => r.matchedTargetHeader)).toEqual(['Quantity', 'Description']);
    expect(stats.averageConfidence).toBe(91);
    expect(stats.existingMappingsUsedCount).toBe(0);
    expect(prompts).toHaveLength(2);
  });

  it('confirms mapped headers without calling the provider', async () => {
    const { provider, prompts } = providerFor([reply('Desc', 'Description', 92, 'synonym')]);

    const results = await matchColumns(
      request({
        sourceHeaders: ['QTY', 'Desc'],
        existingMappings: [{ targetColumn: 'Quantity', sourceColumn: 'qty' }],
      }),
      provider
    );

    expect(results[0]).toEqual({
      sourceHeader: 'QTY',
      matchedTargetHeader: 'Quantity',
      confidencePercentage: 100,
      reasoning: 'Confirmed existing mapping',
      usedExistingMapping: true,
    });
    expect(prompts).toHaveLength(1);
    expect(prompts[0]).toContain('SOURCE HEADER TO MATCH:\nDesc\n');
    expect(prompts[0]).toContain('- "qty" → "Quantity"');
  });

  it('lists confirmed results before inferred ones', async () => {
    const { provider } = providerFor([reply('Qty', 'Quantity', 80, 'abbreviation')]);

    const results = await matchColumns(
      request({ existingMappings: [{ targetColumn: 'Description', sourceColumn: 'Desc' }] }),
      provider
    );

    expect(results.map((r) => r.sourceHeader)).toEqual(['Desc', 'Qty']);
  });

  it('degrades a header whose transport call fails and keeps going', async () => {
    const { provider } = providerFor([new Error('boom'), reply('Desc', 'Description', 92, 'synonym')]);

    const results = await matchColumns(request(), provider);

    expect(results).toEqual([
      {
        sourceHeader: 'Qty',
        matchedTargetHeader: '',
        confidencePercentage: 0,
        reasoning: 'Processing failed: Fake request failed: boom',
        usedExistingMapping: false,
      },
      {
        sourceHeader: 'Desc',
        matchedTargetHeader: 'Description',
        confidencePercentage: 92,
        reasoning: 'synonym',
        usedExistingMapping: false,
      },
    ]);
  });

  it('degrades a header whose reply has no JSON', async () => {
    const { provider } = providerFor(['no json here', reply('Desc', 'Description', 92, 'synonym')]);

    const [qty] = await matchColumns(request(), provider);

    expect(qty?.reasoning).toBe('Processing failed: No JSON object found in response: no json here');
    expect(qty?.confidencePercentage).toBe(0);
  });

  it('never throws on a truncated reply', async () => {
    const truncated =
      '{"sourceHeader":"Qty","matchedTargetHeader":"Quantity","confidencePercentage":87,"reasoning":"abbrev match","usedExistingMapping":false';
    const { provider } = providerFor([truncated, reply('Desc', 'Description', 92, 'synonym')]);

    const results = await matchColumns(request(), provider);

    expect(results).toHaveLength(2);
    expect(results[0]?.confidencePercentage).toBe(0);
    expect(results[0]?.reasoning).toMatch(/^Processing failed: Unable to parse JSON from response/);
  });

  it('replaces an invalid parsed result with a no-match default', async () => {
    const { provider } = providerFor([
      reply('Qty', 'Quantity', 150, 'overconfident'),
      reply('Desc', 'Description', 92, 'synonym'),
    ]);

    const [qty] = await matchColumns(request(), provider);

    expect(qty).toEqual({
      sourceHeader: 'Qty',
      matchedTargetHeader: '',
      confidencePercentage: 0,
      reasoning: 'No match found',
      usedExistingMapping: false,
    });
  });

  it('keeps the requested header when the model echoes another', async () => {
    const { provider } = providerFor([
      reply('Quantity Ordered', 'Quantity', 75, 'guess'),
      reply('Desc', 'Description', 92, 'synonym'),
    ]);

    const results = await matchColumns(request(), provider);

    expect(results.map((r) => r.sourceHeader)).toEqual(['Qty', 'Desc']);
  });

  it('sends headers covered only by invalid mappings to the provider', async () => {
    const { provider, prompts } = providerFor([
      reply('Qty', 'Quantity', 90, 'abbreviation'),
      reply('Desc', 'Description', 92, 'synonym'),
    ]);

    const results = await matchColumns(
      request({ existingMappings: [{ targetColumn: ' ', sourceColumn: 'Qty' }] }),
      provider
    );

    expect(prompts).toHaveLength(2);
    expect(prompts[0]).not.toContain('EXISTING MAPPINGS');
    expect(results[0]?.usedExistingMapping).toBe(false);
  });

  it('returns one result per occurrence of a repeated header', async () => {
    const { provider } = providerFor([]);

    const results = await matchColumns(
      request({
        sourceHeaders: ['Qty', 'qty'],
        existingMappings: [{ targetColumn: 'Quantity', sourceColumn: 'Qty' }],
      }),
      provider
    );

    expect(results.map((r) => r.sourceHeader)).toEqual(['Qty', 'qty']);
    expect(aggregateResults(results).existingMappingUtilizationRate).toBe(100);
  });

  describe('validation', () => {
    it('rejects an unsupported model before any call', async () => {
      const { provider, prompts } = providerFor([]);

      await expect(
        matchColumns(request({ modelConfig: { ...modelConfig, modelId: 'gpt-4o' } }), provider)
      ).rejects.toThrow(ValidationError);
      expect(prompts).toHaveLength(0);
    });

    it('rejects empty source headers', async () => {
      const { provider } = providerFor([]);

      await expect(matchColumns(request({ sourceHeaders: [] }), provider)).rejects.toThrow(
        'sourceHeaders must not be empty'
      );
    });

    it('rejects empty target headers', async () => {
      const { provider } = providerFor([]);

      await expect(matchColumns(request({ targetHeaders: [] }), provider)).rejects.toThrow(
        'targetHeaders must not be empty'
      );
    });

    it('rejects an out-of-range model configuration', async () => {
      const { provider } = providerFor([]);

      await expect(
        matchColumns(request({ modelConfig: { ...modelConfig, temperature: 5 } }), provider)
      ).rejects.toThrow('model configuration is out of range');
    });
  });
});

describe('ensureCoverage', () => {
  const result = (sourceHeader: string): ColumnMatchingResult => ({
    sourceHeader,
    matchedTargetHeader: 'T',
    confidencePercentage: 50,
    reasoning: 'r',
    usedExistingMapping: false,
  });

  it('appends defaults for missing occurrences', () => {
    const covered = ensureCoverage(['A', 'B', 'A'], [result('A')]);

    expect(covered.map((r) => [r.sourceHeader, r.reasoning])).toEqual([
      ['A', 'r'],
      ['B', 'No match found'],
      ['A', 'No match found'],
    ]);
  });

  it('leaves a complete sequence untouched', () => {
    const results = [result('A'), result('B')];
    expect(ensureCoverage(['A', 'B'], results)).toEqual(results);
  });
});
