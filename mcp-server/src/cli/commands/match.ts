import { Command } from 'commander';
import { readFile, writeFile } from 'fs/promises';
import type { ColumnMapping } from '@colmatch/shared';
import { createAppContext } from '../../context.js';
import { runColumnMatching } from '../../services/column-matching-service.js';
import { readHeadersFile, readMappingsCsv } from '../../services/mapping-loader.js';
import { toColumnMatchingRequest } from '../../services/request-schema.js';
import { collectParameter, formatResultLine, formatSummary, parseNumberOption } from '../format.js';

interface MatchOptions {
  source: string;
  target: string;
  mappings?: string;
  mappingsJson?: string;
  context?: string;
  provider?: string;
  model?: string;
  param?: Record<string, string>;
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  topK?: number;
  json?: boolean;
  output?: string;
}

async function runMatch(options: MatchOptions): Promise<void> {
  const context = createAppContext();

  const sourceHeaders = await readHeadersFile(options.source);
  const targetHeaders = await readHeadersFile(options.target);
  const existingMappings: ColumnMapping[] = options.mappings ? await readMappingsCsv(options.mappings) : [];
  const existingMappingsJson = options.mappingsJson ? await readFile(options.mappingsJson, 'utf-8') : undefined;

  const outcome = await runColumnMatching(
    toColumnMatchingRequest(
      {
        providerId: options.provider,
        providerParameters: options.param,
        modelId: options.model,
        temperature: options.temperature,
        maxTokens: options.maxTokens,
        topP: options.topP,
        topK: options.topK,
        sourceHeaders,
        targetHeaders,
        existingMappings,
        existingMappingsJson,
        industryContext: options.context,
      },
      context.config
    ),
    { registry: context.registry }
  );

  if (options.output) {
    await writeFile(options.output, `${JSON.stringify(outcome, null, 2)}\n`);
  }

  if (!outcome.success) {
    console.error(`Error: ${outcome.errorMessage}`);
    process.exitCode = 1;
    return;
  }

  if (options.json) {
    console.log(JSON.stringify(outcome, null, 2));
    return;
  }

  for (const result of outcome.results) {
    console.log(formatResultLine(result));
  }
  console.log('');
  for (const line of formatSummary(outcome.statistics, outcome.usedProviderName)) {
    console.log(line);
  }
  if (options.output) {
    console.log(`\nSaved results to ${options.output}`);
  }
}

export const matchCommand = new Command('match')
  .description('Match source headers to target headers')
  .requiredOption('-s, --source <file>', 'Source headers (CSV first line or one per line)')
  .requiredOption('-t, --target <file>', 'Target headers (CSV first line or one per line)')
  .option('-m, --mappings <file>', 'Existing mappings CSV with target,source[,context] columns')
  .option('--mappings-json <file>', 'Existing mappings as a JSON array')
  .option('-c, --context <text>', 'Industry context')
  .option('-p, --provider <id>', 'Provider id (default from COLMATCH_PROVIDER)')
  .option('--model <id>', 'Model id (default from COLMATCH_MODEL)')
  .option('--param <key=value>', 'Provider parameter, repeatable', collectParameter)
  .option('--temperature <n>', 'Sampling temperature (0-2)', parseNumberOption)
  .option('--max-tokens <n>', 'Maximum tokens per reply', parseNumberOption)
  .option('--top-p <n>', 'Nucleus sampling (0-1)', parseNumberOption)
  .option('--top-k <n>', 'Top-k sampling', parseNumberOption)
  .option('--json', 'Print the full run output as JSON')
  .option('-o, --output <file>', 'Write the run output as JSON to a file')
  .action(async (options: MatchOptions) => {
    await runMatch(options);
  });
