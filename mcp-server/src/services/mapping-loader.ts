import { readFile } from 'fs/promises';
import { parse as parseCsv } from 'csv-parse/sync';
import { z } from 'zod';
import { isValidColumnMapping, type ColumnMapping } from '@colmatch/shared';
import { ValidationError, errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('mapping-loader');

const MappingEntrySchema = z.object({
  targetColumn: z.string(),
  sourceColumn: z.string(),
  mappingContext: z.string().nullish(),
  context: z.string().nullish(),
  valid: z.boolean().nullish(),
});

function toColumnMapping(entry: z.infer<typeof MappingEntrySchema>): ColumnMapping {
  const mapping: ColumnMapping = {
    targetColumn: entry.targetColumn,
    sourceColumn: entry.sourceColumn,
  };
  const context = entry.mappingContext ?? entry.context;
  if (context) mapping.context = context;
  if (typeof entry.valid === 'boolean') mapping.valid = entry.valid;
  return mapping;
}

function parseMappingObjects(entries: unknown[]): ColumnMapping[] {
  const mappings: ColumnMapping[] = [];
  entries.forEach((entry, index) => {
    const parsed = MappingEntrySchema.safeParse(entry);
    if (!parsed.success) {
      log.warn(`Skipping malformed mapping at index ${index}`);
      return;
    }
    const mapping = toColumnMapping(parsed.data);
    if (!isValidColumnMapping(mapping)) {
      log.warn(`Skipping invalid mapping at index ${index}: "${mapping.sourceColumn}" → "${mapping.targetColumn}"`);
      return;
    }
    mappings.push(mapping);
  });
  return mappings;
}

/**
 * Read existing mappings from a JSON document.
 *
 * Accepts an array of mapping objects, or an array of column names that each
 * map to themselves. Anything else is logged and treated as no mappings.
 */
export function parseExistingMappingsJson(json: string | null | undefined): ColumnMapping[] {
  if (!json || json.trim() === '') {
    return [];
  }

  let document: unknown;
  try {
    document = JSON.parse(json);
  } catch (error) {
    log.error(`Failed to parse existing mappings JSON: ${errorMessage(error)}`);
    return [];
  }

  if (!Array.isArray(document)) {
    log.error('Failed to parse existing mappings JSON: expected an array');
    return [];
  }

  const entries: unknown[] = document.filter((entry: unknown) => entry !== null);

  if (entries.every((entry) => typeof entry === 'string')) {
    return entries
      .filter((name): name is string => typeof name === 'string' && name.trim() !== '')
      .map((name) => ({ targetColumn: name.trim(), sourceColumn: name.trim() }));
  }

  if (entries.every((entry) => typeof entry === 'object' && !Array.isArray(entry))) {
    const mappings = parseMappingObjects(entries);
    log.info(`Parsed ${mappings.length} valid mappings from existing mappings JSON`);
    return mappings;
  }

  log.error('Failed to parse existing mappings JSON: expected mapping objects or column names');
  return [];
}

/**
 * Split header text: a first line containing a comma is read as one CSV
 * record, otherwise each non-blank line is a header.
 */
export function parseHeadersText(text: string): string[] {
  const content = text.replace(/^\uFEFF/, '');
  const firstLine = content.split(/\r?\n/).find((line) => line.trim() !== '') ?? '';

  if (firstLine.includes(',')) {
    const rows: unknown = parseCsv(firstLine, { trim: true, relax_quotes: true });
    const record = z.array(z.array(z.string())).parse(rows)[0] ?? [];
    return record.filter((header) => header !== '');
  }

  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '');
}

const MappingRowSchema = z.record(z.string());

/**
 * Read mappings from CSV text with a `target,source[,context]` header row.
 */
export function parseMappingsCsv(text: string): ColumnMapping[] {
  const rows: unknown = parseCsv(text, {
    bom: true,
    columns: (header: string[]) => header.map((name) => name.trim().toLowerCase()),
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true,
  });

  const records = z.array(MappingRowSchema).parse(rows);
  const first = records[0];
  if (first && !('target' in first && 'source' in first)) {
    throw new ValidationError('Mappings CSV needs a header row with target and source columns', {
      operation: 'parseMappingsCsv',
    });
  }

  return parseMappingObjects(
    records.map((record) => ({
      targetColumn: record.target ?? '',
      sourceColumn: record.source ?? '',
      context: record.context || undefined,
    }))
  );
}

export async function readHeadersFile(path: string): Promise<string[]> {
  return parseHeadersText(await readFile(path, 'utf-8'));
}

export async function readMappingsCsv(path: string): Promise<ColumnMapping[]> {
  return parseMappingsCsv(await readFile(path, 'utf-8'));
}
