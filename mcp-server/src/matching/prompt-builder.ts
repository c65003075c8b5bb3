import { formatMappingForPrompt, type ColumnMapping } from '@colmatch/shared';

export interface PromptInput {
  sourceHeader: string;
  targetHeaders: readonly string[];
  existingMappings: readonly ColumnMapping[];
  industryContext?: string;
}

/**
 * Build the instruction for matching a single source header.
 *
 * One header per prompt keeps replies short enough that truncation is rare.
 */
export function buildMatchingPrompt(input: PromptInput): string {
  const { sourceHeader, targetHeaders, existingMappings, industryContext } = input;
  const lines: string[] = [];

  lines.push(
    'IMPORTANT: Reply with a single JSON object and nothing else. No markdown, no code fences, no commentary.',
    '',
    'TASK: Choose the target header that best matches ONE source header. Consider, in order:',
    '1. Exact matches from the existing mappings (100% confidence)',
    '2. Patterns learned from the existing mappings (high confidence)',
    '3. Semantic similarity and business meaning (variable confidence)',
    '4. Common abbreviations and naming conventions',
    ''
  );

  if (existingMappings.length > 0) {
    lines.push('EXISTING MAPPINGS (examples to learn from):');
    for (const mapping of existingMappings) {
      lines.push(`- ${formatMappingForPrompt(mapping)}`);
    }
    lines.push(
      '',
      'PATTERN ANALYSIS: Use these mappings to infer naming conventions, abbreviations and relationships between columns.',
      ''
    );
  }

  lines.push('TARGET HEADERS (choose one):');
  targetHeaders.forEach((header, index) => {
    lines.push(`${index + 1}. ${header}`);
  });
  lines.push('', 'SOURCE HEADER TO MATCH:', sourceHeader, '');

  lines.push(
    'MATCHING GUIDELINES:',
    '- Prefer exact matches found in the existing mappings',
    '- Reuse abbreviation and naming patterns shown by the existing mappings',
    '- Apply semantic similarity and business logic',
    '- Expand common abbreviations (Qty = Quantity, Desc = Description, etc.)',
    '- Stay consistent with the patterns above',
    '- Report whether an existing mapping was used or the match was inferred',
    ''
  );

  if (industryContext && industryContext.trim() !== '') {
    lines.push(`INDUSTRY CONTEXT: ${industryContext.trim()}`, '');
  }

  lines.push(
    'OUTPUT FORMAT: Return exactly this JSON object:',
    '{',
    `  "sourceHeader": ${JSON.stringify(sourceHeader)},`,
    '  "matchedTargetHeader": "string",',
    '  "confidencePercentage": number,',
    '  "reasoning": "string",',
    '  "usedExistingMapping": boolean',
    '}',
    '',
    'Start your reply with { and end it with }.'
  );

  return lines.join('\n');
}
