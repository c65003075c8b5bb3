import { describe, it, expect } from 'vitest';
import {
  isValidColumnMapping,
  mappingMatchesHeader,
  targetColumnForHeader,
  findMappingForHeader,
  areMappingsEquivalent,
  formatMappingForPrompt,
} from './column-mapping.js';
import type { ColumnMapping } from './types/index.js';

const qty: ColumnMapping = { targetColumn: 'Quantity', sourceColumn: 'Qty' };

describe('isValidColumnMapping', () => {
  it('accepts a mapping with both columns set', () => {
    expect(isValidColumnMapping(qty)).toBe(true);
  });

  it('rejects blank columns', () => {
    expect(isValidColumnMapping({ targetColumn: '  ', sourceColumn: 'Qty' })).toBe(false);
    expect(isValidColumnMapping({ targetColumn: 'Quantity', sourceColumn: '' })).toBe(false);
  });

  describe('valid override', () => {
    it('treats explicit true like unset', () => {
      expect(isValidColumnMapping({ ...qty, valid: true })).toBe(true);
    });

    it('forces invalid when explicitly false', () => {
      expect(isValidColumnMapping({ ...qty, valid: false })).toBe(false);
    });
  });
});

describe('mappingMatchesHeader', () => {
  it('matches case-insensitively after trimming', () => {
    expect(mappingMatchesHeader(qty, '  QTY ')).toBe(true);
    expect(mappingMatchesHeader(qty, 'qty')).toBe(true);
  });

  it('does not match partial headers', () => {
    expect(mappingMatchesHeader(qty, 'Qty Ordered')).toBe(false);
  });
});

describe('targetColumnForHeader', () => {
  it('returns the target for a matching header', () => {
    expect(targetColumnForHeader(qty, 'qty')).toBe('Quantity');
  });

  it('returns undefined otherwise', () => {
    expect(targetColumnForHeader(qty, 'Desc')).toBeUndefined();
  });
});

describe('findMappingForHeader', () => {
  it('returns the first applicable mapping', () => {
    const mappings: ColumnMapping[] = [
      { targetColumn: 'Description', sourceColumn: 'Desc' },
      qty,
      { targetColumn: 'Amount', sourceColumn: 'QTY' },
    ];
    expect(findMappingForHeader(mappings, 'Qty')).toBe(qty);
  });

  it('returns undefined when nothing applies', () => {
    expect(findMappingForHeader([qty], 'Price')).toBeUndefined();
  });
});

describe('areMappingsEquivalent', () => {
  it('compares both columns case-insensitively', () => {
    expect(areMappingsEquivalent(qty, { targetColumn: 'QUANTITY', sourceColumn: 'qty' })).toBe(true);
  });

  it('ignores context', () => {
    expect(areMappingsEquivalent(qty, { ...qty, context: 'inventory' })).toBe(true);
  });

  it('differs when either column differs', () => {
    expect(areMappingsEquivalent(qty, { targetColumn: 'Amount', sourceColumn: 'Qty' })).toBe(false);
  });
});

describe('formatMappingForPrompt', () => {
  it('renders source and target', () => {
    expect(formatMappingForPrompt(qty)).toBe('"Qty" → "Quantity"');
  });

  it('appends context when present', () => {
    expect(formatMappingForPrompt({ ...qty, context: 'units ordered' })).toBe(
      '"Qty" → "Quantity" (units ordered)'
    );
  });

  it('omits blank context', () => {
    expect(formatMappingForPrompt({ ...qty, context: '   ' })).toBe('"Qty" → "Quantity"');
  });
});
