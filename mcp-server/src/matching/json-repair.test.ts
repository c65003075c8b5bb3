import { describe, it, expect } from 'vitest';
import { collapseWhitespace, normalizeQuotes, repairJson, stripTrailingCommas } from './json-repair.js';

describe('stripTrailingCommas', () => {
  it('removes a comma before a closing brace', () => {
    expect(stripTrailingCommas('{"a":1,}')).toBe('{"a":1}');
  });

  it('removes a comma and whitespace before a closing bracket', () => {
    expect(stripTrailingCommas('[1, 2,\n ]')).toBe('[1, 2]');
  });

  it('leaves separating commas alone', () => {
    expect(stripTrailingCommas('{"a":1,"b":2}')).toBe('{"a":1,"b":2}');
  });
});

describe('collapseWhitespace', () => {
  it('turns runs of whitespace into single spaces', () => {
    expect(collapseWhitespace('{\n  "a":\t1\r\n}')).toBe('{ "a": 1 }');
  });
});

describe('normalizeQuotes', () => {
  it('replaces typographic double quotes', () => {
    expect(normalizeQuotes('{“a”:1}')).toBe('{"a":1}');
  });

  it('keeps typographic quotes inside string values', () => {
    expect(normalizeQuotes('{"reasoning":"short for “quantity” here"}')).toBe(
      '{"reasoning":"short for “quantity” here"}'
    );
  });

  it('rewrites quoted keys and values in delimiter positions', () => {
    expect(normalizeQuotes('{ “a” : “b”, “c”:[“d”] }')).toBe('{ "a" : "b", "c":["d"] }');
  });

  it('leaves straight quotes untouched', () => {
    expect(normalizeQuotes('{"a":"b"}')).toBe('{"a":"b"}');
  });
});

describe('repairJson', () => {
  it('applies every rule', () => {
    expect(repairJson('{\n “a”: 1,\n}')).toBe('{ "a": 1}');
  });

  it('repairs a trailing comma without breaking quoted words in a value', () => {
    const repaired = repairJson('{"matchedTargetHeader":"Quantity","reasoning":"short for “quantity”",}');

    expect(JSON.parse(repaired)).toEqual({
      matchedTargetHeader: 'Quantity',
      reasoning: 'short for “quantity”',
    });
  });

  it('makes a trailing-comma object parseable', () => {
    expect(JSON.parse(repairJson('{"a":1,}'))).toEqual({ a: 1 });
  });
});
