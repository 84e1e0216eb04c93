import { describe, it, expect } from 'vitest';
import {
  aggregateIssuePatterns,
  createIssue,
  formatAllowedValues,
  formatIssue,
  hasIssues,
  isEnumMember,
  issuePattern,
  normalizePath,
} from '../../src/core/issues.js';
import type { ValidationResult } from '../../src/types/validation.js';

describe('normalizePath', () => {
  it('replaces array indices with a wildcard', () => {
    expect(normalizePath('Items[3].Code')).toBe('Items[*].Code');
    expect(normalizePath('A[1].B[22]')).toBe('A[*].B[*]');
  });

  it('groups different indices of the same field', () => {
    expect(normalizePath('Items[0].X')).toBe(normalizePath('Items[17].X'));
  });

  it('is idempotent', () => {
    const once = normalizePath('Items[3].Code[12]');
    expect(normalizePath(once)).toBe(once);
  });

  it('leaves paths without indices alone', () => {
    expect(normalizePath('TradeItem.GTIN')).toBe('TradeItem.GTIN');
  });
});

describe('formatAllowedValues', () => {
  it('lists short enumerations in full', () => {
    expect(formatAllowedValues(['ACTIVE', 'DISCONTINUED'])).toBe("['ACTIVE', 'DISCONTINUED']");
  });

  it('shows the first six values of longer enumerations', () => {
    expect(formatAllowedValues(['A', 'B', 'C', 'D', 'E', 'F', 'G'])).toBe(
      "['A', 'B', 'C', 'D', 'E', 'F', ...]",
    );
  });

  it('prints non-string values as JSON', () => {
    expect(formatAllowedValues([1, true, null])).toBe('[1, true, null]');
  });
});

describe('isEnumMember', () => {
  it('compares JSON values deeply', () => {
    expect(isEnumMember('A', ['A', 'B'])).toBe(true);
    expect(isEnumMember('C', ['A', 'B'])).toBe(false);
    expect(isEnumMember({ k: 1 }, [{ k: 1 }])).toBe(true);
    expect(isEnumMember(1, ['1'])).toBe(false);
    expect(isEnumMember(-0, [0, 1])).toBe(true);
  });
});

describe('issue formatting', () => {
  const issue = createIssue('UNKNOWN_FIELD', 'Items[4].Colour', "not in 'Item' (has 2 properties)");

  it('formats an issue for listings', () => {
    expect(formatIssue(issue)).toBe("UNKNOWN_FIELD Items[4].Colour: not in 'Item' (has 2 properties)");
  });

  it('uses the normalized path in patterns', () => {
    expect(issuePattern(issue)).toBe(
      "UNKNOWN_FIELD Items[*].Colour: not in 'Item' (has 2 properties)",
    );
  });

  it('creates immutable issues', () => {
    expect(Object.isFrozen(issue)).toBe(true);
  });
});

describe('aggregateIssuePatterns', () => {
  const results: ValidationResult = new Map([
    [
      'a.json',
      [
        createIssue('UNKNOWN_FIELD', 'Items[0].X', 'm'),
        createIssue('UNKNOWN_FIELD', 'Items[1].X', 'm'),
        createIssue('TYPE_MISMATCH', 'GTIN', 'expected string, got integer'),
      ],
    ],
    ['b.json', [createIssue('UNKNOWN_FIELD', 'Items[5].X', 'm')]],
    ['c.json', []],
  ]);

  it('counts each pattern once per document', () => {
    expect(aggregateIssuePatterns(results)).toEqual([
      { pattern: 'UNKNOWN_FIELD Items[*].X: m', count: 2 },
      { pattern: 'TYPE_MISMATCH GTIN: expected string, got integer', count: 1 },
    ]);
  });

  it('keeps first-seen order for ties', () => {
    const tied: ValidationResult = new Map([
      ['a.json', [createIssue('INVALID_ENUM', 'B', 'x'), createIssue('INVALID_ENUM', 'A', 'x')]],
    ]);
    expect(aggregateIssuePatterns(tied).map((p) => p.pattern)).toEqual([
      'INVALID_ENUM B: x',
      'INVALID_ENUM A: x',
    ]);
  });

  it('honours the limit', () => {
    expect(aggregateIssuePatterns(results, 1)).toHaveLength(1);
  });
});

describe('hasIssues', () => {
  it('is false when every document is clean', () => {
    const clean: ValidationResult = new Map([['a.json', []]]);
    expect(hasIssues(clean)).toBe(false);
  });

  it('is true when any document has issues', () => {
    const mixed: ValidationResult = new Map([
      ['a.json', []],
      ['b.json', [createIssue('PARSE_ERROR', '', 'bad')]],
    ]);
    expect(hasIssues(mixed)).toBe(true);
  });
});
