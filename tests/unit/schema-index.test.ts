import { describe, it, expect } from 'vitest';
import { buildSchemaIndex, shortName } from '../../src/core/schema-index.js';

describe('shortName', () => {
  it('returns the segment after the last dot', () => {
    expect(shortName('Namespace.Standard.TradeItem')).toBe('TradeItem');
  });

  it('returns names without dots unchanged', () => {
    expect(shortName('TradeItem')).toBe('TradeItem');
  });
});

describe('buildSchemaIndex', () => {
  it('returns an empty index for no definitions', () => {
    expect(buildSchemaIndex([]).size).toBe(0);
  });

  it('maps short names to full names', () => {
    const index = buildSchemaIndex(['Gs1.Codes.UnitCode', 'Gs1.Standard.BrandDef']);
    expect(index.get('UnitCode')).toBe('Gs1.Codes.UnitCode');
    expect(index.get('BrandDef')).toBe('Gs1.Standard.BrandDef');
  });

  it('prefers the Standard namespace when it comes last', () => {
    const index = buildSchemaIndex(['Gs1.Other.TradeItem', 'Gs1.Standard.TradeItem']);
    expect(index.get('TradeItem')).toBe('Gs1.Standard.TradeItem');
  });

  it('prefers the Standard namespace when it comes first', () => {
    const index = buildSchemaIndex(['Gs1.Standard.TradeItem', 'Gs1.Other.TradeItem']);
    expect(index.get('TradeItem')).toBe('Gs1.Standard.TradeItem');
  });

  it('keeps the first unmarked name when none is preferred', () => {
    const index = buildSchemaIndex(['A.Item', 'B.Item']);
    expect(index.get('Item')).toBe('A.Item');
  });

  it('keeps the first marked name among several marked ones', () => {
    const index = buildSchemaIndex(['X.Standard.Item', 'Other.Item', 'Y.Standard.Item']);
    expect(index.get('Item')).toBe('X.Standard.Item');
  });

  it('accepts a custom namespace marker', () => {
    const index = buildSchemaIndex(['A.Item', 'Legacy.Item'], 'Legacy');
    expect(index.get('Item')).toBe('Legacy.Item');
  });
});
