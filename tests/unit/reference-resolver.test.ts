import { describe, it, expect } from 'vitest';
import { resolveReference, stripReferencePrefix } from '../../src/core/reference-resolver.js';
import { fixtureSchema } from '../helpers/swagger-fixture.js';

describe('stripReferencePrefix', () => {
  it('removes the definitions pointer prefix', () => {
    expect(stripReferencePrefix('#/definitions/Gs1.Codes.UnitCode')).toBe('Gs1.Codes.UnitCode');
  });

  it('leaves bare names alone', () => {
    expect(stripReferencePrefix('UnitCode')).toBe('UnitCode');
  });
});

describe('resolveReference', () => {
  const schema = fixtureSchema();

  it('resolves a $ref pointer to its full name', () => {
    expect(resolveReference('#/definitions/Gs1.Standard.BrandDef', schema)).toBe(
      'Gs1.Standard.BrandDef',
    );
  });

  it('returns an exact full name unchanged', () => {
    expect(resolveReference('Gs1.Codes.UnitCode', schema)).toBe('Gs1.Codes.UnitCode');
  });

  it('resolves a short name through the index', () => {
    expect(resolveReference('TradeItem', schema)).toBe('Gs1.Standard.TradeItem');
  });

  it('falls back to the short name of an unknown qualified name', () => {
    expect(resolveReference('#/definitions/Elsewhere.BrandDef', schema)).toBe(
      'Gs1.Standard.BrandDef',
    );
  });

  it('returns undefined when nothing matches', () => {
    expect(resolveReference('#/definitions/Gs1.Standard.Missing', schema)).toBeUndefined();
  });
});
