import { describe, it, expect } from 'vitest';
import { depreciatedPrice, depreciationEstimate, parseYear } from '../src/market/depreciation.js';

describe('depreciatedPrice', () => {
  it('decays 12% a year from the base price', () => {
    expect(depreciatedPrice('2016', undefined, 2026)).toBe(2_228_008);
    expect(depreciatedPrice('2023', undefined, 2026)).toBe(5_451_776);
  });

  it('never goes under the floor', () => {
    expect(depreciatedPrice('1995', undefined, 2026)).toBe(1_500_000);
  });

  it('treats future model years as new', () => {
    expect(depreciatedPrice('2027', undefined, 2026)).toBe(8_000_000);
  });

  it('falls to the floor for an unknown year', () => {
    expect(depreciatedPrice('n/a', undefined, 2026)).toBe(1_500_000);
    expect(depreciatedPrice(undefined, undefined, 2026)).toBe(1_500_000);
  });

  it('uses custom parameters', () => {
    expect(depreciatedPrice(2024, { basePrice: 10_000_000, decayRate: 0.5, floorPrice: 0 }, 2026)).toBe(2_500_000);
  });
});

describe('depreciationEstimate', () => {
  it('marks the result as estimated', () => {
    expect(depreciationEstimate('2016', undefined, 2026)).toEqual({
      averagePrice: 2_228_008,
      minPrice: 2_228_008,
      maxPrice: 2_228_008,
      numListings: 0,
      sourceName: 'depreciation-model',
      estimated: true,
    });
  });
});

describe('parseYear', () => {
  it('accepts four digits only', () => {
    expect(parseYear(' 2019 ')).toBe(2019);
    expect(parseYear('19')).toBeUndefined();
    expect(parseYear('2019a')).toBeUndefined();
  });
});
