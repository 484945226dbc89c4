import { describe, it, expect } from 'vitest';
import { extractAmounts, isPlausible, parseAmount } from '../src/extract/money.js';

describe('extractAmounts', () => {
  it('keeps amounts inside the plausibility band', () => {
    expect(extractAmounts('$1.600.000 y $999')).toEqual([1600000]);
    // below the default floor of 1.500.000
    expect(extractAmounts('$1.200.000 y $999')).toEqual([]);
  });

  it('drops amounts above the band and collapses duplicates', () => {
    const text = 'Precio $9.000.000 · antes $9.000.000 · cuota $250.000 · tasación $150.000.000 · $ 8.800.000';
    expect(extractAmounts(text)).toEqual([9000000, 8800000]);
  });

  it('honours a custom band', () => {
    expect(extractAmounts('$1.200.000 y $999', { band: { min: 1_000_000, max: 2_000_000 } })).toEqual([1200000]);
  });

  it('requires the currency symbol unless told otherwise', () => {
    const text = 'Chevrolet Sail 2019 12.490.000 km 45.000';
    expect(extractAmounts(text)).toEqual([]);
    expect(extractAmounts(text, { requireSymbol: false })).toEqual([12490000]);
  });

  it('does not read a longer digit run as an amount', () => {
    expect(extractAmounts('$12.490.0001')).toEqual([]);
  });

  it('is idempotent over its own output', () => {
    const first = extractAmounts('$5.000.000 $6.000.000');
    const again = extractAmounts(first.map((n) => '$' + String(n).replace(/\B(?=(\d{3})+(?!\d))/g, '.')).join(' '));
    expect(again).toEqual(first);
  });

  it('supports comma grouping', () => {
    expect(extractAmounts('USD$ 2,500,000', { groupSeparator: ',' })).toEqual([2500000]);
  });
});

describe('parseAmount', () => {
  it('reads numbers and price strings', () => {
    expect(parseAmount(15000000)).toBe(15000000);
    expect(parseAmount('$15.000.000')).toBe(15000000);
    expect(parseAmount('15,000,000 CLP')).toBe(15000000);
    expect(parseAmount('12.490.000,50')).toBe(12490000);
  });

  it('rejects empty and non-positive values', () => {
    expect(parseAmount('consultar')).toBeUndefined();
    expect(parseAmount(0)).toBeUndefined();
    expect(parseAmount(null)).toBeUndefined();
  });
});

describe('isPlausible', () => {
  it('is inclusive at both ends', () => {
    expect(isPlausible(1_500_000)).toBe(true);
    expect(isPlausible(100_000_000)).toBe(true);
    expect(isPlausible(1_499_999)).toBe(false);
  });
});
