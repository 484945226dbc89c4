import { describe, it, expect } from 'vitest';
import { PlateResolver, type PlateProvider } from '../src/plate/resolver.js';
import { normalizePlate, isValidPlate } from '../src/plate/plate.js';
import { NotFoundError, ProviderUnavailableError } from '../src/errors.js';
import type { VehicleRecord } from '../src/types/valuation.js';
import { hang } from './support/fakes.js';

type Lookup = (plate: string, signal: AbortSignal) => Promise<VehicleRecord>;

function provider(name: string, lookup: Lookup): PlateProvider & { calls: string[] } {
  const calls: string[] = [];
  return {
    name,
    calls,
    lookup(plate, signal) {
      calls.push(plate);
      return lookup(plate, signal);
    },
  };
}

const found = (make: string): Lookup => async (plate) => ({ plate, found: true, make, model: 'CX-5', year: '2018' });
const notFound: Lookup = async () => {
  throw new NotFoundError('no such plate');
};

describe('normalizePlate', () => {
  it('removes separators and upper-cases', () => {
    expect(normalizePlate(' lx-bw.68 ')).toBe('LXBW68');
    expect(normalizePlate('ab·cd·12')).toBe('ABCD12');
    expect(normalizePlate('LX BW 68')).toBe('LXBW68');
  });

  it('validates 4 to 8 alphanumerics', () => {
    expect(isValidPlate('LXBW68')).toBe(true);
    expect(isValidPlate('AB1')).toBe(false);
    expect(isValidPlate('LXBW68/')).toBe(false);
  });
});

describe('PlateResolver', () => {
  it('returns the first found record with its source', async () => {
    const first = provider('index', notFound);
    const second = provider('ai-search', found('MAZDA'));
    const third = provider('patentechile', found('KIA'));
    const resolver = new PlateResolver([first, second, third], { timeoutMs: 1000 });

    const record = await resolver.resolve('lx-bw68');

    expect(record).toEqual({ plate: 'LXBW68', found: true, make: 'MAZDA', model: 'CX-5', year: '2018', sourceName: 'ai-search' });
    expect(first.calls).toEqual(['LXBW68']);
    expect(third.calls).toEqual([]);
  });

  it('rejects malformed plates without calling any provider', async () => {
    const only = provider('index', found('MAZDA'));
    const record = await new PlateResolver([only], { timeoutMs: 1000 }).resolve('A-1');

    expect(record.found).toBe(false);
    expect(record.errorCode).toBe('invalid_input');
    expect(only.calls).toEqual([]);
  });

  it('reports every failure and the last reason when all providers fail', async () => {
    const resolver = new PlateResolver(
      [
        provider('index', notFound),
        provider('ai-search', async () => {
          throw new ProviderUnavailableError('reply contained no JSON object');
        }),
        provider('patentechile', async (plate) => ({ plate, found: false, errorReason: 'empty table' })),
      ],
      { timeoutMs: 1000 },
    );

    expect(await resolver.resolve('LXBW68')).toEqual({
      plate: 'LXBW68',
      found: false,
      errorCode: 'not_found',
      errorReason: 'empty table',
      failures: [
        { source: 'index', code: 'not_found', reason: 'no such plate' },
        { source: 'ai-search', code: 'provider_unavailable', reason: 'reply contained no JSON object' },
        { source: 'patentechile', code: 'not_found', reason: 'empty table' },
      ],
    });
  });

  it('moves on when a provider exceeds its timeout', async () => {
    const slow = provider('ai-search', (_plate, signal) => hang(signal));
    const fast = provider('patentechile', found('KIA'));
    const resolver = new PlateResolver([slow, fast], { timeoutMs: 1000, timeouts: { 'ai-search': 20 } });

    const record = await resolver.resolve('LXBW68');

    expect(record.sourceName).toBe('patentechile');
    expect(record.make).toBe('KIA');
  });

  it('surfaces caller cancellation as a cancelled failure', async () => {
    const controller = new AbortController();
    const slow = provider('ai-search', (_plate, signal) => {
      setTimeout(() => controller.abort(), 10);
      return hang(signal);
    });
    const never = provider('patentechile', found('KIA'));

    const record = await new PlateResolver([slow, never], { timeoutMs: 5000 }).resolve('LXBW68', controller.signal);

    expect(record.found).toBe(false);
    expect(record.errorCode).toBe('cancelled');
    expect(never.calls).toEqual([]);
  });

  it('reports a missing configuration', async () => {
    const record = await new PlateResolver([], { timeoutMs: 1000 }).resolve('LXBW68');
    expect(record).toEqual({
      plate: 'LXBW68',
      found: false,
      errorCode: 'provider_unavailable',
      errorReason: 'No plate provider configured',
    });
  });
});
