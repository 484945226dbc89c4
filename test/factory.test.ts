import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, afterAll } from 'vitest';
import { createEngine } from '../src/engine/factory.js';
import { loadConfig } from '../src/config.js';
import { InMemoryPlateIndex } from '../src/plate/plate-index.js';
import { MemoryCounterStore } from '../src/quota/stores.js';
import type { Logger } from '../src/server/logger.js';
import { FakeBrowserSession, FakeCompletionBackend, FakePageFetcher } from './support/fakes.js';

const AUTOFACT_URL = 'https://www.autofact.cl/valor-comercial-autos/mazda/cx_5/2018';
const AUTOFACT_PAGE = '<html><body><h1>Mazda CX-5 2018</h1><p>Valor comercial</p><p>$9.500.000</p></body></html>';
const MAZDA = { make: 'MAZDA', model: 'CX-5', year: '2018' };

function recordingLogger() {
  const warnings: Array<{ message: string; meta?: Record<string, unknown> }> = [];
  const logger: Logger = {
    debug() {},
    info() {},
    error() {},
    warn(message, meta) {
      warnings.push({ message, meta });
    },
  };
  return { logger, warnings };
}

/** No backend at all unless a test adds one. */
const bare = () => ({
  completion: undefined,
  browser: undefined,
  plateIndex: undefined,
  supabase: undefined,
  counterStore: new MemoryCounterStore(),
});

describe('createEngine', () => {
  it('skips providers whose backend is not configured', async () => {
    const { logger, warnings } = recordingLogger();
    const engine = await createEngine(loadConfig({}), { ...bare(), fetcher: new FakePageFetcher({}), logger });

    expect(warnings.map((w) => w.meta?.provider)).toEqual([
      'index',
      'ai-search',
      'patentechile',
      'volanteomaleta',
      'ai-valuation',
    ]);
    expect(warnings[0]).toEqual({
      message: 'Skipping plate provider: backend not configured',
      meta: { provider: 'index', requires: 'plateIndex' },
    });
    await expect(engine.resolvePlate('ABCD12')).resolves.toEqual({
      plate: 'ABCD12',
      found: false,
      errorCode: 'provider_unavailable',
      errorReason: 'No plate provider configured',
    });
  });

  it('builds providers in the configured order', async () => {
    const config = loadConfig({ PLATE_PROVIDERS: 'index,ai-search', PRICE_PROVIDERS: 'autofact' });
    const completion = new FakeCompletionBackend('{"found": true, "make": "Toyota", "model": "Yaris", "year": 2019}');
    const fetcher = new FakePageFetcher({ [AUTOFACT_URL]: AUTOFACT_PAGE });
    const engine = await createEngine(config, {
      ...bare(),
      completion,
      fetcher,
      plateIndex: new InMemoryPlateIndex({ ABCD12: MAZDA }),
    });

    await expect(engine.resolvePlate('ABCD12')).resolves.toMatchObject({ found: true, sourceName: 'index' });
    expect(completion.requests).toHaveLength(0);

    await expect(engine.resolvePlate('EFGH34')).resolves.toEqual({
      plate: 'EFGH34',
      found: true,
      make: 'Toyota',
      model: 'Yaris',
      year: '2019',
      sourceName: 'ai-search',
    });

    const outcome = await engine.resolveValuation(MAZDA);
    expect(outcome).toMatchObject({
      success: true,
      estimate: { averagePrice: 9_500_000, numListings: 1, sourceName: 'autofact', estimated: false },
    });
    expect(fetcher.urls).toEqual([AUTOFACT_URL]);
  });

  it('falls back to the depreciation model when every site misses', async () => {
    const fetcher = new FakePageFetcher({});
    const engine = await createEngine(loadConfig({ PRICE_PROVIDERS: 'autofact,autofact-simple,chileautos' }), {
      ...bare(),
      fetcher,
    });

    const outcome = await engine.resolveValuation(MAZDA);

    expect(outcome).toMatchObject({ success: true, estimate: { sourceName: 'depreciation-model', estimated: true } });
    // autofact-simple has nothing distinct to ask for a one-word model
    expect(fetcher.urls).toEqual([AUTOFACT_URL, 'https://www.chileautos.cl/vehiculos/autos-veh%C3%ADculo/mazda/cx_5/2018-ano/']);
  });

  it('fetches pages through the browser when asked to', async () => {
    const browser = new FakeBrowserSession('<table></table>', { [AUTOFACT_URL]: AUTOFACT_PAGE });
    const config = loadConfig({ PAGE_FETCHER: 'browser', PLATE_PROVIDERS: 'patentechile', PRICE_PROVIDERS: 'autofact' });
    const engine = await createEngine(config, { ...bare(), browser });

    await expect(engine.resolveValuation(MAZDA)).resolves.toMatchObject({ success: true });
    expect(browser.urls).toEqual([AUTOFACT_URL]);

    await engine.resolvePlate('ABCD12');
    expect(browser.forms).toEqual([
      {
        url: 'https://www.patentechile.com/',
        inputSelector: '#inputTerm',
        submitSelector: '#searchBtn',
        value: 'ABCD12',
        resultSelector: '#tbl-results',
      },
    ]);
  });

  describe('with PLATE_INDEX_FILE', () => {
    let dir = '';

    afterAll(async () => {
      if (dir) await fs.rm(dir, { recursive: true, force: true });
    });

    it('loads the index from disk', async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'plate-index-'));
      const file = path.join(dir, 'vehicles.index.json');
      await fs.writeFile(
        file,
        JSON.stringify({ builtAt: '2026-03-01T00:00:00.000Z', sources: ['202602.csv'], entries: { ABCD12: MAZDA } }),
      );

      const config = loadConfig({ PLATE_INDEX_FILE: file, PLATE_PROVIDERS: 'index' });
      const engine = await createEngine(config, {
        counterStore: new MemoryCounterStore(),
        fetcher: new FakePageFetcher({}),
      });

      await expect(engine.resolvePlate('abcd-12')).resolves.toEqual({ plate: 'ABCD12', found: true, ...MAZDA, sourceName: 'index' });
    });
  });
});
