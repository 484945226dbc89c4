import { describe, it, expect } from 'vitest';
import { InMemoryPlateIndex } from '../src/plate/plate-index.js';
import { IndexedPlateProvider } from '../src/plate/providers/indexed.js';
import { AiSearchPlateProvider } from '../src/plate/providers/ai-search.js';
import { BrowserFormPlateProvider } from '../src/plate/providers/browser-form.js';
import { PLATE_SITES } from '../src/plate/sites.js';
import { NotFoundError, ProviderUnavailableError } from '../src/errors.js';
import { FakeBrowserSession, FakeCompletionBackend } from './support/fakes.js';

const signal = new AbortController().signal;

describe('IndexedPlateProvider', () => {
  const index = new InMemoryPlateIndex({ LXBW68: { make: 'MAZDA', model: 'CX-5', year: '2018' } });

  it('answers from the index', async () => {
    await expect(new IndexedPlateProvider(index).lookup('LXBW68', signal)).resolves.toEqual({
      plate: 'LXBW68',
      found: true,
      make: 'MAZDA',
      model: 'CX-5',
      year: '2018',
    });
  });

  it('throws NotFound for unknown plates', async () => {
    await expect(new IndexedPlateProvider(index).lookup('ZZZZ99', signal)).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('AiSearchPlateProvider', () => {
  it('reads the JSON block out of a grounded reply', async () => {
    const backend = new FakeCompletionBackend(
      'According to the registry [1]:\n```json\n{"found": true, "make": " Toyota ", "model": "Yaris", "year": 2016}\n```',
    );
    const record = await new AiSearchPlateProvider(backend).lookup('HJKL12', signal);

    expect(record).toEqual({ plate: 'HJKL12', found: true, make: 'Toyota', model: 'Yaris', year: '2016' });
    expect(backend.requests[0].grounded).toBe(true);
    expect(backend.requests[0].prompt).toContain('HJKL12');
  });

  it('maps found:false to NotFound', async () => {
    const backend = new FakeCompletionBackend('{"found": false, "reason": "no public listing"}');
    await expect(new AiSearchPlateProvider(backend).lookup('HJKL12', signal)).rejects.toThrow(
      new NotFoundError('no public listing'),
    );
  });

  it('treats prose and wrong shapes as unavailability', async () => {
    await expect(
      new AiSearchPlateProvider(new FakeCompletionBackend('I could not find it.')).lookup('HJKL12', signal),
    ).rejects.toBeInstanceOf(ProviderUnavailableError);
    await expect(
      new AiSearchPlateProvider(new FakeCompletionBackend('{"make": "KIA"}')).lookup('HJKL12', signal),
    ).rejects.toBeInstanceOf(ProviderUnavailableError);
  });
});

describe('BrowserFormPlateProvider', () => {
  const RESULT = `<html><body>
    <table id="tbl-results">
      <tr><td colspan="2">Datos del vehículo - Información vehicular</td></tr>
      <tr><td>Marca</td><td>MAZDA</td></tr>
      <tr><td>Modelo</td><td>CX-5</td></tr>
      <tr><td>Año</td><td>2018</td></tr>
    </table></body></html>`;

  it('submits the plate and parses the results table', async () => {
    const session = new FakeBrowserSession(RESULT);
    const record = await new BrowserFormPlateProvider(session, PLATE_SITES.patentechile).lookup('LXBW68', signal);

    expect(record).toEqual({ plate: 'LXBW68', found: true, make: 'MAZDA', model: 'CX-5', year: '2018' });
    expect(session.forms).toEqual([
      {
        url: 'https://www.patentechile.com/',
        inputSelector: '#inputTerm',
        submitSelector: '#searchBtn',
        resultSelector: '#tbl-results',
        value: 'LXBW68',
      },
    ]);
  });

  it('throws NotFound when the table has no vehicle rows', async () => {
    const session = new FakeBrowserSession('<table><tr><td>Sin datos</td><td></td></tr></table>');
    const provider = new BrowserFormPlateProvider(session, PLATE_SITES.volanteomaleta);
    expect(provider.name).toBe('volanteomaleta');
    await expect(provider.lookup('LXBW68', signal)).rejects.toBeInstanceOf(NotFoundError);
  });
});
