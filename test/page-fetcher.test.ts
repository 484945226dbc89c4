import { describe, it, expect, vi, afterEach } from 'vitest';
import { HttpPageFetcher } from '../src/backends/page-fetcher.js';
import { CancelledError, NotFoundError, ProviderUnavailableError } from '../src/errors.js';

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('HttpPageFetcher', () => {
  it('returns the body of a 2xx page', async () => {
    const fetchMock = vi.fn(async () => new Response('<p>$9.500.000</p>', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    await expect(new HttpPageFetcher().fetchPage('https://www.autofact.cl/x')).resolves.toBe('<p>$9.500.000</p>');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('maps 404 to NotFoundError', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('', { status: 404 })));
    await expect(new HttpPageFetcher().fetchPage('https://www.autofact.cl/x')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('maps other failures to ProviderUnavailableError', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('', { status: 503 })));
    await expect(new HttpPageFetcher().fetchPage('https://www.autofact.cl/x')).rejects.toThrow(
      new ProviderUnavailableError('https://www.autofact.cl/x returned 503'),
    );

    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      }),
    );
    await expect(new HttpPageFetcher().fetchPage('https://www.autofact.cl/x')).rejects.toBeInstanceOf(
      ProviderUnavailableError,
    );
  });

  it('rethrows the abort reason when cancelled', async () => {
    const controller = new AbortController();
    controller.abort(new CancelledError('client gone'));
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new DOMException('aborted', 'AbortError');
      }),
    );

    await expect(new HttpPageFetcher().fetchPage('https://www.autofact.cl/x', controller.signal)).rejects.toThrow(
      'client gone',
    );
  });
});
