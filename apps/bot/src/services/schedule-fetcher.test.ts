import { describe, it, expect, vi, afterEach } from 'vitest';
import { FetchError } from '../errors.js';
import { fetchSchedulePage } from './schedule-fetcher.js';

const URL = 'https://club.example/schedule/';

describe('fetchSchedulePage', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the page body with a timeout signal attached', async () => {
    const mockFetch = vi.fn().mockResolvedValue(new Response('<h1>2024</h1>', { status: 200 }));
    vi.stubGlobal('fetch', mockFetch);

    await expect(fetchSchedulePage(URL, { timeoutMs: 5000 })).resolves.toBe('<h1>2024</h1>');
    expect(mockFetch).toHaveBeenCalledWith(
      URL,
      expect.objectContaining({ signal: expect.any(AbortSignal) })
    );
  });

  it('throws FetchError with the status on a non-2xx response', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('oops', { status: 500 })));

    const error = await fetchSchedulePage(URL).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({
      message: 'Failed to load schedule page: HTTP 500',
      statusCode: 500,
      url: URL,
    });
  });

  it('wraps network failures', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

    await expect(fetchSchedulePage(URL)).rejects.toThrow(`Failed to fetch ${URL}: fetch failed`);
  });

  it('reports timeouts', async () => {
    const timeout = Object.assign(new Error('The operation was aborted due to timeout'), {
      name: 'TimeoutError',
    });
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(timeout));

    await expect(fetchSchedulePage(URL, { timeoutMs: 2500 })).rejects.toThrow(
      `Timed out after 2500ms fetching ${URL}`
    );
  });
});
