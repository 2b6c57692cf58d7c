/**
 * Tests for HttpFetcher.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { HttpFetcher, createHttpFetcher } from './HttpFetcher.js';

const DOC_URL = 'https://docs.example.test/rfc/rfc0001.txt';

describe('HttpFetcher', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the response body as bytes', async () => {
    const fetchMock = vi.fn(async (_input: string, _init?: RequestInit) => new Response('Network Working Group', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const body = await new HttpFetcher().fetchBytes(DOC_URL);

    expect(new TextDecoder().decode(body)).toBe('Network Working Group');
    expect(fetchMock).toHaveBeenCalledWith(DOC_URL, { headers: { 'User-Agent': 'rfc-mirror' } });
  });

  it('sends extra headers', async () => {
    const fetchMock = vi.fn(async (_input: string, _init?: RequestInit) => new Response('', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    await createHttpFetcher({ headers: { Authorization: 'Bearer test-secret' } }).fetchBytes(DOC_URL);

    expect(fetchMock).toHaveBeenCalledWith(DOC_URL, {
      headers: { 'User-Agent': 'rfc-mirror', Authorization: 'Bearer test-secret' },
    });
  });

  it('fails with FETCH on a non-200 status', async () => {
    vi.stubGlobal('fetch', vi.fn(async (_input: string, _init?: RequestInit) => new Response('forbidden', { status: 403 })));

    await expect(new HttpFetcher().fetchBytes(DOC_URL)).rejects.toMatchObject({
      name: 'CacheError',
      code: 'FETCH',
      message: `Error downloading ${DOC_URL}: status code 403`,
    });
  });

  it('treats other success codes as failures', async () => {
    vi.stubGlobal('fetch', vi.fn(async (_input: string, _init?: RequestInit) => new Response(null, { status: 204 })));

    await expect(new HttpFetcher().fetchBytes(DOC_URL)).rejects.toMatchObject({
      code: 'FETCH',
      message: `Error downloading ${DOC_URL}: status code 204`,
    });
  });

  it('fails with FETCH on a transport error', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new TypeError('fetch failed');
    }));

    await expect(new HttpFetcher().fetchBytes(DOC_URL)).rejects.toMatchObject({
      code: 'FETCH',
      message: `Error downloading ${DOC_URL}: fetch failed`,
    });
  });
});
