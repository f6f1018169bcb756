/**
 * Tests for the single-attempt HTTP helpers
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('undici', async (importOriginal) => ({
  ...(await importOriginal<typeof import('undici')>()),
  fetch: vi.fn(),
}));

import { fetch, Response } from 'undici';
import { DEFAULT_USER_AGENT, fetchJson, fetchText } from '../core/http-fetch.js';
import { ExtractionError, FetchError } from '../types.js';

const mockFetch = vi.mocked(fetch);

beforeEach(() => {
  mockFetch.mockReset();
});

describe('fetchText', () => {
  it('returns the body with browser-like headers', async () => {
    mockFetch.mockResolvedValueOnce(new Response('<html>ok</html>', {
      status: 200,
      headers: { 'Content-Type': 'text/html; charset=utf-8' },
    }));

    const result = await fetchText('https://example.com/page');

    expect(result).toEqual({
      url: 'https://example.com/page',
      status: 200,
      contentType: 'text/html; charset=utf-8',
      body: '<html>ok</html>',
    });
    expect(mockFetch.mock.calls[0][1]?.headers).toEqual({
      'User-Agent': DEFAULT_USER_AGENT,
      'Accept-Language': 'en-US,en;q=0.9',
    });
  });

  it('lets callers override headers', async () => {
    mockFetch.mockResolvedValueOnce(new Response('ok', { status: 200 }));

    await fetchText('https://example.com/page', { headers: { 'User-Agent': 'custom-agent' } });

    expect(mockFetch.mock.calls[0][1]?.headers).toEqual({
      'User-Agent': 'custom-agent',
      'Accept-Language': 'en-US,en;q=0.9',
    });
  });

  it('fails on any status other than 200', async () => {
    mockFetch.mockResolvedValueOnce(new Response('missing', { status: 404 }));

    const err = await fetchText('https://example.com/missing').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(FetchError);
    expect(err).toMatchObject({
      message: 'HTTP 404 (Not Found) for URL https://example.com/missing',
      status: 404,
    });
  });

  it('discards the body of a failed response', async () => {
    const response = new Response('rate limited', { status: 429 });
    const body = response.body;
    if (!body) throw new Error('expected a response body');
    const cancel = vi.spyOn(body, 'cancel');
    mockFetch.mockResolvedValueOnce(response);

    await expect(fetchText('https://example.com/busy')).rejects.toThrow(
      'HTTP 429 (Too Many Requests) for URL https://example.com/busy',
    );
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('treats other 2xx statuses as failures too', async () => {
    mockFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));

    await expect(fetchText('https://example.com/empty')).rejects.toThrow(
      'HTTP 204 (Unknown Error) for URL https://example.com/empty',
    );
  });

  it('reports the underlying network error', async () => {
    const cause = Object.assign(new Error('getaddrinfo ENOTFOUND example.invalid'), { code: 'ENOTFOUND' });
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed', { cause }));

    await expect(fetchText('https://example.invalid/')).rejects.toThrow(
      'Network error for URL https://example.invalid/: getaddrinfo ENOTFOUND example.invalid (ENOTFOUND)',
    );
  });

  it('aborts after the timeout', async () => {
    mockFetch.mockImplementationOnce((_url, init) => new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
    }));

    await expect(fetchText('https://example.com/slow', { timeoutMs: 10 })).rejects.toThrow(
      'Request timed out after 0.01s for URL https://example.com/slow',
    );
  });
});

describe('fetchJson', () => {
  it('parses JSON and asks for it', async () => {
    mockFetch.mockResolvedValueOnce(new Response('[{"kind":"Listing"}]', { status: 200 }));

    await expect(fetchJson('https://example.com/data.json')).resolves.toEqual([{ kind: 'Listing' }]);
    expect(mockFetch.mock.calls[0][1]?.headers).toMatchObject({ Accept: 'application/json' });
  });

  it('raises an extraction error for a non-JSON body', async () => {
    mockFetch.mockResolvedValueOnce(new Response('<html>blocked</html>', { status: 200 }));

    const err = await fetchJson('https://example.com/data.json').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ExtractionError);
    expect(err).toMatchObject({ message: 'Response from https://example.com/data.json is not valid JSON' });
  });
});
