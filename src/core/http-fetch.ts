/**
 * Single-attempt HTTP GET helpers.
 * Every call has a hard timeout and fails with FetchError on a network error
 * or any status other than 200. Nothing here retries.
 */

// Force IPv4-first DNS resolution globally.
// Hosts that advertise AAAA records without routing IPv6 otherwise stall until timeout.
import dns from 'dns';
dns.setDefaultResultOrder('ipv4first');

import { fetch as undiciFetch, type Response } from 'undici';
import { ExtractionError, FetchError } from '../types.js';

/** Browser-like identification sent with every outbound request */
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; url-brief/1.0)';

export const DEFAULT_TIMEOUT_MS = 30000;

// ── HTTP status text fallbacks (HTTP/2 omits reason phrases) ──────────────────

const HTTP_STATUS_TEXT: Record<number, string> = {
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  408: 'Request Timeout',
  410: 'Gone',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
  504: 'Gateway Timeout',
};

export interface FetchOptions {
  /** Extra request headers; a User-Agent here replaces the default one */
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export interface FetchTextResult {
  /** Final URL (after redirects) */
  url: string;
  status: number;
  contentType: string;
  body: string;
}

/** Best description of a network failure; undici hides the real reason in `cause`. */
function describeNetworkError(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause;
    if (cause instanceof Error) {
      const code = 'code' in cause && typeof cause.code === 'string' ? cause.code : null;
      return code ? `${cause.message} (${code})` : cause.message;
    }
    return err.message;
  }
  return String(err);
}

/**
 * Fetch a URL and return its body as text.
 *
 * @throws FetchError on timeout, network failure, or a non-200 status
 */
export async function fetchText(url: string, options: FetchOptions = {}): Promise<FetchTextResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    let response: Response;
    try {
      response = await undiciFetch(url, {
        headers: {
          'User-Agent': DEFAULT_USER_AGENT,
          'Accept-Language': 'en-US,en;q=0.9',
          ...options.headers,
        },
        signal: controller.signal,
      });
    } catch (err) {
      if (controller.signal.aborted) {
        throw new FetchError(`Request timed out after ${timeoutMs / 1000}s for URL ${url}`, { cause: err });
      }
      throw new FetchError(`Network error for URL ${url}: ${describeNetworkError(err)}`, { cause: err });
    }

    if (response.status !== 200) {
      // Release the connection; undici holds it until the body is consumed
      try {
        await response.body?.cancel();
      } catch (err) {
        if (process.env.DEBUG) console.debug('[url-brief]', `could not discard body of ${url}:`, describeNetworkError(err));
      }
      const statusText = response.statusText || HTTP_STATUS_TEXT[response.status] || 'Unknown Error';
      throw new FetchError(`HTTP ${response.status} (${statusText}) for URL ${url}`, {
        status: response.status,
      });
    }

    let body: string;
    try {
      body = await response.text();
    } catch (err) {
      if (controller.signal.aborted) {
        throw new FetchError(`Request timed out after ${timeoutMs / 1000}s for URL ${url}`, { cause: err });
      }
      throw new FetchError(`Could not read response body from ${url}: ${describeNetworkError(err)}`, { cause: err });
    }

    if (process.env.DEBUG) console.debug('[url-brief]', `GET ${url} -> ${response.status} (${body.length} chars)`);

    return {
      url: response.url || url,
      status: response.status,
      contentType: response.headers.get('content-type') ?? '',
      body,
    };
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Fetch a URL and parse its body as JSON.
 *
 * @throws FetchError as fetchText does
 * @throws ExtractionError when the body is not JSON
 */
export async function fetchJson(url: string, options: FetchOptions = {}): Promise<unknown> {
  const result = await fetchText(url, {
    ...options,
    headers: { Accept: 'application/json', ...options.headers },
  });
  try {
    const data: unknown = JSON.parse(result.body);
    return data;
  } catch {
    throw new ExtractionError(`Response from ${url} is not valid JSON`);
  }
}
