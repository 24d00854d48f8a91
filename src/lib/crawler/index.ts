import { FetchError } from '../errors';
import { logger } from '../logger';
import { FetchedPage } from '../types';
import { isBlockedTarget } from '../validation';

const USER_AGENT = 'SignalScore-Analyzer/1.0 (answer engine visibility check)';
export const MAX_REDIRECTS = 5;

export interface ResourceProbe {
  contentLength: number;
}

export interface Fetcher {
  fetchPage(url: string, timeoutMs: number): Promise<FetchedPage>;
  headOnly(url: string, timeoutMs: number): Promise<ResourceProbe>;
}

async function assertPublicTarget(url: string): Promise<void> {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new FetchError('FETCH_FAILED', url, `Invalid URL: ${url}`);
  }
  if (!['http:', 'https:'].includes(parsed.protocol) || await isBlockedTarget(parsed)) {
    throw new FetchError('FETCH_FAILED', url, `Refusing to fetch private or internal target ${url}`);
  }
}

async function discardBody(response: Response): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (error) {
    logger.debug('crawler', 'Could not discard redirect body', error);
  }
}

/**
 * Follows redirects by hand so every hop passes the private-target check.
 * Resolves with the final response and the URL it came from.
 */
async function fetchPublic(url: string, init: RequestInit, timeoutMs: number): Promise<{ response: Response; finalUrl: string }> {
  const signal = AbortSignal.timeout(timeoutMs);
  let current = url;

  for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
    await assertPublicTarget(current);

    let response: Response;
    try {
      response = await fetch(current, { ...init, signal, redirect: 'manual' });
    } catch (error) {
      throw FetchError.fromUnknown(error, current, timeoutMs);
    }

    const location = response.headers.get('location');
    if (response.status < 300 || response.status >= 400 || !location) {
      return { response, finalUrl: current };
    }

    await discardBody(response);
    try {
      current = new URL(location, current).toString();
    } catch {
      throw new FetchError('FETCH_FAILED', current, `Invalid redirect location from ${current}`);
    }
  }

  throw new FetchError('FETCH_FAILED', url, `Too many redirects from ${url}`);
}

export const httpFetcher: Fetcher = {
  async fetchPage(url, timeoutMs) {
    const start = Date.now();
    const { response, finalUrl } = await fetchPublic(url, {
      headers: {
        'User-Agent': USER_AGENT,
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      },
    }, timeoutMs);
    // Headers have arrived: this is the single round-trip timing sample.
    const elapsedMs = Date.now() - start;

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw FetchError.fromUnknown(error, finalUrl, timeoutMs);
    }

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });

    return { url: finalUrl, status: response.status, headers, body, elapsedMs };
  },

  async headOnly(url, timeoutMs) {
    const { response } = await fetchPublic(url, {
      method: 'HEAD',
      headers: { 'User-Agent': USER_AGENT },
    }, timeoutMs);
    return { contentLength: parseContentLength(response.headers.get('content-length')) };
  },
};

export function parseContentLength(raw: string | null): number {
  if (!raw) return 0;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 0;
}
