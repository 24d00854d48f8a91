import { describe, expect, it, vi } from 'vitest';
import { Fetcher } from '../crawler';
import { FetchError } from '../errors';
import { parsePage } from './signals';
import { calculatePerformanceScore, discoverResources, measureSpeed, resolveResourceUrl } from './speed';

function stubFetcher(sizes: Record<string, number>, calls: string[] = []): Fetcher {
  return {
    async fetchPage() {
      throw new Error('not used');
    },
    async headOnly(url) {
      calls.push(url);
      if (!(url in sizes)) throw new FetchError('FETCH_FAILED', url, `Failed to fetch ${url}`);
      return { contentLength: sizes[url] };
    },
  };
}

describe('resolveResourceUrl', () => {
  it('resolves relative and protocol-relative references against the page origin', () => {
    expect(resolveResourceUrl('/app.js', 'https://example.com/blog/post')).toBe('https://example.com/app.js');
    expect(resolveResourceUrl('//cdn.example.net/x.css', 'https://example.com/')).toBe('https://cdn.example.net/x.css');
  });

  it('rejects non-http schemes', () => {
    expect(resolveResourceUrl('data:image/png;base64,AAAA', 'https://example.com/')).toBeNull();
  });
});

describe('discoverResources', () => {
  it('lists scripts, stylesheets and images in that order', () => {
    const doc = parsePage('https://example.com/', `
      <img src="/a.png">
      <link rel="stylesheet" href="/s.css">
      <link rel="icon" href="/favicon.ico">
      <script src="/app.js"></script>
      <script>inline()</script>
    `);
    expect(discoverResources(doc)).toEqual([
      { url: 'https://example.com/app.js', type: 'script' },
      { url: 'https://example.com/s.css', type: 'css' },
      { url: 'https://example.com/a.png', type: 'image' },
    ]);
  });
});

describe('calculatePerformanceScore', () => {
  it('starts at 100 for a fast, light page', () => {
    expect(calculatePerformanceScore({ timeToFirstByteMs: 150, totalTimeMs: 900, resourceCount: 10, totalBytes: 200_000 })).toBe(100);
  });

  it('applies a 20 point penalty per exceeded threshold', () => {
    expect(calculatePerformanceScore({ timeToFirstByteMs: 201, totalTimeMs: 900, resourceCount: 10, totalBytes: 200_000 })).toBe(80);
    expect(calculatePerformanceScore({ timeToFirstByteMs: 500, totalTimeMs: 4000, resourceCount: 51, totalBytes: 5_000_001 })).toBe(20);
  });

  it('does not penalize values exactly at a threshold', () => {
    expect(calculatePerformanceScore({ timeToFirstByteMs: 200, totalTimeMs: 3000, resourceCount: 50, totalBytes: 5_000_000 })).toBe(100);
  });
});

describe('measureSpeed', () => {
  it('sums measured sizes and counts failed requests as zero bytes', async () => {
    const doc = parsePage('https://example.com/', `
      <script src="/app.js"></script>
      <link rel="stylesheet" href="/s.css">
      <img src="/missing.png">
    `);
    const fetcher = stubFetcher({
      'https://example.com/app.js': 1000,
      'https://example.com/s.css': 500,
    });

    const metrics = await measureSpeed(doc, {
      fetcher,
      probeTimeoutMs: 100,
      concurrency: 10,
      startedAt: 1_000,
      timeToFirstByteMs: 120,
      now: () => 1_800,
    });

    expect(metrics).toEqual({
      timeToFirstByteMs: 120,
      totalTimeMs: 800,
      resourceCount: 3,
      totalBytes: 1500,
      resourceTypes: { script: 1, css: 1, image: 1 },
      failedProbes: 1,
      performanceScore: 100,
    });
  });

  it('measures every resource when the count exceeds the concurrency', async () => {
    const images = Array.from({ length: 7 }, (_, i) => `<img src="/i${i}.png">`).join('');
    const doc = parsePage('https://example.com/', images);
    const sizes: Record<string, number> = {};
    for (let i = 0; i < 7; i++) sizes[`https://example.com/i${i}.png`] = 10;
    const calls: string[] = [];

    const metrics = await measureSpeed(doc, {
      fetcher: stubFetcher(sizes, calls),
      probeTimeoutMs: 100,
      concurrency: 3,
      startedAt: 0,
      timeToFirstByteMs: 50,
      now: () => 10,
    });

    expect(calls).toHaveLength(7);
    expect(metrics.totalBytes).toBe(70);
    expect(metrics.failedProbes).toBe(0);
  });

  it('never holds more than the concurrency limit in flight', async () => {
    const doc = parsePage('https://example.com/', Array.from({ length: 12 }, (_, i) => `<img src="/i${i}.png">`).join(''));
    let inFlight = 0;
    let peak = 0;
    const fetcher: Fetcher = {
      async fetchPage() {
        throw new Error('not used');
      },
      async headOnly() {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise(resolve => setTimeout(resolve, 5));
        inFlight--;
        return { contentLength: 1 };
      },
    };

    const metrics = await measureSpeed(doc, {
      fetcher,
      probeTimeoutMs: 100,
      concurrency: 4,
      startedAt: 0,
      timeToFirstByteMs: 50,
      now: () => 10,
    });

    expect(peak).toBe(4);
    expect(metrics.totalBytes).toBe(12);
  });

  it('starts queued requests while a slow request is still running', async () => {
    const doc = parsePage('https://example.com/', `
      <img src="/slow.png"><img src="/a.png"><img src="/b.png"><img src="/c.png"><img src="/d.png">
    `);
    const started: string[] = [];
    let releaseSlow: () => void = () => {};
    const slow = new Promise<void>(resolve => {
      releaseSlow = resolve;
    });
    const fetcher: Fetcher = {
      async fetchPage() {
        throw new Error('not used');
      },
      async headOnly(url) {
        started.push(url);
        if (url.endsWith('/slow.png')) await slow;
        return { contentLength: 10 };
      },
    };

    const pending = measureSpeed(doc, {
      fetcher,
      probeTimeoutMs: 100,
      concurrency: 2,
      startedAt: 0,
      timeToFirstByteMs: 50,
      now: () => 10,
    });

    await vi.waitFor(() => expect(started).toHaveLength(5));
    releaseSlow();
    const metrics = await pending;

    expect(metrics.totalBytes).toBe(50);
    expect(metrics.failedProbes).toBe(0);
  });
});
