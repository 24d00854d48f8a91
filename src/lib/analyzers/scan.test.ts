import { describe, expect, it } from 'vitest';
import { Fetcher } from '../crawler';
import { FetchError } from '../errors';
import { FetchedPage } from '../types';
import { scanPage } from './scan';

const GOOD_PAGE = `<!doctype html>
<html>
  <head>
    <title>Italian Recipes</title>
    <meta name="description" content="Easy Italian recipes">
    <meta name="viewport" content="width=device-width, initial-scale=1">
    <script type="application/ld+json">{"@context":"https://schema.org","@type":"FAQPage","mainEntity":[]}</script>
    <script src="/app.js"></script>
  </head>
  <body>
    <h1>Italian Recipes</h1>
    <img src="/pasta.jpg" alt="Fresh pasta">
  </body>
</html>`;

function fetcherFor(page: Partial<FetchedPage>, sizes: Record<string, number> = {}): Fetcher {
  return {
    async fetchPage(url) {
      return { url, status: 200, headers: {}, body: '', elapsedMs: 80, ...page };
    },
    async headOnly(url) {
      if (!(url in sizes)) throw new FetchError('FETCH_FAILED', url, `Failed to fetch ${url}`);
      return { contentLength: sizes[url] };
    },
  };
}

describe('scanPage', () => {
  it('scores a page that satisfies every signal at 100', async () => {
    const fetcher = fetcherFor({ body: GOOD_PAGE }, {
      'https://example.com/app.js': 2000,
      'https://example.com/pasta.jpg': 3000,
    });
    let tick = 0;
    const outcome = await scanPage('https://example.com/', { fetcher, now: () => (tick += 100) });

    expect(outcome.score.totalScore).toBe(100);
    expect(outcome.grade).toBe('A+');
    expect(outcome.issues).toEqual([]);
    expect(outcome.warnings).toEqual([]);
    expect(outcome.facts.speed.totalBytes).toBe(5000);
    expect(outcome.facts.speed.timeToFirstByteMs).toBe(80);
  });

  it('warns about resources that could not be measured', async () => {
    const outcome = await scanPage('https://example.com/', {
      fetcher: fetcherFor({ body: GOOD_PAGE }),
      now: () => 0,
    });

    expect(outcome.facts.speed.failedProbes).toBe(2);
    expect(outcome.facts.speed.totalBytes).toBe(0);
    expect(outcome.warnings).toEqual([
      '2 of 2 linked resources could not be measured; their size counts as 0 bytes.',
    ]);
  });

  it('reports a slow server as a speed issue', async () => {
    const outcome = await scanPage('https://example.com/', {
      fetcher: fetcherFor({ body: GOOD_PAGE, elapsedMs: 450 }, {
        'https://example.com/app.js': 1,
        'https://example.com/pasta.jpg': 1,
      }),
      now: () => 0,
    });

    expect(outcome.facts.speed.performanceScore).toBe(80);
    expect(outcome.score.totalScore).toBe(100);
    expect(outcome.issues.map(issue => issue.fix)).toEqual(['Improve server response']);
  });

  it('throws a FetchError for an error status', async () => {
    await expect(scanPage('https://example.com/gone', {
      fetcher: fetcherFor({ status: 404, body: 'Not found' }),
    })).rejects.toMatchObject({ code: 'HTTP_ERROR', status: 404 });
  });

  it('propagates a failed document fetch', async () => {
    const fetcher: Fetcher = {
      async fetchPage(url) {
        throw new FetchError('TIMEOUT', url, `Request to ${url} timed out after 10ms`);
      },
      async headOnly() {
        return { contentLength: 0 };
      },
    };
    await expect(scanPage('https://example.com/', { fetcher })).rejects.toBeInstanceOf(FetchError);
  });
});
