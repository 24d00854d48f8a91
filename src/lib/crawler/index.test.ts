import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { measureSpeed } from '../analyzers/speed';
import { parsePage } from '../analyzers/signals';
import { FetchError } from '../errors';
import { MAX_REDIRECTS, httpFetcher, parseContentLength } from './index';

// Public IP literals skip DNS, so nothing here leaves the process.
const PUBLIC_ORIGIN = 'http://93.184.216.34';

let fetchMock: Mock<typeof fetch>;

beforeEach(() => {
  fetchMock = vi.fn<typeof fetch>();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

function redirect(location: string, status = 302): Response {
  return new Response(null, { status, headers: { location } });
}

describe('httpFetcher.headOnly', () => {
  it('reads the content length of a public resource', async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 200, headers: { 'content-length': '2048' } }));

    await expect(httpFetcher.headOnly(`${PUBLIC_ORIGIN}/app.js`, 100)).resolves.toEqual({ contentLength: 2048 });
    expect(fetchMock).toHaveBeenCalledWith(`${PUBLIC_ORIGIN}/app.js`, expect.objectContaining({ method: 'HEAD', redirect: 'manual' }));
  });

  it('refuses loopback and link-local targets without sending a request', async () => {
    await expect(httpFetcher.headOnly('http://127.0.0.1:6379/', 100)).rejects.toBeInstanceOf(FetchError);
    await expect(httpFetcher.headOnly('http://169.254.169.254/latest/meta-data/iam', 100)).rejects.toBeInstanceOf(FetchError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('httpFetcher.fetchPage', () => {
  it('follows public redirects and reports the final url', async () => {
    fetchMock
      .mockResolvedValueOnce(redirect('/home', 301))
      .mockResolvedValueOnce(new Response('<title>Home</title>', { status: 200 }));

    const page = await httpFetcher.fetchPage(`${PUBLIC_ORIGIN}/`, 100);

    expect(page.url).toBe(`${PUBLIC_ORIGIN}/home`);
    expect(page.body).toBe('<title>Home</title>');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('stops at a redirect into a private network', async () => {
    fetchMock.mockResolvedValueOnce(redirect('http://10.0.0.5/admin'));

    await expect(httpFetcher.fetchPage(`${PUBLIC_ORIGIN}/`, 100)).rejects.toThrow(
      'Refusing to fetch private or internal target http://10.0.0.5/admin',
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('gives up after too many redirects', async () => {
    fetchMock.mockImplementation(async () => redirect('/loop'));

    await expect(httpFetcher.fetchPage(`${PUBLIC_ORIGIN}/`, 100)).rejects.toThrow(`Too many redirects from ${PUBLIC_ORIGIN}/`);
    expect(fetchMock).toHaveBeenCalledTimes(MAX_REDIRECTS + 1);
  });
});

describe('measureSpeed with httpFetcher', () => {
  it('counts private resources as failed zero-byte requests', async () => {
    const doc = parsePage(`${PUBLIC_ORIGIN}/`, `
      <img src="http://169.254.169.254/latest/meta-data/iam">
      <script src="http://127.0.0.1:6379/"></script>
    `);

    const metrics = await measureSpeed(doc, {
      fetcher: httpFetcher,
      probeTimeoutMs: 100,
      concurrency: 10,
      startedAt: 0,
      timeToFirstByteMs: 50,
      now: () => 10,
    });

    expect(fetchMock).not.toHaveBeenCalled();
    expect(metrics.resourceCount).toBe(2);
    expect(metrics.failedProbes).toBe(2);
    expect(metrics.totalBytes).toBe(0);
  });
});

describe('parseContentLength', () => {
  it('treats missing or invalid headers as zero', () => {
    expect(parseContentLength(null)).toBe(0);
    expect(parseContentLength('abc')).toBe(0);
    expect(parseContentLength('512')).toBe(512);
  });
});
