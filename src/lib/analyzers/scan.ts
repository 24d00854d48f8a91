import { Fetcher, httpFetcher } from '../crawler';
import { FetchError } from '../errors';
import { logger } from '../logger';
import { ScanOutcome, SignalFacts, getGrade } from '../types';
import { prioritizeQuickWins } from './recommendations';
import { calculateScore } from './scoring';
import {
  checkImageAltText, detectFaqSchema, detectMobileViewport, detectStructuredData,
  extractHeaders, extractMetadata, parsePage,
} from './signals';
import { measureSpeed } from './speed';

export interface ScanOptions {
  fetcher?: Fetcher;
  fetchTimeoutMs?: number;
  probeTimeoutMs?: number;
  concurrency?: number;
  now?: () => number;
}

const DEFAULTS = {
  fetchTimeoutMs: 10_000,
  probeTimeoutMs: 5_000,
  concurrency: 10,
};

/**
 * Fetches the page once, extracts every signal, then scores it and derives
 * the prioritized issue list. Only a failed document fetch throws; resource
 * measurement failures are reported as warnings.
 */
export async function scanPage(url: string, options: ScanOptions = {}): Promise<ScanOutcome> {
  const fetcher = options.fetcher ?? httpFetcher;
  const now = options.now ?? Date.now;
  const fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULTS.fetchTimeoutMs;

  const startedAt = now();
  const page = await fetcher.fetchPage(url, fetchTimeoutMs);
  if (page.status >= 400) {
    throw FetchError.httpStatus(url, page.status);
  }

  const doc = parsePage(page.url, page.body);
  const speed = await measureSpeed(doc, {
    fetcher,
    probeTimeoutMs: options.probeTimeoutMs ?? DEFAULTS.probeTimeoutMs,
    concurrency: options.concurrency ?? DEFAULTS.concurrency,
    startedAt,
    timeToFirstByteMs: page.elapsedMs,
    now,
  });

  const facts: SignalFacts = {
    url: page.url,
    metadata: extractMetadata(doc),
    headers: extractHeaders(doc),
    structuredData: detectStructuredData(doc),
    faq: detectFaqSchema(doc),
    mobileFriendly: detectMobileViewport(doc),
    accessibility: checkImageAltText(doc),
    speed,
  };

  const score = calculateScore(facts);
  const warnings: string[] = [];
  if (speed.failedProbes > 0) {
    warnings.push(`${speed.failedProbes} of ${speed.resourceCount} linked resources could not be measured; their size counts as 0 bytes.`);
  }

  logger.info('scan', `Scored ${facts.url}`, { totalScore: score.totalScore, resources: speed.resourceCount });

  return {
    facts,
    score,
    grade: getGrade(score.totalScore),
    issues: prioritizeQuickWins(facts),
    warnings,
    scannedAt: new Date(now()).toISOString(),
  };
}
