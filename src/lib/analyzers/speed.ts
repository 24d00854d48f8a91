import pLimit from 'p-limit';
import { Fetcher } from '../crawler';
import { logger } from '../logger';
import { ResourceType, SPEED_THRESHOLDS, SpeedMetrics } from '../types';
import { PageDocument } from './signals';

export interface LinkedResource {
  url: string | null;
  type: ResourceType;
}

export interface SpeedOptions {
  fetcher: Fetcher;
  probeTimeoutMs: number;
  concurrency: number;
  /** Epoch ms at which the document request started. */
  startedAt: number;
  timeToFirstByteMs: number;
  now?: () => number;
}

export function resolveResourceUrl(raw: string, pageUrl: string): string | null {
  try {
    const origin = new URL(pageUrl).origin;
    const resolved = new URL(raw.trim(), origin);
    return ['http:', 'https:'].includes(resolved.protocol) ? resolved.toString() : null;
  } catch {
    return null;
  }
}

export function discoverResources(doc: PageDocument): LinkedResource[] {
  const { $ } = doc;
  const resources: LinkedResource[] = [];

  $('script[src]').each((_, el) => {
    resources.push({ url: resolveResourceUrl($(el).attr('src') || '', doc.url), type: 'script' });
  });
  $('link[rel~="stylesheet"][href]').each((_, el) => {
    resources.push({ url: resolveResourceUrl($(el).attr('href') || '', doc.url), type: 'css' });
  });
  $('img[src]').each((_, el) => {
    resources.push({ url: resolveResourceUrl($(el).attr('src') || '', doc.url), type: 'image' });
  });

  return resources;
}

export function calculatePerformanceScore(metrics: Pick<SpeedMetrics, 'timeToFirstByteMs' | 'totalTimeMs' | 'resourceCount' | 'totalBytes'>): number {
  let score = 100;
  if (metrics.timeToFirstByteMs > SPEED_THRESHOLDS.timeToFirstByteMs) score -= SPEED_THRESHOLDS.penalty;
  if (metrics.totalTimeMs > SPEED_THRESHOLDS.totalTimeMs) score -= SPEED_THRESHOLDS.penalty;
  if (metrics.resourceCount > SPEED_THRESHOLDS.resourceCount) score -= SPEED_THRESHOLDS.penalty;
  if (metrics.totalBytes > SPEED_THRESHOLDS.totalBytes) score -= SPEED_THRESHOLDS.penalty;
  return Math.max(0, score);
}

interface ProbeResult {
  type: ResourceType;
  bytes: number;
  failed: boolean;
}

async function probeResource(resource: LinkedResource, fetcher: Fetcher, timeoutMs: number): Promise<ProbeResult> {
  if (!resource.url) {
    return { type: resource.type, bytes: 0, failed: true };
  }
  try {
    const { contentLength } = await fetcher.headOnly(resource.url, timeoutMs);
    return { type: resource.type, bytes: contentLength, failed: false };
  } catch (error) {
    logger.debug('speed', `Probe failed for ${resource.url}`, error);
    return { type: resource.type, bytes: 0, failed: true };
  }
}

export async function measureSpeed(doc: PageDocument, options: SpeedOptions): Promise<SpeedMetrics> {
  const now = options.now ?? Date.now;
  const resources = discoverResources(doc);
  // Each finished request frees its slot for the next one.
  const limit = pLimit(options.concurrency);
  const results = await Promise.all(
    resources.map(resource => limit(() => probeResource(resource, options.fetcher, options.probeTimeoutMs))),
  );

  const resourceTypes: SpeedMetrics['resourceTypes'] = {};
  let totalBytes = 0;
  let failedProbes = 0;
  for (const result of results) {
    totalBytes += result.bytes;
    resourceTypes[result.type] = (resourceTypes[result.type] ?? 0) + 1;
    if (result.failed) failedProbes++;
  }

  const metrics = {
    timeToFirstByteMs: options.timeToFirstByteMs,
    totalTimeMs: Math.max(0, now() - options.startedAt),
    resourceCount: resources.length,
    totalBytes,
  };

  return {
    ...metrics,
    resourceTypes,
    failedProbes,
    performanceScore: calculatePerformanceScore(metrics),
  };
}
