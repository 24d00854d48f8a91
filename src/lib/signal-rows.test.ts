import { describe, expect, it } from 'vitest';
import { calculateScore } from './analyzers/scoring';
import { SUBSCORE_COMPONENTS, describeSignals } from './signal-rows';
import { SCORE_WEIGHTS, SUBSCORE_MAXIMUMS, SignalFacts } from './types';

const facts: SignalFacts = {
  url: 'https://example.com/',
  metadata: { title: 'Example', description: null },
  headers: { h1Count: 1, h2Count: 2, h1Present: true, h2Present: true },
  structuredData: false,
  faq: false,
  mobileFriendly: true,
  accessibility: { allImagesHaveAlt: false, imageCount: 3, imagesWithAlt: 1 },
  speed: {
    timeToFirstByteMs: 120,
    totalTimeMs: 900,
    resourceCount: 4,
    totalBytes: 20_000,
    resourceTypes: { script: 2, css: 1, image: 1 },
    failedProbes: 0,
    performanceScore: 100,
  },
};

describe('describeSignals', () => {
  it('lists every component with its points and weight', () => {
    const rows = describeSignals(facts, calculateScore(facts).componentScores);

    expect(rows).toHaveLength(Object.keys(SCORE_WEIGHTS).length);
    expect(rows.find(r => r.key === 'description')).toEqual({
      key: 'description',
      label: 'Meta description',
      value: 'Missing',
      points: 0,
      maxPoints: 8,
    });
    expect(rows.find(r => r.key === 'accessibility')?.value).toBe('1 of 3 images');
    expect(rows.find(r => r.key === 'headers')?.points).toBe(15);
  });
});

describe('SUBSCORE_COMPONENTS', () => {
  it('adds up to each subscore maximum', () => {
    const sum = (keys: Array<keyof typeof SCORE_WEIGHTS>) => keys.reduce((total, key) => total + SCORE_WEIGHTS[key], 0);
    expect(sum(SUBSCORE_COMPONENTS.contentStructure)).toBe(SUBSCORE_MAXIMUMS.contentStructure);
    expect(sum(SUBSCORE_COMPONENTS.technical)).toBe(SUBSCORE_MAXIMUMS.technical);
    expect(sum(SUBSCORE_COMPONENTS.metadata)).toBe(SUBSCORE_MAXIMUMS.metadata);
    expect(sum(SUBSCORE_COMPONENTS.accessibility)).toBe(SUBSCORE_MAXIMUMS.accessibility);
  });
});
