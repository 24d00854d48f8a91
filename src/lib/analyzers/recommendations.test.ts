import { describe, expect, it } from 'vitest';
import { prioritizeQuickWins, RecommendationInput } from './recommendations';

function makeFacts(overrides: Partial<RecommendationInput> = {}): RecommendationInput {
  return {
    metadata: { title: 'Recipes', description: 'Easy recipes' },
    headers: { h1Count: 1, h2Count: 0, h1Present: true, h2Present: false },
    structuredData: true,
    faq: true,
    mobileFriendly: true,
    accessibility: { allImagesHaveAlt: true },
    speed: { performanceScore: 100, timeToFirstByteMs: 100, totalBytes: 1000, resourceCount: 5 },
    ...overrides,
  };
}

describe('prioritizeQuickWins', () => {
  it('returns nothing for a page with every signal satisfied', () => {
    expect(prioritizeQuickWins(makeFacts())).toEqual([]);
  });

  it('emits one issue per unmet signal', () => {
    const issues = prioritizeQuickWins(makeFacts({
      metadata: { title: null, description: null },
      headers: { h1Count: 0, h2Count: 0, h1Present: false, h2Present: false },
      structuredData: false,
      faq: false,
      mobileFriendly: false,
      accessibility: { allImagesHaveAlt: false },
    }));

    const types = issues.map(issue => issue.type).sort();
    expect(types).toEqual(['accessibility', 'description', 'faq', 'h1', 'mobile', 'structured_data', 'title']);
  });

  it('emits up to three speed issues from the raw metrics', () => {
    const issues = prioritizeQuickWins(makeFacts({
      speed: { performanceScore: 40, timeToFirstByteMs: 900, totalBytes: 6_000_000, resourceCount: 80 },
    }));
    expect(issues.map(issue => issue.fix)).toEqual([
      'Improve server response',
      'Reduce page size',
      'Reduce requests',
    ]);
    expect(issues.every(issue => issue.type === 'speed')).toBe(true);
  });

  it('sorts by priority, then low effort first, then table order', () => {
    const issues = prioritizeQuickWins(makeFacts({
      metadata: { title: 'Recipes', description: null },
      headers: { h1Count: 0, h2Count: 0, h1Present: false, h2Present: false },
      mobileFriendly: false,
      accessibility: { allImagesHaveAlt: false },
      faq: false,
    }));

    expect(issues.map(issue => [issue.type, issue.priority, issue.effort])).toEqual([
      ['h1', 1, 'low'],
      ['description', 2, 'low'],
      ['accessibility', 2, 'low'],
      ['mobile', 2, 'medium'],
      ['faq', 3, 'medium'],
    ]);
  });

  it('carries the points each signal is worth', () => {
    const [issue] = prioritizeQuickWins(makeFacts({ structuredData: false }));
    expect(issue).toEqual({
      type: 'structured_data',
      priority: 3,
      effort: 'medium',
      fix: 'Implement structured data',
      example: 'Add Recipe schema markup in a <script type="application/ld+json"> block',
      pointsAvailable: 25,
    });
  });
});
