import { describe, expect, it } from 'vitest';
import { PDFDocument } from 'pdf-lib';
import { calculateScore } from '@/lib/analyzers/scoring';
import { prioritizeQuickWins } from '@/lib/analyzers/recommendations';
import { ProgressSummary, ScanOutcome, SignalFacts, getGrade } from '@/lib/types';
import {
  buildReportFilename,
  generateDetailedReportPdf,
  generateProgressReportPdf,
  generateQuickWinsReportPdf,
} from './pdf-report';

function makeFacts(): SignalFacts {
  return {
    url: 'https://example.com/recipes',
    metadata: { title: 'Easy Recipes → fast dinners', description: null },
    headers: { h1Count: 0, h2Count: 3, h1Present: false, h2Present: true },
    structuredData: true,
    faq: false,
    mobileFriendly: true,
    accessibility: { allImagesHaveAlt: false, imageCount: 4, imagesWithAlt: 2 },
    speed: {
      timeToFirstByteMs: 340,
      totalTimeMs: 1200,
      resourceCount: 12,
      totalBytes: 480_000,
      resourceTypes: { script: 5, css: 2, image: 5 },
      failedProbes: 1,
      performanceScore: 80,
    },
  };
}

function makeOutcome(): ScanOutcome {
  const facts = makeFacts();
  const score = calculateScore(facts);
  return {
    facts,
    score,
    grade: getGrade(score.totalScore),
    issues: prioritizeQuickWins(facts),
    warnings: ['1 of 12 linked resources could not be measured; their size counts as 0 bytes.'],
    scannedAt: '2026-03-02T09:30:00.000Z',
  };
}

describe('generateQuickWinsReportPdf', () => {
  it('creates a loadable pdf with the report title', async () => {
    const facts = makeFacts();
    const bytes = await generateQuickWinsReportPdf({
      url: facts.url,
      liteScore: 65,
      issues: prioritizeQuickWins(facts),
      generatedAt: new Date('2026-03-02T09:30:00.000Z'),
    });

    const loaded = await PDFDocument.load(bytes);
    expect(loaded.getPageCount()).toBeGreaterThanOrEqual(1);
    expect(loaded.getTitle()).toBe('SignalScore Quick Wins Report - example.com');
  });

  it('renders when there are no issues', async () => {
    const bytes = await generateQuickWinsReportPdf({
      url: 'https://example.com',
      liteScore: 65,
      issues: [],
      generatedAt: new Date('2026-03-02T09:30:00.000Z'),
    });
    const loaded = await PDFDocument.load(bytes);
    expect(loaded.getPageCount()).toBe(1);
  });
});

describe('generateDetailedReportPdf', () => {
  it('handles text the standard fonts cannot encode', async () => {
    const outcome = makeOutcome();
    outcome.facts.metadata.title = 'Recipes 🍝 für alle ✓';

    const bytes = await generateDetailedReportPdf(outcome);
    const loaded = await PDFDocument.load(bytes);
    expect(loaded.getPageCount()).toBeGreaterThanOrEqual(1);
    expect(loaded.getTitle()).toBe('SignalScore Detailed Analysis - example.com');
  });
});

describe('generateProgressReportPdf', () => {
  it('renders scan history and implementations', async () => {
    const summary: ProgressSummary = {
      initialScore: 45,
      currentScore: 70,
      totalImprovement: 25,
      scanCount: 2,
      implementedChanges: 1,
      pendingChanges: 1,
      implementationImpact: 15,
      trendingData: [],
      recommendations: [
        {
          id: 1,
          url: 'https://example.com',
          type: 'h1',
          description: 'Add an H1 header',
          priority: 1,
          pointsPotential: 15,
          status: 'implemented',
          createdAt: new Date('2026-03-01T00:00:00.000Z'),
          implementedAt: new Date('2026-03-02T00:00:00.000Z'),
          notes: 'Added to the hero section',
        },
        {
          id: 2,
          url: 'https://example.com',
          type: 'faq',
          description: 'Add FAQ schema markup',
          priority: 3,
          pointsPotential: 20,
          status: 'pending',
          createdAt: new Date('2026-03-01T00:00:00.000Z'),
          implementedAt: null,
          notes: null,
        },
      ],
    };

    const bytes = await generateProgressReportPdf({
      url: 'https://example.com',
      summary,
      generatedAt: new Date('2026-03-03T00:00:00.000Z'),
    });
    const loaded = await PDFDocument.load(bytes);
    expect(loaded.getTitle()).toBe('SignalScore Progress Report - example.com');
  });
});

describe('buildReportFilename', () => {
  it('builds a stable filename from kind, host and date', () => {
    expect(buildReportFilename('detailed', 'https://docs.example.com/path', '2026-02-14T12:00:00.000Z'))
      .toBe('signalscore-detailed-docs.example.com-2026-02-14.pdf');
  });

  it('reads the host from an address typed without a scheme', () => {
    expect(buildReportFilename('quick-wins', 'example.com', new Date('2026-02-14T00:00:00.000Z')))
      .toBe('signalscore-quick-wins-example.com-2026-02-14.pdf');
  });

  it('falls back when the url cannot be parsed', () => {
    expect(buildReportFilename('progress', 'not a url', new Date('2026-02-14T00:00:00.000Z')))
      .toBe('signalscore-progress-site-2026-02-14.pdf');
  });
});
