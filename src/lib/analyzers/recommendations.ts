import {
  Effort, IssueType, QuickWinIssue, SCORE_WEIGHTS, SPEED_THRESHOLDS, SignalFacts,
} from '../types';
import { ScoringInput } from './scoring';

export type RecommendationInput = ScoringInput & {
  speed: Pick<SignalFacts['speed'], 'timeToFirstByteMs' | 'totalBytes' | 'resourceCount'>;
};

interface IssueTemplate {
  type: IssueType;
  priority: number;
  effort: Effort;
  fix: string;
  example: string;
}

interface IssueRule extends IssueTemplate {
  applies: (facts: RecommendationInput) => boolean;
}

export interface ImpactDescription {
  what: string;
  why: string;
  impact: 'High' | 'Medium-High' | 'Medium';
}

const POINTS_BY_TYPE: Record<IssueType, number> = {
  title: SCORE_WEIGHTS.title,
  description: SCORE_WEIGHTS.description,
  h1: SCORE_WEIGHTS.headers,
  structured_data: SCORE_WEIGHTS.structuredData,
  faq: SCORE_WEIGHTS.faq,
  mobile: SCORE_WEIGHTS.mobile,
  accessibility: SCORE_WEIGHTS.accessibility,
  speed: SCORE_WEIGHTS.speed,
};

const ISSUE_RULES: IssueRule[] = [
  {
    type: 'title', priority: 1, effort: 'low',
    fix: 'Add a descriptive title tag',
    example: 'Best Italian Recipes | Easy Guide',
    applies: f => f.metadata.title === null,
  },
  {
    type: 'description', priority: 2, effort: 'low',
    fix: 'Add a meta description',
    example: 'Discover easy Italian recipes with step-by-step instructions.',
    applies: f => f.metadata.description === null,
  },
  {
    type: 'h1', priority: 1, effort: 'low',
    fix: 'Add an H1 header',
    example: 'Welcome to Italian Recipes',
    applies: f => !f.headers.h1Present,
  },
  {
    type: 'structured_data', priority: 3, effort: 'medium',
    fix: 'Implement structured data',
    example: 'Add Recipe schema markup in a <script type="application/ld+json"> block',
    applies: f => !f.structuredData,
  },
  {
    type: 'faq', priority: 3, effort: 'medium',
    fix: 'Add FAQ schema markup',
    example: 'Include common questions with FAQPage JSON-LD',
    applies: f => !f.faq,
  },
  {
    type: 'mobile', priority: 2, effort: 'medium',
    fix: 'Implement responsive design',
    example: '<meta name="viewport" content="width=device-width, initial-scale=1">',
    applies: f => !f.mobileFriendly,
  },
  {
    type: 'accessibility', priority: 2, effort: 'low',
    fix: 'Add image alt text',
    example: '<img src="pasta.jpg" alt="Fresh pasta">',
    applies: f => !f.accessibility.allImagesHaveAlt,
  },
  {
    type: 'speed', priority: 1, effort: 'medium',
    fix: 'Improve server response',
    example: 'Enable caching and optimize server configuration',
    applies: f => f.speed.timeToFirstByteMs > SPEED_THRESHOLDS.timeToFirstByteMs,
  },
  {
    type: 'speed', priority: 2, effort: 'medium',
    fix: 'Reduce page size',
    example: 'Compress images and minify scripts',
    applies: f => f.speed.totalBytes > SPEED_THRESHOLDS.totalBytes,
  },
  {
    type: 'speed', priority: 2, effort: 'medium',
    fix: 'Reduce requests',
    example: 'Combine CSS files and lazy-load below-the-fold images',
    applies: f => f.speed.resourceCount > SPEED_THRESHOLDS.resourceCount,
  },
];

const IMPACTS: Record<IssueType, ImpactDescription> = {
  title: {
    what: 'Title tags are crucial for search engines and answer engines to understand page content.',
    why: 'A well-optimized title helps answer engines identify your content as relevant to specific queries.',
    impact: 'High',
  },
  description: {
    what: 'Meta descriptions provide a summary of page content.',
    why: 'Clear descriptions help answer engines understand and potentially feature your content.',
    impact: 'Medium-High',
  },
  h1: {
    what: 'H1 headers define the main topic of your page.',
    why: 'Answer engines use H1s to understand content hierarchy and main topics.',
    impact: 'High',
  },
  structured_data: {
    what: 'Structured data provides explicit information about your content.',
    why: 'It helps answer engines extract specific information and understand relationships.',
    impact: 'High',
  },
  faq: {
    what: 'FAQ sections address common user questions directly.',
    why: 'This format matches how people query answer engines and voice assistants.',
    impact: 'Medium-High',
  },
  mobile: {
    what: 'Mobile-friendly pages display properly on all devices.',
    why: 'Voice searches often come from mobile devices and answer engines prioritize mobile-friendly content.',
    impact: 'Medium',
  },
  accessibility: {
    what: 'Accessible content can be used by everyone, including people using assistive technologies.',
    why: 'Clear content structure and image descriptions help answer engines understand your content.',
    impact: 'Medium',
  },
  speed: {
    what: 'Page speed affects user experience and crawling efficiency.',
    why: 'Faster pages are crawled more often and preferred when answers are assembled.',
    impact: 'High',
  },
};

const EFFORT_ORDER: Record<Effort, number> = { low: 0, medium: 1 };

export function getImpactDescription(type: IssueType): ImpactDescription {
  return IMPACTS[type];
}

export function prioritizeQuickWins(facts: RecommendationInput): QuickWinIssue[] {
  const issues: QuickWinIssue[] = ISSUE_RULES
    .filter(rule => rule.applies(facts))
    .map(({ applies: _applies, ...template }) => ({
      ...template,
      pointsAvailable: POINTS_BY_TYPE[template.type],
    }));

  // Array.prototype.sort is stable, so equal keys keep table order.
  return issues.sort((a, b) => {
    const pDiff = a.priority - b.priority;
    if (pDiff !== 0) return pDiff;
    return EFFORT_ORDER[a.effort] - EFFORT_ORDER[b.effort];
  });
}
