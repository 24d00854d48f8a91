import { ComponentScores, SCORE_WEIGHTS, SignalFacts, Subscores } from './types';

export interface SignalRow {
  key: keyof ComponentScores;
  label: string;
  value: string;
  points: number;
  maxPoints: number;
}

/** Groups each component under the subscore it counts towards. */
export const SUBSCORE_COMPONENTS: Record<keyof Subscores, Array<keyof ComponentScores>> = {
  contentStructure: ['structuredData', 'faq', 'headers'],
  technical: ['speed', 'mobile'],
  metadata: ['title', 'description'],
  accessibility: ['accessibility'],
};

export const SUBSCORE_LABELS: Record<keyof Subscores, string> = {
  contentStructure: 'Content Structure',
  technical: 'Technical',
  metadata: 'Metadata',
  accessibility: 'Accessibility',
};

export function describeSignals(facts: SignalFacts, scores: ComponentScores): SignalRow[] {
  const row = (key: keyof ComponentScores, label: string, value: string): SignalRow => ({
    key,
    label,
    value,
    points: scores[key],
    maxPoints: SCORE_WEIGHTS[key],
  });

  return [
    row('title', 'Title', facts.metadata.title ?? 'Missing'),
    row('description', 'Meta description', facts.metadata.description ?? 'Missing'),
    row('headers', 'H1 header', `${facts.headers.h1Count} H1, ${facts.headers.h2Count} H2`),
    row('structuredData', 'Structured data', facts.structuredData ? 'JSON-LD found' : 'Not found'),
    row('faq', 'FAQ schema', facts.faq ? 'FAQPage found' : 'Not found'),
    row('mobile', 'Mobile viewport', facts.mobileFriendly ? 'Present' : 'Missing'),
    row('accessibility', 'Image alt text', `${facts.accessibility.imagesWithAlt} of ${facts.accessibility.imageCount} images`),
    row('speed', 'Performance', `${facts.speed.performanceScore}/100`),
  ];
}
