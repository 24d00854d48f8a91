import {
  ComponentScores, LITE_SCORE, MetadataFacts, SCORE_WEIGHTS, SPEED_PASS_SCORE,
  ScoreResult, SignalFacts, Subscores,
} from '../types';

export type ScoringInput = Pick<SignalFacts, 'metadata' | 'headers' | 'structuredData' | 'faq' | 'mobileFriendly'> & {
  accessibility: Pick<SignalFacts['accessibility'], 'allImagesHaveAlt'>;
  speed: Pick<SignalFacts['speed'], 'performanceScore'>;
};

export function calculateComponentScores(facts: ScoringInput): ComponentScores {
  return {
    structuredData: facts.structuredData ? SCORE_WEIGHTS.structuredData : 0,
    faq: facts.faq ? SCORE_WEIGHTS.faq : 0,
    headers: facts.headers.h1Present ? SCORE_WEIGHTS.headers : 0,
    title: facts.metadata.title !== null ? SCORE_WEIGHTS.title : 0,
    speed: facts.speed.performanceScore >= SPEED_PASS_SCORE ? SCORE_WEIGHTS.speed : 0,
    description: facts.metadata.description !== null ? SCORE_WEIGHTS.description : 0,
    mobile: facts.mobileFriendly ? SCORE_WEIGHTS.mobile : 0,
    accessibility: facts.accessibility.allImagesHaveAlt ? SCORE_WEIGHTS.accessibility : 0,
  };
}

export function calculateSubscores(components: ComponentScores): Subscores {
  return {
    contentStructure: components.structuredData + components.faq + components.headers,
    technical: components.speed + components.mobile,
    metadata: components.title + components.description,
    accessibility: components.accessibility,
  };
}

export function calculateScore(facts: ScoringInput): ScoreResult {
  const componentScores = calculateComponentScores(facts);
  const subscores = calculateSubscores(componentScores);
  const totalScore = Object.values(componentScores).reduce((sum, points) => sum + points, 0);
  return { totalScore, subscores, componentScores };
}

/** Free-tier score: only the title is checked. */
export function calculateLiteScore(metadata: MetadataFacts): number {
  return metadata.title !== null ? LITE_SCORE.withTitle : LITE_SCORE.withoutTitle;
}
