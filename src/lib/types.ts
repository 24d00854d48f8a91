export type ResourceType = 'script' | 'css' | 'image';

export type Effort = 'low' | 'medium';

export const ISSUE_TYPES = [
  'title',
  'description',
  'h1',
  'structured_data',
  'faq',
  'mobile',
  'accessibility',
  'speed',
] as const;

export type IssueType = typeof ISSUE_TYPES[number];

export const RECOMMENDATION_STATUSES = ['pending', 'in_progress', 'implemented', 'deferred'] as const;

export type RecommendationStatus = typeof RECOMMENDATION_STATUSES[number];

export interface FetchedPage {
  url: string;
  status: number;
  headers: Record<string, string>;
  body: string;
  elapsedMs: number;
}

export interface MetadataFacts {
  title: string | null;
  description: string | null;
}

export interface HeaderFacts {
  h1Count: number;
  h2Count: number;
  h1Present: boolean;
  h2Present: boolean;
}

export interface AccessibilityFacts {
  allImagesHaveAlt: boolean;
  imageCount: number;
  imagesWithAlt: number;
}

export interface SpeedMetrics {
  timeToFirstByteMs: number;
  totalTimeMs: number;
  resourceCount: number;
  totalBytes: number;
  resourceTypes: Partial<Record<ResourceType, number>>;
  failedProbes: number;
  performanceScore: number;
}

export interface SignalFacts {
  url: string;
  metadata: MetadataFacts;
  headers: HeaderFacts;
  structuredData: boolean;
  faq: boolean;
  mobileFriendly: boolean;
  accessibility: AccessibilityFacts;
  speed: SpeedMetrics;
}

export interface Subscores {
  contentStructure: number;
  technical: number;
  metadata: number;
  accessibility: number;
}

export interface ComponentScores {
  structuredData: number;
  faq: number;
  headers: number;
  title: number;
  speed: number;
  description: number;
  mobile: number;
  accessibility: number;
}

export interface ScoreResult {
  totalScore: number;
  subscores: Subscores;
  componentScores: ComponentScores;
}

export interface QuickWinIssue {
  type: IssueType;
  priority: number;
  effort: Effort;
  fix: string;
  example: string;
  pointsAvailable: number;
}

export interface ScanOutcome {
  facts: SignalFacts;
  score: ScoreResult;
  grade: string;
  issues: QuickWinIssue[];
  warnings: string[];
  scannedAt: string;
}

export interface ScanRecord {
  id: number;
  url: string;
  scannedAt: Date;
  totalScore: number;
  contentStructureScore: number;
  technicalScore: number;
  metadataScore: number;
  accessibilityScore: number;
  speedScore: number;
  structuredDataPresent: boolean;
  faqPresent: boolean;
  mobileFriendly: boolean;
}

export interface Recommendation {
  id: number;
  url: string;
  type: IssueType;
  description: string;
  priority: number;
  pointsPotential: number;
  status: RecommendationStatus;
  createdAt: Date;
  implementedAt: Date | null;
  notes: string | null;
}

export interface AccessCode {
  id: number;
  email: string;
  code: string;
  used: boolean;
}

export interface ScanHistory {
  scans: ScanRecord[];
  recommendations: Recommendation[];
}

export interface ProgressSummary {
  initialScore: number;
  currentScore: number;
  totalImprovement: number;
  scanCount: number;
  implementedChanges: number;
  pendingChanges: number;
  implementationImpact: number;
  trendingData: ScanRecord[];
  recommendations: Recommendation[];
}

export function getGrade(score: number): string {
  if (score >= 90) return 'A+';
  if (score >= 80) return 'A';
  if (score >= 70) return 'B';
  if (score >= 60) return 'C';
  if (score >= 50) return 'D';
  return 'F';
}

// Point allocations are stored with every scan; changing them breaks trend comparisons.
export const SCORE_WEIGHTS = {
  structuredData: 25,
  faq: 20,
  headers: 15,
  title: 10,
  speed: 10,
  description: 8,
  mobile: 7,
  accessibility: 5,
} as const satisfies ComponentScores;

export const SUBSCORE_MAXIMUMS: Subscores = {
  contentStructure: SCORE_WEIGHTS.structuredData + SCORE_WEIGHTS.faq + SCORE_WEIGHTS.headers,
  technical: SCORE_WEIGHTS.speed + SCORE_WEIGHTS.mobile,
  metadata: SCORE_WEIGHTS.title + SCORE_WEIGHTS.description,
  accessibility: SCORE_WEIGHTS.accessibility,
};

export const SPEED_PASS_SCORE = 80;

export const SPEED_THRESHOLDS = {
  timeToFirstByteMs: 200,
  totalTimeMs: 3000,
  resourceCount: 50,
  totalBytes: 5_000_000,
  penalty: 20,
} as const;

export const LITE_SCORE = {
  withTitle: 65,
  withoutTitle: 50,
} as const;
