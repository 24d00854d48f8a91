import { logger } from './logger';
import { getStorage } from './storage';
import { RecommendationRepository, ScanRepository } from './storage/types';
import {
  ProgressSummary, QuickWinIssue, Recommendation, RecommendationStatus, ScanHistory, ScoreResult, SignalFacts,
} from './types';

export const SCAN_DEBOUNCE_MS = 60_000;

export interface HistoryStoreDeps {
  scans: ScanRepository;
  recommendations: RecommendationRepository;
  now?: () => Date;
}

type RecordedFacts = Pick<SignalFacts, 'url' | 'structuredData' | 'faq' | 'mobileFriendly'> & {
  speed: Pick<SignalFacts['speed'], 'performanceScore'>;
};

export class HistoryStore {
  private readonly scans: ScanRepository;
  private readonly recommendations: RecommendationRepository;
  private readonly now: () => Date;

  constructor(deps: HistoryStoreDeps) {
    this.scans = deps.scans;
    this.recommendations = deps.recommendations;
    this.now = deps.now ?? (() => new Date());
  }

  /** Returns false when a scan of the same url was stored within the last minute. */
  async recordScan(url: string, score: ScoreResult, facts: RecordedFacts): Promise<boolean> {
    const scannedAt = this.now();
    const since = new Date(scannedAt.getTime() - SCAN_DEBOUNCE_MS);
    const inserted = await this.scans.insertScanUnlessRecent({
      url,
      scannedAt,
      totalScore: score.totalScore,
      contentStructureScore: score.subscores.contentStructure,
      technicalScore: score.subscores.technical,
      metadataScore: score.subscores.metadata,
      accessibilityScore: score.subscores.accessibility,
      speedScore: facts.speed.performanceScore,
      structuredDataPresent: facts.structuredData,
      faqPresent: facts.faq,
      mobileFriendly: facts.mobileFriendly,
    }, since);

    if (!inserted) {
      logger.debug('history', `Skipped duplicate scan of ${url}`);
    }
    return inserted !== null;
  }

  /** Returns the number of rows inserted; issues with a pending row of the same type are skipped. */
  async recordRecommendations(url: string, issues: QuickWinIssue[]): Promise<number> {
    const createdAt = this.now();
    let inserted = 0;
    // Sequential: several speed issues share one (url, type) slot.
    for (const issue of issues) {
      const row = await this.recommendations.insertUnlessPending({
        url,
        type: issue.type,
        description: issue.fix,
        priority: issue.priority,
        pointsPotential: issue.pointsAvailable,
        createdAt,
      });
      if (row) inserted++;
    }
    return inserted;
  }

  async updateRecommendationStatus(
    id: number,
    status: RecommendationStatus,
    notes?: string | null,
  ): Promise<Recommendation | null> {
    return this.recommendations.updateStatus(id, {
      status,
      implementedAt: status === 'implemented' ? this.now() : null,
      notes,
    });
  }

  async getHistory(url: string): Promise<ScanHistory> {
    const [scans, recommendations] = await Promise.all([
      this.scans.listScans(url),
      this.recommendations.listRecommendations(url),
    ]);
    return { scans, recommendations };
  }

  /** Null when the url has never been scanned. */
  async getProgressSummary(url: string): Promise<ProgressSummary | null> {
    const { scans, recommendations } = await this.getHistory(url);
    if (scans.length === 0) return null;

    const implemented = recommendations.filter(r => r.status === 'implemented');
    const initialScore = scans[0].totalScore;
    const currentScore = scans[scans.length - 1].totalScore;

    return {
      initialScore,
      currentScore,
      totalImprovement: currentScore - initialScore,
      scanCount: scans.length,
      implementedChanges: implemented.length,
      pendingChanges: recommendations.filter(r => r.status === 'pending').length,
      implementationImpact: implemented.reduce((sum, r) => sum + r.pointsPotential, 0),
      trendingData: scans,
      recommendations,
    };
  }

  listTrackedUrls(): Promise<string[]> {
    return this.scans.listTrackedUrls();
  }
}

export function getHistoryStore(): HistoryStore {
  const { scans, recommendations } = getStorage();
  return new HistoryStore({ scans, recommendations });
}
