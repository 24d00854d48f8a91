import { AccessCode, IssueType, Recommendation, RecommendationStatus, ScanRecord } from '../types';

export type NewScan = Omit<ScanRecord, 'id'>;

export interface NewRecommendation {
  url: string;
  type: IssueType;
  description: string;
  priority: number;
  pointsPotential: number;
  createdAt: Date;
}

export interface StatusChange {
  status: RecommendationStatus;
  implementedAt: Date | null;
  /** `undefined` keeps the stored notes, `null` clears them. */
  notes?: string | null;
}

export interface ScanRepository {
  /** Inserts unless a scan for the same url exists at or after `since`; null when skipped. */
  insertScanUnlessRecent(scan: NewScan, since: Date): Promise<ScanRecord | null>;
  /** Oldest first. */
  listScans(url: string): Promise<ScanRecord[]>;
  listTrackedUrls(): Promise<string[]>;
}

export interface RecommendationRepository {
  /** Inserts unless a pending row for the same (url, type) exists; null when skipped. */
  insertUnlessPending(recommendation: NewRecommendation): Promise<Recommendation | null>;
  updateStatus(id: number, change: StatusChange): Promise<Recommendation | null>;
  getRecommendation(id: number): Promise<Recommendation | null>;
  /** Ascending priority, then descending points, then insertion order. */
  listRecommendations(url: string): Promise<Recommendation[]>;
}

export type AccessCodeWrite =
  | { ok: true; record: AccessCode }
  | { ok: false; reason: 'code_conflict' };

export interface AccessCodeRepository {
  /** Creates the row for `email`, or replaces its code with a fresh unused one. */
  upsertForEmail(email: string, code: string): Promise<AccessCodeWrite>;
  findUnused(code: string): Promise<AccessCode | null>;
  /** Marks an unused code as used in one conditional write; null if absent or already used. */
  consume(code: string): Promise<AccessCode | null>;
}

export interface CheckoutRepository {
  /** Records a checkout session as fulfilled; false when it already was. */
  claim(sessionId: string, email: string, at: Date): Promise<boolean>;
  /** Drops a claim so a failed fulfilment can be retried. */
  release(sessionId: string): Promise<void>;
}

export interface Storage {
  scans: ScanRepository;
  recommendations: RecommendationRepository;
  accessCodes: AccessCodeRepository;
  checkouts: CheckoutRepository;
}
