import { AccessCode, Recommendation, ScanRecord } from '../types';
import {
  AccessCodeRepository, AccessCodeWrite, NewRecommendation, NewScan, RecommendationRepository,
  CheckoutRepository, ScanRepository, StatusChange, Storage,
} from './types';

export function compareRecommendations(a: Recommendation, b: Recommendation): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  if (a.pointsPotential !== b.pointsPotential) return b.pointsPotential - a.pointsPotential;
  return a.id - b.id;
}

class MemoryScanRepository implements ScanRepository {
  private rows: ScanRecord[] = [];
  private nextId = 1;

  async insertScanUnlessRecent(scan: NewScan, since: Date): Promise<ScanRecord | null> {
    const recent = this.rows.some(row => row.url === scan.url && row.scannedAt.getTime() >= since.getTime());
    if (recent) return null;
    const record: ScanRecord = { ...scan, id: this.nextId++ };
    this.rows.push(record);
    return { ...record };
  }

  async listScans(url: string): Promise<ScanRecord[]> {
    return this.rows
      .filter(row => row.url === url)
      .sort((a, b) => a.scannedAt.getTime() - b.scannedAt.getTime() || a.id - b.id)
      .map(row => ({ ...row }));
  }

  async listTrackedUrls(): Promise<string[]> {
    return [...new Set(this.rows.map(row => row.url))].sort();
  }
}

class MemoryRecommendationRepository implements RecommendationRepository {
  private rows: Recommendation[] = [];
  private nextId = 1;

  async insertUnlessPending(input: NewRecommendation): Promise<Recommendation | null> {
    const pending = this.rows.some(row => row.url === input.url && row.type === input.type && row.status === 'pending');
    if (pending) return null;
    const record: Recommendation = {
      ...input,
      id: this.nextId++,
      status: 'pending',
      implementedAt: null,
      notes: null,
    };
    this.rows.push(record);
    return { ...record };
  }

  async updateStatus(id: number, change: StatusChange): Promise<Recommendation | null> {
    const row = this.rows.find(r => r.id === id);
    if (!row) return null;
    row.status = change.status;
    row.implementedAt = change.implementedAt;
    if (change.notes !== undefined) row.notes = change.notes;
    return { ...row };
  }

  async getRecommendation(id: number): Promise<Recommendation | null> {
    const row = this.rows.find(r => r.id === id);
    return row ? { ...row } : null;
  }

  async listRecommendations(url: string): Promise<Recommendation[]> {
    return this.rows
      .filter(row => row.url === url)
      .sort(compareRecommendations)
      .map(row => ({ ...row }));
  }
}

class MemoryAccessCodeRepository implements AccessCodeRepository {
  private rows: AccessCode[] = [];
  private nextId = 1;

  async upsertForEmail(email: string, code: string): Promise<AccessCodeWrite> {
    if (this.rows.some(row => row.code === code && row.email !== email)) {
      return { ok: false, reason: 'code_conflict' };
    }
    const existing = this.rows.find(row => row.email === email);
    if (existing) {
      existing.code = code;
      existing.used = false;
      return { ok: true, record: { ...existing } };
    }
    const record: AccessCode = { id: this.nextId++, email, code, used: false };
    this.rows.push(record);
    return { ok: true, record: { ...record } };
  }

  async findUnused(code: string): Promise<AccessCode | null> {
    const row = this.rows.find(r => r.code === code && !r.used);
    return row ? { ...row } : null;
  }

  async consume(code: string): Promise<AccessCode | null> {
    const row = this.rows.find(r => r.code === code && !r.used);
    if (!row) return null;
    row.used = true;
    return { ...row };
  }
}

class MemoryCheckoutRepository implements CheckoutRepository {
  private fulfilled = new Map<string, { email: string; at: Date }>();

  async claim(sessionId: string, email: string, at: Date): Promise<boolean> {
    if (this.fulfilled.has(sessionId)) return false;
    this.fulfilled.set(sessionId, { email, at });
    return true;
  }

  async release(sessionId: string): Promise<void> {
    this.fulfilled.delete(sessionId);
  }
}

export function createMemoryStorage(): Storage {
  return {
    scans: new MemoryScanRepository(),
    recommendations: new MemoryRecommendationRepository(),
    accessCodes: new MemoryAccessCodeRepository(),
    checkouts: new MemoryCheckoutRepository(),
  };
}
