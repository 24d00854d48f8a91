import { neon, NeonQueryFunction } from '@neondatabase/serverless';
import { PersistenceError } from '../errors';
import { logger } from '../logger';
import { AccessCode, ISSUE_TYPES, IssueType, RECOMMENDATION_STATUSES, Recommendation, RecommendationStatus, ScanRecord } from '../types';
import {
  AccessCodeRepository, AccessCodeWrite, CheckoutRepository, NewRecommendation, NewScan, RecommendationRepository,
  ScanRepository, StatusChange, Storage,
} from './types';

type Sql = NeonQueryFunction<false, false>;
type Row = Record<string, unknown>;

function toDate(value: unknown): Date {
  return value instanceof Date ? value : new Date(String(value));
}

function toIssueType(value: unknown): IssueType {
  const match = ISSUE_TYPES.find(type => type === value);
  if (!match) throw new PersistenceError('read recommendation', `Unknown recommendation type: ${String(value)}`);
  return match;
}

function toStatus(value: unknown): RecommendationStatus {
  const match = RECOMMENDATION_STATUSES.find(status => status === value);
  if (!match) throw new PersistenceError('read recommendation', `Unknown recommendation status: ${String(value)}`);
  return match;
}

function mapScan(row: Row): ScanRecord {
  return {
    id: Number(row.id),
    url: String(row.url),
    scannedAt: toDate(row.scan_date),
    totalScore: Number(row.total_score),
    contentStructureScore: Number(row.content_structure_score),
    technicalScore: Number(row.technical_score),
    metadataScore: Number(row.metadata_score),
    accessibilityScore: Number(row.accessibility_score),
    speedScore: Number(row.speed_score),
    structuredDataPresent: Boolean(row.structured_data_present),
    faqPresent: Boolean(row.faq_present),
    mobileFriendly: Boolean(row.mobile_friendly),
  };
}

function mapRecommendation(row: Row): Recommendation {
  return {
    id: Number(row.id),
    url: String(row.url),
    type: toIssueType(row.type),
    description: String(row.description),
    priority: Number(row.priority),
    pointsPotential: Number(row.points_potential),
    status: toStatus(row.status),
    createdAt: toDate(row.created_at),
    implementedAt: row.implementation_date == null ? null : toDate(row.implementation_date),
    notes: row.notes == null ? null : String(row.notes),
  };
}

function mapAccessCode(row: Row): AccessCode {
  return {
    id: Number(row.id),
    email: String(row.email),
    code: String(row.code),
    used: Boolean(row.used),
  };
}

function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === '23505';
}

export function createNeonStorage(databaseUrl: string): Storage {
  const sql: Sql = neon(databaseUrl);
  let tablesReady: Promise<void> | null = null;

  function ensureTables() {
    if (!tablesReady) {
      tablesReady = sql`
        CREATE TABLE IF NOT EXISTS access_codes (
          id SERIAL PRIMARY KEY,
          email TEXT NOT NULL UNIQUE,
          code TEXT NOT NULL UNIQUE,
          used BOOLEAN NOT NULL DEFAULT false
        )
      `.then(() => sql`
        CREATE TABLE IF NOT EXISTS scans (
          id SERIAL PRIMARY KEY,
          url TEXT NOT NULL,
          scan_date TIMESTAMPTZ NOT NULL DEFAULT now(),
          total_score INTEGER NOT NULL,
          content_structure_score INTEGER NOT NULL,
          technical_score INTEGER NOT NULL,
          metadata_score INTEGER NOT NULL,
          accessibility_score INTEGER NOT NULL,
          speed_score INTEGER NOT NULL,
          structured_data_present BOOLEAN NOT NULL,
          faq_present BOOLEAN NOT NULL,
          mobile_friendly BOOLEAN NOT NULL
        )
      `).then(() =>
        sql`CREATE INDEX IF NOT EXISTS idx_scans_url_date ON scans (url, scan_date)`
      ).then(() => sql`
        CREATE TABLE IF NOT EXISTS recommendations (
          id SERIAL PRIMARY KEY,
          url TEXT NOT NULL,
          type TEXT NOT NULL,
          description TEXT NOT NULL,
          priority INTEGER NOT NULL,
          points_potential INTEGER NOT NULL,
          status TEXT NOT NULL DEFAULT 'pending',
          created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
          implementation_date TIMESTAMPTZ,
          notes TEXT
        )
      `).then(() =>
        sql`CREATE UNIQUE INDEX IF NOT EXISTS idx_recommendations_pending ON recommendations (url, type) WHERE status = 'pending'`
      ).then(() => sql`
        CREATE TABLE IF NOT EXISTS fulfilled_checkouts (
          session_id TEXT PRIMARY KEY,
          email TEXT NOT NULL,
          fulfilled_at TIMESTAMPTZ NOT NULL DEFAULT now()
        )
      `).then(() => {}).catch((err) => {
        tablesReady = null; // Reset so next call retries
        throw err;
      });
    }
    return tablesReady;
  }

  async function run<T>(operation: string, query: () => Promise<T>): Promise<T> {
    try {
      await ensureTables();
      return await query();
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      logger.error('storage', `${operation} failed`, error);
      throw new PersistenceError(operation, error);
    }
  }

  const scans: ScanRepository = {
    insertScanUnlessRecent(scan: NewScan, since: Date) {
      return run('insert scan', async () => {
        const rows = await sql`
          INSERT INTO scans (
            url, scan_date, total_score, content_structure_score, technical_score, metadata_score,
            accessibility_score, speed_score, structured_data_present, faq_present, mobile_friendly
          )
          SELECT
            ${scan.url}::text, ${scan.scannedAt.toISOString()}::timestamptz, ${scan.totalScore}::int,
            ${scan.contentStructureScore}::int, ${scan.technicalScore}::int, ${scan.metadataScore}::int,
            ${scan.accessibilityScore}::int, ${scan.speedScore}::int, ${scan.structuredDataPresent}::boolean,
            ${scan.faqPresent}::boolean, ${scan.mobileFriendly}::boolean
          WHERE NOT EXISTS (
            SELECT 1 FROM scans WHERE url = ${scan.url} AND scan_date >= ${since.toISOString()}::timestamptz
          )
          RETURNING *
        `;
        return rows.length > 0 ? mapScan(rows[0]) : null;
      });
    },

    listScans(url: string) {
      return run('list scans', async () => {
        const rows = await sql`SELECT * FROM scans WHERE url = ${url} ORDER BY scan_date ASC, id ASC`;
        return rows.map(mapScan);
      });
    },

    listTrackedUrls() {
      return run('list tracked urls', async () => {
        const rows = await sql`SELECT DISTINCT url FROM scans ORDER BY url`;
        return rows.map(row => String(row.url));
      });
    },
  };

  const recommendations: RecommendationRepository = {
    insertUnlessPending(input: NewRecommendation) {
      return run('insert recommendation', async () => {
        const rows = await sql`
          INSERT INTO recommendations (url, type, description, priority, points_potential, created_at)
          VALUES (${input.url}, ${input.type}, ${input.description}, ${input.priority}, ${input.pointsPotential}, ${input.createdAt.toISOString()})
          ON CONFLICT (url, type) WHERE status = 'pending' DO NOTHING
          RETURNING *
        `;
        return rows.length > 0 ? mapRecommendation(rows[0]) : null;
      });
    },

    updateStatus(id: number, change: StatusChange) {
      return run('update recommendation', async () => {
        const keepNotes = change.notes === undefined;
        const rows = await sql`
          UPDATE recommendations
          SET status = ${change.status},
              implementation_date = ${change.implementedAt ? change.implementedAt.toISOString() : null},
              notes = CASE WHEN ${keepNotes}::boolean THEN notes ELSE ${change.notes ?? null}::text END
          WHERE id = ${id}
          RETURNING *
        `;
        return rows.length > 0 ? mapRecommendation(rows[0]) : null;
      });
    },

    getRecommendation(id: number) {
      return run('get recommendation', async () => {
        const rows = await sql`SELECT * FROM recommendations WHERE id = ${id}`;
        return rows.length > 0 ? mapRecommendation(rows[0]) : null;
      });
    },

    listRecommendations(url: string) {
      return run('list recommendations', async () => {
        const rows = await sql`
          SELECT * FROM recommendations
          WHERE url = ${url}
          ORDER BY priority ASC, points_potential DESC, id ASC
        `;
        return rows.map(mapRecommendation);
      });
    },
  };

  const accessCodes: AccessCodeRepository = {
    upsertForEmail(email: string, code: string) {
      return run('issue access code', async (): Promise<AccessCodeWrite> => {
        try {
          const rows = await sql`
            INSERT INTO access_codes (email, code)
            VALUES (${email}, ${code})
            ON CONFLICT (email) DO UPDATE SET code = EXCLUDED.code, used = false
            RETURNING *
          `;
          return { ok: true, record: mapAccessCode(rows[0]) };
        } catch (error) {
          // The email conflict is handled above, so a violation here is on code.
          if (isUniqueViolation(error)) return { ok: false, reason: 'code_conflict' };
          throw error;
        }
      });
    },

    findUnused(code: string) {
      return run('find access code', async () => {
        const rows = await sql`SELECT * FROM access_codes WHERE code = ${code} AND used = false`;
        return rows.length > 0 ? mapAccessCode(rows[0]) : null;
      });
    },

    consume(code: string) {
      return run('consume access code', async () => {
        const rows = await sql`
          UPDATE access_codes SET used = true
          WHERE code = ${code} AND used = false
          RETURNING *
        `;
        return rows.length > 0 ? mapAccessCode(rows[0]) : null;
      });
    },
  };

  const checkouts: CheckoutRepository = {
    claim(sessionId: string, email: string, at: Date) {
      return run('claim checkout', async () => {
        const rows = await sql`
          INSERT INTO fulfilled_checkouts (session_id, email, fulfilled_at)
          VALUES (${sessionId}, ${email}, ${at.toISOString()})
          ON CONFLICT (session_id) DO NOTHING
          RETURNING session_id
        `;
        return rows.length > 0;
      });
    },

    release(sessionId: string) {
      return run('release checkout', async () => {
        await sql`DELETE FROM fulfilled_checkouts WHERE session_id = ${sessionId}`;
      });
    },
  };

  return { scans, recommendations, accessCodes, checkouts };
}
