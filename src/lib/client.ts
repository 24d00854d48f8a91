import type { ProgressSummary, QuickWinIssue, Recommendation, ScanHistory, ScanOutcome } from './types';
import type { ReportKind } from './report/pdf-report';

/** Shape a value takes after a round trip through JSON. */
export type Jsonified<T> = T extends Date
  ? string
  : T extends (infer U)[]
    ? Jsonified<U>[]
    : T extends object
      ? { [K in keyof T]: Jsonified<T[K]> }
      : T;

export interface FreeScoreResponse {
  url: string;
  liteScore: number;
  grade: string;
  quickWins: QuickWinIssue[];
  leadCaptured: boolean;
  scannedAt: string;
}

export interface AnalyzeResponse extends ScanOutcome {
  url: string;
  recorded: boolean;
  recommendationsAdded: number;
}

export type HistoryResponse = Jsonified<ScanHistory> & { url: string };

export interface ProgressResponse {
  url: string;
  summary: Jsonified<ProgressSummary> | null;
}

export type RecommendationView = Jsonified<Recommendation>;

export class ApiRequestError extends Error {
  constructor(message: string, public readonly status: number) {
    super(message);
    this.name = 'ApiRequestError';
  }
}

async function failure(res: Response): Promise<ApiRequestError> {
  const data: unknown = await res.json().catch(() => null);
  const message = typeof data === 'object' && data !== null && 'error' in data && typeof data.error === 'string'
    ? data.error
    : `Request failed (${res.status})`;
  return new ApiRequestError(message, res.status);
}

export async function requestJson<T>(input: string, init?: RequestInit): Promise<T> {
  const res = await fetch(input, init);
  if (!res.ok) throw await failure(res);
  return res.json();
}

export function postJson<T>(input: string, body: unknown, method: 'POST' | 'PATCH' = 'POST'): Promise<T> {
  return requestJson<T>(input, {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

export async function downloadReport(kind: ReportKind, url: string): Promise<void> {
  const res = await fetch('/api/report', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ kind, url }),
  });
  if (!res.ok) throw await failure(res);

  const disposition = res.headers.get('Content-Disposition') ?? '';
  const filename = /filename="([^"]+)"/.exec(disposition)?.[1] ?? `signalscore-${kind}.pdf`;
  const blob = await res.blob();
  const href = URL.createObjectURL(blob);
  const a = document.createElement('a');
  a.href = href;
  a.download = filename;
  document.body.appendChild(a);
  a.click();
  a.remove();
  URL.revokeObjectURL(href);
}

export function getClientErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Something went wrong. Please try again.';
}
