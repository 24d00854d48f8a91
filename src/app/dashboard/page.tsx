'use client';

import { Suspense, useCallback, useEffect, useState } from 'react';
import Link from 'next/link';
import { useSearchParams } from 'next/navigation';
import { AlertTriangle, FileText, Loader2, TrendingDown, TrendingUp } from 'lucide-react';
import { getScoreColor } from '@/components/score-ring';
import { RecommendationRow } from '@/components/recommendation-row';
import {
  ApiRequestError, ProgressResponse, RecommendationView, downloadReport,
  getClientErrorMessage, postJson, requestJson,
} from '@/lib/client';
import { RecommendationStatus } from '@/lib/types';

type Summary = NonNullable<ProgressResponse['summary']>;

function StatCard({ label, value, hint, color }: { label: string; value: string; hint: string; color: string }) {
  return (
    <div className="rounded-xl bg-bg-card p-5">
      <div className="text-[10px] font-bold uppercase tracking-[0.1em] text-text-muted">{label}</div>
      <div className="text-3xl font-mono font-bold mt-2 tracking-tight" style={{ color }}>{value}</div>
      <div className="text-xs text-text-secondary mt-1">{hint}</div>
    </div>
  );
}

function TrendChart({ scans }: { scans: Summary['trendingData'] }) {
  return (
    <div className="rounded-xl bg-bg-card p-5">
      <h3 className="text-[10px] font-bold uppercase tracking-[0.1em] text-text-muted mb-4">Score history</h3>
      <div className="flex items-end gap-1.5 h-32">
        {scans.map(scan => (
          <div key={scan.id} className="flex-1 min-w-2 flex flex-col items-center justify-end h-full group">
            <span className="text-[10px] font-mono text-text-muted opacity-0 group-hover:opacity-100 transition-opacity">{scan.totalScore}</span>
            <div
              className="w-full rounded-t"
              style={{ height: `${Math.max(scan.totalScore, 2)}%`, background: getScoreColor(scan.totalScore, 100) }}
              title={`${new Date(scan.scannedAt).toLocaleString()}: ${scan.totalScore}/100`}
            />
          </div>
        ))}
      </div>
    </div>
  );
}

function ProgressView() {
  const params = useSearchParams();
  const [urls, setUrls] = useState<string[]>([]);
  const [selected, setSelected] = useState(params.get('url') ?? '');
  const [summary, setSummary] = useState<Summary | null>(null);
  const [loading, setLoading] = useState(true);
  const [downloading, setDownloading] = useState(false);
  const [error, setError] = useState('');
  const [needsAccess, setNeedsAccess] = useState(false);

  const fail = (err: unknown) => {
    setNeedsAccess(err instanceof ApiRequestError && err.status === 401);
    setError(getClientErrorMessage(err));
  };

  useEffect(() => {
    requestJson<{ urls: string[] }>('/api/history')
      .then(data => {
        setUrls(data.urls);
        setSelected(current => current || data.urls[0] || '');
      })
      .catch(fail)
      .finally(() => setLoading(false));
  }, []);

  const loadProgress = useCallback(async (url: string) => {
    const data = await requestJson<ProgressResponse>(`/api/progress?url=${encodeURIComponent(url)}`);
    setSummary(data.summary);
  }, []);

  useEffect(() => {
    if (!selected) return;
    setError('');
    loadProgress(selected).catch(fail);
  }, [selected, loadProgress]);

  const handleStatusChange = async (id: number, status: RecommendationStatus, notes: string | null) => {
    try {
      await postJson<RecommendationView>(`/api/recommendations/${id}`, { status, notes }, 'PATCH');
      await loadProgress(selected);
    } catch (err) {
      fail(err);
    }
  };

  const handleDownload = async () => {
    setDownloading(true);
    try {
      await downloadReport('progress', selected);
    } catch (err) {
      fail(err);
    } finally {
      setDownloading(false);
    }
  };

  if (loading) {
    return (
      <div className="flex-1 flex items-center justify-center">
        <Loader2 size={20} className="animate-spin text-text-muted" />
      </div>
    );
  }

  const improvement = summary?.totalImprovement ?? 0;

  return (
    <main className="max-w-5xl mx-auto w-full px-6 py-12">
      <div className="flex flex-wrap items-end gap-4 justify-between">
        <div>
          <h1 className="text-3xl font-bold tracking-tight">Progress</h1>
          <p className="text-text-secondary mt-2 text-sm">Track scores across scans and mark recommendations as you ship them.</p>
        </div>
        {urls.length > 0 && (
          <div className="flex items-center gap-2">
            <select
              value={selected}
              onChange={e => setSelected(e.target.value)}
              className="h-10 px-3 rounded-lg bg-bg-card border border-border text-sm text-text max-w-72 cursor-pointer"
            >
              {urls.map(url => <option key={url} value={url}>{url}</option>)}
            </select>
            <button
              onClick={handleDownload}
              disabled={downloading || !summary}
              className="h-10 inline-flex items-center gap-1.5 px-3.5 rounded-lg bg-bg-elevated border border-border hover:border-border-bright text-sm font-medium transition-all cursor-pointer disabled:opacity-40"
            >
              {downloading ? <Loader2 size={14} className="animate-spin" /> : <FileText size={14} />}
              Progress PDF
            </button>
          </div>
        )}
      </div>

      {error && (
        <div className="mt-6 p-4 rounded-xl bg-bg-card border border-border border-l-4 border-l-danger flex items-start gap-3">
          <AlertTriangle size={16} className="text-danger shrink-0 mt-0.5" />
          <div className="text-sm text-text-secondary">
            {error}
            {needsAccess && <Link href="/" className="ml-2 text-accent-light hover:text-accent font-medium">Redeem a code</Link>}
          </div>
        </div>
      )}

      {!error && urls.length === 0 && (
        <div className="mt-10 p-8 rounded-2xl bg-bg-card border border-border text-center">
          <p className="text-text-secondary text-sm">No pages tracked yet.</p>
          <Link href="/pro" className="inline-block mt-3 text-sm font-medium text-accent-light hover:text-accent">Run a full analysis</Link>
        </div>
      )}

      {summary && (
        <div className="mt-8 space-y-6" style={{ animation: 'fadeIn 0.3s ease-out' }}>
          <div className="grid grid-cols-2 md:grid-cols-4 gap-4">
            <StatCard label="Initial" value={String(summary.initialScore)} hint="First scan" color={getScoreColor(summary.initialScore, 100)} />
            <StatCard label="Current" value={String(summary.currentScore)} hint={`${summary.scanCount} scans`} color={getScoreColor(summary.currentScore, 100)} />
            <StatCard
              label="Change"
              value={`${improvement >= 0 ? '+' : ''}${improvement}`}
              hint={improvement >= 0 ? 'Points gained' : 'Points lost'}
              color={improvement >= 0 ? 'var(--color-score-pass)' : 'var(--color-score-fail)'}
            />
            <StatCard
              label="Implemented"
              value={`${summary.implementedChanges}`}
              hint={`${summary.pendingChanges} pending, +${summary.implementationImpact} pts`}
              color="var(--color-accent-light)"
            />
          </div>

          <TrendChart scans={summary.trendingData} />

          <div>
            <h2 className="flex items-center gap-2 text-[10px] font-bold uppercase tracking-[0.1em] text-text-muted mb-3">
              {improvement >= 0 ? <TrendingUp size={12} /> : <TrendingDown size={12} />}
              Recommendations ({summary.recommendations.length})
            </h2>
            <div className="space-y-2.5">
              {summary.recommendations.map(rec => (
                <RecommendationRow key={`${rec.id}-${rec.status}`} rec={rec} onStatusChange={handleStatusChange} />
              ))}
            </div>
          </div>
        </div>
      )}
    </main>
  );
}

export default function DashboardPage() {
  return (
    <Suspense fallback={null}>
      <ProgressView />
    </Suspense>
  );
}
