'use client';

import { useState } from 'react';
import Link from 'next/link';
import { Globe, Loader2, ArrowRight, AlertTriangle, FileText, BarChart3, Gauge } from 'lucide-react';
import { ScoreRing } from '@/components/score-ring';
import { SubscoreCard } from '@/components/subscore-card';
import { IssueCard } from '@/components/issue-card';
import { AnalyzeResponse, ApiRequestError, downloadReport, getClientErrorMessage, postJson } from '@/lib/client';
import { SUBSCORE_COMPONENTS, SUBSCORE_LABELS, describeSignals } from '@/lib/signal-rows';
import { SUBSCORE_MAXIMUMS, Subscores } from '@/lib/types';

const SUBSCORE_ORDER: Array<keyof Subscores> = ['contentStructure', 'technical', 'metadata', 'accessibility'];

function formatBytes(bytes: number): string {
  if (bytes >= 1_000_000) return `${(bytes / 1_000_000).toFixed(1)} MB`;
  return `${(bytes / 1024).toFixed(1)} KB`;
}

function SpeedPanel({ speed }: { speed: AnalyzeResponse['facts']['speed'] }) {
  const rows: Array<[string, string]> = [
    ['Time to first byte', `${speed.timeToFirstByteMs} ms`],
    ['Total load time', `${speed.totalTimeMs} ms`],
    ['Resources', `${speed.resourceCount} (${speed.resourceTypes.script ?? 0} JS, ${speed.resourceTypes.css ?? 0} CSS, ${speed.resourceTypes.image ?? 0} img)`],
    ['Total size', formatBytes(speed.totalBytes)],
  ];

  return (
    <div className="rounded-xl bg-bg-card p-5">
      <div className="flex items-center gap-2 mb-4">
        <Gauge size={15} className="text-accent-light" />
        <h3 className="font-semibold text-[15px]">Speed</h3>
        <span className="ml-auto text-xs font-mono text-text-secondary">{speed.performanceScore}/100</span>
      </div>
      <dl className="grid grid-cols-2 gap-x-4 gap-y-3">
        {rows.map(([label, value]) => (
          <div key={label}>
            <dt className="text-[10px] font-bold uppercase tracking-[0.1em] text-text-muted">{label}</dt>
            <dd className="text-sm font-mono text-text mt-0.5">{value}</dd>
          </div>
        ))}
      </dl>
    </div>
  );
}

export default function ProAnalysis() {
  const [url, setUrl] = useState('');
  const [loading, setLoading] = useState(false);
  const [downloading, setDownloading] = useState(false);
  const [error, setError] = useState('');
  const [needsAccess, setNeedsAccess] = useState(false);
  const [result, setResult] = useState<AnalyzeResponse | null>(null);

  const handleAnalyze = async () => {
    setLoading(true);
    setError('');
    setNeedsAccess(false);
    try {
      setResult(await postJson<AnalyzeResponse>('/api/analyze', { url }));
    } catch (err) {
      setNeedsAccess(err instanceof ApiRequestError && err.status === 401);
      setError(getClientErrorMessage(err));
    } finally {
      setLoading(false);
    }
  };

  const handleDownload = async () => {
    if (!result) return;
    setDownloading(true);
    try {
      await downloadReport('detailed', result.url);
    } catch (err) {
      setError(getClientErrorMessage(err));
    } finally {
      setDownloading(false);
    }
  };

  const signals = result ? describeSignals(result.facts, result.score.componentScores) : [];

  return (
    <main className="max-w-5xl mx-auto w-full px-6 py-12">
      <h1 className="text-3xl font-bold tracking-tight">Full Analysis</h1>
      <p className="text-text-secondary mt-2 text-sm">Every signal, speed metrics and prioritized fixes. Each scan is saved to your progress history.</p>

      <form
        onSubmit={e => { e.preventDefault(); void handleAnalyze(); }}
        className="mt-6 flex gap-2 p-2 rounded-2xl bg-bg-elevated border border-border"
      >
        <div className="relative flex-1">
          <Globe size={15} className="absolute left-3 top-1/2 -translate-y-1/2 text-text-muted" />
          <input
            value={url}
            onChange={e => setUrl(e.target.value)}
            placeholder="example.com/pricing"
            className="w-full h-11 pl-10 pr-4 rounded-lg bg-bg-card border border-border focus:border-accent/50 focus:ring-1 focus:ring-accent/20 outline-none text-text placeholder-text-muted transition-all text-sm"
            disabled={loading}
          />
        </div>
        <button
          type="submit"
          disabled={!url.trim() || loading}
          className="h-11 px-6 rounded-[10px] bg-accent hover:bg-accent-light disabled:opacity-40 disabled:cursor-not-allowed text-white font-semibold text-[15px] transition-all flex items-center gap-2 cursor-pointer"
        >
          {loading ? <Loader2 size={16} className="animate-spin" /> : <><span>Analyze</span><ArrowRight size={15} /></>}
        </button>
      </form>

      {error && (
        <div className="mt-4 p-4 rounded-xl bg-bg-card border border-border border-l-4 border-l-danger flex items-start gap-3">
          <AlertTriangle size={16} className="text-danger shrink-0 mt-0.5" />
          <div className="text-sm text-text-secondary">
            {error}
            {needsAccess && (
              <Link href="/" className="ml-2 text-accent-light hover:text-accent font-medium">Redeem a code</Link>
            )}
          </div>
        </div>
      )}

      {result && (
        <div className="mt-10 space-y-8" style={{ animation: 'fadeIn 0.3s ease-out' }}>
          <div className="flex flex-col sm:flex-row items-center gap-8">
            <ScoreRing score={result.score.totalScore} grade={result.grade} size={140} label="Visibility" />
            <div className="flex-1 min-w-0">
              <p className="text-xs text-text-muted font-mono truncate">{result.url}</p>
              <p className="text-sm text-text-secondary mt-2">
                {result.recorded ? 'Scan saved to your history.' : 'Scanned again within a minute; history was not updated.'}
                {result.recommendationsAdded > 0 && ` ${result.recommendationsAdded} new recommendations tracked.`}
              </p>
              <div className="flex flex-wrap gap-2 mt-4">
                <button
                  onClick={handleDownload}
                  disabled={downloading}
                  className="inline-flex items-center gap-1.5 px-3.5 py-2 rounded-lg bg-bg-elevated border border-border hover:border-border-bright text-sm font-medium transition-all cursor-pointer disabled:opacity-40"
                >
                  {downloading ? <Loader2 size={14} className="animate-spin" /> : <FileText size={14} />}
                  Detailed PDF
                </button>
                <Link
                  href={`/dashboard?url=${encodeURIComponent(result.url)}`}
                  className="inline-flex items-center gap-1.5 px-3.5 py-2 rounded-lg bg-accent hover:bg-accent-light text-white text-sm font-medium transition-all"
                >
                  <BarChart3 size={14} />
                  View progress
                </Link>
              </div>
            </div>
          </div>

          {result.warnings.length > 0 && (
            <ul className="p-4 rounded-xl bg-score-warn-dim text-sm text-text-secondary space-y-1">
              {result.warnings.map(warning => <li key={warning}>{warning}</li>)}
            </ul>
          )}

          <div className="grid lg:grid-cols-[1fr_320px] gap-6 items-start">
            <div className="space-y-3">
              {SUBSCORE_ORDER.map(key => (
                <SubscoreCard
                  key={key}
                  name={SUBSCORE_LABELS[key]}
                  points={result.score.subscores[key]}
                  maxPoints={SUBSCORE_MAXIMUMS[key]}
                  signals={signals.filter(signal => SUBSCORE_COMPONENTS[key].includes(signal.key))}
                />
              ))}
            </div>
            <SpeedPanel speed={result.facts.speed} />
          </div>

          <div>
            <h2 className="text-[10px] font-bold uppercase tracking-[0.1em] text-text-muted mb-3">
              Recommendations ({result.issues.length})
            </h2>
            {result.issues.length === 0 ? (
              <p className="text-sm text-text-secondary">Every signal passes.</p>
            ) : (
              <div className="space-y-3">
                {result.issues.map(issue => <IssueCard key={`${issue.type}-${issue.fix}`} issue={issue} />)}
              </div>
            )}
          </div>
        </div>
      )}
    </main>
  );
}
