'use client';

import { Suspense, useState } from 'react';
import {
  Globe, Mail, Loader2, ArrowRight, AlertTriangle, FileText,
  KeyRound, CreditCard, CheckCircle2, Search, ListChecks, LineChart,
} from 'lucide-react';
import { useRouter, useSearchParams } from 'next/navigation';
import { signIn } from 'next-auth/react';
import { ScoreRing } from '@/components/score-ring';
import { IssueCard } from '@/components/issue-card';
import { SiteShell } from '@/components/site-shell';
import { FreeScoreResponse, downloadReport, getClientErrorMessage, postJson } from '@/lib/client';

const STEPS = [
  { icon: Search, title: 'Scan', desc: 'We fetch your page once and read its signals' },
  { icon: ListChecks, title: 'Prioritize', desc: 'Issues are ranked by urgency and effort' },
  { icon: LineChart, title: 'Track', desc: 'Pro scans record history so you can see progress' },
];

const inputClass =
  'w-full h-11 pl-10 pr-4 rounded-lg bg-bg-card border border-border focus:border-accent/50 focus:ring-1 focus:ring-accent/20 outline-none text-text placeholder-text-muted transition-all text-sm';

function CheckoutBanner() {
  const params = useSearchParams();
  const checkout = params.get('checkout');
  if (checkout === 'success') {
    return (
      <div className="mb-6 p-4 rounded-xl bg-score-pass-dim text-sm text-text flex items-center gap-2.5">
        <CheckCircle2 size={16} className="text-score-pass shrink-0" />
        Payment received. Your access code is on its way to your inbox.
      </div>
    );
  }
  if (checkout === 'cancelled') {
    return (
      <div className="mb-6 p-4 rounded-xl bg-bg-card border border-border text-sm text-text-secondary">
        Checkout was cancelled. You can upgrade any time.
      </div>
    );
  }
  return null;
}

function ErrorNotice({ message }: { message: string }) {
  return (
    <div className="mt-4 p-4 rounded-xl bg-bg-card border border-border border-l-4 border-l-danger flex items-start gap-3" style={{ animation: 'fadeIn 0.2s ease-out' }}>
      <AlertTriangle size={16} className="text-danger shrink-0 mt-0.5" />
      <p className="text-sm text-text-secondary leading-relaxed">{message}</p>
    </div>
  );
}

function UnlockPanel({ email, url }: { email: string; url: string }) {
  const router = useRouter();
  const [code, setCode] = useState('');
  const [busy, setBusy] = useState<'redeem' | 'buy' | null>(null);
  const [error, setError] = useState('');

  const handleRedeem = async () => {
    setBusy('redeem');
    setError('');
    try {
      const result = await signIn('access-code', { code: code.trim(), redirect: false });
      if (!result || result.error) {
        setError(code.trim() ? 'Invalid or already used access code' : 'Please enter your access code');
        setBusy(null);
        return;
      }
      router.push('/pro');
    } catch (err) {
      setError(getClientErrorMessage(err));
      setBusy(null);
    }
  };

  const handleBuy = async () => {
    setBusy('buy');
    setError('');
    try {
      const session = await postJson<{ url: string }>('/api/checkout', { email, url: url || undefined });
      window.location.href = session.url;
    } catch (err) {
      setError(getClientErrorMessage(err));
      setBusy(null);
    }
  };

  return (
    <div className="rounded-2xl bg-bg-card border border-border p-6">
      <h2 className="text-lg font-bold tracking-tight">Unlock the full analysis</h2>
      <p className="text-sm text-text-secondary mt-1.5 leading-relaxed">
        Pro shows every signal and its points, speed metrics, all recommendations, PDF reports and progress tracking over time.
      </p>

      <div className="grid sm:grid-cols-2 gap-4 mt-5">
        <div>
          <label className="text-[10px] font-bold uppercase tracking-[0.1em] text-text-muted">Have a code?</label>
          <div className="relative mt-2">
            <KeyRound size={15} className="absolute left-3 top-1/2 -translate-y-1/2 text-text-muted" />
            <input
              value={code}
              onChange={e => setCode(e.target.value)}
              placeholder="ABCD1234"
              className={`${inputClass} font-mono uppercase`}
              disabled={busy !== null}
            />
          </div>
          <button
            onClick={handleRedeem}
            disabled={!code.trim() || busy !== null}
            className="mt-2.5 w-full h-10 rounded-lg bg-accent hover:bg-accent-light disabled:opacity-40 disabled:cursor-not-allowed text-white font-medium text-sm transition-all flex items-center justify-center gap-2 cursor-pointer"
          >
            {busy === 'redeem' ? <Loader2 size={15} className="animate-spin" /> : 'Redeem'}
          </button>
        </div>
        <div>
          <label className="text-[10px] font-bold uppercase tracking-[0.1em] text-text-muted">Need one?</label>
          <p className="text-xs text-text-secondary mt-2 leading-relaxed">
            We email a single-use code to <span className="font-medium text-text">{email || 'your address'}</span> as soon as payment completes.
          </p>
          <button
            onClick={handleBuy}
            disabled={!email.trim() || busy !== null}
            className="mt-2.5 w-full h-10 rounded-lg bg-bg-elevated border border-border hover:border-border-bright disabled:opacity-40 disabled:cursor-not-allowed text-text font-medium text-sm transition-all flex items-center justify-center gap-2 cursor-pointer"
          >
            {busy === 'buy' ? <Loader2 size={15} className="animate-spin" /> : <><CreditCard size={14} /> Buy access</>}
          </button>
        </div>
      </div>
      {error && <ErrorNotice message={error} />}
    </div>
  );
}

function FreeScore() {
  const [email, setEmail] = useState('');
  const [url, setUrl] = useState('');
  const [loading, setLoading] = useState(false);
  const [downloading, setDownloading] = useState(false);
  const [error, setError] = useState('');
  const [result, setResult] = useState<FreeScoreResponse | null>(null);

  const handleScore = async () => {
    setLoading(true);
    setError('');
    setResult(null);
    try {
      setResult(await postJson<FreeScoreResponse>('/api/score', { email, url }));
    } catch (err) {
      setError(getClientErrorMessage(err));
    } finally {
      setLoading(false);
    }
  };

  const handleDownload = async () => {
    if (!result) return;
    setDownloading(true);
    try {
      await downloadReport('quick-wins', result.url);
    } catch (err) {
      setError(getClientErrorMessage(err));
    } finally {
      setDownloading(false);
    }
  };

  return (
    <>
      <header className="max-w-3xl mx-auto w-full px-6 pt-16 pb-10">
        <Suspense fallback={null}>
          <CheckoutBanner />
        </Suspense>
        <h1 className="text-4xl sm:text-5xl font-bold tracking-tight text-center leading-tight">
          Is your page ready for <span className="text-accent-light">answer engines</span>?
        </h1>
        <p className="text-text-secondary text-center mt-4 max-w-xl mx-auto">
          Get a free visibility score and your top quick wins for voice assistants and AI answers.
        </p>

        <form
          onSubmit={e => { e.preventDefault(); void handleScore(); }}
          className="mt-10 p-2 rounded-2xl bg-bg-elevated border border-border grid sm:grid-cols-[1fr_1fr_auto] gap-2"
        >
          <div className="relative">
            <Globe size={15} className="absolute left-3 top-1/2 -translate-y-1/2 text-text-muted" />
            <input value={url} onChange={e => setUrl(e.target.value)} placeholder="example.com" className={inputClass} disabled={loading} />
          </div>
          <div className="relative">
            <Mail size={15} className="absolute left-3 top-1/2 -translate-y-1/2 text-text-muted" />
            <input type="email" value={email} onChange={e => setEmail(e.target.value)} placeholder="you@company.com" className={inputClass} disabled={loading} />
          </div>
          <button
            type="submit"
            disabled={!url.trim() || !email.trim() || loading}
            className="h-11 px-6 rounded-[10px] bg-accent hover:bg-accent-light disabled:opacity-40 disabled:cursor-not-allowed text-white font-semibold text-[15px] transition-all flex items-center justify-center gap-2 cursor-pointer"
          >
            {loading ? <Loader2 size={16} className="animate-spin" /> : <><span>Score</span><ArrowRight size={15} /></>}
          </button>
        </form>
        {error && <ErrorNotice message={error} />}
      </header>

      {result ? (
        <section className="max-w-3xl mx-auto w-full px-6 pb-16 space-y-6" style={{ animation: 'fadeIn 0.3s ease-out' }}>
          <div className="rounded-2xl bg-bg-card border border-border p-6 flex flex-col sm:flex-row items-center gap-6">
            <ScoreRing score={result.liteScore} grade={result.grade} label="Lite Score" />
            <div className="flex-1 min-w-0 text-center sm:text-left">
              <p className="text-xs text-text-muted font-mono truncate">{result.url}</p>
              <p className="text-sm text-text-secondary mt-2 leading-relaxed">
                The lite score checks your page title only. The full analysis scores eight signals out of 100.
              </p>
              <button
                onClick={handleDownload}
                disabled={downloading}
                className="mt-4 inline-flex items-center gap-1.5 px-3.5 py-2 rounded-lg bg-bg-elevated border border-border hover:border-border-bright text-sm font-medium text-text transition-all cursor-pointer disabled:opacity-40"
              >
                {downloading ? <Loader2 size={14} className="animate-spin" /> : <FileText size={14} />}
                Quick Wins PDF
              </button>
            </div>
          </div>

          <div>
            <h2 className="text-[10px] font-bold uppercase tracking-[0.1em] text-text-muted mb-3">Top quick wins</h2>
            {result.quickWins.length === 0 ? (
              <p className="text-sm text-text-secondary">No quick wins found. Nice work.</p>
            ) : (
              <div className="space-y-3">
                {result.quickWins.map(issue => <IssueCard key={`${issue.type}-${issue.fix}`} issue={issue} />)}
              </div>
            )}
          </div>

          <UnlockPanel email={email} url={result.url} />
        </section>
      ) : (
        <section className="max-w-4xl mx-auto w-full px-6 pb-16 space-y-10">
          <div className="grid sm:grid-cols-3 gap-6">
            {STEPS.map(step => (
              <div key={step.title} className="flex flex-col items-center gap-3 text-center">
                <div className="w-14 h-14 rounded-xl border border-accent/20 bg-accent-dim flex items-center justify-center">
                  <step.icon size={22} className="text-accent-light" />
                </div>
                <div className="text-[15px] font-semibold text-text">{step.title}</div>
                <div className="text-sm text-text-secondary">{step.desc}</div>
              </div>
            ))}
          </div>
          <UnlockPanel email={email} url={url} />
        </section>
      )}
    </>
  );
}

export default function Home() {
  return (
    <SiteShell>
      <FreeScore />
    </SiteShell>
  );
}
