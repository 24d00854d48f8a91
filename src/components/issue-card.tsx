'use client';

import { useState } from 'react';
import { Zap, ArrowUp, Clock, TrendingUp, ChevronDown, ChevronRight, Copy, Check } from 'lucide-react';
import { getImpactDescription } from '@/lib/analyzers/recommendations';
import type { QuickWinIssue } from '@/lib/types';

export const ISSUE_LABELS: Record<QuickWinIssue['type'], string> = {
  title: 'Page Title',
  description: 'Meta Description',
  h1: 'H1 Header',
  structured_data: 'Structured Data',
  faq: 'FAQ Schema',
  mobile: 'Mobile Viewport',
  accessibility: 'Image Alt Text',
  speed: 'Page Speed',
};

function priorityConfig(priority: number) {
  if (priority <= 1) return { color: 'var(--color-score-fail)', icon: Zap, label: 'Urgent' };
  if (priority <= 2) return { color: 'var(--color-score-caution)', icon: ArrowUp, label: 'High' };
  return { color: 'var(--color-score-warn)', icon: Clock, label: 'Medium' };
}

const effortConfig = {
  low: { label: 'Quick Win', color: 'var(--color-score-pass)' },
  medium: { label: 'Moderate', color: 'var(--color-score-warn)' },
};

export function IssueCard({ issue }: { issue: QuickWinIssue }) {
  const [showExample, setShowExample] = useState(false);
  const [copied, setCopied] = useState(false);

  const p = priorityConfig(issue.priority);
  const e = effortConfig[issue.effort];
  const impact = getImpactDescription(issue.type);
  const Icon = p.icon;

  const handleCopy = async () => {
    await navigator.clipboard.writeText(issue.example);
    setCopied(true);
    setTimeout(() => setCopied(false), 2000);
  };

  return (
    <div className="rounded-xl bg-bg-card p-5 hover:bg-bg-elevated/50 transition-all ring-1 ring-transparent hover:ring-border">
      <div className="flex items-start gap-4">
        <div
          className="shrink-0 w-9 h-9 rounded-lg flex items-center justify-center"
          style={{ background: `color-mix(in srgb, ${p.color} 8%, transparent)` }}
        >
          <Icon size={16} style={{ color: p.color }} />
        </div>
        <div className="flex-1 min-w-0">
          <div className="flex items-center gap-2 flex-wrap mb-1.5">
            <span
              className="text-[9px] font-bold px-2 py-0.5 rounded-full uppercase tracking-widest"
              style={{ background: `color-mix(in srgb, ${p.color} 8%, transparent)`, color: p.color }}
            >
              {p.label}
            </span>
            <span
              className="text-[9px] font-bold px-2 py-0.5 rounded-full uppercase tracking-widest"
              style={{ background: `color-mix(in srgb, ${e.color} 6%, transparent)`, color: e.color }}
            >
              {e.label}
            </span>
          </div>
          <h3 className="font-semibold text-text text-[15px] leading-snug">{ISSUE_LABELS[issue.type]}</h3>
          <p className="text-sm text-text-secondary mt-1.5 leading-relaxed">{issue.fix}</p>
          <p className="text-xs text-text-muted mt-1.5 leading-relaxed">{impact.why}</p>

          <div className="mt-3">
            <button
              onClick={() => setShowExample(!showExample)}
              className="flex items-center gap-1.5 text-xs text-accent-light hover:text-accent font-medium cursor-pointer"
            >
              {showExample ? <ChevronDown size={13} /> : <ChevronRight size={13} />}
              Example
            </button>
            {showExample && (
              <div className="mt-2 rounded-lg bg-bg-elevated border border-border overflow-hidden" style={{ animation: 'fadeIn 0.2s ease-out' }}>
                <div className="flex items-center justify-end px-3 py-1.5 border-b border-border">
                  <button onClick={handleCopy} className="flex items-center gap-1 text-[11px] text-text-muted hover:text-text transition-colors cursor-pointer">
                    {copied ? <Check size={11} className="text-score-pass" /> : <Copy size={11} />}
                    {copied ? 'Copied' : 'Copy'}
                  </button>
                </div>
                <pre className="p-3 text-xs font-mono text-text-secondary overflow-x-auto leading-relaxed whitespace-pre-wrap">
                  <code>{issue.example}</code>
                </pre>
              </div>
            )}
          </div>

          <div className="mt-4 flex items-center gap-2">
            <TrendingUp size={12} className="text-score-pass" />
            <span className="text-[11px] text-text-muted">
              Up to <span className="font-mono text-score-pass">+{issue.pointsAvailable}</span> points &middot; {impact.impact} impact
            </span>
          </div>
        </div>
      </div>
    </div>
  );
}
