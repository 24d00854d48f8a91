'use client';

import { useState } from 'react';
import { ChevronDown, ChevronRight, Check, X } from 'lucide-react';
import type { SignalRow } from '@/lib/signal-rows';
import { getScoreColor } from './score-ring';

interface SubscoreCardProps {
  name: string;
  points: number;
  maxPoints: number;
  signals: SignalRow[];
}

export function SubscoreCard({ name, points, maxPoints, signals }: SubscoreCardProps) {
  const [expanded, setExpanded] = useState(false);
  const color = getScoreColor(points, maxPoints);
  const percent = maxPoints > 0 ? Math.round((points / maxPoints) * 100) : 0;

  return (
    <div className={`rounded-xl bg-bg-card overflow-hidden transition-all ${
      expanded ? 'ring-1 ring-border-bright' : 'ring-1 ring-transparent hover:ring-border'
    }`}>
      <button
        onClick={() => setExpanded(!expanded)}
        className="w-full flex items-center gap-4 px-5 py-4 text-left transition-colors hover:bg-bg-elevated/50"
      >
        <span
          className="inline-flex items-center justify-center min-w-12 h-8 px-2 rounded-lg font-mono font-bold text-xs"
          style={{ background: `color-mix(in srgb, ${color} 8%, transparent)`, color }}
        >
          {points}/{maxPoints}
        </span>
        <div className="flex-1 min-w-0">
          <h3 className="font-semibold text-text text-[15px] truncate">{name}</h3>
          <div className="flex items-center gap-3 mt-2">
            <div className="flex-1 h-1 bg-track rounded-full overflow-hidden">
              <div
                className="h-full rounded-full transition-all duration-1000"
                style={{ width: `${percent}%`, background: color }}
              />
            </div>
            <span className="text-xs font-mono text-text-secondary tabular-nums">{percent}%</span>
          </div>
        </div>
        <span className="text-text-muted ml-1">
          {expanded ? <ChevronDown size={16} /> : <ChevronRight size={16} />}
        </span>
      </button>

      {expanded && (
        <div className="border-t border-border px-5 py-4 space-y-1.5" style={{ animation: 'fadeIn 0.2s ease-out' }}>
          <h4 className="text-[10px] font-bold uppercase tracking-[0.1em] text-text-muted mb-2">Signals</h4>
          {signals.map(signal => {
            const passed = signal.points === signal.maxPoints;
            return (
              <div key={signal.key} className="flex items-start gap-3 py-2 px-3 rounded-lg hover:bg-bg-elevated/30 transition-colors">
                <span className="mt-0.5 shrink-0">
                  {passed ? (
                    <span className="flex items-center justify-center w-5 h-5 rounded-full bg-score-pass-dim">
                      <Check size={11} className="text-score-pass" strokeWidth={3} />
                    </span>
                  ) : (
                    <span className="flex items-center justify-center w-5 h-5 rounded-full bg-score-fail-dim">
                      <X size={11} className="text-score-fail" strokeWidth={3} />
                    </span>
                  )}
                </span>
                <div className="min-w-0 flex-1">
                  <div className="flex items-center gap-2">
                    <span className="text-sm font-medium text-text">{signal.label}</span>
                    <span className="text-[11px] font-mono text-text-muted tabular-nums">{signal.points}/{signal.maxPoints}</span>
                  </div>
                  <p className="text-xs text-text-secondary mt-0.5 leading-relaxed break-words">{signal.value}</p>
                </div>
              </div>
            );
          })}
        </div>
      )}
    </div>
  );
}
