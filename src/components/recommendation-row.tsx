'use client';

import { useState } from 'react';
import { Loader2 } from 'lucide-react';
import { RecommendationView } from '@/lib/client';
import { RECOMMENDATION_STATUSES, RecommendationStatus } from '@/lib/types';
import { ISSUE_LABELS } from './issue-card';

const STATUS_LABELS: Record<RecommendationStatus, string> = {
  pending: 'Pending',
  in_progress: 'In progress',
  implemented: 'Implemented',
  deferred: 'Deferred',
};

const STATUS_COLORS: Record<RecommendationStatus, string> = {
  pending: 'var(--color-score-warn)',
  in_progress: 'var(--color-accent-light)',
  implemented: 'var(--color-score-pass)',
  deferred: 'var(--color-text-muted)',
};

function toStatus(value: string): RecommendationStatus | null {
  return RECOMMENDATION_STATUSES.find(status => status === value) ?? null;
}

interface RecommendationRowProps {
  rec: RecommendationView;
  onStatusChange: (id: number, status: RecommendationStatus, notes: string | null) => Promise<void>;
}

export function RecommendationRow({ rec, onStatusChange }: RecommendationRowProps) {
  const [saving, setSaving] = useState(false);
  const [notes, setNotes] = useState(rec.notes ?? '');
  const color = STATUS_COLORS[rec.status];

  const save = async (status: RecommendationStatus) => {
    setSaving(true);
    try {
      await onStatusChange(rec.id, status, notes.trim() || null);
    } finally {
      setSaving(false);
    }
  };

  return (
    <div className="rounded-xl bg-bg-card p-4 ring-1 ring-transparent hover:ring-border transition-all">
      <div className="flex items-start gap-3">
        <div className="flex-1 min-w-0">
          <div className="flex items-center gap-2 flex-wrap">
            <span className="font-semibold text-[14px] text-text">{ISSUE_LABELS[rec.type]}</span>
            <span
              className="text-[9px] font-bold px-2 py-0.5 rounded-full uppercase tracking-widest"
              style={{ background: `color-mix(in srgb, ${color} 10%, transparent)`, color }}
            >
              {STATUS_LABELS[rec.status]}
            </span>
            <span className="text-[11px] font-mono text-text-muted">+{rec.pointsPotential} pts &middot; P{rec.priority}</span>
          </div>
          <p className="text-sm text-text-secondary mt-1 leading-relaxed">{rec.description}</p>
          {rec.implementedAt && (
            <p className="text-[11px] text-text-muted mt-1">Implemented {new Date(rec.implementedAt).toLocaleDateString()}</p>
          )}
        </div>
        <div className="flex items-center gap-2 shrink-0">
          {saving && <Loader2 size={14} className="animate-spin text-text-muted" />}
          <select
            value={rec.status}
            disabled={saving}
            onChange={e => {
              const status = toStatus(e.target.value);
              if (status) void save(status);
            }}
            className="h-8 px-2 rounded-lg bg-bg-elevated border border-border text-xs text-text cursor-pointer"
          >
            {RECOMMENDATION_STATUSES.map(status => (
              <option key={status} value={status}>{STATUS_LABELS[status]}</option>
            ))}
          </select>
        </div>
      </div>
      <input
        value={notes}
        onChange={e => setNotes(e.target.value)}
        onBlur={() => {
          if (notes.trim() !== (rec.notes ?? '')) void save(rec.status);
        }}
        placeholder="Notes"
        className="mt-3 w-full h-8 px-3 rounded-lg bg-bg-elevated border border-border focus:border-accent/50 outline-none text-xs text-text placeholder-text-muted"
      />
    </div>
  );
}
