'use client';

import { useEffect, useState } from 'react';

interface ScoreRingProps {
  score: number;
  grade: string;
  size?: number;
  label?: string;
  delay?: number;
}

export function ScoreRing({ score, grade, size = 120, label, delay = 0 }: ScoreRingProps) {
  const [visible, setVisible] = useState(delay === 0);
  const radius = 42;
  const circumference = 2 * Math.PI * radius;
  const offset = circumference - (Math.min(score, 100) / 100) * circumference;
  const color = getScoreColor(score, 100);

  useEffect(() => {
    if (delay > 0) {
      const t = setTimeout(() => setVisible(true), delay);
      return () => clearTimeout(t);
    }
  }, [delay]);

  const caption = label && (
    <span className="text-[11px] text-text-secondary font-medium tracking-widest uppercase">{label}</span>
  );

  if (!visible) {
    return (
      <div className="flex flex-col items-center gap-3" style={{ width: size }}>
        <div style={{ width: size, height: size }} />
        {caption}
      </div>
    );
  }

  return (
    <div className="flex flex-col items-center gap-3" style={{ animation: 'countUp 0.5s ease-out' }}>
      <div className="relative" style={{ width: size, height: size }}>
        <svg viewBox="0 0 100 100" className="transform -rotate-90" style={{ width: size, height: size }}>
          <circle cx="50" cy="50" r={radius} fill="none" strokeWidth="6" style={{ stroke: 'var(--color-track)' }} />
          <circle
            cx="50" cy="50" r={radius}
            fill="none"
            strokeWidth="6"
            strokeLinecap="round"
            strokeDasharray={circumference}
            strokeDashoffset={offset}
            style={{
              stroke: color,
              animation: 'scoreRingFill 1.8s cubic-bezier(0.16, 1, 0.3, 1) forwards',
            }}
          />
        </svg>
        <div className="absolute inset-0 flex flex-col items-center justify-center">
          <span className="font-mono text-3xl font-bold tracking-tight" style={{ color }}>{score}</span>
          <GradeBadge grade={grade} size="sm" />
        </div>
      </div>
      {caption}
    </div>
  );
}

/** Color for points out of a maximum; thresholds follow the letter grades. */
export function getScoreColor(points: number, max: number): string {
  const percent = max > 0 ? (points / max) * 100 : 0;
  if (percent >= 80) return 'var(--color-score-pass)';
  if (percent >= 60) return 'var(--color-score-warn)';
  if (percent >= 50) return 'var(--color-score-caution)';
  return 'var(--color-score-fail)';
}

export function getGradeColor(grade: string): string {
  if (grade.startsWith('A')) return 'var(--color-score-pass)';
  if (grade === 'B' || grade === 'C') return 'var(--color-score-warn)';
  if (grade === 'D') return 'var(--color-score-caution)';
  return 'var(--color-score-fail)';
}

export function GradeBadge({ grade, size = 'md' }: { grade: string; size?: 'sm' | 'md' | 'lg' }) {
  const color = getGradeColor(grade);
  const sizeClasses = {
    sm: 'min-w-6 h-6 px-1.5 text-[10px] mt-1',
    md: 'min-w-8 h-8 px-2 text-xs',
    lg: 'min-w-10 h-10 px-2 text-sm',
  };

  return (
    <span
      className={`inline-flex items-center justify-center rounded-lg font-mono font-bold ${sizeClasses[size]}`}
      style={{ background: `color-mix(in srgb, ${color} 8%, transparent)`, color }}
    >
      {grade}
    </span>
  );
}
