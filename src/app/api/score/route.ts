import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { scanPage } from '@/lib/analyzers/scan';
import { calculateLiteScore } from '@/lib/analyzers/scoring';
import { errorResponse, parseWith, readJson, scanOptionsFromConfig } from '@/lib/api';
import { captureLead, getLeadSink } from '@/lib/integrations/leads';
import { getGrade } from '@/lib/types';
import { EmailSchema, UrlInputSchema, resolveScanTarget } from '@/lib/validation';

export const runtime = 'nodejs';

const QUICK_WIN_COUNT = 3;

const ScoreRequestSchema = z.object({
  email: EmailSchema,
  url: UrlInputSchema,
});

export async function POST(request: NextRequest) {
  try {
    const { email, url } = parseWith(ScoreRequestSchema, await readJson(request), 'Invalid score request');
    const target = await resolveScanTarget(url);

    const [outcome, leadCaptured] = await Promise.all([
      scanPage(target, scanOptionsFromConfig()),
      captureLead(getLeadSink(), { email, url: target, capturedAt: new Date() }),
    ]);

    const liteScore = calculateLiteScore(outcome.facts.metadata);
    return NextResponse.json({
      url: outcome.facts.url,
      liteScore,
      grade: getGrade(liteScore),
      quickWins: outcome.issues.slice(0, QUICK_WIN_COUNT),
      leadCaptured,
      scannedAt: outcome.scannedAt,
    });
  } catch (err) {
    return errorResponse('POST /api/score', err);
  }
}
