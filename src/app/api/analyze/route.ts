import { NextRequest, NextResponse } from 'next/server';
import { auth } from '@/auth';
import { z } from 'zod';
import { scanPage } from '@/lib/analyzers/scan';
import { errorResponse, parseWith, readJson, requireProEmail, scanOptionsFromConfig } from '@/lib/api';
import { getHistoryStore } from '@/lib/history';
import { UrlInputSchema, resolveScanTarget } from '@/lib/validation';

export const runtime = 'nodejs';

const AnalyzeRequestSchema = z.object({
  url: UrlInputSchema,
});

export async function POST(request: NextRequest) {
  try {
    requireProEmail(await auth());
    const { url } = parseWith(AnalyzeRequestSchema, await readJson(request), 'Invalid analysis request');
    const target = await resolveScanTarget(url);

    const outcome = await scanPage(target, scanOptionsFromConfig());

    const history = getHistoryStore();
    const recorded = await history.recordScan(target, outcome.score, outcome.facts);
    const recommendationsAdded = await history.recordRecommendations(target, outcome.issues);

    return NextResponse.json({ ...outcome, url: target, recorded, recommendationsAdded });
  } catch (err) {
    return errorResponse('POST /api/analyze', err);
  }
}
