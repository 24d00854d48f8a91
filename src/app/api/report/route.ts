import { NextRequest, NextResponse } from 'next/server';
import { auth } from '@/auth';
import { z } from 'zod';
import { scanPage } from '@/lib/analyzers/scan';
import { calculateLiteScore } from '@/lib/analyzers/scoring';
import { errorResponse, parseWith, pdfResponse, readJson, requireProEmail, scanOptionsFromConfig } from '@/lib/api';
import { getHistoryStore } from '@/lib/history';
import {
  buildReportFilename,
  generateDetailedReportPdf,
  generateProgressReportPdf,
  generateQuickWinsReportPdf,
} from '@/lib/report/pdf-report';
import { UrlInputSchema, normalizeUrl, resolveScanTarget } from '@/lib/validation';

export const runtime = 'nodejs';

const ReportRequestSchema = z.object({
  kind: z.enum(['quick-wins', 'detailed', 'progress']),
  url: UrlInputSchema,
});

export async function POST(request: NextRequest) {
  try {
    const { kind, url } = parseWith(ReportRequestSchema, await readJson(request), 'Invalid report request');
    const generatedAt = new Date();
    let pdfBytes: Uint8Array;
    let reportUrl: string;

    if (kind === 'quick-wins') {
      const outcome = await scanPage(await resolveScanTarget(url), scanOptionsFromConfig());
      reportUrl = outcome.facts.url;
      pdfBytes = await generateQuickWinsReportPdf({
        url: outcome.facts.url,
        liteScore: calculateLiteScore(outcome.facts.metadata),
        issues: outcome.issues,
        generatedAt,
      });
    } else if (kind === 'detailed') {
      requireProEmail(await auth());
      const outcome = await scanPage(await resolveScanTarget(url), scanOptionsFromConfig());
      reportUrl = outcome.facts.url;
      pdfBytes = await generateDetailedReportPdf(outcome);
    } else {
      requireProEmail(await auth());
      const target = normalizeUrl(url);
      const summary = await getHistoryStore().getProgressSummary(target);
      if (!summary) {
        return NextResponse.json({ error: 'No scans recorded for this URL yet', code: 'NOT_FOUND' }, { status: 404 });
      }
      reportUrl = target;
      pdfBytes = await generateProgressReportPdf({ url: target, summary, generatedAt });
    }

    return pdfResponse(pdfBytes, buildReportFilename(kind, reportUrl, generatedAt));
  } catch (err) {
    return errorResponse('POST /api/report', err);
  }
}
