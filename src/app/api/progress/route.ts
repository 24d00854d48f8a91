import { NextRequest, NextResponse } from 'next/server';
import { auth } from '@/auth';
import { errorResponse, requireProEmail } from '@/lib/api';
import { ValidationError } from '@/lib/errors';
import { getHistoryStore } from '@/lib/history';
import { normalizeUrl } from '@/lib/validation';

export const runtime = 'nodejs';

export async function GET(request: NextRequest) {
  try {
    requireProEmail(await auth());
    const rawUrl = request.nextUrl.searchParams.get('url');
    if (!rawUrl) {
      throw new ValidationError('The url query parameter is required');
    }

    const url = normalizeUrl(rawUrl);
    // summary is null until the url has been scanned at least once.
    const summary = await getHistoryStore().getProgressSummary(url);
    return NextResponse.json({ url, summary });
  } catch (err) {
    return errorResponse('GET /api/progress', err);
  }
}
