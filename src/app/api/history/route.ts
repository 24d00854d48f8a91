import { NextRequest, NextResponse } from 'next/server';
import { auth } from '@/auth';
import { errorResponse, requireProEmail } from '@/lib/api';
import { getHistoryStore } from '@/lib/history';
import { normalizeUrl } from '@/lib/validation';

export const runtime = 'nodejs';

export async function GET(request: NextRequest) {
  try {
    requireProEmail(await auth());
    const history = getHistoryStore();
    const rawUrl = request.nextUrl.searchParams.get('url');

    if (!rawUrl) {
      return NextResponse.json({ urls: await history.listTrackedUrls() });
    }

    const url = normalizeUrl(rawUrl);
    return NextResponse.json({ url, ...(await history.getHistory(url)) });
  } catch (err) {
    return errorResponse('GET /api/history', err);
  }
}
