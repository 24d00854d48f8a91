import { NextRequest, NextResponse } from 'next/server';
import { getAccessGate } from '@/lib/access-codes';
import { errorResponse } from '@/lib/api';
import { getNotifier } from '@/lib/integrations/email';
import { extractCompletedCheckout, verifyWebhook } from '@/lib/integrations/stripe';
import { logger } from '@/lib/logger';
import { fulfilCheckout } from '@/lib/purchase';
import { getStorage } from '@/lib/storage';

export const runtime = 'nodejs';

export async function POST(request: NextRequest) {
  try {
    // Signature verification needs the exact raw body.
    const payload = await request.text();
    const event = verifyWebhook(payload, request.headers.get('stripe-signature'));

    const checkout = extractCompletedCheckout(event);
    if (!checkout) {
      logger.debug('POST /api/webhook', `Ignored ${event.type}`);
      return NextResponse.json({ received: true });
    }

    const result = await fulfilCheckout(checkout, {
      gate: getAccessGate(),
      notifier: getNotifier(),
      checkouts: getStorage().checkouts,
    });
    if (!result) {
      return NextResponse.json({ received: true, duplicate: true });
    }
    return NextResponse.json({ received: true, emailSent: result.emailSent });
  } catch (err) {
    return errorResponse('POST /api/webhook', err);
  }
}
