import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { errorResponse, parseWith, readJson } from '@/lib/api';
import { getConfig } from '@/lib/config';
import { createCheckoutSession } from '@/lib/integrations/stripe';
import { EmailSchema } from '@/lib/validation';

export const runtime = 'nodejs';

const CheckoutSchema = z.object({
  email: EmailSchema,
  url: z.string().trim().max(2048).optional(),
});

export async function POST(request: NextRequest) {
  try {
    const { email, url } = parseWith(CheckoutSchema, await readJson(request), 'Invalid checkout request');
    const { APP_URL } = getConfig();

    const session = await createCheckoutSession({
      email,
      url,
      successUrl: `${APP_URL}/?checkout=success`,
      cancelUrl: `${APP_URL}/?checkout=cancelled`,
    });

    return NextResponse.json({ sessionId: session.sessionId, url: session.url });
  } catch (err) {
    return errorResponse('POST /api/checkout', err);
  }
}
