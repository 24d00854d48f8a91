import { NextResponse } from 'next/server';
import { getConfig } from '@/lib/config';

export const runtime = 'nodejs';

export async function GET() {
  const config = getConfig();
  return NextResponse.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    storage: config.DATABASE_URL ? 'postgres' : 'memory',
    integrations: {
      payments: Boolean(config.STRIPE_SECRET_KEY && config.STRIPE_PRICE_ID),
      email: Boolean(config.SMTP_USER && config.SMTP_PASSWORD),
      leads: Boolean(config.GOOGLE_SERVICE_ACCOUNT_EMAIL && config.GOOGLE_PRIVATE_KEY && config.LEADS_SPREADSHEET_ID),
    },
  });
}
