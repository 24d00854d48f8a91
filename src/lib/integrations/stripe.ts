import Stripe from 'stripe';
import { AppConfig, getConfig } from '../config';
import { ExternalServiceError, ValidationError } from '../errors';

export interface CheckoutRequest {
  email: string;
  url?: string;
  successUrl: string;
  cancelUrl: string;
}

export interface CompletedCheckout {
  sessionId: string;
  email: string;
  url: string | null;
}

let client: Stripe | null = null;

function getStripe(config: AppConfig): Stripe {
  if (!config.STRIPE_SECRET_KEY) {
    throw new ExternalServiceError('stripe', 'Payments are not configured');
  }
  if (!client) {
    client = new Stripe(config.STRIPE_SECRET_KEY);
  }
  return client;
}

export async function createCheckoutSession(request: CheckoutRequest, config: AppConfig = getConfig()): Promise<{ sessionId: string; url: string }> {
  const stripe = getStripe(config);
  if (!config.STRIPE_PRICE_ID) {
    throw new ExternalServiceError('stripe', 'Price ID not configured');
  }

  let session: Stripe.Checkout.Session;
  try {
    session = await stripe.checkout.sessions.create({
      mode: 'payment',
      customer_email: request.email,
      line_items: [{ price: config.STRIPE_PRICE_ID, quantity: 1 }],
      success_url: request.successUrl,
      cancel_url: request.cancelUrl,
      metadata: {
        email: request.email,
        url: request.url ?? '',
      },
    });
  } catch (error) {
    throw new ExternalServiceError('stripe', 'Could not create checkout session', error);
  }

  if (!session.url) {
    throw new ExternalServiceError('stripe', 'Checkout session has no redirect URL');
  }
  return { sessionId: session.id, url: session.url };
}

/** Verifies the signature header; throws ValidationError on a bad signature. */
export function parseWebhookEvent(payload: string, signature: string | null, secret: string, stripe: Stripe): Stripe.Event {
  if (!signature) {
    throw new ValidationError('Missing Stripe-Signature header');
  }
  try {
    return stripe.webhooks.constructEvent(payload, signature, secret);
  } catch (error) {
    throw new ValidationError('Invalid webhook signature', error instanceof Error ? error.message : undefined);
  }
}

export function verifyWebhook(payload: string, signature: string | null, config: AppConfig = getConfig()): Stripe.Event {
  if (!config.STRIPE_WEBHOOK_SECRET) {
    throw new ExternalServiceError('stripe', 'Webhook secret is not configured');
  }
  return parseWebhookEvent(payload, signature, config.STRIPE_WEBHOOK_SECRET, getStripe(config));
}

/** Null for events other than a paid, completed checkout with a known email. */
export function extractCompletedCheckout(event: Stripe.Event): CompletedCheckout | null {
  if (event.type !== 'checkout.session.completed') return null;
  const session = event.data.object;
  if (session.payment_status === 'unpaid') return null;

  const email = session.customer_details?.email || session.customer_email || session.metadata?.email;
  if (!email) return null;

  return {
    sessionId: session.id,
    email: email.trim().toLowerCase(),
    url: session.metadata?.url || null,
  };
}
