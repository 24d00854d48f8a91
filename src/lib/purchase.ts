import { AccessGate } from './access-codes';
import { getErrorMessage } from './errors';
import { CompletedCheckout } from './integrations/stripe';
import { Notifier } from './integrations/email';
import { logger } from './logger';
import { CheckoutRepository } from './storage/types';
import { AccessCode } from './types';

export interface FulfilmentResult {
  accessCode: AccessCode;
  emailSent: boolean;
  emailError?: string;
}

export interface FulfilmentDeps {
  gate: AccessGate;
  notifier: Notifier;
  checkouts: CheckoutRepository;
  now?: () => Date;
}

/**
 * Issues the access code for a paid checkout, then emails it. The code stays
 * issued when delivery fails; the failure is reported to the caller.
 * Resolves to null for a checkout session that was already fulfilled.
 */
export async function fulfilCheckout(checkout: CompletedCheckout, deps: FulfilmentDeps): Promise<FulfilmentResult | null> {
  const now = deps.now ?? (() => new Date());
  const claimed = await deps.checkouts.claim(checkout.sessionId, checkout.email, now());
  if (!claimed) {
    logger.info('purchase', 'Checkout already fulfilled, skipping', { sessionId: checkout.sessionId });
    return null;
  }

  let accessCode: AccessCode;
  try {
    accessCode = await deps.gate.issue(checkout.email);
  } catch (error) {
    await deps.checkouts.release(checkout.sessionId);
    throw error;
  }
  logger.info('purchase', `Issued access code for ${checkout.email}`, { sessionId: checkout.sessionId });

  try {
    await deps.notifier.sendAccessCode(checkout.email, accessCode.code);
    return { accessCode, emailSent: true };
  } catch (error) {
    logger.error('purchase', `Access code email failed for ${checkout.email}`, error);
    return { accessCode, emailSent: false, emailError: getErrorMessage(error) };
  }
}
