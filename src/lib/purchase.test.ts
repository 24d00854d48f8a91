import { describe, expect, it } from 'vitest';
import { AccessGate } from './access-codes';
import { AccessCodeExhaustedError, ExternalServiceError } from './errors';
import { Notifier } from './integrations/email';
import { fulfilCheckout } from './purchase';
import { createMemoryStorage } from './storage/memory';

const CHECKOUT = { sessionId: 'cs_test_1', email: 'buyer@example.com', url: null };

function recordingNotifier(sent: Array<[string, string]>): Notifier {
  return {
    async sendAccessCode(email, code) {
      sent.push([email, code]);
    },
  };
}

describe('fulfilCheckout', () => {
  it('issues a code and emails it to the buyer', async () => {
    const sent: Array<[string, string]> = [];
    const storage = createMemoryStorage();
    const gate = new AccessGate(storage.accessCodes, () => 'PAID0001');

    const result = await fulfilCheckout(CHECKOUT, { gate, notifier: recordingNotifier(sent), checkouts: storage.checkouts });

    expect(result?.emailSent).toBe(true);
    expect(result?.accessCode.code).toBe('PAID0001');
    expect(sent).toEqual([['buyer@example.com', 'PAID0001']]);
  });

  it('keeps the issued code when the email fails', async () => {
    const storage = createMemoryStorage();
    const gate = new AccessGate(storage.accessCodes, () => 'PAID0002');
    const notifier: Notifier = {
      async sendAccessCode() {
        throw new ExternalServiceError('email', 'SMTP unavailable');
      },
    };

    const result = await fulfilCheckout(CHECKOUT, { gate, notifier, checkouts: storage.checkouts });

    expect(result).toMatchObject({ emailSent: false, emailError: 'SMTP unavailable' });
    expect(await gate.validate('PAID0002')).toMatchObject({ email: 'buyer@example.com' });
  });

  it('ignores a repeated delivery of the same checkout session', async () => {
    const sent: Array<[string, string]> = [];
    const storage = createMemoryStorage();
    const codes = ['PAID0003', 'PAID0004'];
    const gate = new AccessGate(storage.accessCodes, () => codes.shift() ?? 'PAID9999');
    const deps = { gate, notifier: recordingNotifier(sent), checkouts: storage.checkouts };

    await fulfilCheckout(CHECKOUT, deps);
    const repeat = await fulfilCheckout(CHECKOUT, deps);

    expect(repeat).toBeNull();
    expect(sent).toEqual([['buyer@example.com', 'PAID0003']]);
    expect(await gate.validate('PAID0003')).toMatchObject({ email: 'buyer@example.com' });
  });

  it('fulfils a different checkout session for the same buyer', async () => {
    const sent: Array<[string, string]> = [];
    const storage = createMemoryStorage();
    const codes = ['PAID0005', 'PAID0006'];
    const gate = new AccessGate(storage.accessCodes, () => codes.shift() ?? 'PAID9999');
    const deps = { gate, notifier: recordingNotifier(sent), checkouts: storage.checkouts };

    await fulfilCheckout(CHECKOUT, deps);
    const second = await fulfilCheckout({ ...CHECKOUT, sessionId: 'cs_test_2' }, deps);

    expect(second?.accessCode.code).toBe('PAID0006');
    expect(sent).toHaveLength(2);
  });

  it('lets a retry through when issuing the code failed', async () => {
    const storage = createMemoryStorage();
    await new AccessGate(storage.accessCodes, () => 'TAKEN000').issue('other@example.com');
    const sent: Array<[string, string]> = [];

    const failing = new AccessGate(storage.accessCodes, () => 'TAKEN000');
    await expect(
      fulfilCheckout(CHECKOUT, { gate: failing, notifier: recordingNotifier(sent), checkouts: storage.checkouts }),
    ).rejects.toBeInstanceOf(AccessCodeExhaustedError);

    const working = new AccessGate(storage.accessCodes, () => 'PAID0007');
    const retry = await fulfilCheckout(CHECKOUT, { gate: working, notifier: recordingNotifier(sent), checkouts: storage.checkouts });
    expect(retry?.accessCode.code).toBe('PAID0007');
    expect(sent).toEqual([['buyer@example.com', 'PAID0007']]);
  });
});
