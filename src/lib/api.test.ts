import { describe, expect, it } from 'vitest';
import { requireProEmail } from './api';
import { UnauthorizedError } from './errors';

describe('requireProEmail', () => {
  it('returns the email of a signed-in session', () => {
    const session = { user: { email: 'buyer@example.com' }, expires: '2026-12-31T00:00:00.000Z' };
    expect(requireProEmail(session)).toBe('buyer@example.com');
  });

  it('rejects a missing session or one without an email', () => {
    expect(() => requireProEmail(null)).toThrow(UnauthorizedError);
    expect(() => requireProEmail({ user: {}, expires: '2026-12-31T00:00:00.000Z' })).toThrow('A valid Pro access code is required');
  });
});
