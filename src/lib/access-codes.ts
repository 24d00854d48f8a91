import { randomInt } from 'node:crypto';
import { z } from 'zod';
import { AccessCodeExhaustedError } from './errors';
import { logger } from './logger';
import { getStorage } from './storage';
import { AccessCodeRepository } from './storage/types';
import { AccessCode } from './types';

const CODE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const ACCESS_CODE_LENGTH = 8;
export const MAX_ISSUE_ATTEMPTS = 5;

export function generateAccessCode(length = ACCESS_CODE_LENGTH): string {
  let code = '';
  for (let i = 0; i < length; i++) {
    code += CODE_ALPHABET[randomInt(CODE_ALPHABET.length)];
  }
  return code;
}

export function normalizeAccessCode(raw: string): string {
  return raw.trim().toUpperCase();
}

export class AccessGate {
  constructor(
    private readonly repository: AccessCodeRepository,
    private readonly generate: () => string = generateAccessCode,
  ) {}

  /**
   * Issues a fresh unused code for `email`. An email that already holds a
   * code gets a new one on the same row.
   */
  async issue(email: string): Promise<AccessCode> {
    for (let attempt = 1; attempt <= MAX_ISSUE_ATTEMPTS; attempt++) {
      const result = await this.repository.upsertForEmail(email, this.generate());
      if (result.ok) return result.record;
      logger.warn('access-codes', `Code collision on attempt ${attempt}, regenerating`);
    }
    throw new AccessCodeExhaustedError(MAX_ISSUE_ATTEMPTS);
  }

  validate(code: string): Promise<AccessCode | null> {
    return this.repository.findUnused(normalizeAccessCode(code));
  }

  consume(code: string): Promise<AccessCode | null> {
    return this.repository.consume(normalizeAccessCode(code));
  }

  /** Validate and consume in one conditional write. */
  redeem(code: string): Promise<AccessCode | null> {
    return this.consume(code);
  }
}

export function getAccessGate(): AccessGate {
  return new AccessGate(getStorage().accessCodes);
}

const AccessCodeCredentialsSchema = z.object({
  code: z.string().trim().min(1).max(32),
});

export interface ProUser {
  id: string;
  email: string;
}

/**
 * Credentials check behind the Pro sign-in. A code unlocks Pro once; the
 * session that follows carries the buyer's email.
 */
export async function authorizeAccessCode(credentials: unknown, gate: AccessGate = getAccessGate()): Promise<ProUser | null> {
  const parsed = AccessCodeCredentialsSchema.safeParse(credentials);
  if (!parsed.success) return null;

  const record = await gate.redeem(parsed.data.code);
  if (!record) {
    logger.info('auth', 'Rejected invalid or used access code');
    return null;
  }
  logger.info('auth', `Pro unlocked for ${record.email}`);
  return { id: String(record.id), email: record.email };
}
