import { beforeEach, describe, expect, it } from 'vitest';
import { ACCESS_CODE_LENGTH, AccessGate, MAX_ISSUE_ATTEMPTS, authorizeAccessCode, generateAccessCode } from './access-codes';
import { AccessCodeExhaustedError } from './errors';
import { createMemoryStorage } from './storage/memory';
import { AccessCodeRepository } from './storage/types';

function sequence(...codes: string[]): () => string {
  let index = 0;
  return () => codes[Math.min(index++, codes.length - 1)];
}

describe('generateAccessCode', () => {
  it('produces 8 uppercase alphanumeric characters', () => {
    for (let i = 0; i < 20; i++) {
      expect(generateAccessCode()).toMatch(/^[A-Z0-9]{8}$/);
    }
    expect(ACCESS_CODE_LENGTH).toBe(8);
  });
});

describe('AccessGate', () => {
  let repository: AccessCodeRepository;

  beforeEach(() => {
    repository = createMemoryStorage().accessCodes;
  });

  it('issues a code that validates until it is consumed', async () => {
    const gate = new AccessGate(repository, sequence('ABCD1234'));
    const issued = await gate.issue('buyer@example.com');
    expect(issued).toMatchObject({ email: 'buyer@example.com', code: 'ABCD1234', used: false });

    expect(await gate.validate('abcd1234')).toMatchObject({ code: 'ABCD1234' });
    expect(await gate.consume('ABCD1234')).toMatchObject({ code: 'ABCD1234', used: true });
    expect(await gate.validate('ABCD1234')).toBeNull();
  });

  it('rejects a second consume of the same code', async () => {
    const gate = new AccessGate(repository, sequence('ZZZZ9999'));
    await gate.issue('buyer@example.com');

    expect(await gate.redeem('ZZZZ9999')).not.toBeNull();
    expect(await gate.redeem('ZZZZ9999')).toBeNull();
  });

  it('returns null for an unknown code', async () => {
    const gate = new AccessGate(repository);
    expect(await gate.validate('NOPE0000')).toBeNull();
    expect(await gate.consume('NOPE0000')).toBeNull();
  });

  it('regenerates on a code collision', async () => {
    await new AccessGate(repository, sequence('SAMECODE')).issue('first@example.com');

    const gate = new AccessGate(repository, sequence('SAMECODE', 'FRESH001'));
    const issued = await gate.issue('second@example.com');
    expect(issued.code).toBe('FRESH001');
  });

  it('gives up after a bounded number of collisions', async () => {
    await new AccessGate(repository, sequence('SAMECODE')).issue('first@example.com');

    const gate = new AccessGate(repository, sequence('SAMECODE'));
    await expect(gate.issue('second@example.com')).rejects.toBeInstanceOf(AccessCodeExhaustedError);
    expect(MAX_ISSUE_ATTEMPTS).toBe(5);
  });

  it('re-issues a fresh unused code for a returning buyer', async () => {
    const gate = new AccessGate(repository, sequence('FIRST000', 'SECOND00'));
    const first = await gate.issue('buyer@example.com');
    await gate.consume(first.code);

    const second = await gate.issue('buyer@example.com');
    expect(second).toMatchObject({ id: first.id, code: 'SECOND00', used: false });
    expect(await gate.validate('FIRST000')).toBeNull();
    expect(await gate.validate('SECOND00')).not.toBeNull();
  });
});

describe('authorizeAccessCode', () => {
  let gate: AccessGate;

  beforeEach(() => {
    gate = new AccessGate(createMemoryStorage().accessCodes, sequence('PRO12345'));
  });

  it('signs in the buyer once and rejects the same code afterwards', async () => {
    const issued = await gate.issue('buyer@example.com');

    await expect(authorizeAccessCode({ code: ' pro12345 ' }, gate)).resolves.toEqual({
      id: String(issued.id),
      email: 'buyer@example.com',
    });
    await expect(authorizeAccessCode({ code: 'PRO12345' }, gate)).resolves.toBeNull();
  });

  it('rejects unknown codes and malformed credentials', async () => {
    await gate.issue('buyer@example.com');

    await expect(authorizeAccessCode({ code: 'NOPE0000' }, gate)).resolves.toBeNull();
    await expect(authorizeAccessCode({ code: '   ' }, gate)).resolves.toBeNull();
    await expect(authorizeAccessCode({}, gate)).resolves.toBeNull();
    await expect(authorizeAccessCode(undefined, gate)).resolves.toBeNull();
    expect(await gate.validate('PRO12345')).not.toBeNull();
  });
});
