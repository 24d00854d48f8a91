import { describe, expect, it } from 'vitest';
import { ValidationError } from './errors';
import { EmailSchema, isBlockedTarget, isPrivateIpAddress, normalizeUrl } from './validation';

describe('normalizeUrl', () => {
  it('adds https when the scheme is missing', () => {
    expect(normalizeUrl('  example.com/menu ')).toBe('https://example.com/menu');
  });

  it('keeps an explicit http scheme', () => {
    expect(normalizeUrl('http://example.com')).toBe('http://example.com/');
  });

  it('rejects input that is not a web address', () => {
    expect(() => normalizeUrl('not a url')).toThrow(ValidationError);
    expect(() => normalizeUrl('intranet')).toThrow('Please enter a valid URL');
  });
});

describe('isPrivateIpAddress', () => {
  it('flags loopback and private ranges', () => {
    expect(isPrivateIpAddress('127.0.0.1')).toBe(true);
    expect(isPrivateIpAddress('10.1.2.3')).toBe(true);
    expect(isPrivateIpAddress('172.20.0.1')).toBe(true);
    expect(isPrivateIpAddress('192.168.1.10')).toBe(true);
    expect(isPrivateIpAddress('::1')).toBe(true);
    expect(isPrivateIpAddress('::ffff:10.0.0.1')).toBe(true);
  });

  it('allows public addresses', () => {
    expect(isPrivateIpAddress('93.184.216.34')).toBe(false);
    expect(isPrivateIpAddress('172.32.0.1')).toBe(false);
  });
});

describe('isBlockedTarget', () => {
  it('blocks internal hostnames and literal private addresses without a lookup', async () => {
    expect(await isBlockedTarget(new URL('http://localhost:3000/'))).toBe(true);
    expect(await isBlockedTarget(new URL('http://printer.local/'))).toBe(true);
    expect(await isBlockedTarget(new URL('http://[::1]/'))).toBe(true);
    expect(await isBlockedTarget(new URL('http://192.168.0.5/'))).toBe(true);
  });

  it('allows a public address literal', async () => {
    expect(await isBlockedTarget(new URL('http://93.184.216.34/'))).toBe(false);
  });
});

describe('EmailSchema', () => {
  it('trims and lowercases', () => {
    expect(EmailSchema.parse('  Buyer@Example.COM ')).toBe('buyer@example.com');
  });

  it('rejects malformed addresses', () => {
    expect(EmailSchema.safeParse('buyer@').success).toBe(false);
  });
});
