import { lookup } from 'node:dns/promises';
import { isIP } from 'node:net';
import { z } from 'zod';
import { ValidationError } from './errors';

export const EmailSchema = z.string().trim().toLowerCase().email('Please enter a valid email address');

export const UrlInputSchema = z.string().trim().min(1, 'Please enter a valid URL');

const INTERNAL_HOSTNAMES = new Set([
  'localhost',
  'host.docker.internal',
  'metadata.google.internal',
]);

const INTERNAL_HOST_SUFFIXES = ['.localhost', '.local', '.internal', '.lan', '.home'];

export function normalizeUrl(rawUrl: string): string {
  const candidate = rawUrl.trim();
  const prefixed = /^https?:\/\//i.test(candidate) ? candidate : `https://${candidate}`;
  let parsed: URL;
  try {
    parsed = new URL(prefixed);
  } catch {
    throw new ValidationError('Please enter a valid URL');
  }

  if (!['http:', 'https:'].includes(parsed.protocol)) {
    throw new ValidationError('Only HTTP(S) URLs are supported');
  }
  if (!parsed.hostname.includes('.') && isIP(parsed.hostname) === 0 && parsed.hostname !== 'localhost') {
    throw new ValidationError('Please enter a valid URL');
  }

  return parsed.toString();
}

function isPrivateIpv4(address: string): boolean {
  const parts = address.split('.').map(Number);
  if (parts.length !== 4 || parts.some(Number.isNaN)) return false;
  const [a, b] = parts;
  if (a === 10 || a === 127 || a === 0) return true;
  if (a === 169 && b === 254) return true;
  if (a === 172 && b >= 16 && b <= 31) return true;
  if (a === 192 && b === 168) return true;
  if (a === 100 && b >= 64 && b <= 127) return true;
  if (a === 198 && (b === 18 || b === 19)) return true;
  return false;
}

function isPrivateIpv6(address: string): boolean {
  const normalized = address.toLowerCase().split('%')[0];
  if (normalized === '::1') return true;
  if (normalized.startsWith('fc') || normalized.startsWith('fd')) return true;
  if (/^fe[89ab]/.test(normalized)) return true;
  if (normalized.startsWith('::ffff:')) {
    return isPrivateIpv4(normalized.slice(7));
  }
  return false;
}

export function isPrivateIpAddress(address: string): boolean {
  const version = isIP(address);
  if (version === 4) return isPrivateIpv4(address);
  if (version === 6) return isPrivateIpv6(address);
  return false;
}

function isInternalHostname(hostname: string): boolean {
  const normalized = hostname.toLowerCase().replace(/\.$/, '');
  return INTERNAL_HOSTNAMES.has(normalized) || INTERNAL_HOST_SUFFIXES.some(suffix => normalized.endsWith(suffix));
}

export async function isBlockedTarget(url: URL): Promise<boolean> {
  // URL keeps IPv6 literals bracketed.
  const hostname = url.hostname.replace(/^\[|\]$/g, '');

  if (isInternalHostname(hostname)) return true;
  if (isPrivateIpAddress(hostname)) return true;

  if (isIP(hostname) === 0) {
    try {
      const resolved = await lookup(hostname, { all: true, verbatim: true });
      if (resolved.some(entry => isPrivateIpAddress(entry.address))) {
        return true;
      }
    } catch {
      // Unresolvable hosts fail later as a FetchError.
    }
  }

  return false;
}

/** Normalizes user input and rejects private or internal targets. */
export async function resolveScanTarget(rawUrl: string): Promise<string> {
  const normalized = normalizeUrl(rawUrl);
  if (await isBlockedTarget(new URL(normalized))) {
    throw new ValidationError('This URL points to a private/internal network target and cannot be analyzed.');
  }
  return normalized;
}

export function formatZodError(error: z.ZodError, fallback: string): string {
  return error.issues.map(issue => issue.message).join(', ') || fallback;
}
