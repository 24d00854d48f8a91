import type { Session } from 'next-auth';
import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { ScanOptions } from './analyzers/scan';
import { AppConfig, getConfig } from './config';
import { UnauthorizedError, ValidationError, toErrorResponse } from './errors';
import { logger } from './logger';
import { formatZodError } from './validation';

export async function readJson(request: NextRequest): Promise<unknown> {
  try {
    return await request.json();
  } catch {
    throw new ValidationError('Invalid request body');
  }
}

export function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown, fallback: string): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(formatZodError(parsed.error, fallback));
  }
  return parsed.data;
}

export function errorResponse(route: string, error: unknown): NextResponse {
  const { status, body } = toErrorResponse(error);
  if (status >= 500) {
    logger.error(route, 'Request failed', error);
  } else {
    logger.debug(route, body.error);
  }
  return NextResponse.json(body, { status });
}

/** Returns the signed-in Pro email, or throws when there is no session. */
export function requireProEmail(session: Session | null): string {
  const email = session?.user?.email;
  if (!email) {
    throw new UnauthorizedError();
  }
  return email;
}

export function scanOptionsFromConfig(config: AppConfig = getConfig()): ScanOptions {
  return {
    fetchTimeoutMs: config.FETCH_TIMEOUT_MS,
    probeTimeoutMs: config.PROBE_TIMEOUT_MS,
    concurrency: config.PROBE_CONCURRENCY,
  };
}

export function pdfResponse(pdfBytes: Uint8Array, filename: string): NextResponse {
  const body = new Blob([Uint8Array.from(pdfBytes)], { type: 'application/pdf' });
  return new NextResponse(body, {
    status: 200,
    headers: {
      'Content-Type': 'application/pdf',
      'Content-Disposition': `attachment; filename="${filename}"`,
      'Content-Length': String(pdfBytes.length),
      'Cache-Control': 'no-store',
    },
  });
}
