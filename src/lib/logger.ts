/**
 * Component-tagged console logger.
 *
 *   logger.info('scan', 'Scored page', { url, totalScore });
 *   logger.error('POST /api/analyze', 'Scan failed', err);
 *
 * `LOG_LEVEL` (debug | info | warn | error) sets the minimum level; unknown
 * values fall back to info.
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const WRITERS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function minimumLevel(): number {
  const configured = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLogLevel(configured) ? LEVEL_ORDER[configured] : LEVEL_ORDER.info;
}

function write(level: LogLevel, component: string, message: string, meta?: unknown): void {
  if (LEVEL_ORDER[level] < minimumLevel()) return;
  const line = `[${component}] ${message}`;
  if (meta === undefined) {
    WRITERS[level](line);
  } else {
    WRITERS[level](line, meta);
  }
}

export const logger = {
  debug(component: string, message: string, meta?: unknown): void {
    write('debug', component, message, meta);
  },
  info(component: string, message: string, meta?: unknown): void {
    write('info', component, message, meta);
  },
  warn(component: string, message: string, meta?: unknown): void {
    write('warn', component, message, meta);
  },
  error(component: string, message: string, error?: unknown): void {
    write('error', component, message, error);
  },
};
