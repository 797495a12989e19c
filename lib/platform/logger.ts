/**
 * Structured logger for the seating pipeline and CLI.
 *
 * Outputs JSON lines by default (easy to pipe into jq or a log drain)
 * and human-readable lines when NODE_ENV=development.
 *
 * Usage:
 *   import { log } from '@/lib/platform/logger';
 *   log.info('seating.pack', 'Packed category', { category, tables: 3 });
 *   log.warn('seating.pack', 'Party exceeds table capacity', { partyId, size });
 *   log.error('cli', 'Build failed', { input }, error);
 */

type LogLevel = 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel | 'silent', number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3,
};

function isDev(): boolean {
  return process.env.NODE_ENV === 'development';
}

/** Minimum level from LOG_LEVEL; unknown values fall back to info. */
function threshold(): number {
  const raw = (process.env.LOG_LEVEL ?? '').trim().toLowerCase();
  if (raw === 'warn' || raw === 'error' || raw === 'silent') return LEVEL_RANK[raw];
  return LEVEL_RANK.info;
}

function formatError(err: unknown): { message: string; stack?: string } {
  if (err instanceof Error) {
    return { message: err.message, ...(err.stack ? { stack: err.stack } : {}) };
  }
  return { message: String(err) };
}

function emit(
  level: LogLevel,
  scope: string,
  message: string,
  context?: Record<string, unknown>,
  err?: unknown
) {
  if (LEVEL_RANK[level] < threshold()) return;

  const fn = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;

  if (isDev()) {
    const prefix = level === 'error' ? '✗' : level === 'warn' ? '⚠' : '·';
    const extra = context ? ` ${JSON.stringify(context)}` : '';
    const errLine = err ? `\n  → ${formatError(err).message}` : '';
    fn(`${prefix} [${scope}] ${message}${extra}${errLine}`);
    return;
  }

  const entry: Record<string, unknown> = {
    level,
    scope,
    message,
    ...(context ? { context } : {}),
    ...(err ? { error: formatError(err) } : {}),
    ts: new Date().toISOString(),
  };
  fn(JSON.stringify(entry));
}

export const log = {
  info: (scope: string, message: string, context?: Record<string, unknown>) =>
    emit('info', scope, message, context),

  warn: (scope: string, message: string, context?: Record<string, unknown>) =>
    emit('warn', scope, message, context),

  error: (scope: string, message: string, context?: Record<string, unknown>, err?: unknown) =>
    emit('error', scope, message, context, err),
};
