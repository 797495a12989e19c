/**
 * Fatal error types and the CLI's error reporter.
 *
 * Fatal problems (missing input columns, bad options) throw before any
 * guest is classified. Unusual but representable data never throws; it
 * becomes a `SeatingWarning` on the result instead.
 *
 * Usage:
 *   throw new MissingColumnError(['rsvp', 'party']);
 *   const message = reportError('cli.build', 'Build failed', err, { input });
 */

import { log } from './logger';

export class MissingColumnError extends Error {
  readonly columns: string[];

  constructor(columns: string[]) {
    super(`Missing required column${columns.length === 1 ? '' : 's'}: ${columns.join(', ')}`);
    this.name = 'MissingColumnError';
    this.columns = columns;
  }
}

export class InvalidOptionError extends Error {
  readonly option: string;

  constructor(option: string, message: string) {
    super(`Invalid ${option}: ${message}`);
    this.name = 'InvalidOptionError';
    this.option = option;
  }
}

/** Errors whose message is safe and useful to show as-is. */
export function isSeatingError(err: unknown): err is MissingColumnError | InvalidOptionError {
  return err instanceof MissingColumnError || err instanceof InvalidOptionError;
}

/**
 * Log the real error with structured context and return the line to show
 * the user. Known seating errors keep their own message; anything else is
 * reported under the caller's generic message.
 *
 * @param scope   - Logger scope (e.g. 'cli.build')
 * @param message - Fallback message for unexpected errors
 */
export function reportError(
  scope: string,
  message: string,
  err?: unknown,
  context?: Record<string, unknown>
): string {
  log.error(scope, message, context, err);
  if (isSeatingError(err)) return err.message;
  if (err instanceof Error && err.message) return `${message}: ${err.message}`;
  return message;
}
