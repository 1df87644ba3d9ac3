/**
 * errors.ts — Typed failures that cross module boundaries.
 *
 * Content problems (a selector that matched nothing, a slow OTP e-mail) are
 * reported as values.  The classes here are for conditions a caller must be
 * able to branch on by type rather than by sniffing message text.
 */

import type { LoginTerminal } from './types';

/**
 * The page, context or browser went away underneath an automation call.
 *
 * Raised by the browser capability itself, so "the site changed" and "the
 * automation infrastructure broke" never look alike to the login flow.
 */
export class AutomationFault extends Error {
  /** The capability call that was in flight, e.g. `goto` or `count`. */
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AutomationFault';
    this.operation = operation;
  }
}

/** `ensureLoggedIn` could not produce an authenticated page. */
export class LoginError extends Error {
  readonly outcome: Exclude<LoginTerminal, { status: 'success' }>;

  constructor(outcome: Exclude<LoginTerminal, { status: 'success' }>) {
    super(`Login failed: ${outcome.message}`);
    this.name = 'LoginError';
    this.outcome = outcome;
  }
}

/** Invalid or missing configuration detected at start-up. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Render any thrown value as a single-line message. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}

/** Cut a message to `max` characters for inclusion in a result object. */
export function truncate(message: string, max = 100): string {
  return message.length > max ? message.slice(0, max) : message;
}
