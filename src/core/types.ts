/**
 * types.ts — Shared type definitions for the scan pipeline, plus the
 * environment-derived `WorkerConfig`.
 */

import type { BrowserState, Locator } from './automation';
import { ConfigError } from './errors';

// ─── Targets ───────────────────────────────────────────────

/** Semantic roles a target's content selectors can play. */
export type IndicatorRole =
  | 'noSlotsIndicator'
  | 'slotIndicator'
  | 'dateIndicator'
  | 'loadingIndicator';

/**
 * Everything needed to check one booking portal (one country / office).
 *
 * Immutable once loaded; the registry hands out frozen objects.
 */
export interface TargetConfiguration {
  /** Lower-case identifier, e.g. "deu". */
  id: string;
  /** Display name, e.g. "Germany". */
  name: string;
  baseUrl: string;
  appointmentUrl: string;
  loginUrl: string;
  dashboardUrl: string;
  /** Ordered candidates per role: the first one that matches wins. */
  selectors: Readonly<Record<IndicatorRole, readonly Locator[]>>;
  /** CSS selector that appears once the appointment widget has rendered. */
  readySelector: string;
  navigationTimeoutMs: number;
}

// ─── Credentials ───────────────────────────────────────────

/** Portal account for one scan invocation.  Never persisted. */
export interface Credentials {
  email: string;
  /** Plaintext; decrypted by the caller. */
  password: string;
  targetId: string;
}

/** IMAP mailbox the portal sends one-time codes to.  Never persisted. */
export interface MailboxAccess {
  address: string;
  secret: string;
  imapHost: string;
  imapPort: number;
  /** Only messages from this domain are inspected (e.g. "vfsglobal.com"). */
  senderDomain: string;
}

// ─── Sessions ──────────────────────────────────────────────

/**
 * A reusable authenticated browser state for one user on one target.
 *
 * Replaced wholesale on every save, never edited in place.
 */
export interface SessionRecord {
  userId: string;
  targetId: string;
  browserState: BrowserState;
  /** ISO-8601, UTC. */
  savedAt: string;
  /** ISO-8601, UTC. */
  expiresAt: string;
}

// ─── Login ─────────────────────────────────────────────────

export type OtpMethod = 'auto' | 'manual' | 'session' | 'failed' | 'maintenance';

/** States of the credential verification flow, in the order they run. */
export type LoginState =
  | 'page_load'
  | 'challenge_check'
  | 'fill_email'
  | 'fill_password'
  | 'submit'
  | 'otp_wait'
  | 'otp_fill'
  | 'otp_submit'
  | 'outcome_check';

export type LoginFailureReason =
  | 'page_load'
  | 'challenge'
  | 'field_not_found'
  | 'submit_not_found'
  | 'otp_missing'
  | 'dashboard_not_found'
  | 'browser_closed'
  | 'unexpected';

/** Where the login state machine stopped. */
export type LoginTerminal =
  | { status: 'success'; otpMethod: 'auto' | 'manual' | 'session'; message: string }
  | { status: 'maintenance'; stage: LoginState; message: string }
  | {
      status: 'failed';
      stage: LoginState;
      reason: LoginFailureReason;
      otpMethod: OtpMethod;
      message: string;
    };

/** Flat summary of a login attempt for callers that only need the verdict. */
export interface LoginOutcome {
  success: boolean;
  message: string;
  otpMethod: OtpMethod;
}

// ─── Scanning ──────────────────────────────────────────────

export interface ScanRequest {
  targetId: string;
  targetName: string;
  userId?: string;
  credentials?: Credentials;
  mailbox?: MailboxAccess;
  /** An explicit session to try first; otherwise the session store is consulted. */
  session?: SessionRecord;
}

/** What `SlotScanner.scan()` resolves with.  Produced once, never mutated. */
export interface ScanResult {
  success: boolean;
  /** The target's display name as given by the caller. */
  target: string;
  hasAppointment: boolean;
  availableSlots: string[] | null;
  message: string;
  durationMs: number;
  sessionSaved: boolean;
}

// ─── Worker configuration ──────────────────────────────────

export type PacingMode = 'human' | 'off';

/**
 * Central configuration for the worker.
 * Read from environment variables with sensible defaults.
 */
export interface WorkerConfig {
  port: number;
  workerSecret?: string;

  // Browser
  chromeExecutablePath?: string;
  headless: boolean;
  navigationTimeoutMs: number;
  pacing: PacingMode;

  // Sessions / OTP
  sessionTtlHours: number;
  otpTimeoutMs: number;

  // Persistence
  supabaseUrl?: string;
  supabaseServiceRoleKey?: string;

  // Debugging
  debugScreenshotDir?: string;
}

/** Build a WorkerConfig from `env` (defaults to process.env). */
export function loadWorkerConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  const pacing = env.PACING ?? 'human';
  if (pacing !== 'human' && pacing !== 'off') {
    throw new ConfigError(`PACING must be "human" or "off", got "${pacing}"`);
  }

  return {
    port: positiveInt(env, 'PORT', 8000),
    workerSecret: nonEmpty(env.WORKER_SECRET),
    chromeExecutablePath: nonEmpty(env.CHROME_EXECUTABLE_PATH),
    headless: (env.HEADLESS ?? 'true').toLowerCase() !== 'false',
    navigationTimeoutMs: positiveInt(env, 'NAVIGATION_TIMEOUT_MS', 30_000),
    pacing,
    sessionTtlHours: positiveNumber(env, 'SESSION_TTL_HOURS', 24),
    otpTimeoutMs: positiveInt(env, 'OTP_TIMEOUT_MS', 60_000),
    supabaseUrl: nonEmpty(env.SUPABASE_URL),
    supabaseServiceRoleKey: nonEmpty(env.SUPABASE_SERVICE_ROLE_KEY),
    debugScreenshotDir: nonEmpty(env.DEBUG_SCREENSHOT_DIR),
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function positiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function positiveNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive number, got "${raw}"`);
  }
  return value;
}
