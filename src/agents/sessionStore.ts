/**
 * sessionStore.ts — Save, validate and restore authenticated browser state.
 *
 * A session record is keyed by (user, target) and is only trusted while it
 * has more than five minutes left to live, so a scan never starts on a
 * session that will expire half-way through.  Records are replaced
 * wholesale on every save (last write wins).
 *
 * Storage is pluggable through `SessionRepository`; nothing here assumes a
 * filesystem.  Every I/O problem is logged and reported as `null`/`false`:
 * a broken store must never abort the scan that asked it for help.
 */

import { DateTime, Duration } from 'luxon';
import { z } from 'zod';
import type { AutomationContext, BrowserState } from '../core/automation';
import type { SessionRecord } from '../core/types';
import { AutomationFault, describeError } from '../core/errors';
import { Logger } from '../core/logger';

const logger = new Logger('SessionStore');

/** A session is unusable once it has less than this left. */
export const SESSION_EXPIRY_BUFFER = Duration.fromObject({ minutes: 5 });

// ─── Record schema ─────────────────────────────────────────

const cookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string(),
  path: z.string(),
  expires: z.number().optional(),
  httpOnly: z.boolean().optional(),
  secure: z.boolean().optional(),
  sameSite: z.enum(['Strict', 'Lax', 'None']).optional(),
});

const browserStateSchema = z.object({
  cookies: z.array(cookieSchema),
  origins: z.array(
    z.object({
      origin: z.string(),
      localStorage: z.array(z.object({ name: z.string(), value: z.string() })),
    }),
  ),
});

const isoTimestamp = z.string().refine((value) => DateTime.fromISO(value).isValid, 'not an ISO-8601 timestamp');

export const sessionRecordSchema = z.object({
  userId: z.string().min(1),
  targetId: z.string().min(1),
  browserState: browserStateSchema,
  savedAt: isoTimestamp,
  expiresAt: isoTimestamp,
});

/** Parse untrusted data into a record, or `null` if it doesn't fit. */
export function parseSessionRecord(raw: unknown): SessionRecord | null {
  const parsed = sessionRecordSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

// ─── Repository seam ───────────────────────────────────────

export interface SessionRepository {
  get(userId: string, targetId: string): Promise<SessionRecord | null>;
  /** Replace whatever is stored for (record.userId, record.targetId). */
  put(record: SessionRecord): Promise<void>;
}

/** Process-local repository; the default when no database is configured. */
export class InMemorySessionRepository implements SessionRepository {
  private readonly records = new Map<string, SessionRecord>();

  async get(userId: string, targetId: string): Promise<SessionRecord | null> {
    const record = this.records.get(sessionKey(userId, targetId));
    return record ? structuredClone(record) : null;
  }

  async put(record: SessionRecord): Promise<void> {
    this.records.set(sessionKey(record.userId, record.targetId), structuredClone(record));
  }

  get size(): number {
    return this.records.size;
  }
}

/** Map key for a (user, target) pair; target ids are case-insensitive. */
export function sessionKey(userId: string, targetId: string): string {
  return JSON.stringify([userId, targetId.toLowerCase()]);
}

// ─── SessionStore ──────────────────────────────────────────

export interface SessionStoreOptions {
  repository?: SessionRepository;
  /** Current time; injectable for tests. */
  clock?: () => DateTime;
}

export class SessionStore {
  private readonly repository: SessionRepository;
  private readonly clock: () => DateTime;

  constructor(options: SessionStoreOptions = {}) {
    this.repository = options.repository ?? new InMemorySessionRepository();
    this.clock = options.clock ?? (() => DateTime.utc());
  }

  /**
   * Stamp `browserState` with `expiresAt = now + ttlHours`, persist it
   * (replacing any previous record for the key) and return the record.
   *
   * @returns `null` if the repository write failed.
   */
  async save(
    userId: string,
    targetId: string,
    browserState: BrowserState,
    ttlHours: number,
  ): Promise<SessionRecord | null> {
    const now = this.clock().toUTC();
    const expiresAt = now.plus({ hours: ttlHours });

    const record: SessionRecord = Object.freeze({
      userId,
      targetId: targetId.toLowerCase(),
      browserState: structuredClone(browserState),
      savedAt: now.toISO() ?? new Date(now.toMillis()).toISOString(),
      expiresAt: expiresAt.toISO() ?? new Date(expiresAt.toMillis()).toISOString(),
    });

    try {
      await this.repository.put(record);
      logger.info(
        `Session saved for user ${userId} - ${targetId.toUpperCase()} ` +
          `(${browserState.cookies.length} cookies, expires ${record.expiresAt})`,
      );
      return record;
    } catch (err) {
      logger.error(`Error saving session for user ${userId} - ${targetId.toUpperCase()}`, err);
      return null;
    }
  }

  /**
   * Export `context`'s current state and `save()` it.
   *
   * @returns `null` if the export or the write failed.
   */
  async capture(
    context: AutomationContext,
    userId: string,
    targetId: string,
    ttlHours: number,
  ): Promise<SessionRecord | null> {
    let state: BrowserState;
    try {
      state = await context.exportState();
    } catch (err) {
      logger.error(`Could not export browser state for user ${userId}: ${describeError(err)}`);
      return null;
    }
    return this.save(userId, targetId, state, ttlHours);
  }

  /** The stored record for (user, target), or `null` if absent, malformed or unreadable. */
  async get(userId: string, targetId: string): Promise<SessionRecord | null> {
    try {
      const raw = await this.repository.get(userId, targetId);
      if (!raw) return null;

      const record = parseSessionRecord(raw);
      if (!record) {
        logger.warn(`Stored session for user ${userId} - ${targetId.toUpperCase()} is malformed — ignoring`);
      }
      return record;
    } catch (err) {
      logger.error(`Error reading session for user ${userId} - ${targetId.toUpperCase()}: ${describeError(err)}`);
      return null;
    }
  }

  /**
   * Re-apply a record's cookies and storage onto `context`.
   *
   * Returns `false` without touching the context when the record is missing,
   * malformed or no longer valid, and `false` (logged) when applying fails.
   */
  async load(context: AutomationContext, record: unknown): Promise<boolean> {
    if (!record) {
      logger.warn('No session data to load');
      return false;
    }

    const parsed = parseSessionRecord(record);
    if (!parsed) {
      logger.warn('Session data is malformed — not loading');
      return false;
    }

    if (!this.isValid(parsed)) {
      logger.warn(`Session for user ${parsed.userId} expired at ${parsed.expiresAt} — not loading`);
      return false;
    }

    try {
      await context.applyState(parsed.browserState);
      logger.info(`Session loaded (${parsed.browserState.cookies.length} cookies)`);
      return true;
    } catch (err) {
      if (err instanceof AutomationFault) {
        logger.error(`Browser closed while loading session: ${err.message}`);
      } else {
        logger.error(`Error loading session: ${describeError(err)}`);
      }
      return false;
    }
  }

  /** `expiresAt` is more than five minutes in the future. */
  isValid(record: Pick<SessionRecord, 'expiresAt'> | null | undefined): boolean {
    if (!record || typeof record.expiresAt !== 'string') return false;

    const expiresAt = DateTime.fromISO(record.expiresAt, { zone: 'utc' });
    if (!expiresAt.isValid) return false;

    return expiresAt.toMillis() > this.clock().plus(SESSION_EXPIRY_BUFFER).toMillis();
  }
}
