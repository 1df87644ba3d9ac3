/**
 * supabaseService.ts — Supabase-backed session storage and scan log.
 *
 * Tables:
 *   scan_sessions  (user_id, target_id) UNIQUE → browser_state jsonb, saved_at, expires_at
 *   scan_logs      one row per finished scan
 *
 * Sessions are upserted on `user_id,target_id`, so saving twice for the same
 * pair replaces the row instead of adding one.  Rows coming back from the
 * database are validated before they are handed to the session store.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { SessionRecord, WorkerConfig } from '../core/types';
import { Logger } from '../core/logger';
import type { SessionRepository } from '../agents/sessionStore';
import { sessionRecordSchema } from '../agents/sessionStore';
import type { ScanLogEntry, ScanLogSink } from '../slotScanner';

const logger = new Logger('SupabaseService');

const SESSIONS_TABLE = 'scan_sessions';
const SCAN_LOGS_TABLE = 'scan_logs';

const sessionRowSchema = z.object({
  user_id: z.string(),
  target_id: z.string(),
  browser_state: z.unknown(),
  saved_at: z.string(),
  expires_at: z.string(),
});

export class SupabaseService implements SessionRepository, ScanLogSink {
  private readonly client: SupabaseClient;

  constructor(client: SupabaseClient) {
    this.client = client;
  }

  /** A service for `config`, or `null` when Supabase isn't configured. */
  static fromConfig(config: WorkerConfig): SupabaseService | null {
    if (!config.supabaseUrl || !config.supabaseServiceRoleKey) return null;
    return new SupabaseService(
      createClient(config.supabaseUrl, config.supabaseServiceRoleKey, {
        auth: { persistSession: false },
      }),
    );
  }

  // ── Sessions ─────────────────────────────────────────────

  async get(userId: string, targetId: string): Promise<SessionRecord | null> {
    const { data, error } = await this.client
      .from(SESSIONS_TABLE)
      .select('user_id, target_id, browser_state, saved_at, expires_at')
      .eq('user_id', userId)
      .eq('target_id', targetId.toLowerCase())
      .maybeSingle();

    if (error) {
      throw new Error(`SupabaseService.get failed: ${error.message}`);
    }
    if (!data) return null;

    const row = sessionRowSchema.safeParse(data);
    const record = row.success
      ? sessionRecordSchema.safeParse({
          userId: row.data.user_id,
          targetId: row.data.target_id,
          browserState: row.data.browser_state,
          savedAt: row.data.saved_at,
          expiresAt: row.data.expires_at,
        })
      : null;

    if (!record || !record.success) {
      logger.warn(`Ignoring malformed session row for user ${userId} - ${targetId.toUpperCase()}`);
      return null;
    }
    return record.data;
  }

  async put(record: SessionRecord): Promise<void> {
    const { error } = await this.client.from(SESSIONS_TABLE).upsert(
      {
        user_id: record.userId,
        target_id: record.targetId.toLowerCase(),
        browser_state: record.browserState,
        saved_at: record.savedAt,
        expires_at: record.expiresAt,
      },
      { onConflict: 'user_id,target_id', ignoreDuplicates: false },
    );

    if (error) {
      throw new Error(`SupabaseService.put failed: ${error.message}`);
    }
    logger.debug(`Upserted session for user ${record.userId} - ${record.targetId.toUpperCase()}`);
  }

  // ── Scan logs ────────────────────────────────────────────

  async record(entry: ScanLogEntry): Promise<void> {
    const { error } = await this.client.from(SCAN_LOGS_TABLE).insert({
      user_id: entry.userId,
      target_id: entry.targetId,
      target_name: entry.targetName,
      success: entry.success,
      has_appointment: entry.hasAppointment,
      slot_count: entry.slotCount,
      message: entry.message,
      duration_ms: entry.durationMs,
      scanned_at: entry.scannedAt,
    });

    if (error) {
      throw new Error(`SupabaseService.record failed: ${error.message}`);
    }
    logger.debug(`Logged scan of ${entry.targetName}`);
  }
}
