/**
 * otpReader.ts — Pull the portal's one-time code out of an IMAP mailbox.
 *
 * Polls every 2 s for unread mail from the portal's sender domain, reads the
 * newest match, and extracts the code.  As soon as a code is found the
 * message is flagged \Seen (so the next login doesn't pick it up again) and
 * the reader returns; it does not sit out the rest of the timeout.
 *
 * Never rejects: timeouts, bad credentials and dropped connections all come
 * back as `null`.
 *
 * CODE PATTERNS
 * ─────────────
 * The text part of the message, then its subject, is matched against
 * `OTP_PATTERNS` in order and the first hit wins:
 *   "OTP: 123456", "OTP is 123456", "OTP code is: 123456"
 *   "verification code is 1234"
 *   "one-time password: 12345678"
 *   "şifre: 1234", "şifreniz: 1234"
 *   any standalone six-digit number
 * Labelled codes may be 4 to 8 digits long.
 */

import { ImapFlow } from 'imapflow';
import { simpleParser } from 'mailparser';
import type { MailboxAccess } from '../core/types';
import { describeError } from '../core/errors';
import { Logger, maskCode } from '../core/logger';
import { sleep } from '../middleware/humanBehavior';

const logger = new Logger('OtpReader');

// ─── Code extraction ───────────────────────────────────────

/**
 * Patterns tried in order.  Labelled codes come first; the bare six-digit
 * number is the last resort because it will happily match a phone number or
 * a reference id elsewhere in the body.
 */
export const OTP_PATTERNS: readonly RegExp[] = [
  /\bOTP(?:\s+code)?(?:\s+is)?[:\s]+(\d{4,8})\b/i,
  /verification code(?:\s+is)?[:\s]+(\d{4,8})\b/i,
  /one-time password(?:\s+is)?[:\s]+(\d{4,8})\b/i,
  /şifre(?:niz)?[:\s]+(\d{4,8})\b/i,
  /\b(\d{6})\b/,
];

export function extractOtpFromText(body: string): string | null {
  for (const pattern of OTP_PATTERNS) {
    const match = pattern.exec(body);
    if (match) return match[1];
  }
  return null;
}

// ─── Mailbox seam ──────────────────────────────────────────

export interface MailboxMessage {
  subject: string;
  text: string;
}

/** The handful of IMAP operations the reader needs. */
export interface MailboxClient {
  connect(): Promise<void>;
  /** UIDs of unread messages from `senderDomain`, oldest first. */
  searchUnread(senderDomain: string): Promise<number[]>;
  fetchMessage(uid: number): Promise<MailboxMessage | null>;
  markSeen(uid: number): Promise<void>;
  close(): Promise<void>;
}

export type MailboxClientFactory = (access: MailboxAccess) => MailboxClient;

/** `MailboxClient` over imapflow, INBOX only, TLS on. */
export class ImapMailboxClient implements MailboxClient {
  private readonly client: ImapFlow;
  private releaseLock: (() => void) | null = null;

  constructor(access: MailboxAccess) {
    this.client = new ImapFlow({
      host: access.imapHost,
      port: access.imapPort,
      secure: true,
      auth: { user: access.address, pass: access.secret },
      logger: false,
    });
    // An unhandled 'error' event would take the whole worker down.
    this.client.on('error', (err: unknown) => {
      logger.warn(`IMAP connection error: ${describeError(err)}`);
    });
  }

  async connect(): Promise<void> {
    await this.client.connect();
    const lock = await this.client.getMailboxLock('INBOX');
    this.releaseLock = () => lock.release();
  }

  async searchUnread(senderDomain: string): Promise<number[]> {
    const uids = await this.client.search({ seen: false, from: senderDomain }, { uid: true });
    if (!uids) return [];
    return [...uids].sort((a, b) => a - b);
  }

  async fetchMessage(uid: number): Promise<MailboxMessage | null> {
    const message = await this.client.fetchOne(String(uid), { source: true }, { uid: true });
    if (!message || !message.source) return null;

    const parsed = await simpleParser(message.source);
    return { subject: parsed.subject ?? '', text: parsed.text ?? '' };
  }

  async markSeen(uid: number): Promise<void> {
    await this.client.messageFlagsAdd(String(uid), ['\\Seen'], { uid: true });
  }

  async close(): Promise<void> {
    this.releaseLock?.();
    this.releaseLock = null;
    await this.client.logout();
  }
}

// ─── OtpReader ─────────────────────────────────────────────

export interface OtpReaderOptions {
  clientFactory?: MailboxClientFactory;
  /** Gap between polls; 2 s by default. */
  pollIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export class OtpReader {
  private readonly clientFactory: MailboxClientFactory;
  private readonly pollIntervalMs: number;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(options: OtpReaderOptions = {}) {
    this.clientFactory = options.clientFactory ?? ((access) => new ImapMailboxClient(access));
    this.pollIntervalMs = options.pollIntervalMs ?? 2_000;
    this.sleepFn = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Wait up to `timeoutMs` for a one-time code.
   *
   * @returns the code, or `null` on timeout or any mailbox error.
   */
  async read(access: MailboxAccess, timeoutMs: number): Promise<string | null> {
    logger.info(`Reading OTP from ${access.address} (timeout: ${Math.round(timeoutMs / 1000)}s)…`);

    const client = this.clientFactory(access);
    const startedAt = this.now();

    try {
      await client.connect();
      logger.info(`Connected to ${access.imapHost}`);

      do {
        const code = await this.pollOnce(client, access.senderDomain);
        if (code) return code;

        if (this.now() - startedAt >= timeoutMs) break;
        await this.sleepFn(this.pollIntervalMs);
      } while (this.now() - startedAt < timeoutMs);

      logger.warn(`Timeout (${Math.round(timeoutMs / 1000)}s) — no OTP e-mail received`);
      return null;
    } catch (err) {
      logger.error(`Error reading mailbox ${access.address}: ${describeError(err)}`);
      return null;
    } finally {
      await client.close().catch((err: unknown) => {
        logger.debug(`Mailbox close failed: ${describeError(err)}`);
      });
    }
  }

  /** Inspect the newest unread message from the sender, if any. */
  private async pollOnce(client: MailboxClient, senderDomain: string): Promise<string | null> {
    logger.debug(`Searching for OTP e-mail from ${senderDomain}…`);
    const uids = await client.searchUnread(senderDomain);
    if (uids.length === 0) return null;

    const latest = uids[uids.length - 1];
    logger.info(`Found ${uids.length} unread message(s); reading the newest`);

    const message = await client.fetchMessage(latest);
    if (!message) return null;

    const code = extractOtpFromText(message.text) ?? extractOtpFromText(message.subject);
    if (!code) {
      logger.warn(`E-mail "${message.subject}" has no recognisable code`);
      return null;
    }

    await client.markSeen(latest);
    logger.info(`OTP found: ${maskCode(code)}`);
    return code;
  }
}
