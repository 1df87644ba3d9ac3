/**
 * sessionManager.ts — Hand back an authenticated page, reusing a session when possible.
 *
 * Order of preference:
 *   1. The session the caller passed in, else the one in the session store.
 *      If it is still valid it is applied to the context and probed on the
 *      dashboard; a visible "logged in" marker means we skip the login.
 *   2. A fresh run of the login state machine.  Success is captured back
 *      into the session store so the next scan can reuse it.
 *
 * A failed login closes the page it opened and rejects with `LoginError`.
 * Without a mailbox and without manual OTP entry a login can never finish,
 * so that case rejects before any page is opened.
 */

import type { AutomationContext, AutomationPage, Locator } from '../core/automation';
import { describeLocator } from '../core/automation';
import { AutomationFault, LoginError, describeError } from '../core/errors';
import { Logger } from '../core/logger';
import type { Credentials, MailboxAccess, SessionRecord, TargetConfiguration } from '../core/types';
import { portalSelectors, targetRegistry, type PortalSelectors, type TargetRegistry } from '../config/targetRegistry';
import { LoginFlow } from './loginFlow';
import { SessionStore } from './sessionStore';

const logger = new Logger('SessionManager');

/** Navigation budget for the dashboard probe of a restored session. */
const SESSION_PROBE_TIMEOUT_MS = 15_000;

export interface EnsureLoggedInResult {
  page: AutomationPage;
  /** `true` when the login state machine ran (rather than a restored session). */
  isNewLogin: boolean;
  /** The record saved after a new login; `null` when reused or when saving failed. */
  session: SessionRecord | null;
}

export interface SessionManagerOptions {
  store: SessionStore;
  loginFlow: LoginFlow;
  sessionTtlHours?: number;
  registry?: TargetRegistry;
  selectors?: PortalSelectors;
}

export class SessionManager {
  private readonly store: SessionStore;
  private readonly loginFlow: LoginFlow;
  private readonly sessionTtlHours: number;
  private readonly registry: TargetRegistry;
  private readonly selectors: PortalSelectors;

  constructor(options: SessionManagerOptions) {
    this.store = options.store;
    this.loginFlow = options.loginFlow;
    this.sessionTtlHours = options.sessionTtlHours ?? 24;
    this.registry = options.registry ?? targetRegistry;
    this.selectors = options.selectors ?? portalSelectors;
  }

  /**
   * Produce a page on `context` that is logged in to `credentials.targetId`.
   *
   * @throws LoginError when neither a saved session nor a fresh login works.
   * @throws AutomationFault when the browser goes away mid-probe.
   */
  async ensureLoggedIn(
    context: AutomationContext,
    userId: string,
    credentials: Credentials,
    mailbox?: MailboxAccess,
    existingSession?: SessionRecord,
  ): Promise<EnsureLoggedInResult> {
    const target = this.registry.get(credentials.targetId);

    const candidate = existingSession ?? (await this.store.get(userId, target.id));
    if (candidate && this.store.isValid(candidate)) {
      const restored = await this.tryRestore(context, candidate, target);
      if (restored) {
        logger.info(`Reusing saved session for user ${userId} - ${target.id.toUpperCase()}`);
        return { page: restored, isNewLogin: false, session: null };
      }
      logger.info('Saved session was not accepted by the portal — logging in again');
    } else if (candidate) {
      logger.info(`Saved session for user ${userId} has expired — logging in again`);
    }

    if (!mailbox && !this.loginFlow.supportsManualOtp) {
      throw new LoginError({
        status: 'failed',
        stage: 'otp_wait',
        reason: 'otp_missing',
        otpMethod: 'failed',
        message: 'OTP not provided - no mailbox access and manual OTP entry is not available',
      });
    }

    const page = await context.newPage();
    const terminal = await this.loginFlow.run(page, credentials, mailbox);

    if (terminal.status !== 'success') {
      await closeQuietly(page);
      throw new LoginError(terminal);
    }

    const session = await this.store.capture(context, userId, target.id, this.sessionTtlHours);
    if (!session) logger.warn('Login succeeded but the session could not be saved');

    return { page, isNewLogin: true, session };
  }

  /**
   * Apply `record` and look for a logged-in marker on the dashboard.
   * Returns the probed page on success; closes it and returns `null` otherwise.
   */
  private async tryRestore(
    context: AutomationContext,
    record: SessionRecord,
    target: TargetConfiguration,
  ): Promise<AutomationPage | null> {
    const loaded = await this.store.load(context, record);
    if (!loaded) return null;

    const page = await context.newPage();
    try {
      await page.goto(target.dashboardUrl, { timeoutMs: SESSION_PROBE_TIMEOUT_MS, waitUntil: 'load' });

      for (const probe of this.selectors.authenticatedProbe) {
        if ((await countSafely(page, probe)) > 0) {
          logger.debug(`Session probe matched ${describeLocator(probe)}`);
          return page;
        }
      }
      logger.debug(`No logged-in marker on ${page.url()}`);
    } catch (err) {
      if (err instanceof AutomationFault) {
        await closeQuietly(page);
        throw err;
      }
      logger.warn(`Session probe failed: ${describeError(err)}`);
    }

    await closeQuietly(page);
    return null;
  }
}

async function countSafely(page: AutomationPage, locator: Locator): Promise<number> {
  try {
    return await page.count(locator);
  } catch (err) {
    if (err instanceof AutomationFault) throw err;
    return 0;
  }
}

async function closeQuietly(page: AutomationPage): Promise<void> {
  if (page.isClosed()) return;
  try {
    await page.close();
  } catch (err) {
    logger.debug(`Page close failed: ${describeError(err)}`);
  }
}
