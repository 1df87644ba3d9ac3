/**
 * loginFlow.ts — The credential verification state machine.
 *
 *   page_load → challenge_check → fill_email → fill_password → submit
 *     → otp_wait → otp_fill → otp_submit → outcome_check
 *
 * Each state is a handler that either names the next state or returns a
 * terminal: `success`, `maintenance` (retry later, not a bug) or
 * `failed(stage, reason)`.  Handlers turn every expected problem into a
 * terminal themselves; anything they throw is converted by the driver loop.
 * An `AutomationFault` always becomes `browser_closed`, never
 * `field_not_found`.
 *
 * TIMING
 * ──────
 *   navigationMs      page_load only; the portal is slow, 30 s by default
 *   fieldWaitMs       per field, polled every fieldPollMs; 0 means one look
 *   submitSettleMs    wait for the OTP screen (or an error) after submit
 *   otpMs             shared by the mailbox poll and the manual prompt
 *   otpSettleMs       wait for the dashboard after the code is submitted
 *   challengeGraceMs  one pause before the single challenge re-check
 *
 * Pacer delays come on top of all of these and are not counted against
 * them.  A flow that fails everywhere can therefore take well over a minute.
 *
 * SCREENSHOTS
 * ───────────
 * With `screenshotDir` set, every failed terminal writes
 * `login-<target>-<stage>-<timestamp>.png`.  A screenshot that cannot be
 * taken is logged and otherwise ignored; it never changes the terminal.
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { AutomationPage, Locator } from '../core/automation';
import { describeLocator } from '../core/automation';
import { AutomationFault, describeError } from '../core/errors';
import { Logger } from '../core/logger';
import type {
  Credentials,
  LoginFailureReason,
  LoginOutcome,
  LoginState,
  LoginTerminal,
  MailboxAccess,
  TargetConfiguration,
} from '../core/types';
import { portalSelectors, targetRegistry, type PortalSelectors, type TargetRegistry } from '../config/targetRegistry';
import { inspectPage, type PageSignals } from '../middleware/challengeDetector';
import { HumanPacer } from '../middleware/humanBehavior';
import { OtpReader } from './otpReader';

const logger = new Logger('LoginFlow');

// ─── Options ───────────────────────────────────────────────

/**
 * Supplies a one-time code by some out-of-band route (a person at a
 * terminal, a webhook).  Resolve `null` when no code is coming.
 */
export type ManualOtpProvider = (request: {
  targetId: string;
  email: string;
  timeoutMs: number;
}) => Promise<string | null>;

export interface LoginTimeouts {
  navigationMs: number;
  /** How long to keep looking for a form field while the page renders. */
  fieldWaitMs: number;
  fieldPollMs: number;
  submitSettleMs: number;
  otpMs: number;
  otpSettleMs: number;
  /** Grace period before re-checking a bot challenge once. */
  challengeGraceMs: number;
}

export const DEFAULT_LOGIN_TIMEOUTS: LoginTimeouts = {
  navigationMs: 30_000,
  fieldWaitMs: 10_000,
  fieldPollMs: 500,
  submitSettleMs: 15_000,
  otpMs: 60_000,
  otpSettleMs: 20_000,
  challengeGraceMs: 8_000,
};

export interface LoginFlowOptions {
  pacer?: HumanPacer;
  otpReader?: OtpReader;
  /** Leave unset when nobody can type a code in; the flow then fails fast at otp_wait. */
  manualOtp?: ManualOtpProvider;
  registry?: TargetRegistry;
  selectors?: PortalSelectors;
  timeouts?: Partial<LoginTimeouts>;
  /** Write a PNG of the page here whenever the flow ends in failure. */
  screenshotDir?: string;
}

// ─── Internal run state ────────────────────────────────────

interface LoginRun {
  page: AutomationPage;
  credentials: Credentials;
  target: TargetConfiguration;
  mailbox?: MailboxAccess;
  otpSource: 'auto' | 'manual' | null;
  otpCode: string | null;
}

type Step = { next: LoginState } | { done: LoginTerminal };

type Handler = (run: LoginRun) => Promise<Step>;

// ─── LoginFlow ─────────────────────────────────────────────

export class LoginFlow {
  private readonly pacer: HumanPacer;
  private readonly otpReader: OtpReader;
  private readonly manualOtp?: ManualOtpProvider;
  private readonly registry: TargetRegistry;
  private readonly selectors: PortalSelectors;
  private readonly timeouts: LoginTimeouts;
  private readonly screenshotDir?: string;

  private readonly handlers: Record<LoginState, Handler> = {
    page_load: (run) => this.pageLoad(run),
    challenge_check: (run) => this.challengeCheck(run),
    fill_email: (run) => this.fillEmail(run),
    fill_password: (run) => this.fillPassword(run),
    submit: (run) => this.submit(run),
    otp_wait: (run) => this.otpWait(run),
    otp_fill: (run) => this.otpFill(run),
    otp_submit: (run) => this.otpSubmit(run),
    outcome_check: (run) => this.outcomeCheck(run),
  };

  constructor(options: LoginFlowOptions = {}) {
    this.pacer = options.pacer ?? new HumanPacer();
    this.otpReader = options.otpReader ?? new OtpReader();
    this.manualOtp = options.manualOtp;
    this.registry = options.registry ?? targetRegistry;
    this.selectors = options.selectors ?? portalSelectors;
    this.timeouts = { ...DEFAULT_LOGIN_TIMEOUTS, ...options.timeouts };
    this.screenshotDir = options.screenshotDir;
  }

  /** Whether a code can be obtained without a mailbox. */
  get supportsManualOtp(): boolean {
    return this.manualOtp !== undefined;
  }

  /**
   * Drive `page` through the login sequence for `credentials.targetId`.
   * Never rejects.
   */
  async run(page: AutomationPage, credentials: Credentials, mailbox?: MailboxAccess): Promise<LoginTerminal> {
    const run: LoginRun = {
      page,
      credentials,
      target: this.registry.get(credentials.targetId),
      mailbox,
      otpSource: null,
      otpCode: null,
    };

    logger.info(`Starting login for ${run.target.name} (${run.target.id})`);

    let state: LoginState = 'page_load';
    for (;;) {
      let step: Step;
      try {
        step = await this.handlers[state](run);
      } catch (err) {
        step = { done: this.fromError(state, run, err) };
      }

      if ('done' in step) {
        await this.report(run, step.done);
        return step.done;
      }

      logger.debug(`${state} → ${step.next}`);
      state = step.next;
    }
  }

  // ── States ───────────────────────────────────────────────

  /** Go straight to the login page, skipping the landing page. */
  private async pageLoad(run: LoginRun): Promise<Step> {
    const { page, target } = run;
    logger.info(`Navigating directly to login page: ${target.loginUrl}`);

    try {
      await page.goto(target.loginUrl, { timeoutMs: this.timeouts.navigationMs, waitUntil: 'networkidle' });
    } catch (err) {
      if (err instanceof AutomationFault) throw err;
      return this.fail(run, 'page_load', 'page_load', `Login page load failed: ${describeError(err)}`);
    }

    await this.pacer.pause('pageSettle');

    const currentPath = pathnameOf(page.url());
    if (currentPath.includes('/dashboard')) {
      logger.info('Redirected to dashboard — already logged in');
      return { done: { status: 'success', otpMethod: 'session', message: 'Already logged in' } };
    }

    return { next: 'challenge_check' };
  }

  /** Maintenance ends the flow; a challenge gets one grace period. */
  private async challengeCheck(run: LoginRun): Promise<Step> {
    const { page } = run;

    let signals = await this.checkpoint(page);
    if (signals.maintenance) return this.maintenance('challenge_check');

    if (signals.challenge) {
      logger.warn(
        `Bot challenge detected (${signals.reasons.join('; ')}) — ` +
          `waiting ${Math.round(this.timeouts.challengeGraceMs / 1000)}s and re-checking once`,
      );
      await this.pacer.wait(this.timeouts.challengeGraceMs);

      signals = await this.checkpoint(page);
      if (signals.maintenance) return this.maintenance('challenge_check');
      if (signals.challenge) {
        return this.fail(run, 'challenge_check', 'challenge', 'Bot challenge page did not clear');
      }
    }

    const dismissed = await this.pacer.dismissCookieBanner(page, this.selectors.cookieBanner);
    if (!dismissed) logger.debug('No cookie banner found');

    return { next: 'fill_email' };
  }

  private async fillEmail(run: LoginRun): Promise<Step> {
    const field = await this.findFirst(run.page, this.selectors.emailField, this.timeouts.fieldWaitMs);
    if (!field) {
      return this.fail(run, 'fill_email', 'field_not_found', 'Email input field not found');
    }

    await this.pacer.typeLikeHuman(run.page, field, run.credentials.email);
    logger.info(`Email entered via ${describeLocator(field)}`);
    await this.pacer.pause('betweenFields');
    return { next: 'fill_password' };
  }

  private async fillPassword(run: LoginRun): Promise<Step> {
    const field = await this.findFirst(run.page, this.selectors.passwordField, this.timeouts.fieldWaitMs);
    if (!field) {
      return this.fail(run, 'fill_password', 'field_not_found', 'Password input field not found');
    }

    await this.pacer.typeLikeHuman(run.page, field, run.credentials.password);
    logger.info(`Password entered via ${describeLocator(field)}`);
    await this.pacer.pause('thinking');
    return { next: 'submit' };
  }

  /** Click the submit control, or press Enter when there is none. */
  private async submit(run: LoginRun): Promise<Step> {
    const { page } = run;

    const control = await this.findFirst(page, this.selectors.submitControl, 0);
    if (control) {
      logger.info(`Submitting login form via ${describeLocator(control)}`);
      await this.pacer.clickLikeHuman(page, control);
    } else {
      logger.warn('Could not find submit button, trying Enter key');
      try {
        await page.pressKey('Enter');
      } catch (err) {
        if (err instanceof AutomationFault) throw err;
        return this.fail(run, 'submit', 'submit_not_found', `Submit button not found: ${describeError(err)}`);
      }
    }

    const settled = await page.waitForNetworkIdle(this.timeouts.submitSettleMs);
    if (!settled) logger.warn('Network did not settle after submitting credentials (continuing)');
    await this.pacer.pause('pageSettle');

    const signals = await this.checkpoint(page);
    if (signals.maintenance) return this.maintenance('submit');

    return { next: 'otp_wait' };
  }

  /** Mailbox first, then the manual provider if one was configured. */
  private async otpWait(run: LoginRun): Promise<Step> {
    if (run.mailbox) {
      const code = await this.otpReader.read(run.mailbox, this.timeouts.otpMs);
      if (code) {
        run.otpSource = 'auto';
        run.otpCode = code;
        return { next: 'otp_fill' };
      }
      logger.warn(`OTP e-mail not received within ${Math.round(this.timeouts.otpMs / 1000)}s`);
    } else {
      logger.warn('No mailbox access provided for OTP auto-read');
    }

    if (!this.manualOtp) {
      return this.fail(
        run,
        'otp_wait',
        'otp_missing',
        run.mailbox
          ? 'OTP e-mail not received and manual OTP entry is not available'
          : 'OTP not provided - no mailbox access and manual OTP entry is not available',
      );
    }

    run.otpSource = 'manual';
    logger.info('Waiting for a manually entered OTP…');
    const code = await this.manualOtp({
      targetId: run.target.id,
      email: run.credentials.email,
      timeoutMs: this.timeouts.otpMs,
    });
    const trimmed = code?.trim();
    if (!trimmed) {
      return this.fail(run, 'otp_wait', 'otp_missing', 'OTP not provided - manual entry returned no code');
    }

    run.otpCode = trimmed;
    return { next: 'otp_fill' };
  }

  private async otpFill(run: LoginRun): Promise<Step> {
    const field = await this.findFirst(run.page, this.selectors.otpField, this.timeouts.fieldWaitMs);
    if (!field || !run.otpCode) {
      return this.fail(run, 'otp_fill', 'field_not_found', 'OTP input field not found');
    }

    await this.pacer.typeLikeHuman(run.page, field, run.otpCode);
    logger.info(`OTP entered via ${describeLocator(field)}`);
    await this.pacer.pause('betweenFields');
    return { next: 'otp_submit' };
  }

  private async otpSubmit(run: LoginRun): Promise<Step> {
    const { page } = run;

    const control = await this.findFirst(page, this.selectors.otpSubmit, 0);
    if (control) {
      logger.info(`Submitting OTP via ${describeLocator(control)}`);
      await this.pacer.clickLikeHuman(page, control);
    } else {
      logger.warn('No OTP verify button found, pressing Enter');
      try {
        await page.pressKey('Enter');
      } catch (err) {
        if (err instanceof AutomationFault) throw err;
        return this.fail(run, 'otp_submit', 'submit_not_found', `OTP submit control not found: ${describeError(err)}`);
      }
    }

    const settled = await page.waitForNetworkIdle(this.timeouts.otpSettleMs);
    if (!settled) logger.warn('Network did not settle after submitting the OTP (continuing)');
    await this.pacer.pause('pageSettle');
    return { next: 'outcome_check' };
  }

  /** Any dashboard-only indicator means we're in. */
  private async outcomeCheck(run: LoginRun): Promise<Step> {
    const { page } = run;

    const signals = await this.checkpoint(page);
    if (signals.maintenance) return this.maintenance('outcome_check');

    const indicator = await this.findFirst(page, this.selectors.loginSuccess, 0);
    if (indicator && run.otpSource) {
      logger.info(`Login successful (found ${describeLocator(indicator)})`);
      return { done: { status: 'success', otpMethod: run.otpSource, message: 'Login successful' } };
    }

    return this.fail(run, 'outcome_check', 'dashboard_not_found', `Login failed - current URL: ${page.url()}`);
  }

  // ── Helpers ──────────────────────────────────────────────

  /**
   * Page-level heuristics plus the explicit maintenance selectors.  Challenge
   * markup next to a visible e-mail field is an embedded widget, not an
   * interstitial.
   */
  private async checkpoint(page: AutomationPage): Promise<PageSignals> {
    const hasLoginForm = (await this.findFirst(page, this.selectors.emailField, 0)) !== null;
    const signals = inspectPage({
      url: page.url(),
      title: await page.title(),
      html: await page.content(),
      hasLoginForm,
    });
    if (signals.maintenance) return signals;

    for (const candidate of this.selectors.maintenance) {
      if ((await this.safeCount(page, candidate)) > 0) {
        return { ...signals, maintenance: true, reasons: [...signals.reasons, describeLocator(candidate)] };
      }
    }
    return signals;
  }

  /**
   * First candidate with at least one match.  Keeps polling for up to
   * `waitMs` so dynamically rendered forms get a chance to appear.
   */
  private async findFirst(page: AutomationPage, candidates: readonly Locator[], waitMs: number): Promise<Locator | null> {
    const passes = 1 + Math.ceil(Math.max(0, waitMs) / this.timeouts.fieldPollMs);

    for (let pass = 0; pass < passes; pass++) {
      if (pass > 0) await this.pacer.wait(this.timeouts.fieldPollMs);
      for (const candidate of candidates) {
        if ((await this.safeCount(page, candidate)) > 0) return candidate;
      }
    }
    return null;
  }

  /** `count()`, with ordinary selector errors read as "no match". */
  private async safeCount(page: AutomationPage, locator: Locator): Promise<number> {
    try {
      return await page.count(locator);
    } catch (err) {
      if (err instanceof AutomationFault) throw err;
      logger.debug(`Selector ${describeLocator(locator)} failed: ${describeError(err)}`);
      return 0;
    }
  }

  private maintenance(stage: LoginState): Step {
    logger.warn('Portal is in maintenance mode — will retry on the next scan');
    return { done: { status: 'maintenance', stage, message: 'Portal maintenance in progress' } };
  }

  private fail(run: LoginRun, stage: LoginState, reason: LoginFailureReason, message: string): Step {
    return {
      done: { status: 'failed', stage, reason, otpMethod: run.otpSource ?? 'failed', message },
    };
  }

  private fromError(stage: LoginState, run: LoginRun, err: unknown): LoginTerminal {
    if (err instanceof AutomationFault) {
      return {
        status: 'failed',
        stage,
        reason: 'browser_closed',
        otpMethod: run.otpSource ?? 'failed',
        message: `Browser closed during ${stage} (${err.operation}): ${err.message}`,
      };
    }
    logger.error(`Unexpected error during ${stage}`, err);
    return {
      status: 'failed',
      stage,
      reason: 'unexpected',
      otpMethod: run.otpSource ?? 'failed',
      message: `Login error: ${describeError(err)}`,
    };
  }

  /** Log the terminal and, for failures, keep a screenshot if configured. */
  private async report(run: LoginRun, terminal: LoginTerminal): Promise<void> {
    switch (terminal.status) {
      case 'success':
        logger.info(`Login finished: ${terminal.message} (OTP method: ${terminal.otpMethod})`);
        return;
      case 'maintenance':
        logger.warn(`Login stopped at ${terminal.stage}: ${terminal.message}`);
        return;
      case 'failed':
        logger.error(`Login failed at ${terminal.stage} [${terminal.reason}]: ${terminal.message}`);
        await this.saveScreenshot(run, terminal.stage);
    }
  }

  private async saveScreenshot(run: LoginRun, stage: LoginState): Promise<void> {
    if (!this.screenshotDir || run.page.isClosed()) return;

    try {
      const image = await run.page.screenshot();
      await mkdir(this.screenshotDir, { recursive: true });
      const file = path.join(this.screenshotDir, `login-${run.target.id}-${stage}-${Date.now()}.png`);
      await writeFile(file, image);
      logger.info(`Screenshot saved: ${file}`);
    } catch (err) {
      logger.warn(`Could not save screenshot: ${describeError(err)}`);
    }
  }
}

/** Collapse a terminal into the flat `{ success, message, otpMethod }` summary. */
export function toLoginOutcome(terminal: LoginTerminal): LoginOutcome {
  switch (terminal.status) {
    case 'success':
      return { success: true, message: terminal.message, otpMethod: terminal.otpMethod };
    case 'maintenance':
      return { success: false, message: terminal.message, otpMethod: 'maintenance' };
    case 'failed':
      return { success: false, message: terminal.message, otpMethod: terminal.otpMethod };
  }
}

function pathnameOf(url: string): string {
  try {
    return new URL(url).pathname.toLowerCase();
  } catch {
    return url.toLowerCase();
  }
}
