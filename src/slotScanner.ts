/**
 * slotScanner.ts — The orchestrator that ties every layer together.
 *
 *   1. RESOLVE  → TargetRegistry gives URLs, selectors and timeouts
 *   2. PAGE     → SessionManager (authenticated) or a bare page (public)
 *   3. NAVIGATE → the appointment view; failures become a result, not a throw
 *   4. BEHAVE   → HumanPacer's page interaction, then wait for the widget
 *   5. CLASSIFY → "no appointment" banner first, then slot elements
 *   6. RECORD   → the optional scan-log sink
 *
 * `scan()` never rejects.  Whatever happens, the caller gets a `ScanResult`
 * with the target name, a message and a duration, and the context opened for
 * the scan is closed again.
 */

import type { AutomationContext, AutomationPage, BrowserProvider, Locator } from './core/automation';
import { describeLocator } from './core/automation';
import { AutomationFault, LoginError, describeError, truncate } from './core/errors';
import { Logger } from './core/logger';
import type { ScanRequest, ScanResult, TargetConfiguration } from './core/types';
import { portalSelectors, targetRegistry, type PortalSelectors, type TargetRegistry } from './config/targetRegistry';
import { HumanPacer } from './middleware/humanBehavior';
import type { SessionManager } from './agents/sessionManager';

const logger = new Logger('SlotScanner');

/** How long to wait for the appointment widget before classifying anyway. */
const READY_TIMEOUT_MS = 10_000;
/** At most this many slot texts are reported. */
const MAX_SLOTS = 10;

// ─── Scan log ──────────────────────────────────────────────

export interface ScanLogEntry {
  userId: string | null;
  targetId: string;
  targetName: string;
  success: boolean;
  hasAppointment: boolean;
  slotCount: number;
  message: string;
  durationMs: number;
  /** ISO-8601, UTC. */
  scannedAt: string;
}

/** Where finished scans are recorded.  Failures here never affect the result. */
export interface ScanLogSink {
  record(entry: ScanLogEntry): Promise<void>;
}

// ─── Classification ────────────────────────────────────────

export interface Availability {
  hasAppointment: boolean;
  availableSlots: string[] | null;
  message: string;
}

/**
 * Decide availability from what is on `page` right now.
 *
 * The "no appointment" banner is authoritative: the portal keeps disabled
 * slot elements around next to it, so it is checked first.
 */
export async function classifyAvailability(
  page: AutomationPage,
  target: TargetConfiguration,
): Promise<Availability> {
  for (const locator of target.selectors.noSlotsIndicator) {
    if ((await probe(page, locator)) > 0) {
      logger.info(`Found "no appointment" message: ${describeLocator(locator)}`);
      return { hasAppointment: false, availableSlots: null, message: 'No appointments available' };
    }
  }

  for (const locator of target.selectors.slotIndicator) {
    const count = await probe(page, locator);
    if (count === 0) continue;

    logger.info(`Found ${count} slot element(s) with: ${describeLocator(locator)}`);
    let slots: string[] = [];
    try {
      slots = await page.texts(locator, MAX_SLOTS);
    } catch (err) {
      if (err instanceof AutomationFault) throw err;
      logger.warn(`Could not read slot texts: ${describeError(err)}`);
    }
    return {
      hasAppointment: true,
      availableSlots: slots,
      message: `Found ${slots.length} available slots`,
    };
  }

  return { hasAppointment: false, availableSlots: null, message: 'No slots detected on page' };
}

/** `count()`, with a broken selector read as "no match". */
async function probe(page: AutomationPage, locator: Locator): Promise<number> {
  try {
    return await page.count(locator);
  } catch (err) {
    if (err instanceof AutomationFault) throw err;
    logger.debug(`Selector ${describeLocator(locator)} failed: ${describeError(err)}`);
    return 0;
  }
}

// ─── SlotScanner ───────────────────────────────────────────

export interface SlotScannerOptions {
  browser: BrowserProvider;
  sessionManager: SessionManager;
  pacer?: HumanPacer;
  registry?: TargetRegistry;
  selectors?: PortalSelectors;
  scanLog?: ScanLogSink;
  /** Milliseconds since the epoch; injectable for tests. */
  now?: () => number;
}

export class SlotScanner {
  private readonly browser: BrowserProvider;
  private readonly sessionManager: SessionManager;
  private readonly pacer: HumanPacer;
  private readonly registry: TargetRegistry;
  private readonly selectors: PortalSelectors;
  private readonly scanLog?: ScanLogSink;
  private readonly now: () => number;

  constructor(options: SlotScannerOptions) {
    this.browser = options.browser;
    this.sessionManager = options.sessionManager;
    this.pacer = options.pacer ?? new HumanPacer();
    this.registry = options.registry ?? targetRegistry;
    this.selectors = options.selectors ?? portalSelectors;
    this.scanLog = options.scanLog;
    this.now = options.now ?? Date.now;
  }

  /** Check one target.  Never rejects. */
  async scan(request: ScanRequest): Promise<ScanResult> {
    const startedAt = this.now();
    logger.info(`Scanning ${request.targetName} (${request.targetId})`);

    let context: AutomationContext | null = null;
    let page: AutomationPage | null = null;
    let result: ScanResult;

    try {
      const target = this.registry.get(request.targetId);
      context = await this.browser.newContext();

      let sessionSaved = false;
      if (request.credentials && request.userId) {
        const login = await this.sessionManager.ensureLoggedIn(
          context,
          request.userId,
          request.credentials,
          request.mailbox,
          request.session,
        );
        page = login.page;
        sessionSaved = login.isNewLogin && login.session !== null;
      } else {
        page = await context.newPage();
      }

      result = await this.inspect(page, target, request, startedAt, sessionSaved);
    } catch (err) {
      result = this.failure(request, startedAt, errorMessage(err));
      if (err instanceof LoginError) {
        logger.warn(`${request.targetName}: ${err.message}`);
      } else {
        logger.error(`Error scanning ${request.targetName}`, err);
      }
    } finally {
      await this.release(page, context);
    }

    logger.info(`Scan of ${request.targetName} finished in ${result.durationMs}ms: ${result.message}`);
    await this.record(request, result);
    return result;
  }

  /**
   * Scan targets one after another, pausing between them.  One target's
   * failure never stops the batch.
   */
  async scanBatch(requests: readonly ScanRequest[]): Promise<ScanResult[]> {
    const results: ScanResult[] = [];

    for (const [index, request] of requests.entries()) {
      results.push(await this.scan(request));

      if (index < requests.length - 1) {
        await this.pacer.pauseBetweenTargets();
      }
    }

    const found = results.filter((r) => r.hasAppointment).length;
    logger.info(`Batch complete: ${results.length} scanned, ${found} with appointments`);
    return results;
  }

  // ── Internals ────────────────────────────────────────────

  private async inspect(
    page: AutomationPage,
    target: TargetConfiguration,
    request: ScanRequest,
    startedAt: number,
    sessionSaved: boolean,
  ): Promise<ScanResult> {
    logger.info(`Navigating to ${target.appointmentUrl}`);
    try {
      await page.goto(target.appointmentUrl, { timeoutMs: target.navigationTimeoutMs, waitUntil: 'networkidle' });
    } catch (err) {
      if (err instanceof AutomationFault) throw err;
      logger.warn(`Navigation failed for ${request.targetName}: ${describeError(err)}`);
      return {
        ...this.failure(request, startedAt, `Navigation failed: ${truncate(describeError(err))}`),
        sessionSaved,
      };
    }

    await this.pacer.simulatePageInteraction(page, this.selectors.cookieBanner);

    const ready = await page.waitForSelector(target.readySelector, READY_TIMEOUT_MS);
    if (!ready) logger.warn('Timeout waiting for appointment content (continuing anyway)');

    const availability = await classifyAvailability(page, target);

    return Object.freeze({
      success: true,
      target: request.targetName,
      ...availability,
      durationMs: this.now() - startedAt,
      sessionSaved,
    });
  }

  private failure(request: ScanRequest, startedAt: number, message: string): ScanResult {
    return Object.freeze({
      success: false,
      target: request.targetName,
      hasAppointment: false,
      availableSlots: null,
      message,
      durationMs: this.now() - startedAt,
      sessionSaved: false,
    });
  }

  private async release(page: AutomationPage | null, context: AutomationContext | null): Promise<void> {
    if (page && !page.isClosed()) {
      await page.close().catch((err: unknown) => logger.debug(`Page close failed: ${describeError(err)}`));
    }
    if (context) {
      await context.close().catch((err: unknown) => logger.debug(`Context close failed: ${describeError(err)}`));
    }
  }

  private async record(request: ScanRequest, result: ScanResult): Promise<void> {
    if (!this.scanLog) return;

    try {
      await this.scanLog.record({
        userId: request.userId ?? null,
        targetId: request.targetId.trim().toLowerCase(),
        targetName: result.target,
        success: result.success,
        hasAppointment: result.hasAppointment,
        slotCount: result.availableSlots?.length ?? 0,
        message: result.message,
        durationMs: result.durationMs,
        scannedAt: new Date(this.now()).toISOString(),
      });
    } catch (err) {
      logger.warn(`Could not record scan log: ${describeError(err)}`);
    }
  }
}

function errorMessage(err: unknown): string {
  if (err instanceof LoginError) return truncate(err.message);
  if (err instanceof AutomationFault) return `Browser error: ${truncate(err.message)}`;
  return `Error: ${truncate(describeError(err))}`;
}
