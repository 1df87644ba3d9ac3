/**
 * humanBehavior.ts — Randomised pacing and human-like interaction.
 *
 * Purely advisory: nothing here decides anything except whether a cookie
 * banner got dismissed.  Every wait is drawn uniformly from a fixed
 * `[min, max]` range per action class, and every sleep goes through the
 * injected `sleep` function so tests can run the whole pipeline instantly.
 *
 * Mouse paths themselves (Bezier curves, overshoot) are ghost-cursor's job
 * inside `PuppeteerPage`; this layer only decides *when* and *where*.
 */

import type { AutomationPage, Locator } from '../core/automation';
import { describeLocator } from '../core/automation';
import { AutomationFault, describeError } from '../core/errors';
import { Logger } from '../core/logger';

const logger = new Logger('HumanBehavior');

// ─── Delay classes ─────────────────────────────────────────

export interface DelayRange {
  min: number;
  max: number;
}

/** Delay ranges in milliseconds, per action class. */
export const PACING_RANGES = {
  keystroke: { min: 50, max: 150 },
  fieldFocus: { min: 200, max: 500 },
  beforeClick: { min: 100, max: 300 },
  afterClick: { min: 500, max: 1_500 },
  betweenFields: { min: 500, max: 1_000 },
  mouseSettle: { min: 100, max: 300 },
  scrollStep: { min: 30, max: 80 },
  scrollPause: { min: 500, max: 1_000 },
  pageSettle: { min: 2_000, max: 4_000 },
  reading: { min: 3_000, max: 6_000 },
  thinking: { min: 1_000, max: 2_500 },
  interTarget: { min: 2 * 60_000, max: 5 * 60_000 },
} as const satisfies Record<string, DelayRange>;

export type PacingAction = keyof typeof PACING_RANGES;

export interface HumanPacerOptions {
  /** Defaults to a real `setTimeout` sleep. */
  sleep?: (ms: number) => Promise<void>;
  /** Uniform [0, 1) source; defaults to Math.random. */
  random?: () => number;
}

// ─── HumanPacer ────────────────────────────────────────────

export class HumanPacer {
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(options: HumanPacerOptions = {}) {
    this.sleepFn = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  /** A pacer that never waits, for `PACING=off` runs and tests. */
  static instant(): HumanPacer {
    return new HumanPacer({ sleep: () => Promise.resolve() });
  }

  // ── Delays ───────────────────────────────────────────────

  /** Draw a delay (ms) for `action` from its configured range. */
  delayFor(action: PacingAction): number {
    const { min, max } = PACING_RANGES[action];
    return this.between(min, max);
  }

  /** Wait a randomised amount appropriate for `action`. */
  async pause(action: PacingAction): Promise<void> {
    await this.sleepFn(this.delayFor(action));
  }

  /** Wait a fixed amount (grace periods, polling intervals). */
  async wait(ms: number): Promise<void> {
    await this.sleepFn(ms);
  }

  /** The minutes-scale gap between two targets of a batch. */
  async pauseBetweenTargets(): Promise<number> {
    const delay = this.delayFor('interTarget');
    logger.info(`Waiting ${(delay / 60_000).toFixed(1)} min before the next target…`);
    await this.sleepFn(delay);
    return delay;
  }

  // ── Interactions ─────────────────────────────────────────

  /**
   * Clear a field and type `value` one character at a time with a
   * keystroke-range delay between characters.
   */
  async typeLikeHuman(page: AutomationPage, locator: Locator, value: string): Promise<void> {
    logger.debug(`Human-typing ${value.length} characters into ${describeLocator(locator)}`);

    await page.clear(locator);
    await this.pause('fieldFocus');

    for (const char of value) {
      await page.typeCharacter(char);
      await this.pause('keystroke');
    }
  }

  /** Drift the mouse somewhere, pause, then click. */
  async clickLikeHuman(page: AutomationPage, locator: Locator): Promise<void> {
    await this.moveMouseRandomly(page);
    await this.pause('beforeClick');
    await page.click(locator);
    await this.pause('afterClick');
  }

  /** Move the cursor to a random point inside the viewport. */
  async moveMouseRandomly(page: AutomationPage): Promise<void> {
    const { width, height } = page.viewport();
    const x = this.between(100, Math.max(100, Math.min(800, width - 100)));
    const y = this.between(100, Math.max(100, Math.min(600, height - 100)));
    await page.moveMouse(x, y);
    await this.pause('mouseSettle');
  }

  /**
   * Scroll `distance` px with variable-speed wheel events: deltas follow a
   * bell curve (small, large, small) with a few px of jitter.
   */
  async scroll(page: AutomationPage, distance: number): Promise<void> {
    const direction = distance > 0 ? 1 : -1;
    const total = Math.abs(distance);
    let remaining = total;

    while (remaining > 0) {
      const progress = 1 - remaining / total;
      const bellFactor = Math.sin(progress * Math.PI);
      const baseDelta = 20 + bellFactor * 80;
      const jitter = (this.random() - 0.5) * 10;
      const delta = Math.min(remaining, Math.max(5, baseDelta + jitter));

      await page.wheel(delta * direction);
      remaining -= delta;
      await this.pause('scrollStep');
    }
  }

  /**
   * Click the first visible cookie/consent button among `candidates`.
   *
   * @returns whether a banner was dismissed.
   */
  async dismissCookieBanner(page: AutomationPage, candidates: readonly Locator[]): Promise<boolean> {
    for (const candidate of candidates) {
      try {
        if ((await page.count(candidate)) === 0) continue;

        logger.info(`Found cookie banner button: ${describeLocator(candidate)}`);
        await this.pause('thinking');
        await page.click(candidate);
        await this.pause('afterClick');
        return true;
      } catch (err) {
        if (err instanceof AutomationFault) throw err;
        logger.debug(`Cookie banner candidate ${describeLocator(candidate)} failed: ${describeError(err)}`);
      }
    }
    return false;
  }

  /**
   * The full "a person just opened this page" sequence: settle, accept
   * cookies, drift the mouse 2–4 times, maybe scroll, then read.
   *
   * Best effort: interaction errors are logged and swallowed here, except
   * `AutomationFault`, which the caller must see.
   */
  async simulatePageInteraction(page: AutomationPage, cookieCandidates: readonly Locator[]): Promise<void> {
    logger.debug('Simulating human page interaction…');

    try {
      await this.pause('pageSettle');
      await this.dismissCookieBanner(page, cookieCandidates);

      const drifts = this.between(2, 4);
      for (let i = 0; i < drifts; i++) {
        await this.moveMouseRandomly(page);
      }

      if (this.random() < 0.7) {
        const amount = this.between(200, 500);
        await this.scroll(page, amount);
        await this.pause('scrollPause');
        if (this.random() < 0.3) {
          await this.scroll(page, -Math.floor(amount / 2));
        }
      }

      await this.pause('reading');
    } catch (err) {
      if (err instanceof AutomationFault) throw err;
      logger.warn(`Page interaction simulation failed (continuing): ${describeError(err)}`);
    }
  }

  // ── Helpers ──────────────────────────────────────────────

  /** Uniform integer in [min, max]. */
  private between(min: number, max: number): number {
    return Math.floor(this.random() * (max - min + 1)) + min;
  }
}

// ─── Utility functions ──────────────────────────────────────

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
