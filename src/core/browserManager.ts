/**
 * browserManager.ts — Owner of the one stealth Chromium the worker drives.
 *
 * The browser is launched once and shared; every scan gets its own
 * incognito context, which is closed when the scan ends.  The identity
 * profile is drawn once per launch: Chrome's `--lang` flag and every
 * context's pages use the same one, and a relaunch draws a fresh profile.
 *
 * Lifecycle is explicit: whoever creates a `BrowserManager` calls `close()`
 * (or uses `withBrowserManager()`, which does it for them).  Long-running
 * processes additionally call `installShutdownHooks()` so SIGINT/SIGTERM
 * don't leave a Chromium process behind.
 */

import puppeteerCore, { type Browser } from 'puppeteer-core';
import { addExtra } from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import type { AutomationContext, BrowserProvider } from './automation';
import { pickRandomProfile, primaryLanguage, type BrowserProfile } from './browserProfiles';
import { ConfigError, describeError } from './errors';
import { Logger } from './logger';
import { PuppeteerContext } from './puppeteerPage';
import type { WorkerConfig } from './types';

const logger = new Logger('BrowserManager');

// Plugins must be registered before the first launch().
const puppeteer = addExtra(puppeteerCore);
puppeteer.use(StealthPlugin());

export interface BrowserManagerOptions {
  /** Chrome/Chromium binary; puppeteer-core never downloads one. */
  executablePath?: string;
  headless: boolean;
  /** Identity source, consulted once per launch; random by default. */
  pickProfile?: () => BrowserProfile;
}

export class BrowserManager implements BrowserProvider {
  private readonly options: BrowserManagerOptions;
  private readonly pickProfile: () => BrowserProfile;
  private browser: Browser | null = null;
  private profile: BrowserProfile | null = null;
  private launching: Promise<Browser> | null = null;

  constructor(options: BrowserManagerOptions) {
    this.options = options;
    this.pickProfile = options.pickProfile ?? (() => pickRandomProfile());
  }

  static fromConfig(config: WorkerConfig): BrowserManager {
    return new BrowserManager({
      executablePath: config.chromeExecutablePath,
      headless: config.headless,
    });
  }

  // ── Lifecycle ────────────────────────────────────────────

  /** Launch the browser if it isn't running.  Safe to call repeatedly. */
  async start(): Promise<void> {
    await this.ensureBrowser();
  }

  /** Whether a connected browser is currently held. */
  get running(): boolean {
    return this.browser !== null && this.browser.connected;
  }

  /** Close the browser.  Further `newContext()` calls relaunch it. */
  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    if (!browser) return;

    try {
      await browser.close();
      logger.info('Browser closed');
    } catch (err) {
      logger.warn(`Browser did not close cleanly: ${describeError(err)}`);
    }
  }

  /**
   * Close the browser and exit on SIGINT/SIGTERM.
   *
   * @returns a function that removes the hooks again.
   */
  installShutdownHooks(): () => void {
    const shutdown = (signal: NodeJS.Signals) => {
      logger.info(`${signal} received — shutting down the browser`);
      this.close()
        .catch((err: unknown) => logger.error('Shutdown failed', err))
        .finally(() => process.exit(0));
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    return () => {
      process.off('SIGINT', shutdown);
      process.off('SIGTERM', shutdown);
    };
  }

  // ── BrowserProvider ──────────────────────────────────────

  async newContext(): Promise<AutomationContext> {
    const browser = await this.ensureBrowser();
    const profile = this.currentProfile();

    const context = await browser.createBrowserContext();
    return new PuppeteerContext(context, profile);
  }

  // ── Internals ────────────────────────────────────────────

  private currentProfile(): BrowserProfile {
    if (!this.profile) this.profile = this.pickProfile();
    return this.profile;
  }

  private async ensureBrowser(): Promise<Browser> {
    if (this.browser && this.browser.connected) return this.browser;
    if (!this.launching) {
      this.launching = this.launch().finally(() => {
        this.launching = null;
      });
    }
    return this.launching;
  }

  private async launch(): Promise<Browser> {
    const { executablePath, headless } = this.options;
    if (!executablePath) {
      throw new ConfigError('CHROME_EXECUTABLE_PATH must point at a Chrome or Chromium binary');
    }

    const profile = this.pickProfile();
    this.profile = profile;
    logger.info(`Launching ${headless ? 'headless ' : ''}browser from ${executablePath}`);
    logger.debug(`Profile: ${profile.platform} / ${profile.viewport.width}x${profile.viewport.height} / ${primaryLanguage(profile)}`);
    const browser: Browser = await puppeteer.launch({
      executablePath,
      headless,
      args: [
        '--no-sandbox',
        '--disable-setuid-sandbox',
        '--disable-dev-shm-usage',
        '--disable-blink-features=AutomationControlled',
        `--lang=${primaryLanguage(profile)}`,
      ],
    });

    browser.on('disconnected', () => {
      if (this.browser === browser) {
        logger.warn('Browser disconnected');
        this.browser = null;
      }
    });

    this.browser = browser;
    return browser;
  }
}

/** Run `fn` with a started manager and close it afterwards, whatever happens. */
export async function withBrowserManager<T>(
  options: BrowserManagerOptions,
  fn: (manager: BrowserManager) => Promise<T>,
): Promise<T> {
  const manager = new BrowserManager(options);
  try {
    await manager.start();
    return await fn(manager);
  } finally {
    await manager.close();
  }
}
