/**
 * puppeteerPage.ts — `AutomationPage` / `AutomationContext` over puppeteer-core.
 *
 * Locators are resolved inside the page in a single round trip (see
 * `locateInPage`), so a text locator costs the same as a CSS one.  Mouse
 * movement goes through ghost-cursor for curved, human-looking paths.
 *
 * Every call is wrapped by `guard()`: if the page, its target or the browser
 * has gone away the rejection is re-thrown as `AutomationFault`; anything
 * else is passed through untouched.
 */

import { createCursor, type GhostCursor } from 'ghost-cursor';
import {
  TimeoutError,
  type BrowserContext,
  type CDPSession,
  type Page,
  type Protocol,
} from 'puppeteer-core';
import { TargetCloseError } from 'puppeteer-core/internal/common/Errors.js';
import type {
  AutomationContext,
  AutomationPage,
  BrowserState,
  CookieRecord,
  Locator,
  NavigateOptions,
  OriginStorage,
} from './automation';
import { describeLocator } from './automation';
import { profileLanguages, userAgentMetadata, type BrowserProfile } from './browserProfiles';
import { AutomationFault, describeError } from './errors';
import { Logger } from './logger';

const logger = new Logger('PuppeteerPage');

// ─── In-page locator resolution ────────────────────────────

type LocatorAction = 'count' | 'texts' | 'point' | 'clear';

interface LocatorReport {
  count: number;
  texts: string[];
  point: { x: number; y: number } | null;
  cleared: boolean;
}

/**
 * Runs inside the browser; puppeteer serialises it, so it must not touch
 * anything outside its own body.
 */
function locateInPage(locator: Locator, action: LocatorAction, limit: number): LocatorReport {
  const textOf = (el: Element): string => (el instanceof HTMLElement ? el.innerText : (el.textContent ?? ''));

  let matches: Element[];
  if (locator.kind === 'css') {
    matches = Array.from(document.querySelectorAll(locator.selector));
  } else {
    const needle = locator.text;
    const scoped = locator.within !== undefined;
    matches = Array.from(document.querySelectorAll(locator.within ?? 'body *')).filter(
      (el) =>
        textOf(el).includes(needle) &&
        // Unscoped text matches the innermost element only.
        (scoped || !Array.from(el.children).some((child) => textOf(child).includes(needle))),
    );
  }

  const report: LocatorReport = { count: matches.length, texts: [], point: null, cleared: false };
  const first = matches[0];

  switch (action) {
    case 'texts':
      report.texts = matches
        .slice(0, limit)
        .map((el) => textOf(el).trim())
        .filter((value) => value.length > 0);
      break;
    case 'point':
      if (first) {
        first.scrollIntoView({ block: 'center', inline: 'center' });
        const rect = first.getBoundingClientRect();
        report.point = { x: rect.left + rect.width / 2, y: rect.top + rect.height / 2 };
      }
      break;
    case 'clear':
      if (first instanceof HTMLInputElement || first instanceof HTMLTextAreaElement) {
        first.focus();
        first.value = '';
        first.dispatchEvent(new Event('input', { bubbles: true }));
        report.cleared = true;
      } else if (first instanceof HTMLElement) {
        first.focus();
        report.cleared = true;
      }
      break;
    case 'count':
      break;
  }

  return report;
}

// ─── PuppeteerPage ─────────────────────────────────────────

export class PuppeteerPage implements AutomationPage {
  private readonly page: Page;
  private readonly cursor: GhostCursor;
  private readonly fallbackViewport: { width: number; height: number };

  constructor(page: Page, profile: BrowserProfile) {
    this.page = page;
    this.cursor = createCursor(page);
    this.fallbackViewport = profile.viewport;
  }

  /** The underlying puppeteer page, for the context's storage export. */
  get raw(): Page {
    return this.page;
  }

  async goto(url: string, options: NavigateOptions): Promise<void> {
    await this.guard('goto', async () => {
      await this.page.goto(url, {
        timeout: options.timeoutMs,
        // networkidle2 tolerates the portal's long-lived polling connections.
        waitUntil: options.waitUntil === 'networkidle' ? 'networkidle2' : 'load',
      });
    });
  }

  url(): string {
    return this.page.url();
  }

  title(): Promise<string> {
    return this.guard('title', () => this.page.title());
  }

  content(): Promise<string> {
    return this.guard('content', () => this.page.content());
  }

  async count(locator: Locator): Promise<number> {
    const report = await this.locate('count', locator, 'count');
    return report.count;
  }

  async texts(locator: Locator, limit: number): Promise<string[]> {
    const report = await this.locate('texts', locator, 'texts', limit);
    return report.texts;
  }

  waitForSelector(selector: string, timeoutMs: number): Promise<boolean> {
    return this.guard('waitForSelector', async () => {
      try {
        await this.page.waitForSelector(selector, { timeout: timeoutMs });
        return true;
      } catch (err) {
        if (err instanceof TimeoutError) return false;
        throw err;
      }
    });
  }

  waitForNetworkIdle(timeoutMs: number): Promise<boolean> {
    return this.guard('waitForNetworkIdle', async () => {
      try {
        await this.page.waitForNetworkIdle({ idleTime: 500, timeout: timeoutMs });
        return true;
      } catch (err) {
        if (err instanceof TimeoutError) return false;
        throw err;
      }
    });
  }

  async click(locator: Locator): Promise<void> {
    const { point } = await this.locate('click', locator, 'point');
    if (!point) throw new Error(`No element matches ${describeLocator(locator)}`);

    await this.guard('click', async () => {
      await this.cursor.moveTo(point);
      await this.page.mouse.click(point.x, point.y);
    });
  }

  async clear(locator: Locator): Promise<void> {
    const { cleared } = await this.locate('clear', locator, 'clear');
    if (!cleared) throw new Error(`No focusable element matches ${describeLocator(locator)}`);
  }

  typeCharacter(char: string): Promise<void> {
    return this.guard('typeCharacter', () => this.page.keyboard.type(char));
  }

  pressKey(key: 'Enter' | 'Tab' | 'Escape'): Promise<void> {
    return this.guard('pressKey', () => this.page.keyboard.press(key));
  }

  moveMouse(x: number, y: number): Promise<void> {
    return this.guard('moveMouse', () => this.cursor.moveTo({ x, y }));
  }

  wheel(deltaY: number): Promise<void> {
    return this.guard('wheel', () => this.page.mouse.wheel({ deltaY }));
  }

  viewport(): { width: number; height: number } {
    const current = this.page.viewport();
    return current ? { width: current.width, height: current.height } : this.fallbackViewport;
  }

  screenshot(): Promise<Uint8Array> {
    return this.guard('screenshot', () => this.page.screenshot({ type: 'png', fullPage: true }));
  }

  isClosed(): boolean {
    return this.page.isClosed();
  }

  async close(): Promise<void> {
    if (this.page.isClosed()) return;
    await this.page.close();
  }

  // ── Internals ────────────────────────────────────────────

  private locate(operation: string, locator: Locator, action: LocatorAction, limit = 0): Promise<LocatorReport> {
    return this.guard(operation, () => this.page.evaluate(locateInPage, locator, action, limit));
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    if (this.page.isClosed()) {
      throw new AutomationFault(operation, 'Page has been closed');
    }
    try {
      return await fn();
    } catch (err) {
      if (err instanceof AutomationFault) throw err;
      if (err instanceof TargetCloseError || this.page.isClosed() || !this.page.browser().connected) {
        throw new AutomationFault(operation, describeError(err), { cause: err });
      }
      throw err;
    }
  }
}

// ─── PuppeteerContext ──────────────────────────────────────

/**
 * One incognito browser context with one identity.  Cookies are moved in
 * and out through the DevTools `Storage` domain, which works before any
 * page has been opened.
 */
export class PuppeteerContext implements AutomationContext {
  private readonly context: BrowserContext;
  private readonly profile: BrowserProfile;
  private readonly pages: PuppeteerPage[] = [];
  private pendingStorage: OriginStorage[] = [];

  constructor(context: BrowserContext, profile: BrowserProfile) {
    this.context = context;
    this.profile = profile;
  }

  async newPage(): Promise<AutomationPage> {
    const page = await this.guard('newPage', () => this.context.newPage());

    await page.setUserAgent(this.profile.userAgent, userAgentMetadata(this.profile));
    await page.setViewport(this.profile.viewport);
    await page.setExtraHTTPHeaders({ 'accept-language': this.profile.acceptLanguage });
    await applyNavigatorOverrides(page, this.profile);
    if (this.pendingStorage.length > 0) {
      await seedLocalStorage(page, this.pendingStorage);
    }

    const wrapped = new PuppeteerPage(page, this.profile);
    this.pages.push(wrapped);
    return wrapped;
  }

  async exportState(): Promise<BrowserState> {
    const cookies = await this.withStorageSession('exportState', async (session, browserContextId) => {
      const response = await session.send('Storage.getCookies', { browserContextId });
      return response.cookies.map(toCookieRecord);
    });

    const origins = new Map<string, OriginStorage>();
    for (const page of this.pages) {
      if (page.isClosed()) continue;
      try {
        const snapshot = await page.raw.evaluate(() => ({
          origin: window.location.origin,
          localStorage: Object.keys(window.localStorage).map((name) => ({
            name,
            value: window.localStorage.getItem(name) ?? '',
          })),
        }));
        if (snapshot.origin !== 'null' && snapshot.localStorage.length > 0) {
          origins.set(snapshot.origin, snapshot);
        }
      } catch (err) {
        logger.debug(`Could not read localStorage: ${describeError(err)}`);
      }
    }

    return { cookies, origins: [...origins.values()] };
  }

  async applyState(state: BrowserState): Promise<void> {
    await this.withStorageSession('applyState', async (session, browserContextId) => {
      await session.send('Storage.setCookies', {
        browserContextId,
        cookies: state.cookies.map(toCookieParam),
      });
    });

    this.pendingStorage = mergeOrigins(this.pendingStorage, state.origins);
    for (const page of this.pages) {
      if (!page.isClosed()) await seedLocalStorage(page.raw, state.origins);
    }
  }

  async close(): Promise<void> {
    await this.context.close();
  }

  // ── Internals ────────────────────────────────────────────

  private async withStorageSession<T>(
    operation: string,
    fn: (session: CDPSession, browserContextId: string | undefined) => Promise<T>,
  ): Promise<T> {
    return this.guard(operation, async () => {
      const session = await this.context.browser().target().createCDPSession();
      try {
        return await fn(session, this.context.id);
      } finally {
        await session.detach().catch((err: unknown) => logger.debug(`CDP detach failed: ${describeError(err)}`));
      }
    });
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    if (!this.context.browser().connected) {
      throw new AutomationFault(operation, 'Browser context has been closed');
    }
    try {
      return await fn();
    } catch (err) {
      if (err instanceof TargetCloseError || !this.context.browser().connected) {
        throw new AutomationFault(operation, describeError(err), { cause: err });
      }
      throw err;
    }
  }
}

// ─── Helpers ───────────────────────────────────────────────

/** navigator.platform and navigator.languages must agree with the User-Agent. */
async function applyNavigatorOverrides(page: Page, profile: BrowserProfile): Promise<void> {
  await page.evaluateOnNewDocument(
    (platform: string, languages: string[]) => {
      Object.defineProperty(Navigator.prototype, 'platform', { get: () => platform, configurable: true });
      Object.defineProperty(Navigator.prototype, 'languages', {
        get: () => Object.freeze([...languages]),
        configurable: true,
      });
    },
    profile.platform,
    profileLanguages(profile),
  );
}

async function seedLocalStorage(page: Page, origins: readonly OriginStorage[]): Promise<void> {
  await page.evaluateOnNewDocument((entries: OriginStorage[]) => {
    const match = entries.find((entry) => entry.origin === window.location.origin);
    if (!match) return;
    for (const { name, value } of match.localStorage) {
      if (window.localStorage.getItem(name) === null) window.localStorage.setItem(name, value);
    }
  }, [...origins]);
}

function mergeOrigins(current: readonly OriginStorage[], incoming: readonly OriginStorage[]): OriginStorage[] {
  const byOrigin = new Map(current.map((entry) => [entry.origin, entry]));
  for (const entry of incoming) byOrigin.set(entry.origin, entry);
  return [...byOrigin.values()];
}

function toCookieRecord(cookie: Protocol.Network.Cookie): CookieRecord {
  const record: CookieRecord = {
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain,
    path: cookie.path,
    expires: cookie.expires,
    httpOnly: cookie.httpOnly,
    secure: cookie.secure,
  };
  if (cookie.sameSite) record.sameSite = cookie.sameSite;
  return record;
}

function toCookieParam(cookie: CookieRecord): Protocol.Network.CookieParam {
  const param: Protocol.Network.CookieParam = {
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain,
    path: cookie.path,
    httpOnly: cookie.httpOnly,
    secure: cookie.secure,
    sameSite: cookie.sameSite,
  };
  // Session cookies carry -1; CDP wants the field left out for those.
  if (cookie.expires !== undefined && cookie.expires > 0) param.expires = cookie.expires;
  return param;
}
