/**
 * automation.ts — The browser capability the scan pipeline drives.
 *
 * The login flow, session store and scanner only ever talk to these
 * interfaces.  `PuppeteerPage` / `BrowserManager` implement them against a
 * stealth Chromium; tests implement them in memory (see `src/testing`).
 *
 * Any call may reject with `AutomationFault` when the underlying page,
 * context or browser has gone away.  Every other rejection is an ordinary
 * content or network problem.
 */

// ─── Locators ──────────────────────────────────────────────

/**
 * How to find an element.
 *
 * `css` is a plain CSS selector.  `text` matches elements whose visible text
 * contains `text` (case-sensitive), optionally restricted to elements that
 * also match the CSS selector `within` (e.g. `button`).
 */
export type Locator =
  | { kind: 'css'; selector: string }
  | { kind: 'text'; text: string; within?: string };

export function css(selector: string): Locator {
  return { kind: 'css', selector };
}

export function text(value: string, within?: string): Locator {
  return within ? { kind: 'text', text: value, within } : { kind: 'text', text: value };
}

/** Stable, human-readable rendering of a locator (logs and test fixtures). */
export function describeLocator(locator: Locator): string {
  switch (locator.kind) {
    case 'css':
      return locator.selector;
    case 'text':
      return locator.within
        ? `${locator.within}:has-text("${locator.text}")`
        : `text=${locator.text}`;
  }
}

// ─── Browser state ─────────────────────────────────────────

export interface CookieRecord {
  name: string;
  value: string;
  domain: string;
  path: string;
  /** Unix seconds; -1 or absent for session cookies. */
  expires?: number;
  httpOnly?: boolean;
  secure?: boolean;
  sameSite?: 'Strict' | 'Lax' | 'None';
}

export interface OriginStorage {
  origin: string;
  localStorage: Array<{ name: string; value: string }>;
}

/** Everything needed to resume an authenticated browsing session. */
export interface BrowserState {
  cookies: CookieRecord[];
  origins: OriginStorage[];
}

// ─── Page / context / provider ─────────────────────────────

export interface NavigateOptions {
  timeoutMs: number;
  /** `networkidle` waits for the network to go quiet; `load` for the load event. */
  waitUntil?: 'load' | 'networkidle';
}

export interface AutomationPage {
  goto(url: string, options: NavigateOptions): Promise<void>;
  url(): string;
  title(): Promise<string>;
  content(): Promise<string>;

  /** Number of elements currently matching `locator`. */
  count(locator: Locator): Promise<number>;
  /** Trimmed, non-empty inner texts of the first `limit` matches, in document order. */
  texts(locator: Locator, limit: number): Promise<string[]>;
  /** Resolves `true` once `selector` matches, `false` on timeout. */
  waitForSelector(selector: string, timeoutMs: number): Promise<boolean>;
  /** Resolves `true` once the network is idle, `false` on timeout. */
  waitForNetworkIdle(timeoutMs: number): Promise<boolean>;

  /** Click the first element matching `locator`. */
  click(locator: Locator): Promise<void>;
  /** Focus the first match and empty its value. */
  clear(locator: Locator): Promise<void>;
  /** Type one character into the focused element. */
  typeCharacter(char: string): Promise<void>;
  pressKey(key: 'Enter' | 'Tab' | 'Escape'): Promise<void>;
  moveMouse(x: number, y: number): Promise<void>;
  wheel(deltaY: number): Promise<void>;
  viewport(): { width: number; height: number };

  screenshot(): Promise<Uint8Array>;
  isClosed(): boolean;
  close(): Promise<void>;
}

export interface AutomationContext {
  newPage(): Promise<AutomationPage>;
  /** Snapshot cookies and per-origin local storage. */
  exportState(): Promise<BrowserState>;
  /** Re-apply a snapshot: cookies immediately, local storage on the next document load. */
  applyState(state: BrowserState): Promise<void>;
  close(): Promise<void>;
}

/** Hands out isolated browser contexts from one long-lived browser. */
export interface BrowserProvider {
  newContext(): Promise<AutomationContext>;
}
