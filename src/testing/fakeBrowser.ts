/**
 * fakeBrowser.ts — In-memory `BrowserProvider` for tests.
 *
 * A `FakeSite` is a map from URL to `FakeDocument`.  Each document lists the
 * elements present on it, keyed by `describeLocator()` (so `css('.x')` is
 * keyed ".x" and `text('Accept', 'button')` is keyed `button:has-text("Accept")`),
 * with one entry per matching element holding its inner text.  Clicks and
 * the Enter key can move the page to another URL, and landing on a URL can
 * set cookies in the owning context.
 */

import type {
  AutomationContext,
  AutomationPage,
  BrowserProvider,
  BrowserState,
  CookieRecord,
  Locator,
  NavigateOptions,
} from '../core/automation';
import { describeLocator } from '../core/automation';
import { AutomationFault } from '../core/errors';

// ─── Site model ────────────────────────────────────────────

export interface FakeDocument {
  title?: string;
  html?: string;
  /** Locator key → inner text of each matching element. */
  elements?: Record<string, string[]>;
  /** Locator key → URL the page moves to when that element is clicked. */
  clicks?: Record<string, string>;
  /** URL the page moves to when Enter is pressed. */
  enter?: string;
  /** Locator keys whose evaluation throws an ordinary (non-fault) error. */
  broken?: string[];
  /** Land on `otherwise` instead unless the context holds this cookie. */
  requiresCookie?: string;
  otherwise?: string;
  /** Cookies the context receives when this document loads. */
  setCookies?: CookieRecord[];
}

export interface FakeSite {
  documents: Record<string, FakeDocument>;
  /** URL → message of the error `goto` rejects with. */
  navigationErrors?: Record<string, string>;
  /** URL → URL the page actually ends up on. */
  redirects?: Record<string, string>;
}

/** Close the page (and fault) on the n-th call of an operation, 1-based. */
export interface FaultPlan {
  operation: string;
  onCall?: number;
}

interface PageHost {
  site: FakeSite;
  hasCookie(name: string): boolean;
  addCookies(cookies: readonly CookieRecord[]): void;
}

// ─── FakePage ──────────────────────────────────────────────

export class FakePage implements AutomationPage {
  /** Every interaction, in order, e.g. "goto https://…", "click .x", "press Enter". */
  readonly calls: string[] = [];
  /** Locator key → text typed into it since it was last cleared. */
  readonly typed = new Map<string, string>();

  private readonly host: PageHost;
  private readonly fault?: FaultPlan;
  private readonly callCounts = new Map<string, number>();
  private currentUrl = 'about:blank';
  private focused: string | null = null;
  private closed = false;

  constructor(host: PageHost, fault?: FaultPlan) {
    this.host = host;
    this.fault = fault;
  }

  async goto(url: string, _options: NavigateOptions): Promise<void> {
    this.check('goto');
    this.calls.push(`goto ${url}`);

    const error = this.host.site.navigationErrors?.[url];
    if (error) throw new Error(error);
    this.land(url);
  }

  url(): string {
    return this.currentUrl;
  }

  async title(): Promise<string> {
    this.check('title');
    return this.document().title ?? '';
  }

  async content(): Promise<string> {
    this.check('content');
    return this.document().html ?? '<html><body></body></html>';
  }

  async count(locator: Locator): Promise<number> {
    this.check('count');
    return this.matches(locator).length;
  }

  async texts(locator: Locator, limit: number): Promise<string[]> {
    this.check('texts');
    return this.matches(locator)
      .slice(0, limit)
      .map((value) => value.trim())
      .filter((value) => value.length > 0);
  }

  async waitForSelector(selector: string, _timeoutMs: number): Promise<boolean> {
    this.check('waitForSelector');
    return (this.document().elements?.[selector]?.length ?? 0) > 0;
  }

  async waitForNetworkIdle(_timeoutMs: number): Promise<boolean> {
    this.check('waitForNetworkIdle');
    return true;
  }

  async click(locator: Locator): Promise<void> {
    this.check('click');
    const key = describeLocator(locator);
    if (this.matches(locator).length === 0) throw new Error(`No element matches ${key}`);

    this.calls.push(`click ${key}`);
    const next = this.document().clicks?.[key];
    if (next) this.land(next);
  }

  async clear(locator: Locator): Promise<void> {
    this.check('clear');
    const key = describeLocator(locator);
    if (this.matches(locator).length === 0) throw new Error(`No element matches ${key}`);

    this.focused = key;
    this.typed.set(key, '');
  }

  async typeCharacter(char: string): Promise<void> {
    this.check('typeCharacter');
    if (!this.focused) throw new Error('Nothing is focused');
    this.typed.set(this.focused, (this.typed.get(this.focused) ?? '') + char);
  }

  async pressKey(key: 'Enter' | 'Tab' | 'Escape'): Promise<void> {
    this.check('pressKey');
    this.calls.push(`press ${key}`);
    const next = this.document().enter;
    if (key === 'Enter' && next) this.land(next);
  }

  async moveMouse(x: number, y: number): Promise<void> {
    this.check('moveMouse');
    this.calls.push(`move ${x},${y}`);
  }

  async wheel(deltaY: number): Promise<void> {
    this.check('wheel');
    this.calls.push(`wheel ${Math.round(deltaY)}`);
  }

  viewport(): { width: number; height: number } {
    return { width: 1920, height: 1080 };
  }

  async screenshot(): Promise<Uint8Array> {
    this.check('screenshot');
    return new Uint8Array([0x89, 0x50, 0x4e, 0x47]);
  }

  isClosed(): boolean {
    return this.closed;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.calls.push('close');
  }

  // ── Internals ────────────────────────────────────────────

  private document(): FakeDocument {
    return this.host.site.documents[this.currentUrl] ?? {};
  }

  private matches(locator: Locator): string[] {
    const key = describeLocator(locator);
    const doc = this.document();
    if (doc.broken?.includes(key)) throw new Error(`Invalid selector: ${key}`);
    return doc.elements?.[key] ?? [];
  }

  private land(url: string): void {
    let target = this.host.site.redirects?.[url] ?? url;
    const doc = this.host.site.documents[target];
    if (doc?.requiresCookie && !this.host.hasCookie(doc.requiresCookie) && doc.otherwise) {
      target = doc.otherwise;
    }

    this.currentUrl = target;
    this.focused = null;
    const cookies = this.host.site.documents[target]?.setCookies;
    if (cookies) this.host.addCookies(cookies);
  }

  private check(operation: string): void {
    if (this.closed) throw new AutomationFault(operation, 'Target page has been closed');

    const seen = (this.callCounts.get(operation) ?? 0) + 1;
    this.callCounts.set(operation, seen);
    if (this.fault && this.fault.operation === operation && seen === (this.fault.onCall ?? 1)) {
      this.closed = true;
      throw new AutomationFault(operation, 'Target page, context or browser has been closed');
    }
  }
}

// ─── FakeContext ───────────────────────────────────────────

export interface FakeContextOptions {
  fault?: FaultPlan;
  applyError?: Error;
  exportError?: Error;
}

export class FakeContext implements AutomationContext {
  readonly pages: FakePage[] = [];
  /** Every state passed to `applyState`, in order. */
  readonly applied: BrowserState[] = [];
  cookies: CookieRecord[] = [];
  origins: BrowserState['origins'] = [];
  closed = false;

  private readonly site: FakeSite;
  private readonly options: FakeContextOptions;

  constructor(site: FakeSite, options: FakeContextOptions = {}) {
    this.site = site;
    this.options = options;
  }

  async newPage(): Promise<FakePage> {
    if (this.closed) throw new AutomationFault('newPage', 'Browser context has been closed');

    const page = new FakePage(
      {
        site: this.site,
        hasCookie: (name) => this.cookies.some((c) => c.name === name),
        addCookies: (cookies) => this.mergeCookies(cookies),
      },
      this.options.fault,
    );
    this.pages.push(page);
    return page;
  }

  async exportState(): Promise<BrowserState> {
    if (this.options.exportError) throw this.options.exportError;
    return structuredClone({ cookies: this.cookies, origins: this.origins });
  }

  async applyState(state: BrowserState): Promise<void> {
    if (this.options.applyError) throw this.options.applyError;
    this.applied.push(structuredClone(state));
    this.mergeCookies(state.cookies);

    const byOrigin = new Map(this.origins.map((o) => [o.origin, o]));
    for (const origin of state.origins) byOrigin.set(origin.origin, structuredClone(origin));
    this.origins = [...byOrigin.values()];
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private mergeCookies(incoming: readonly CookieRecord[]): void {
    const key = (c: CookieRecord) => `${c.name}|${c.domain}|${c.path}`;
    const merged = new Map(this.cookies.map((c) => [key(c), c]));
    for (const cookie of incoming) merged.set(key(cookie), { ...cookie });
    this.cookies = [...merged.values()];
  }
}

// ─── FakeBrowserProvider ───────────────────────────────────

export class FakeBrowserProvider implements BrowserProvider {
  readonly contexts: FakeContext[] = [];

  private readonly site: FakeSite;
  private readonly options: FakeContextOptions;

  constructor(site: FakeSite, options: FakeContextOptions = {}) {
    this.site = site;
    this.options = options;
  }

  async newContext(): Promise<FakeContext> {
    const context = new FakeContext(this.site, this.options);
    this.contexts.push(context);
    return context;
  }
}

// ─── Fixtures ──────────────────────────────────────────────

/** A plausible portal session cookie. */
export function sessionCookie(value = 'test-session'): CookieRecord {
  return {
    name: 'portal_session',
    value,
    domain: 'visa.vfsglobal.com',
    path: '/',
    expires: -1,
    httpOnly: true,
    secure: true,
    sameSite: 'Lax',
  };
}
