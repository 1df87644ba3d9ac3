import { describe, expect, it, vi } from 'vitest';
import { LoginFlow } from './agents/loginFlow';
import { OtpReader } from './agents/otpReader';
import { SessionManager } from './agents/sessionManager';
import { SessionStore } from './agents/sessionStore';
import { getTargetConfiguration } from './config/targetRegistry';
import { AutomationFault } from './core/errors';
import type { ScanRequest } from './core/types';
import { HumanPacer } from './middleware/humanBehavior';
import { FakeBrowserProvider, FakeContext, type FakeContextOptions, type FakeSite } from './testing/fakeBrowser';
import { PORTAL, portalSite } from './testing/portalSite';
import { SlotScanner, classifyAvailability, type ScanLogEntry, type ScanLogSink } from './slotScanner';

const NOW = Date.parse('2026-03-01T12:00:00.000Z');
const FRANCE_APPOINTMENT = 'https://visa.vfsglobal.com/tur/en/fra/book-an-appointment';

const germany: ScanRequest = { targetId: 'deu', targetName: 'Germany' };

async function pageShowing(elements: Record<string, string[]>, broken: string[] = []) {
  const context = new FakeContext(portalSite({ appointment: { elements, broken } }));
  const page = await context.newPage();
  await page.goto(PORTAL.appointment, { timeoutMs: 1000 });
  return page;
}

class MemoryScanLog implements ScanLogSink {
  readonly entries: ScanLogEntry[] = [];

  async record(entry: ScanLogEntry): Promise<void> {
    this.entries.push(entry);
  }
}

function setup(site: FakeSite, options: FakeContextOptions = {}, scanLog?: ScanLogSink) {
  const browser = new FakeBrowserProvider(site, options);
  const pacer = HumanPacer.instant();
  const loginFlow = new LoginFlow({
    pacer,
    otpReader: new OtpReader({
      clientFactory: () => ({
        connect: async () => undefined,
        searchUnread: async () => [1],
        fetchMessage: async () => ({ subject: 'Doğrulama', text: 'Doğrulama şifreniz: 120394' }),
        markSeen: async () => undefined,
        close: async () => undefined,
      }),
      sleep: async () => undefined,
    }),
    timeouts: { otpMs: 0 },
  });
  const sessionManager = new SessionManager({ store: new SessionStore(), loginFlow });
  const scanner = new SlotScanner({ browser, sessionManager, pacer, scanLog, now: () => NOW });
  return { browser, pacer, scanner };
}

const loginRequest: ScanRequest = {
  ...germany,
  userId: 'user-1',
  credentials: { email: 'user@example.com', password: 'test-secret', targetId: 'deu' },
  mailbox: {
    address: 'user@example.com',
    secret: 'test-secret',
    imapHost: 'imap.example.com',
    imapPort: 993,
    senderDomain: 'vfsglobal.com',
  },
};

describe('classifyAvailability', () => {
  const target = getTargetConfiguration('deu');

  it('trusts the "no appointment" banner over slot elements', async () => {
    const page = await pageShowing({ '.no-appointment-message': ['Yok'], '.appointment-slot.available': ['10:00'] });

    expect(await classifyAvailability(page, target)).toEqual({
      hasAppointment: false,
      availableSlots: null,
      message: 'No appointments available',
    });
  });

  it('reports the trimmed, non-empty texts of the first matching slot selector', async () => {
    const page = await pageShowing({ '.appointment-slot.available': [' 10:00 ', '10:30', ''] });

    expect(await classifyAvailability(page, target)).toEqual({
      hasAppointment: true,
      availableSlots: ['10:00', '10:30'],
      message: 'Found 2 available slots',
    });
  });

  it('reports nothing detected when neither indicator matches', async () => {
    const page = await pageShowing({ '.appointment-calendar': [''] });

    expect(await classifyAvailability(page, target)).toEqual({
      hasAppointment: false,
      availableSlots: null,
      message: 'No slots detected on page',
    });
  });

  it('gives the same answer when asked twice', async () => {
    const page = await pageShowing({ '.calendar-day.available': ['14 Mart'] });

    const first = await classifyAvailability(page, target);
    const second = await classifyAvailability(page, target);

    expect(second).toEqual(first);
  });

  it('skips a selector that throws', async () => {
    const page = await pageShowing({ '.calendar-day.available': ['14 Mart'] }, ['.no-appointment-message']);

    expect(await classifyAvailability(page, target)).toMatchObject({ hasAppointment: true, availableSlots: ['14 Mart'] });
  });

  it('lets a browser fault through', async () => {
    const page = await pageShowing({});
    await page.close();

    await expect(classifyAvailability(page, target)).rejects.toBeInstanceOf(AutomationFault);
  });
});

describe('SlotScanner.scan', () => {
  it('scans anonymously and releases the page and context', async () => {
    const { browser, scanner } = setup(
      portalSite({ appointment: { elements: { '.calendar-day.available': ['14 Mart', '15 Mart'] } } }),
    );

    const result = await scanner.scan(germany);

    expect(result).toEqual({
      success: true,
      target: 'Germany',
      hasAppointment: true,
      availableSlots: ['14 Mart', '15 Mart'],
      message: 'Found 2 available slots',
      durationMs: 0,
      sessionSaved: false,
    });
    expect(Object.isFrozen(result)).toBe(true);
    expect(browser.contexts[0].closed).toBe(true);
    expect(browser.contexts[0].pages[0].isClosed()).toBe(true);
  });

  it('returns a failed result when the appointment page cannot be reached', async () => {
    const { scanner } = setup(portalSite({ navigationErrors: { [PORTAL.appointment]: 'net::ERR_TIMED_OUT' } }));

    const result = await scanner.scan(germany);

    expect(result).toMatchObject({
      success: false,
      hasAppointment: false,
      availableSlots: null,
      message: 'Navigation failed: net::ERR_TIMED_OUT',
    });
  });

  it('logs in first when credentials are given and reports the saved session', async () => {
    const { browser, scanner } = setup(portalSite());

    const result = await scanner.scan(loginRequest);

    expect(result).toMatchObject({ success: true, message: 'No slots detected on page', sessionSaved: true });
    expect(browser.contexts[0].pages[0].typed.get('input[type="text"][maxlength="6"]')).toBe('120394');
  });

  it('turns a failed login into a failed result', async () => {
    const { browser, scanner } = setup(
      portalSite({ navigationErrors: { [PORTAL.login]: 'net::ERR_CONNECTION_RESET' } }),
    );

    const result = await scanner.scan(loginRequest);

    expect(result).toMatchObject({
      success: false,
      message: 'Login failed: Login page load failed: net::ERR_CONNECTION_RESET',
      sessionSaved: false,
    });
    expect(browser.contexts[0].closed).toBe(true);
  });

  it('labels a browser fault as a browser error', async () => {
    const { browser, scanner } = setup(portalSite(), { fault: { operation: 'goto' } });

    const result = await scanner.scan(germany);

    expect(result.success).toBe(false);
    expect(result.message).toBe('Browser error: Target page, context or browser has been closed');
    expect(browser.contexts[0].closed).toBe(true);
  });

  it('records every scan in the scan log', async () => {
    const scanLog = new MemoryScanLog();
    const { scanner } = setup(portalSite(), {}, scanLog);

    await scanner.scan({ ...germany, targetId: ' DEU ', userId: 'user-9' });

    expect(scanLog.entries).toEqual([
      {
        userId: 'user-9',
        targetId: 'deu',
        targetName: 'Germany',
        success: true,
        hasAppointment: false,
        slotCount: 0,
        message: 'No slots detected on page',
        durationMs: 0,
        scannedAt: '2026-03-01T12:00:00.000Z',
      },
    ]);
  });

  it('still returns the result when the scan log fails', async () => {
    const scanLog: ScanLogSink = { record: async () => Promise.reject(new Error('insert failed')) };
    const { scanner } = setup(portalSite(), {}, scanLog);

    const result = await scanner.scan(germany);

    expect(result.success).toBe(true);
  });
});

describe('SlotScanner.scanBatch', () => {
  it('scans every target in order and pauses only between them', async () => {
    const { pacer, scanner } = setup(
      portalSite({ navigationErrors: { [FRANCE_APPOINTMENT]: 'net::ERR_CONNECTION_REFUSED' } }),
    );
    const pauses = vi.spyOn(pacer, 'pauseBetweenTargets');

    const results = await scanner.scanBatch([
      germany,
      { targetId: 'fra', targetName: 'France' },
      { targetId: 'ita', targetName: 'Italy' },
    ]);

    expect(results.map((r) => [r.target, r.success])).toEqual([
      ['Germany', true],
      ['France', false],
      ['Italy', true],
    ]);
    expect(results[1].message).toBe('Navigation failed: net::ERR_CONNECTION_REFUSED');
    expect(pauses).toHaveBeenCalledTimes(2);
  });
});
