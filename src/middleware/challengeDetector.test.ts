import { describe, expect, it } from 'vitest';
import { inspectPage } from './challengeDetector';

const LOGIN = 'https://visa.vfsglobal.com/tur/tr/deu/login';

describe('inspectPage', () => {
  it('sees nothing on an ordinary login form', () => {
    const signals = inspectPage({
      url: LOGIN,
      title: 'Giriş',
      html: '<html><body><form><input type="email"><button>Sign In</button></form></body></html>',
    });

    expect(signals).toEqual({ challenge: false, maintenance: false, reasons: [] });
  });

  it('recognises a challenge interstitial by its title', () => {
    const signals = inspectPage({ url: LOGIN, title: 'Just a moment...', html: '<html><body></body></html>' });

    expect(signals.challenge).toBe(true);
    expect(signals.reasons).toEqual(['challenge title "Just a moment..."']);
  });

  it('recognises challenge widgets by their markup', () => {
    const signals = inspectPage({
      url: LOGIN,
      title: 'Login',
      html: '<html><body><div class="cf-turnstile" data-sitekey="x"></div></body></html>',
    });

    expect(signals.challenge).toBe(true);
    expect(signals.reasons).toEqual(['challenge markup "cf-turnstile"']);
  });

  it('passes a login form that carries the WAF script and a Turnstile widget', () => {
    const signals = inspectPage({
      url: LOGIN,
      title: 'Giriş',
      html:
        '<html><head><script src="/cdn-cgi/challenge-platform/scripts/jsd/main.js"></script></head>' +
        '<body><form><input type="email"><input type="password">' +
        '<div class="cf-turnstile" data-sitekey="test-site-key"></div><button>Sign In</button></form></body></html>',
      hasLoginForm: true,
    });

    expect(signals).toEqual({
      challenge: false,
      maintenance: false,
      reasons: ['embedded challenge markup "challenge-platform"', 'embedded challenge markup "cf-turnstile"'],
    });
  });

  it('still flags a challenge title when the login form is present', () => {
    const signals = inspectPage({
      url: LOGIN,
      title: 'Just a moment...',
      html: '<html><body><div class="cf-turnstile"></div></body></html>',
      hasLoginForm: true,
    });

    expect(signals.challenge).toBe(true);
    expect(signals.reasons).toEqual(['challenge title "Just a moment..."', 'challenge markup "cf-turnstile"']);
  });

  it('ignores challenge wording that only appears inside scripts', () => {
    const signals = inspectPage({
      url: LOGIN,
      title: 'Login',
      html: '<html><body><script>var msg = "verify you are human";</script><p>Welcome</p></body></html>',
    });

    expect(signals.challenge).toBe(false);
  });

  it('detects maintenance from the visible Turkish notice', () => {
    const signals = inspectPage({
      url: LOGIN,
      title: 'VFS Global',
      html: '<html><body><h1>Planlanmış Sistem Bakımı</h1></body></html>',
    });

    expect(signals.maintenance).toBe(true);
    expect(signals.challenge).toBe(false);
  });

  it('detects maintenance from the URL', () => {
    const signals = inspectPage({
      url: 'https://visa.vfsglobal.com/tur/tr/deu/maintenance',
      title: '',
      html: '<html><body></body></html>',
    });

    expect(signals).toEqual({ challenge: false, maintenance: true, reasons: ['maintenance URL'] });
  });
});
