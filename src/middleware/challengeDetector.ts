/**
 * challengeDetector.ts — Recognise bot-challenge and maintenance pages.
 *
 * The portal sits behind a WAF that sometimes serves an interstitial
 * ("Just a moment…", Turnstile, "Access denied") instead of the page we
 * asked for, and the portal itself announces maintenance windows in two
 * languages.  Both are detected from the page title, the URL and the
 * *visible* body text, with scripts and styles stripped by cheerio.
 *
 * Markup fingerprints are weaker evidence.  The WAF injects its
 * `/cdn-cgi/challenge-platform/` script into every page it fronts, and the
 * login form itself may carry a Turnstile widget.  Markup alone therefore
 * only counts as a challenge when the caller saw no login form on the page;
 * with the form present it is reported as embedded and the page passes.
 */

import * as cheerio from 'cheerio';
import { Logger } from '../core/logger';

const logger = new Logger('ChallengeDetector');

// ─── Types ─────────────────────────────────────────────────

export interface PageSnapshot {
  url: string;
  title: string;
  html: string;
  /** The portal's login form is on the page, so markup alone is not an interstitial. */
  hasLoginForm?: boolean;
}

export interface PageSignals {
  /** A bot-detection interstitial is showing instead of real content. */
  challenge: boolean;
  /** The portal says it is down for maintenance. */
  maintenance: boolean;
  /** Human-readable descriptions of every heuristic that fired. */
  reasons: string[];
}

// ─── Heuristics ────────────────────────────────────────────

const CHALLENGE_TITLES = [/just a moment/i, /attention required/i, /access denied/i, /checking your browser/i];

const CHALLENGE_TEXT = [
  /verify you are human/i,
  /checking (?:if the site connection is secure|your browser)/i,
  /enable javascript and cookies to continue/i,
  /access denied/i,
  /bot (?:activity )?detected/i,
  /request unsuccessful\. incapsula/i,
];

/** Markup fingerprints of challenge widgets (these live in attributes, not text). */
const CHALLENGE_MARKUP = [
  'cf-challenge',
  'challenge-platform',
  'cf-turnstile',
  'challenges.cloudflare.com',
  '_incapsula_resource',
];

const MAINTENANCE_TEXT = [
  /scheduled (?:system )?maintenance/i,
  /system maintenance/i,
  /under maintenance/i,
  /temporarily unavailable/i,
  /sistem bakım/i,
  /bakım nedeniyle/i,
  /planlanmış sistem bakımı/i,
];

// ─── Public API ────────────────────────────────────────────

export function inspectPage(snapshot: PageSnapshot): PageSignals {
  const reasons: string[] = [];
  const $ = cheerio.load(snapshot.html);

  $('script, style, noscript').remove();
  const visibleText = $('body').text().replace(/\s+/g, ' ').trim();
  const title = snapshot.title || $('title').text().trim();
  const lowerHtml = snapshot.html.toLowerCase();

  // ── Challenge ──────────────────────────────────────────
  for (const pattern of CHALLENGE_TITLES) {
    if (pattern.test(title)) reasons.push(`challenge title "${title}"`);
  }
  for (const pattern of CHALLENGE_TEXT) {
    if (pattern.test(visibleText)) reasons.push(`challenge text ${pattern.source}`);
  }
  const strongSignal = reasons.length > 0;

  const markers = CHALLENGE_MARKUP.filter((marker) => lowerHtml.includes(marker));
  const challenge = strongSignal || (markers.length > 0 && !snapshot.hasLoginForm);
  for (const marker of markers) {
    reasons.push(challenge ? `challenge markup "${marker}"` : `embedded challenge markup "${marker}"`);
  }

  // ── Maintenance ────────────────────────────────────────
  let maintenance = false;
  if (safePathname(snapshot.url).includes('maintenance')) {
    reasons.push('maintenance URL');
    maintenance = true;
  }
  for (const pattern of MAINTENANCE_TEXT) {
    if (pattern.test(visibleText) || pattern.test(title)) {
      reasons.push(`maintenance text ${pattern.source}`);
      maintenance = true;
    }
  }

  if (reasons.length > 0) {
    logger.debug(`Signals for ${snapshot.url}: ${reasons.join('; ')}`);
  }

  return { challenge, maintenance, reasons };
}

function safePathname(url: string): string {
  try {
    return new URL(url).pathname.toLowerCase();
  } catch {
    return url.toLowerCase();
  }
}
