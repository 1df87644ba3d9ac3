/**
 * browserProfiles.ts — Curated pool of self-consistent browser identities.
 *
 * One profile is drawn per browser launch.  Every page opened under it
 * carries the same User-Agent, client hints, navigator.platform,
 * navigator.languages, viewport and Accept-Language, and Chrome's `--lang`
 * flag is set from the same profile.  The browser underneath is always
 * Chromium, so only Chromium-family user agents appear here.
 */

import type { Protocol } from 'puppeteer-core';

export interface BrowserProfile {
  userAgent: string;
  /** navigator.platform the user agent implies. */
  platform: 'Win32' | 'MacIntel';
  viewport: { width: number; height: number };
  acceptLanguage: string;
}

export const BROWSER_PROFILES: readonly BrowserProfile[] = [
  // ── Chrome on Windows ──
  {
    userAgent:
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
    platform: 'Win32',
    viewport: { width: 1920, height: 1080 },
    acceptLanguage: 'en-US,en;q=0.9,tr;q=0.8',
  },
  {
    userAgent:
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36',
    platform: 'Win32',
    viewport: { width: 1536, height: 864 },
    acceptLanguage: 'tr-TR,tr;q=0.9,en-US;q=0.8,en;q=0.7',
  },
  {
    userAgent:
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
    platform: 'Win32',
    viewport: { width: 1366, height: 768 },
    acceptLanguage: 'en-GB,en;q=0.9,tr;q=0.8',
  },

  // ── Edge on Windows ──
  {
    userAgent:
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36 Edg/124.0.0.0',
    platform: 'Win32',
    viewport: { width: 1920, height: 1080 },
    acceptLanguage: 'tr-TR,tr;q=0.9,en;q=0.8',
  },

  // ── Chrome on macOS ──
  {
    userAgent:
      'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
    platform: 'MacIntel',
    viewport: { width: 1440, height: 900 },
    acceptLanguage: 'en-US,en;q=0.9,tr;q=0.8',
  },
  {
    userAgent:
      'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36',
    platform: 'MacIntel',
    viewport: { width: 1680, height: 1050 },
    acceptLanguage: 'en-US,en;q=0.9',
  },
];

/** Pick a profile uniformly at random. */
export function pickRandomProfile(random: () => number = Math.random): BrowserProfile {
  const index = Math.min(BROWSER_PROFILES.length - 1, Math.floor(random() * BROWSER_PROFILES.length));
  return BROWSER_PROFILES[index];
}

/** The primary language tag of a profile, for Chrome's `--lang` flag. */
export function primaryLanguage(profile: BrowserProfile): string {
  return profile.acceptLanguage.split(',')[0].split(';')[0];
}

/** navigator.languages for a profile: the Accept-Language tags without weights. */
export function profileLanguages(profile: BrowserProfile): string[] {
  return profile.acceptLanguage
    .split(',')
    .map((part) => part.split(';')[0].trim())
    .filter((tag) => tag.length > 0);
}

/** Client-hint metadata matching the profile's User-Agent string. */
export function userAgentMetadata(profile: BrowserProfile): Protocol.Emulation.UserAgentMetadata {
  const chrome = /Chrome\/((\d+)[\d.]*)/.exec(profile.userAgent);
  const fullVersion = chrome ? chrome[1] : '124.0.0.0';
  const major = chrome ? chrome[2] : '124';
  const vendor = /\bEdg\//.test(profile.userAgent) ? 'Microsoft Edge' : 'Google Chrome';
  const windows = profile.platform === 'Win32';

  return {
    brands: [
      { brand: 'Chromium', version: major },
      { brand: vendor, version: major },
      { brand: 'Not-A.Brand', version: '99' },
    ],
    fullVersion,
    platform: windows ? 'Windows' : 'macOS',
    platformVersion: windows ? '10.0.0' : '10.15.7',
    architecture: 'x86',
    model: '',
    mobile: false,
  };
}
