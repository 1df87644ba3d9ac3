/**
 * middleware/index.ts — Barrel export for the page-level helpers.
 */

// ── Human behaviour ─────────────────────────────────────────
export { HumanPacer, PACING_RANGES, sleep } from './humanBehavior';
export type { DelayRange, HumanPacerOptions, PacingAction } from './humanBehavior';

// ── Challenge / maintenance detection ───────────────────────
export { inspectPage } from './challengeDetector';
export type { PageSignals, PageSnapshot } from './challengeDetector';
