/**
 * Public entry point: the scan pipeline and everything needed to assemble it.
 */

export * from './core/automation';
export * from './core/errors';
export * from './core/types';
export { Logger } from './core/logger';
export { BrowserManager, withBrowserManager } from './core/browserManager';
export type { BrowserManagerOptions } from './core/browserManager';
export { BROWSER_PROFILES, pickRandomProfile } from './core/browserProfiles';
export type { BrowserProfile } from './core/browserProfiles';

export { TargetRegistry, targetRegistry, portalSelectors, getTargetConfiguration } from './config/targetRegistry';
export type { PortalSelectors } from './config/targetRegistry';

export * from './middleware';
export * from './agents';

export { SlotScanner, classifyAvailability } from './slotScanner';
export type { Availability, ScanLogEntry, ScanLogSink, SlotScannerOptions } from './slotScanner';
export { SupabaseService } from './services/supabaseService';
export { createWorker } from './worker';
export type { Worker, WorkerOverrides } from './worker';
export { createApp } from './server';
export type { AppDeps } from './server';
