/** worker.ts — Wire the scan pipeline together from a `WorkerConfig`. */

import type { BrowserProvider } from './core/automation';
import { Logger } from './core/logger';
import type { WorkerConfig } from './core/types';
import { targetRegistry, type TargetRegistry } from './config/targetRegistry';
import { HumanPacer } from './middleware/humanBehavior';
import { LoginFlow, type ManualOtpProvider } from './agents/loginFlow';
import { OtpReader } from './agents/otpReader';
import { SessionManager } from './agents/sessionManager';
import { InMemorySessionRepository, SessionStore, type SessionRepository } from './agents/sessionStore';
import { SupabaseService } from './services/supabaseService';
import { SlotScanner, type ScanLogSink } from './slotScanner';

const logger = new Logger('Worker');

export interface WorkerOverrides {
  repository?: SessionRepository;
  scanLog?: ScanLogSink;
  manualOtp?: ManualOtpProvider;
  pacer?: HumanPacer;
  otpReader?: OtpReader;
  registry?: TargetRegistry;
}

export interface Worker {
  registry: TargetRegistry;
  sessionStore: SessionStore;
  loginFlow: LoginFlow;
  sessionManager: SessionManager;
  scanner: SlotScanner;
}

export function createWorker(
  config: WorkerConfig,
  browser: BrowserProvider,
  overrides: WorkerOverrides = {},
): Worker {
  const registry = overrides.registry ?? targetRegistry;
  const pacer = overrides.pacer ?? (config.pacing === 'off' ? HumanPacer.instant() : new HumanPacer());

  const needsSupabase = !overrides.repository || !overrides.scanLog;
  const supabase = needsSupabase ? SupabaseService.fromConfig(config) : null;
  if (needsSupabase && !supabase) {
    logger.info('Supabase not configured — sessions are kept in memory and scans are not logged');
  }

  const sessionStore = new SessionStore({
    repository: overrides.repository ?? supabase ?? new InMemorySessionRepository(),
  });

  const loginFlow = new LoginFlow({
    pacer,
    otpReader: overrides.otpReader ?? new OtpReader(),
    manualOtp: overrides.manualOtp,
    registry,
    timeouts: { navigationMs: config.navigationTimeoutMs, otpMs: config.otpTimeoutMs },
    screenshotDir: config.debugScreenshotDir,
  });

  const sessionManager = new SessionManager({
    store: sessionStore,
    loginFlow,
    sessionTtlHours: config.sessionTtlHours,
    registry,
  });

  const scanner = new SlotScanner({
    browser,
    sessionManager,
    pacer,
    registry,
    scanLog: overrides.scanLog ?? supabase ?? undefined,
  });

  return { registry, sessionStore, loginFlow, sessionManager, scanner };
}
