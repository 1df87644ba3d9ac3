/**
 * logger.ts — Natural-language progress logger for the scan pipeline.
 *
 * Every module creates one `Logger` with its own context label.  Messages
 * are plain sentences ("Loaded 12 saved cookies", "Found 3 available slots
 * for Germany") written to the console.
 *
 * The threshold comes from `LOG_LEVEL` and is read on every emit, which lets
 * tests (and operators) silence or widen output without re-creating loggers.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Lightweight logger that emits human-readable, timestamped messages.
 *
 * Usage:
 *   const logger = new Logger('SlotScanner');
 *   logger.info('Found 4 available slots for Germany');
 */
export class Logger {
  /** A label prepended to every message so you can tell *which* module is talking. */
  private readonly context: string;

  constructor(context: string) {
    this.context = context;
  }

  // ── Public API ─────────────────────────────────────────

  /** Selector probes, per-stage timings, anything too chatty for production. */
  debug(message: string): void {
    this.emit('debug', message);
  }

  /** Routine progress: page loaded, session restored, slots found. */
  info(message: string): void {
    this.emit('info', message);
  }

  /** Something unexpected but non-fatal: ready selector timed out, banner missing. */
  warn(message: string): void {
    this.emit('warn', message);
  }

  /** A hard failure: browser crash, login rejected, Supabase 500. */
  error(message: string, err?: unknown): void {
    this.emit('error', message);
    if (err && this.enabled('error')) {
      console.error(err);
    }
  }

  // ── Internals ──────────────────────────────────────────

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[currentThreshold()];
  }

  /**
   * Formats and writes a single log line:
   * `[2026-02-10T18:30:00Z] [INFO ] [SlotScanner] Found 3 available slots…`
   */
  private emit(level: LogLevel, message: string): void {
    if (!this.enabled(level)) return;

    const timestamp = new Date().toISOString();
    const tag = level.toUpperCase().padEnd(5);
    const line = `[${timestamp}] [${tag}] [${this.context}] ${message}`;

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'debug':
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  }
}

function currentThreshold(): LogLevel | 'silent' {
  const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isThreshold(raw) ? raw : 'info';
}

function isThreshold(value: string): value is LogLevel | 'silent' {
  return value in LEVEL_ORDER;
}

/** Mask all but the first two characters of a one-time code for logging. */
export function maskCode(code: string): string {
  return `${code.slice(0, 2)}${'*'.repeat(Math.max(0, code.length - 2))}`;
}
