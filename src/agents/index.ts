/** agents/index.ts — Barrel export for the session-level modules. */

export { LoginFlow, toLoginOutcome, DEFAULT_LOGIN_TIMEOUTS } from './loginFlow';
export type { LoginFlowOptions, LoginTimeouts, ManualOtpProvider } from './loginFlow';

export { OtpReader, ImapMailboxClient, extractOtpFromText, OTP_PATTERNS } from './otpReader';
export type { MailboxClient, MailboxClientFactory, MailboxMessage, OtpReaderOptions } from './otpReader';

export {
  SessionStore,
  InMemorySessionRepository,
  SESSION_EXPIRY_BUFFER,
  parseSessionRecord,
  sessionRecordSchema,
} from './sessionStore';
export type { SessionRepository, SessionStoreOptions } from './sessionStore';

export { SessionManager } from './sessionManager';
export type { EnsureLoggedInResult, SessionManagerOptions } from './sessionManager';
