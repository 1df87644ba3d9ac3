#!/usr/bin/env node
/**
 * cli.ts — Run scans from a terminal and print the results as JSON.
 *
 *   visa-slot-scanner targets
 *   visa-slot-scanner scan deu fra
 *   visa-slot-scanner scan deu --email me@example.com --password … [--mailbox-address …]
 *
 * With credentials, the one-time code is read from the mailbox when one is
 * given and otherwise typed in at the prompt.
 */

import { createInterface } from 'readline/promises';
import { Command } from 'commander';
import dotenv from 'dotenv';
import { withBrowserManager } from './core/browserManager';
import { describeError } from './core/errors';
import { Logger } from './core/logger';
import { loadWorkerConfig, type MailboxAccess, type ScanRequest } from './core/types';
import { targetRegistry } from './config/targetRegistry';
import type { ManualOtpProvider } from './agents/loginFlow';
import { createWorker } from './worker';

const logger = new Logger('CLI');

interface ScanOptions {
  email?: string;
  password?: string;
  user: string;
  mailboxAddress?: string;
  mailboxSecret?: string;
  imapHost: string;
  imapPort: string;
  senderDomain: string;
}

/** Ask for the code on stdin; `null` when nothing is typed in time. */
export const promptForOtp: ManualOtpProvider = async ({ targetId, email, timeoutMs }) => {
  if (!process.stdin.isTTY) {
    logger.warn('stdin is not a terminal — cannot prompt for the OTP');
    return null;
  }

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`OTP for ${email} on ${targetId.toUpperCase()}: `, {
      signal: AbortSignal.timeout(timeoutMs),
    });
    return answer.trim() || null;
  } catch (err) {
    logger.warn(`No OTP entered: ${describeError(err)}`);
    return null;
  } finally {
    rl.close();
  }
};

function buildMailbox(options: ScanOptions): MailboxAccess | undefined {
  if (!options.mailboxAddress || !options.mailboxSecret) return undefined;

  const port = Number(options.imapPort);
  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`--imap-port must be a positive integer, got "${options.imapPort}"`);
  }
  return {
    address: options.mailboxAddress,
    secret: options.mailboxSecret,
    imapHost: options.imapHost,
    imapPort: port,
    senderDomain: options.senderDomain,
  };
}

export function buildScanRequests(targetIds: readonly string[], options: ScanOptions): ScanRequest[] {
  const password = options.password ?? process.env.PORTAL_PASSWORD;
  const mailbox = buildMailbox(options);

  return targetIds.map((raw) => {
    const target = targetRegistry.get(raw);
    const request: ScanRequest = { targetId: target.id, targetName: target.name };
    if (options.email && password) {
      request.userId = options.user;
      request.credentials = { email: options.email, password, targetId: target.id };
      request.mailbox = mailbox;
    }
    return request;
  });
}

const program = new Command();

program
  .name('visa-slot-scanner')
  .description('Check visa-appointment booking portals for open slots')
  .version('1.0.0')
  .option('--env <path>', 'Path to env file', '.env');

program
  .command('targets')
  .description('List targets with dedicated configuration')
  .action(() => {
    for (const { code, name } of targetRegistry.list()) {
      console.log(`${code}\t${name}`);
    }
  });

program
  .command('scan')
  .description('Scan one or more targets in sequence')
  .argument('<targets...>', 'target identifiers, e.g. deu fra')
  .option('--email <email>', 'portal account e-mail')
  .option('--password <password>', 'portal account password (or PORTAL_PASSWORD)')
  .option('--user <id>', 'user id the saved session is stored under', 'cli')
  .option('--mailbox-address <address>', 'IMAP mailbox that receives the OTP')
  .option('--mailbox-secret <secret>', 'IMAP password or app password')
  .option('--imap-host <host>', 'IMAP server', 'imap.gmail.com')
  .option('--imap-port <port>', 'IMAP port', '993')
  .option('--sender-domain <domain>', 'domain the OTP e-mail comes from', 'vfsglobal.com')
  .action(async (targetIds: string[], options: ScanOptions) => {
    const { env } = program.opts<{ env: string }>();
    dotenv.config({ path: env });
    const config = loadWorkerConfig();
    const requests = buildScanRequests(targetIds, options);

    const results = await withBrowserManager(
      { executablePath: config.chromeExecutablePath, headless: config.headless },
      async (browser) => {
        const uninstall = browser.installShutdownHooks();
        try {
          const { scanner } = createWorker(config, browser, { manualOtp: promptForOtp });
          return await scanner.scanBatch(requests);
        } finally {
          uninstall();
        }
      },
    );

    console.log(JSON.stringify(results, null, 2));
    if (results.some((r) => !r.success)) process.exitCode = 1;
  });

if (require.main === module) {
  program.parseAsync(process.argv).catch((err: unknown) => {
    logger.error(`Command failed: ${describeError(err)}`);
    process.exit(1);
  });
}
