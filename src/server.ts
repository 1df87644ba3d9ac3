/**
 * server.ts — HTTP worker: receives scan requests and returns scan results.
 *
 *   GET  /             service info
 *   GET  /health       liveness
 *   GET  /targets      targets with dedicated configuration
 *   GET  /targets/:id  resolved configuration summary
 *   POST /scan         one ScanResult            (bearer auth)
 *   POST /scan-batch   { success, scanned, found, results }  (bearer auth)
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import dotenv from 'dotenv';
import { BrowserManager } from './core/browserManager';
import { ConfigError, describeError } from './core/errors';
import { Logger } from './core/logger';
import { loadWorkerConfig } from './core/types';
import type { TargetRegistry } from './config/targetRegistry';
import { createBearerAuth } from './mw/bearerAuth';
import { createScanRouter, type Scanner } from './routes/scan';
import { createTargetsRouter } from './routes/targets';
import { createWorker } from './worker';

const logger = new Logger('Server');

export const SERVICE_NAME = 'Visa Slot Scanner Worker';
export const SERVICE_VERSION = '1.0.0';

export interface AppDeps {
  scanner: Scanner;
  registry: TargetRegistry;
  workerSecret: string;
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.get('/', (_req: Request, res: Response) => {
    res.json({ service: SERVICE_NAME, status: 'running', version: SERVICE_VERSION });
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy' });
  });

  app.use(createTargetsRouter(deps.registry));
  app.use(createScanRouter(deps.scanner, deps.registry, createBearerAuth(deps.workerSecret)));

  // Malformed JSON bodies and anything a route let through.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: 'invalid_json', message: err.message });
    }
    logger.error('Unhandled request error', err);
    res.status(500).json({ error: 'internal_error', message: describeError(err) });
  });

  return app;
}

async function main(): Promise<void> {
  dotenv.config();
  const config = loadWorkerConfig();
  if (!config.workerSecret) {
    throw new ConfigError('WORKER_SECRET must be set to start the HTTP worker');
  }

  const browser = BrowserManager.fromConfig(config);
  logger.info('Initializing scanner…');
  await browser.start();
  browser.installShutdownHooks();

  const worker = createWorker(config, browser);
  const app = createApp({ scanner: worker.scanner, registry: worker.registry, workerSecret: config.workerSecret });

  app.listen(config.port, '0.0.0.0', () => {
    logger.info(`Scanner ready on port ${config.port}`);
  });
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logger.error('Worker failed to start', err);
    process.exit(1);
  });
}
