import { Router, Request, Response, RequestHandler } from 'express';
import { z } from 'zod';
import type { ScanRequest, ScanResult } from '../core/types';
import { describeError } from '../core/errors';
import { Logger } from '../core/logger';
import type { TargetRegistry } from '../config/targetRegistry';
import { sessionRecordSchema } from '../agents/sessionStore';

const logger = new Logger('ScanRoutes');

/** Upper bound on targets per batch; each one can take minutes. */
export const MAX_BATCH_SIZE = 20;

// ─── Request bodies ────────────────────────────────────────

const mailboxSchema = z.object({
  address: z.string().email(),
  secret: z.string().min(1),
  imapHost: z.string().min(1),
  imapPort: z.number().int().positive().default(993),
  senderDomain: z.string().min(1),
});

export const scanBodySchema = z
  .object({
    targetId: z.string().trim().min(1).max(16),
    targetName: z.string().trim().min(1).optional(),
    userId: z.string().min(1).optional(),
    credentials: z.object({ email: z.string().email(), password: z.string().min(1) }).optional(),
    mailbox: mailboxSchema.optional(),
    session: sessionRecordSchema.optional(),
  })
  .refine((body) => !body.credentials || body.userId, {
    message: 'userId is required when credentials are given',
    path: ['userId'],
  });

export const scanBatchBodySchema = z.array(scanBodySchema).min(1).max(MAX_BATCH_SIZE);

export type ScanBody = z.infer<typeof scanBodySchema>;

/** Turn a validated body into the scanner's request shape. */
export function toScanRequest(body: ScanBody, registry: TargetRegistry): ScanRequest {
  const targetId = body.targetId.toLowerCase();
  return {
    targetId,
    targetName: body.targetName ?? registry.get(targetId).name,
    userId: body.userId,
    credentials: body.credentials ? { ...body.credentials, targetId } : undefined,
    mailbox: body.mailbox,
    session: body.session,
  };
}

// ─── Router ────────────────────────────────────────────────

export interface Scanner {
  scan(request: ScanRequest): Promise<ScanResult>;
  scanBatch(requests: readonly ScanRequest[]): Promise<ScanResult[]>;
}

export function createScanRouter(scanner: Scanner, registry: TargetRegistry, auth: RequestHandler): Router {
  const router = Router();

  // POST /scan - Check one target
  router.post('/scan', auth, async (req: Request, res: Response) => {
    const parsed = scanBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'invalid_request', message: formatIssues(parsed.error) });
    }

    try {
      const request = toScanRequest(parsed.data, registry);
      logger.info(`Scanning: ${request.targetName} (${request.targetId})`);
      const result = await scanner.scan(request);
      logger.info(`Scan complete: ${result.message}`);
      res.json(result);
    } catch (error) {
      logger.error('Scan error', error);
      res.status(500).json({ error: 'internal_error', message: describeError(error) });
    }
  });

  // POST /scan-batch - Check several targets in sequence
  router.post('/scan-batch', auth, async (req: Request, res: Response) => {
    const parsed = scanBatchBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'invalid_request', message: formatIssues(parsed.error) });
    }

    try {
      const requests = parsed.data.map((body) => toScanRequest(body, registry));
      const results = await scanner.scanBatch(requests);
      res.json({
        success: true,
        scanned: results.length,
        found: results.filter((r) => r.hasAppointment).length,
        results,
      });
    } catch (error) {
      logger.error('Batch scan error', error);
      res.status(500).json({ error: 'internal_error', message: describeError(error) });
    }
  });

  return router;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
