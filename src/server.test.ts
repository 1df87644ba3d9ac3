import type { Server } from 'http';
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { targetRegistry } from './config/targetRegistry';
import type { ScanRequest, ScanResult } from './core/types';
import type { Scanner } from './routes/scan';
import { SERVICE_NAME, SERVICE_VERSION, createApp } from './server';

const SECRET = 'test-secret';

function resultFor(request: ScanRequest): ScanResult {
  const open = request.targetId === 'deu';
  return {
    success: true,
    target: request.targetName,
    hasAppointment: open,
    availableSlots: open ? ['14 Mart'] : null,
    message: open ? 'Found 1 available slots' : 'No appointments available',
    durationMs: 1200,
    sessionSaved: false,
  };
}

const scanner = {
  scan: vi.fn(async (request: ScanRequest) => resultFor(request)),
  scanBatch: vi.fn(async (requests: readonly ScanRequest[]) => requests.map(resultFor)),
} satisfies Scanner;

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  const app = createApp({ scanner, registry: targetRegistry, workerSecret: SECRET });
  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('server is not listening on a port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

beforeEach(() => {
  scanner.scan.mockClear();
  scanner.scanBatch.mockClear();
});

function post(path: string, body: unknown, token: string | null = SECRET): Promise<Response> {
  const headers: Record<string, string> = { 'content-type': 'application/json' };
  if (token !== null) headers.authorization = `Bearer ${token}`;
  return fetch(`${baseUrl}${path}`, { method: 'POST', headers, body: JSON.stringify(body) });
}

describe('service endpoints', () => {
  it('GET / describes the service', async () => {
    const res = await fetch(`${baseUrl}/`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ service: SERVICE_NAME, status: 'running', version: SERVICE_VERSION });
  });

  it('GET /health reports healthy', async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(await res.json()).toEqual({ status: 'healthy' });
  });
});

describe('target endpoints', () => {
  it('GET /targets lists the configured targets', async () => {
    const res = await fetch(`${baseUrl}/targets`);
    const body = await res.json();

    expect(body).toHaveLength(6);
    expect(body[0]).toEqual({ code: 'deu', name: 'Germany' });
  });

  it('GET /targets/:id resolves a configured target', async () => {
    const res = await fetch(`${baseUrl}/targets/deu`);

    expect(await res.json()).toEqual({
      code: 'deu',
      name: 'Germany',
      url: 'https://visa.vfsglobal.com/tur/en/deu/book-an-appointment',
      supported: true,
    });
  });

  it('GET /targets/:id synthesizes a configuration for an unknown target', async () => {
    const res = await fetch(`${baseUrl}/targets/xyz`);

    expect(await res.json()).toEqual({
      code: 'xyz',
      name: 'XYZ',
      url: 'https://visa.vfsglobal.com/tur/en/xyz/book-an-appointment',
      supported: false,
    });
  });
});

describe('POST /scan', () => {
  it('rejects a request without a bearer token', async () => {
    const res = await post('/scan', { targetId: 'deu' }, null);

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: 'unauthorized', message: 'Missing or invalid authorization' });
    expect(scanner.scan).not.toHaveBeenCalled();
  });

  it('rejects a wrong secret', async () => {
    const res = await post('/scan', { targetId: 'deu' }, 'wrong-secret');

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({ error: 'forbidden', message: 'Invalid secret key' });
  });

  it('validates the body', async () => {
    const res = await post('/scan', {
      targetId: 'deu',
      credentials: { email: 'user@example.com', password: 'test-secret' },
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'invalid_request',
      message: 'userId: userId is required when credentials are given',
    });
  });

  it('answers malformed JSON with 400', async () => {
    const res = await fetch(`${baseUrl}/scan`, {
      method: 'POST',
      headers: { 'content-type': 'application/json', authorization: `Bearer ${SECRET}` },
      body: '{"targetId":',
    });

    expect(res.status).toBe(400);
    expect((await res.json()).error).toBe('invalid_json');
  });

  it('scans the target and returns the result', async () => {
    const res = await post('/scan', { targetId: 'DEU' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual(resultFor({ targetId: 'deu', targetName: 'Germany' }));
    expect(scanner.scan).toHaveBeenCalledWith({
      targetId: 'deu',
      targetName: 'Germany',
      userId: undefined,
      credentials: undefined,
      mailbox: undefined,
      session: undefined,
    });
  });

  it('passes credentials through with the target attached', async () => {
    await post('/scan', {
      targetId: 'fra',
      targetName: 'Fransa',
      userId: 'user-1',
      credentials: { email: 'user@example.com', password: 'test-secret' },
      mailbox: {
        address: 'user@example.com',
        secret: 'test-secret',
        imapHost: 'imap.example.com',
        senderDomain: 'vfsglobal.com',
      },
    });

    expect(scanner.scan).toHaveBeenCalledWith({
      targetId: 'fra',
      targetName: 'Fransa',
      userId: 'user-1',
      credentials: { email: 'user@example.com', password: 'test-secret', targetId: 'fra' },
      mailbox: {
        address: 'user@example.com',
        secret: 'test-secret',
        imapHost: 'imap.example.com',
        imapPort: 993,
        senderDomain: 'vfsglobal.com',
      },
      session: undefined,
    });
  });

  it('answers 500 when the scanner itself throws', async () => {
    scanner.scan.mockRejectedValueOnce(new Error('browser not started'));

    const res = await post('/scan', { targetId: 'deu' });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'internal_error', message: 'browser not started' });
  });
});

describe('POST /scan-batch', () => {
  it('returns every result with the number of targets that had slots', async () => {
    const res = await post('/scan-batch', [{ targetId: 'deu' }, { targetId: 'fra' }, { targetId: 'ita' }]);

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.success).toBe(true);
    expect(body.scanned).toBe(3);
    expect(body.found).toBe(1);
    expect(body.results.map((r: ScanResult) => r.target)).toEqual(['Germany', 'France', 'Italy']);
  });

  it('rejects an empty batch', async () => {
    const res = await post('/scan-batch', []);

    expect(res.status).toBe(400);
    expect(scanner.scanBatch).not.toHaveBeenCalled();
  });

  it('requires authentication', async () => {
    const res = await post('/scan-batch', [{ targetId: 'deu' }], null);

    expect(res.status).toBe(401);
  });
});
