import { afterEach, describe, expect, it, vi } from 'vitest';
import { buildScanRequests } from './cli';

const defaults = { user: 'cli', imapHost: 'imap.gmail.com', imapPort: '993', senderDomain: 'vfsglobal.com' };

describe('buildScanRequests', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('builds anonymous requests with resolved target names', () => {
    vi.stubEnv('PORTAL_PASSWORD', '');

    expect(buildScanRequests(['DEU', 'xyz'], defaults)).toEqual([
      { targetId: 'deu', targetName: 'Germany' },
      { targetId: 'xyz', targetName: 'XYZ' },
    ]);
  });

  it('attaches credentials and mailbox access when an e-mail and password are given', () => {
    const [request] = buildScanRequests(['fra'], {
      ...defaults,
      email: 'user@example.com',
      password: 'test-secret',
      mailboxAddress: 'user@example.com',
      mailboxSecret: 'test-secret',
    });

    expect(request).toEqual({
      targetId: 'fra',
      targetName: 'France',
      userId: 'cli',
      credentials: { email: 'user@example.com', password: 'test-secret', targetId: 'fra' },
      mailbox: {
        address: 'user@example.com',
        secret: 'test-secret',
        imapHost: 'imap.gmail.com',
        imapPort: 993,
        senderDomain: 'vfsglobal.com',
      },
    });
  });

  it('takes the password from PORTAL_PASSWORD', () => {
    vi.stubEnv('PORTAL_PASSWORD', 'test-secret');

    const [request] = buildScanRequests(['ita'], { ...defaults, email: 'user@example.com', user: 'ops' });

    expect(request.userId).toBe('ops');
    expect(request.credentials?.password).toBe('test-secret');
    expect(request.mailbox).toBeUndefined();
  });

  it('rejects a non-numeric IMAP port', () => {
    expect(() =>
      buildScanRequests(['deu'], {
        ...defaults,
        imapPort: 'imaps',
        mailboxAddress: 'user@example.com',
        mailboxSecret: 'test-secret',
      }),
    ).toThrow('--imap-port must be a positive integer, got "imaps"');
  });
});
