import { timingSafeEqual } from 'crypto';
import type { NextFunction, Request, Response } from 'express';

/**
 * Require `Authorization: Bearer <secret>`.
 *
 * 401 when the header is missing or isn't a bearer token, 403 when the
 * token is wrong.
 */
export function createBearerAuth(secret: string) {
  const expected = Buffer.from(secret);

  return (req: Request, res: Response, next: NextFunction) => {
    const header = req.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) {
      return res.status(401).json({ error: 'unauthorized', message: 'Missing or invalid authorization' });
    }

    const presented = Buffer.from(header.slice('Bearer '.length));
    if (presented.length !== expected.length || !timingSafeEqual(presented, expected)) {
      return res.status(403).json({ error: 'forbidden', message: 'Invalid secret key' });
    }

    next();
  };
}
