import { Router, Request, Response } from 'express';
import type { TargetRegistry } from '../config/targetRegistry';

export function createTargetsRouter(registry: TargetRegistry): Router {
  const router = Router();

  // GET /targets - Targets with dedicated configuration
  router.get('/targets', (_req: Request, res: Response) => {
    res.json(registry.list());
  });

  // GET /targets/:id - Resolved configuration summary for any identifier
  router.get('/targets/:id', (req: Request, res: Response) => {
    const target = registry.get(req.params.id);
    res.json({
      code: req.params.id,
      name: target.name,
      url: target.appointmentUrl,
      supported: registry.isSupported(req.params.id),
    });
  });

  return router;
}
