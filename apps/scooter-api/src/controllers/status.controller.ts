import { Router } from 'express';
import type { Request, Response } from 'express';
import type { ScooterControlPort } from '@evsim/domain';

export function createStatusRouter(rig: ScooterControlPort): Router {
  const router = Router();

  /** GET /api/status: aggregated battery / motor / thermal telemetry */
  router.get('/', (_req: Request, res: Response) => {
    res.json(rig.getStatus());
  });

  return router;
}
