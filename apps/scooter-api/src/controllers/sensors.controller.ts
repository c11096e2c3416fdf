import { Router } from 'express';
import type { Request, Response } from 'express';
import type { ScooterControlPort } from '@evsim/domain';

export function createSensorsRouter(rig: ScooterControlPort): Router {
  const router = Router();

  /** GET /api/sensors/environmental: one temperature / pressure / humidity / gas reading */
  router.get('/environmental', (_req: Request, res: Response) => {
    res.json(rig.readEnvironment());
  });

  /** GET /api/sensors/inertial: one accelerometer / gyroscope reading */
  router.get('/inertial', (_req: Request, res: Response) => {
    res.json(rig.readMotion());
  });

  return router;
}
