import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { ScooterControlPort } from '@evsim/domain';

const chargingSchema = z.object({
  charging: z.boolean(),
});

export function createBatteryRouter(rig: ScooterControlPort): Router {
  const router = Router();

  /** POST /api/battery/charging: plug in or unplug the charger */
  router.post('/charging', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { charging } = chargingSchema.parse(req.body);
      res.json({ charging: rig.setCharging(charging) });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
