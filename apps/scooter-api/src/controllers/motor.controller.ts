import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { ScooterControlPort } from '@evsim/domain';

const speedSchema = z.object({
  speed: z.number().finite().min(0),
});

export function createMotorRouter(rig: ScooterControlPort): Router {
  const router = Router();

  /** POST /api/motor/speed: set the target speed (km/h); clamped to the motor limit */
  router.post('/speed', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { speed } = speedSchema.parse(req.body);
      res.json({ targetSpeed: rig.setTargetSpeed(speed) });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
