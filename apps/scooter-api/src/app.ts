import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer } from 'http';
import type { Server } from 'http';
import type { ScooterControlPort } from '@evsim/domain';

import { createStatusRouter } from './controllers/status.controller.js';
import { createMotorRouter } from './controllers/motor.controller.js';
import { createBatteryRouter } from './controllers/battery.controller.js';
import { createSensorsRouter } from './controllers/sensors.controller.js';
import { errorHandler, HttpError } from './middleware/error-handler.js';

export interface AppOptions {
  corsOrigin?: string;
}

export function buildApp(rig: ScooterControlPort, options: AppOptions = {}): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: options.corsOrigin ?? '*' }));
  if (process.env['NODE_ENV'] !== 'test') app.use(morgan('combined'));
  app.use(express.json({ limit: '100kb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/status', createStatusRouter(rig));
  app.use('/api/motor', createMotorRouter(rig));
  app.use('/api/battery', createBatteryRouter(rig));
  app.use('/api/sensors', createSensorsRouter(rig));

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', ts: new Date().toISOString() });
  });

  app.use((req, _res, next) => {
    next(new HttpError(404, `No route for ${req.method} ${req.path}`));
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}

export function buildHttpServer(app: ReturnType<typeof express>): Server {
  return createServer(app);
}
