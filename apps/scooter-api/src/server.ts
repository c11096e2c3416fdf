import 'dotenv/config';
import { createRandomSource, systemClock } from '@evsim/adapters';
import { buildApp, buildHttpServer } from './app.js';
import { loadRigConfig } from './config/rig-config.js';
import { ScooterRig } from './services/scooter/scooter-rig.js';

async function main() {
  const config = loadRigConfig();

  const rig = new ScooterRig({
    clock: systemClock,
    random: createRandomSource(config.seed),
    ambientTemperature: config.ambientTemperature,
    batteryCapacity: config.batteryCapacity,
    maxSpeedKph: config.maxSpeedKph,
  });
  console.log(
    `[server] scooter rig ready (seed=${config.seed ?? 'none'}, capacity=${config.batteryCapacity} Wh)`,
  );

  const httpServer = buildHttpServer(buildApp(rig, { corsOrigin: config.corsOrigin }));

  await new Promise<void>((resolve) => {
    httpServer.listen(config.port, () => resolve());
  });
  console.log(`[server] listening on http://0.0.0.0:${config.port}`);

  const shutdown = () => {
    console.log('[server] shutting down...');
    httpServer.close(() => process.exit(0));
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
