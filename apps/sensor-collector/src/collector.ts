import 'dotenv/config';
import {
  Neo4jEnvironmentalReadingRepository,
  applySchema,
  closeNeo4jDriver,
  createRandomSource,
  openSession,
  systemClock,
  verifyNeo4jConnectivity,
} from '@evsim/adapters';
import { EnvironmentalSensorSimulator } from '@evsim/simulation';
import { loadCollectorConfig } from './config/collector-config.js';
import { SensorCollector } from './services/sensor-collector.js';

async function main() {
  const config = loadCollectorConfig();

  await verifyNeo4jConnectivity(config.neo4j);
  await applySchema();

  const collector = new SensorCollector({
    sensor: new EnvironmentalSensorSimulator({
      clock: systemClock,
      random: createRandomSource(config.seed),
    }),
    repository: new Neo4jEnvironmentalReadingRepository(openSession),
    clock: systemClock,
    intervalMs: config.intervalMs,
  });
  collector.configureSensor();

  const shutdown = () => {
    console.log('[collector] shutting down...');
    collector.stop();
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);

  try {
    await collector.run({ durationSec: config.durationSec });
  } finally {
    await closeNeo4jDriver();
  }
}

main().catch((err) => {
  console.error('[collector] fatal error', err);
  process.exit(1);
});
