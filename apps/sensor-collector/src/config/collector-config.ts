import { z } from 'zod';
import type { Neo4jConfig } from '@evsim/adapters';

/**
 * Collector configuration, read from the environment.
 *
 *   NEO4J_URI             Bolt endpoint (default: bolt://localhost:7687)
 *   NEO4J_USER            (default: neo4j)
 *   NEO4J_PASSWORD        (default: password)
 *   COLLECT_INTERVAL_MS   Pause between readings (default: 10000)
 *   COLLECT_DURATION_SEC  Stop after this long (default: run until signalled)
 *   SIM_SEED              Seed for replayable runs (default: unseeded)
 */
const collectorEnvSchema = z.object({
  NEO4J_URI: z.string().default('bolt://localhost:7687'),
  NEO4J_USER: z.string().default('neo4j'),
  NEO4J_PASSWORD: z.string().default('password'),
  COLLECT_INTERVAL_MS: z.coerce.number().int().positive().default(10_000),
  COLLECT_DURATION_SEC: z.coerce.number().positive().optional(),
  SIM_SEED: z.coerce.number().int().optional(),
});

export interface CollectorConfig {
  neo4j: Neo4jConfig;
  intervalMs: number;
  durationSec?: number;
  seed?: number;
}

export function loadCollectorConfig(env: NodeJS.ProcessEnv = process.env): CollectorConfig {
  const parsed = collectorEnvSchema.parse(env);
  return {
    neo4j: {
      uri: parsed.NEO4J_URI,
      user: parsed.NEO4J_USER,
      password: parsed.NEO4J_PASSWORD,
    },
    intervalMs: parsed.COLLECT_INTERVAL_MS,
    durationSec: parsed.COLLECT_DURATION_SEC,
    seed: parsed.SIM_SEED,
  };
}
