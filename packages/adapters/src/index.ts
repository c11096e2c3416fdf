// ─── Neo4j Adapters ───────────────────────────────────────────────────────────
export {
  getNeo4jDriver,
  verifyNeo4jConnectivity,
  openSession,
  parseCypherStatements,
  applySchema,
  closeNeo4jDriver,
} from './neo4j/neo4j.client.js';
export type { Neo4jConfig } from './neo4j/neo4j.client.js';
export { Neo4jEnvironmentalReadingRepository } from './neo4j/environmental-reading.repository.js';
export type {
  CypherRunner,
  GraphSession,
  GraphSessionFactory,
} from './neo4j/environmental-reading.repository.js';

// ─── Clock / RNG ──────────────────────────────────────────────────────────────
export {
  DeterministicClock,
  SeededRng,
  systemClock,
  mathRandomSource,
  createRandomSource,
} from './clock/deterministic-clock.js';
