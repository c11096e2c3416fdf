import neo4j, { Driver, Session, auth } from 'neo4j-driver';
import { readFileSync } from 'fs';
import { resolve } from 'path';

// ─────────────────────────────────────────────────────────────────────────────
// Neo4j client: singleton driver with connection pooling
// ─────────────────────────────────────────────────────────────────────────────

export interface Neo4jConfig {
  uri: string;
  user: string;
  password: string;
  database?: string;
}

let _driver: Driver | null = null;
let _database = 'neo4j';

function configFromEnv(): Neo4jConfig {
  return {
    uri: process.env['NEO4J_URI'] ?? 'bolt://localhost:7687',
    user: process.env['NEO4J_USER'] ?? 'neo4j',
    password: process.env['NEO4J_PASSWORD'] ?? 'password',
  };
}

/**
 * Initialize and return the Neo4j driver (singleton).
 * The config is only read on the first call; later calls return the cached driver.
 */
export function getNeo4jDriver(config: Neo4jConfig = configFromEnv()): Driver {
  if (_driver) return _driver;

  _database = config.database ?? 'neo4j';
  _driver = neo4j.driver(config.uri, auth.basic(config.user, config.password), {
    maxConnectionPoolSize: 10,
    connectionAcquisitionTimeout: 5000,
    logging: {
      level: process.env['NODE_ENV'] === 'development' ? 'warn' : 'error',
      logger: (level, message) => {
        if (level === 'error') console.error(`[neo4j] ${message}`);
        else if (level === 'warn') console.warn(`[neo4j] ${message}`);
      },
    },
  });

  return _driver;
}

/**
 * Verify connectivity.
 * Throws if Neo4j is unreachable.
 */
export async function verifyNeo4jConnectivity(config?: Neo4jConfig): Promise<void> {
  const driver = getNeo4jDriver(config);
  await driver.verifyConnectivity();
  console.log('[neo4j] connected');
}

/** Open a new Neo4j session. Caller is responsible for closing it. */
export function openSession(): Session {
  return getNeo4jDriver().session({ database: _database });
}

/** Split a cypher script on semicolons, dropping `//` comments and blanks. */
export function parseCypherStatements(script: string): string[] {
  return script
    .split(';')
    .map((s) => s.replace(/\/\/.*$/gm, '').trim())
    .filter((s) => s.length > 0);
}

/**
 * Load and execute db/neo4j/schema.cypher.
 * Safe to run multiple times (all statements use IF NOT EXISTS).
 */
export async function applySchema(): Promise<void> {
  const schemaPath = resolve(__dirname, '../../../../db/neo4j/schema.cypher');

  let schemaContent: string;
  try {
    schemaContent = readFileSync(schemaPath, 'utf-8');
  } catch {
    // dist layout sits one level deeper; fall back to the working directory
    schemaContent = readFileSync(resolve(process.cwd(), 'db/neo4j/schema.cypher'), 'utf-8');
  }

  const statements = parseCypherStatements(schemaContent);
  const session = openSession();
  try {
    for (const stmt of statements) {
      await session.run(stmt);
    }
    console.log(`[neo4j] schema applied (${statements.length} statements)`);
  } finally {
    await session.close();
  }
}

/** Gracefully close the driver on shutdown. */
export async function closeNeo4jDriver(): Promise<void> {
  if (_driver) {
    await _driver.close();
    _driver = null;
    console.log('[neo4j] driver closed');
  }
}
