import { describe, it, expect } from '@jest/globals';
import { ZodError } from 'zod';
import { loadCollectorConfig } from '../config/collector-config.js';

describe('loadCollectorConfig', () => {
  it('falls back to defaults', () => {
    const config = loadCollectorConfig({});
    expect(config.neo4j).toEqual({ uri: 'bolt://localhost:7687', user: 'neo4j', password: 'password' });
    expect(config.intervalMs).toBe(10_000);
    expect(config.durationSec).toBeUndefined();
    expect(config.seed).toBeUndefined();
  });

  it('reads connection and timing variables', () => {
    const config = loadCollectorConfig({
      NEO4J_URI: 'bolt://graph:7687',
      NEO4J_USER: 'collector',
      NEO4J_PASSWORD: 'test-secret',
      COLLECT_INTERVAL_MS: '500',
      COLLECT_DURATION_SEC: '60',
      SIM_SEED: '3',
    });
    expect(config).toEqual({
      neo4j: { uri: 'bolt://graph:7687', user: 'collector', password: 'test-secret' },
      intervalMs: 500,
      durationSec: 60,
      seed: 3,
    });
  });

  it('rejects a zero interval', () => {
    expect(() => loadCollectorConfig({ COLLECT_INTERVAL_MS: '0' })).toThrow(ZodError);
  });
});
