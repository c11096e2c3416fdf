import type { EnvironmentalSample } from '../../entities/environmental-sample.js';

export interface EnvironmentalReadingRepositoryPort {
  /** Persists one reading and resolves with its generated id. */
  save(sample: EnvironmentalSample): Promise<string>;
}
