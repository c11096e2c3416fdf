import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { FilterSize, Oversample } from '@evsim/domain';
import type { EnvironmentalReadingRepositoryPort, EnvironmentalSample } from '@evsim/domain';
import { DeterministicClock, SeededRng } from '@evsim/adapters';
import { EnvironmentalSensorSimulator } from '@evsim/simulation';
import { SensorCollector } from '../services/sensor-collector.js';

// ─── In-memory repository ─────────────────────────────────────────────────────

class InMemoryReadingRepository implements EnvironmentalReadingRepositoryPort {
  readonly saved: EnvironmentalSample[] = [];
  onSave: () => void = () => undefined;

  async save(sample: EnvironmentalSample): Promise<string> {
    this.saved.push(sample);
    this.onSave();
    return `reading-${this.saved.length}`;
  }
}

class FailingReadingRepository implements EnvironmentalReadingRepositoryPort {
  async save(): Promise<string> {
    throw new Error('ServiceUnavailable');
  }
}

// ─── Test harness ─────────────────────────────────────────────────────────────

const INTERVAL_MS = 10_000;

let clock: DeterministicClock;
let sensor: EnvironmentalSensorSimulator;
let sleep: jest.Mock<(ms: number) => Promise<void>>;
let logSpy: jest.SpiedFunction<typeof console.log>;
let errorSpy: jest.SpiedFunction<typeof console.error>;

function collectorWith(repository: EnvironmentalReadingRepositoryPort): SensorCollector {
  return new SensorCollector({ sensor, repository, clock, intervalMs: INTERVAL_MS, sleep });
}

beforeEach(() => {
  clock = new DeterministicClock(Date.UTC(2024, 2, 10, 9), 0);
  sensor = new EnvironmentalSensorSimulator({ clock, random: new SeededRng(7) });
  sleep = jest.fn(async (ms: number) => {
    clock.advance(ms);
  });
  logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  logSpy.mockRestore();
  errorSpy.mockRestore();
});

// ═══════════════════════════════════════════════════════════════════════════════

describe('configureSensor', () => {
  it('applies oversampling, filter and gas heater settings', () => {
    collectorWith(new InMemoryReadingRepository()).configureSensor();

    expect(sensor.getConfig()).toEqual({
      humidityOversample: Oversample.X2,
      pressureOversample: Oversample.X4,
      temperatureOversample: Oversample.X8,
      filterSize: FilterSize.SIZE_3,
      gasEnabled: true,
      gasHeaterTemperature: 320,
      gasHeaterDuration: 150,
      gasHeaterProfile: 0,
    });
    expect(sensor.isHeatStable()).toBe(true);
  });
});

describe('readSensor', () => {
  it('includes gas resistance once the heater is configured', () => {
    const collector = collectorWith(new InMemoryReadingRepository());
    expect(collector.readSensor().gasResistance).toBeUndefined();

    collector.configureSensor();
    const sample = collector.readSensor();
    expect(sample.heatStable).toBe(true);
    expect(sample.gasResistance).toBeGreaterThanOrEqual(0);
  });
});

describe('store', () => {
  it('returns the repository id', async () => {
    const collector = collectorWith(new InMemoryReadingRepository());
    await expect(collector.store(collector.readSensor())).resolves.toBe('reading-1');
  });

  it('returns null and logs when the write fails', async () => {
    const collector = collectorWith(new FailingReadingRepository());
    await expect(collector.store(collector.readSensor())).resolves.toBeNull();
    expect(errorSpy).toHaveBeenCalledWith('[collector] failed to store reading', 'ServiceUnavailable');
  });
});

describe('run', () => {
  it('stops once the duration has elapsed', async () => {
    const repository = new InMemoryReadingRepository();
    const collector = collectorWith(repository);

    await expect(collector.run({ durationSec: 30 })).resolves.toBe(3);
    expect(repository.saved).toHaveLength(3);
    expect(repository.saved.map((s) => s.timestamp.toISOString())).toEqual([
      '2024-03-10T09:00:00.000Z',
      '2024-03-10T09:00:10.000Z',
      '2024-03-10T09:00:20.000Z',
    ]);
    expect(sleep).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledWith(INTERVAL_MS);
    expect(collector.isRunning).toBe(false);
  });

  it('ends after the current iteration when stopped', async () => {
    const repository = new InMemoryReadingRepository();
    const collector = collectorWith(repository);
    repository.onSave = () => {
      if (repository.saved.length === 2) collector.stop();
    };

    await expect(collector.run()).resolves.toBe(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('keeps collecting through failed writes', async () => {
    const collector = collectorWith(new FailingReadingRepository());

    await expect(collector.run({ durationSec: 20 })).resolves.toBe(0);
    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('logs progress every ten stored readings', async () => {
    const collector = collectorWith(new InMemoryReadingRepository());

    await expect(collector.run({ durationSec: 200 })).resolves.toBe(20);
    expect(logSpy).toHaveBeenCalledWith('[collector] stored 10 readings');
    expect(logSpy).toHaveBeenCalledWith('[collector] stored 20 readings');
    expect(logSpy).toHaveBeenCalledWith('[collector] stopped after 20 readings');
  });
});
