import { FilterSize, Oversample } from '@evsim/domain';
import type {
  ClockPort,
  EnvironmentalReadingRepositoryPort,
  EnvironmentalSample,
} from '@evsim/domain';
import type { EnvironmentalSensorSimulator } from '@evsim/simulation';

const PROGRESS_EVERY = 10;

export interface SensorCollectorOptions {
  sensor: EnvironmentalSensorSimulator;
  repository: EnvironmentalReadingRepositoryPort;
  clock: ClockPort;
  intervalMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface RunOptions {
  /** Stop once this many seconds have passed on the clock. */
  durationSec?: number;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Reads the environmental sensor on a fixed interval and stores every
 * reading. A failed write is logged and skipped.
 */
export class SensorCollector {
  private readonly sensor: EnvironmentalSensorSimulator;
  private readonly repository: EnvironmentalReadingRepositoryPort;
  private readonly clock: ClockPort;
  private readonly intervalMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private running = false;

  constructor(options: SensorCollectorOptions) {
    this.sensor = options.sensor;
    this.repository = options.repository;
    this.clock = options.clock;
    this.intervalMs = options.intervalMs;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get isRunning(): boolean {
    return this.running;
  }

  configureSensor(): void {
    this.sensor.setHumidityOversample(Oversample.X2);
    this.sensor.setPressureOversample(Oversample.X4);
    this.sensor.setTemperatureOversample(Oversample.X8);
    this.sensor.setFilter(FilterSize.SIZE_3);

    this.sensor.setGasStatus(true);
    this.sensor.setGasHeaterTemperature(320);
    this.sensor.setGasHeaterDuration(150);
    this.sensor.selectGasHeaterProfile(0);

    console.log('[collector] sensor configured');
  }

  readSensor(): EnvironmentalSample {
    return this.sensor.sample();
  }

  /** Resolves with the stored id, or null when the write failed. */
  async store(sample: EnvironmentalSample): Promise<string | null> {
    try {
      return await this.repository.save(sample);
    } catch (err) {
      console.error('[collector] failed to store reading', err instanceof Error ? err.message : err);
      return null;
    }
  }

  /** Resolves with the number of readings stored. */
  async run(options: RunOptions = {}): Promise<number> {
    const { durationSec } = options;
    const startMs = this.clock.now().getTime();
    let stored = 0;

    this.running = true;
    console.log(
      `[collector] collecting every ${this.intervalMs} ms` +
        (durationSec !== undefined ? ` for ${durationSec} s` : ''),
    );

    while (this.running) {
      if (durationSec !== undefined && (this.clock.now().getTime() - startMs) / 1000 >= durationSec) {
        break;
      }

      const id = await this.store(this.readSensor());
      if (id !== null) {
        stored++;
        if (stored % PROGRESS_EVERY === 0) console.log(`[collector] stored ${stored} readings`);
      }

      if (!this.running) break;
      await this.sleep(this.intervalMs);
    }

    this.running = false;
    console.log(`[collector] stopped after ${stored} readings`);
    return stored;
  }

  /** Ends the loop after the current iteration. */
  stop(): void {
    this.running = false;
  }
}
