import {
  FilterSize,
  HEATER_STABLE_MIN_DURATION,
  HEATER_STABLE_MIN_TEMPERATURE,
  Oversample,
} from '@evsim/domain';
import type {
  ClockPort,
  EnvironmentalSample,
  EnvironmentalSensorConfig,
  FilterSizeLevel,
  OversampleLevel,
  RandomSourcePort,
  TrendState,
} from '@evsim/domain';
import { centred, clamp, round2 } from '../random.js';

const BASE_TEMPERATURE_C = 25.0;
const BASE_PRESSURE_HPA = 1013.25;
const BASE_HUMIDITY_PCT = 50.0;
const BASE_GAS_RESISTANCE_OHM = 50_000;
const MIN_GAS_RESISTANCE_OHM = 5_000;
const RUSH_HOUR_FACTOR = 0.7;
const RUSH_HOURS = [8, 18];

const MS_PER_DAY = 86_400_000;
const MS_PER_HOUR = 3_600_000;

export const DEFAULT_ENVIRONMENTAL_CONFIG: EnvironmentalSensorConfig = {
  humidityOversample: Oversample.X1,
  pressureOversample: Oversample.X1,
  temperatureOversample: Oversample.X1,
  filterSize: FilterSize.SIZE_0,
  gasEnabled: false,
  gasHeaterTemperature: 0,
  gasHeaterDuration: 0,
  gasHeaterProfile: 0,
};

export interface EnvironmentalSensorOptions {
  clock: ClockPort;
  random: RandomSourcePort;
  /** Hours since midnight; defaults to the clock's UTC time of day. */
  timeOfDayHours?: number;
  config?: Partial<EnvironmentalSensorConfig>;
}

/** Within two hours of the morning or evening peak. */
export function isRushHour(timeOfDayHours: number): boolean {
  return RUSH_HOURS.some((peak) => Math.abs(timeOfDayHours - peak) < 2.0);
}

/** Daily sine phase: +1 at 14:00, −1 at 02:00. */
export function dailyPhase(timeOfDayHours: number): number {
  return Math.sin(((timeOfDayHours - 8) / 24) * 2 * Math.PI);
}

/**
 * Ω, floored at 5 kΩ. Wetter air and rush-hour traffic both lower it; noise
 * spans [-3000, 7000), skewed towards cleaner air.
 */
export function gasResistanceFor(
  humidity: number,
  rushHour: boolean,
  random: RandomSourcePort,
): number {
  const rushHourFactor = rushHour ? RUSH_HOUR_FACTOR : 1.0;
  const base = BASE_GAS_RESISTANCE_OHM * (1 - humidity / 150) * rushHourFactor;
  return Math.max(MIN_GAS_RESISTANCE_OHM, base + (random.next() - 0.3) * 10_000);
}

/**
 * Environmental sensor (temperature / pressure / humidity / gas) producing
 * daily cycles with bounded drift. Each `sample()` advances the model by the
 * time elapsed on the injected clock since the previous call.
 *
 * Not safe for concurrent use; a single owner drives it.
 */
export class EnvironmentalSensorSimulator {
  private readonly clock: ClockPort;
  private readonly random: RandomSourcePort;
  private config: EnvironmentalSensorConfig;
  private lastUpdateMs: number;
  private timeOfDay: number;
  private trend: TrendState = { temperature: 0, pressure: 0, humidity: 0 };

  constructor(options: EnvironmentalSensorOptions) {
    this.clock = options.clock;
    this.random = options.random;
    this.config = { ...DEFAULT_ENVIRONMENTAL_CONFIG, ...options.config };
    this.lastUpdateMs = this.clock.now().getTime();
    this.timeOfDay =
      options.timeOfDayHours !== undefined
        ? ((options.timeOfDayHours % 24) + 24) % 24
        : (this.lastUpdateMs % MS_PER_DAY) / MS_PER_HOUR;
  }

  // ── Configuration ─────────────────────────────────────────────────────────

  setHumidityOversample(value: OversampleLevel): void {
    this.config = { ...this.config, humidityOversample: value };
  }

  setPressureOversample(value: OversampleLevel): void {
    this.config = { ...this.config, pressureOversample: value };
  }

  setTemperatureOversample(value: OversampleLevel): void {
    this.config = { ...this.config, temperatureOversample: value };
  }

  setFilter(value: FilterSizeLevel): void {
    this.config = { ...this.config, filterSize: value };
  }

  setGasStatus(enabled: boolean): void {
    this.config = { ...this.config, gasEnabled: enabled };
  }

  setGasHeaterTemperature(celsius: number): void {
    this.config = { ...this.config, gasHeaterTemperature: celsius };
  }

  setGasHeaterDuration(ms: number): void {
    this.config = { ...this.config, gasHeaterDuration: ms };
  }

  selectGasHeaterProfile(index: number): void {
    this.config = { ...this.config, gasHeaterProfile: index };
  }

  getConfig(): EnvironmentalSensorConfig {
    return this.config;
  }

  get timeOfDayHours(): number {
    return this.timeOfDay;
  }

  get trends(): TrendState {
    return this.trend;
  }

  isHeatStable(): boolean {
    return (
      this.config.gasHeaterTemperature > HEATER_STABLE_MIN_TEMPERATURE &&
      this.config.gasHeaterDuration > HEATER_STABLE_MIN_DURATION
    );
  }

  // ── Sampling ──────────────────────────────────────────────────────────────

  sample(): EnvironmentalSample {
    const timestamp = this.clock.now();
    const nowMs = timestamp.getTime();
    const elapsed = Math.max(0, nowMs - this.lastUpdateMs) / 1000;
    this.lastUpdateMs = Math.max(nowMs, this.lastUpdateMs);

    this.timeOfDay = (this.timeOfDay + elapsed / 3600) % 24;
    const phase = dailyPhase(this.timeOfDay);

    const prevTempTrend = this.trend.temperature;
    const temperatureTrend = clamp(prevTempTrend + centred(this.random, 0.1) * elapsed, -2, 2);
    const temperature = round2(
      BASE_TEMPERATURE_C + temperatureTrend + 5.0 * phase + centred(this.random, 0.3),
    );

    // Pressure moves against temperature drift
    const pressureTrend = clamp(
      this.trend.pressure -
        0.5 * (temperatureTrend - prevTempTrend) +
        centred(this.random, 0.5) * elapsed,
      -10,
      10,
    );
    const pressure = round2(BASE_PRESSURE_HPA + pressureTrend + centred(this.random, 0.5));

    const humidityTrend = clamp(this.trend.humidity + centred(this.random, 0.5) * elapsed, -20, 20);
    const humidity = round2(
      clamp(BASE_HUMIDITY_PCT + humidityTrend - 10.0 * phase + centred(this.random, 2.0), 0, 100),
    );

    this.trend = { temperature: temperatureTrend, pressure: pressureTrend, humidity: humidityTrend };

    if (!this.config.gasEnabled) {
      return { temperature, pressure, humidity, heatStable: false, timestamp };
    }

    const gasResistance = gasResistanceFor(humidity, isRushHour(this.timeOfDay), this.random);
    const heatStable = this.isHeatStable();

    return heatStable
      ? { temperature, pressure, humidity, gasResistance, heatStable, timestamp }
      : { temperature, pressure, humidity, heatStable, timestamp };
  }
}
