import type { BatteryState, BatteryStateProvider, ClockPort } from '@evsim/domain';
import { clamp } from '@evsim/simulation';

const EMPTY_VOLTAGE_V = 30;
const FULL_VOLTAGE_V = 42;
const CHARGE_RATE_PCT_PER_HOUR = 25;
const CHARGE_CURRENT_A = 2;
const THERMAL_TIME_CONSTANT_SEC = 300;
const HEAT_PER_WATT = 0.01;

export interface BatteryModelOptions {
  clock: ClockPort;
  /** Wh */
  capacity: number;
  /** Present draw on the pack, W */
  loadPower: () => number;
  ambientTemperature: () => number;
  initialLevel?: number;
}

/** Open-circuit voltage on a linear 30–42 V curve. */
export function voltageAtLevel(level: number): number {
  return EMPTY_VOLTAGE_V + ((FULL_VOLTAGE_V - EMPTY_VOLTAGE_V) * level) / 100;
}

/**
 * Lithium pack drained by the motor's draw. `capacity` is the full pack's
 * energy in Wh.
 */
export class BatteryModel implements BatteryStateProvider {
  private readonly clock: ClockPort;
  private readonly capacity: number;
  private readonly loadPower: () => number;
  private readonly ambientTemperature: () => number;
  private lastUpdateMs: number;
  private level: number;
  private charging = false;
  private temperature: number;

  constructor(options: BatteryModelOptions) {
    this.clock = options.clock;
    this.capacity = options.capacity;
    this.loadPower = options.loadPower;
    this.ambientTemperature = options.ambientTemperature;
    this.level = clamp(options.initialLevel ?? 100, 0, 100);
    this.temperature = this.ambientTemperature();
    this.lastUpdateMs = this.clock.now().getTime();
  }

  setCharging(charging: boolean): boolean {
    this.charging = charging;
    return this.charging;
  }

  getState(): BatteryState {
    const nowMs = this.clock.now().getTime();
    const elapsed = Math.max(0, nowMs - this.lastUpdateMs) / 1000;
    this.lastUpdateMs = Math.max(nowMs, this.lastUpdateMs);

    const power = this.loadPower();
    let current: number;
    if (this.charging) {
      this.level = Math.min(100, this.level + (CHARGE_RATE_PCT_PER_HOUR * elapsed) / 3600);
      current = -CHARGE_CURRENT_A;
    } else {
      const drawnWh = (power * elapsed) / 3600;
      this.level = Math.max(0, this.level - (drawnWh / this.capacity) * 100);
      current = power / voltageAtLevel(this.level);
    }

    const heatTarget = this.ambientTemperature() + HEAT_PER_WATT * power;
    this.temperature +=
      (heatTarget - this.temperature) * (1 - Math.exp(-elapsed / THERMAL_TIME_CONSTANT_SEC));

    return {
      level: this.level,
      voltage: voltageAtLevel(this.level),
      current,
      temperature: this.temperature,
      charging: this.charging,
      capacity: this.capacity,
    };
  }
}
