import type { ClockPort, MotorState, MotorStateProvider } from '@evsim/domain';
import { clamp } from '@evsim/simulation';

/** 10" wheel */
const WHEEL_CIRCUMFERENCE_M = 0.798;
const SPEED_TIME_CONSTANT_SEC = 2;
const THERMAL_TIME_CONSTANT_SEC = 120;
/** °C above ambient per W of steady-state load */
const HEAT_PER_WATT = 0.04;
const STOP_THRESHOLD_KPH = 0.05;

export const DEFAULT_MAX_SPEED_KPH = 45;

/** Expected electrical draw (W) while moving at `speedKph`. */
export function expectedPower(speedKph: number): number {
  return 100 + 5 * speedKph + 0.5 * speedKph ** 2;
}

export interface MotorModelOptions {
  clock: ClockPort;
  /** Ambient temperature the motor cools towards */
  ambientTemperature: () => number;
  maxSpeedKph?: number;
}

/** Hub motor chasing a target speed with first-order lag. */
export class MotorModel implements MotorStateProvider {
  private readonly clock: ClockPort;
  private readonly ambientTemperature: () => number;
  private readonly maxSpeedKph: number;
  private readonly ratedPower: number;
  private lastUpdateMs: number;
  private speed = 0;
  private targetSpeed = 0;
  private temperature: number;

  constructor(options: MotorModelOptions) {
    this.clock = options.clock;
    this.ambientTemperature = options.ambientTemperature;
    this.maxSpeedKph = options.maxSpeedKph ?? DEFAULT_MAX_SPEED_KPH;
    this.ratedPower = expectedPower(this.maxSpeedKph);
    this.temperature = this.ambientTemperature();
    this.lastUpdateMs = this.clock.now().getTime();
  }

  /** Clamps to [0, maxSpeed] and returns the applied target. */
  setTargetSpeed(speedKph: number): number {
    this.targetSpeed = clamp(speedKph, 0, this.maxSpeedKph);
    return this.targetSpeed;
  }

  /** Draw at the last update, without advancing time. */
  get currentPower(): number {
    return this.speed > 0 ? expectedPower(this.speed) : 0;
  }

  getState(): MotorState {
    const nowMs = this.clock.now().getTime();
    const elapsed = Math.max(0, nowMs - this.lastUpdateMs) / 1000;
    this.lastUpdateMs = Math.max(nowMs, this.lastUpdateMs);

    this.speed += (this.targetSpeed - this.speed) * (1 - Math.exp(-elapsed / SPEED_TIME_CONSTANT_SEC));
    if (this.targetSpeed === 0 && this.speed < STOP_THRESHOLD_KPH) this.speed = 0;

    const power = this.currentPower;
    const heatTarget = this.ambientTemperature() + HEAT_PER_WATT * power;
    this.temperature +=
      (heatTarget - this.temperature) * (1 - Math.exp(-elapsed / THERMAL_TIME_CONSTANT_SEC));

    const rpm = (this.speed * 1000) / 60 / WHEEL_CIRCUMFERENCE_M;
    const angularVelocity = (rpm * 2 * Math.PI) / 60;

    return {
      power,
      speed: this.speed,
      targetSpeed: this.targetSpeed,
      temperature: this.temperature,
      rpm,
      torque: angularVelocity > 0 ? power / angularVelocity : 0,
      efficiency: 0.9 - 0.1 * Math.min(1, power / this.ratedPower),
    };
  }
}
