import type {
  BatteryStateProvider,
  ClockPort,
  MotorStateProvider,
  TelemetrySnapshot,
  ThermalStateProvider,
} from '@evsim/domain';
import { computeEnergyEfficiency, computeSystemHealth, estimateRange } from './health.js';

export interface TelemetryAggregatorOptions {
  battery: BatteryStateProvider;
  motor: MotorStateProvider;
  thermal: ThermalStateProvider;
  clock: ClockPort;
}

export interface TelemetryTotals {
  /** Wh */
  readonly totalEnergy: number;
  /** km */
  readonly totalDistance: number;
}

/**
 * Fuses battery, motor and thermal provider states into one snapshot and
 * integrates energy and distance over the time between calls.
 *
 * Providers are trusted collaborators; their fields are used as returned.
 */
export class TelemetryAggregator {
  private readonly battery: BatteryStateProvider;
  private readonly motor: MotorStateProvider;
  private readonly thermal: ThermalStateProvider;
  private readonly clock: ClockPort;
  private readonly startMs: number;
  private lastUpdateMs: number;
  private totalEnergy = 0;
  private totalDistance = 0;

  constructor(options: TelemetryAggregatorOptions) {
    this.battery = options.battery;
    this.motor = options.motor;
    this.thermal = options.thermal;
    this.clock = options.clock;
    this.startMs = this.clock.now().getTime();
    this.lastUpdateMs = this.startMs;
  }

  aggregate(): TelemetrySnapshot {
    const timestamp = this.clock.now();
    const nowMs = timestamp.getTime();
    const elapsedHours = (nowMs - this.lastUpdateMs) / 3_600_000;
    this.lastUpdateMs = Math.max(nowMs, this.lastUpdateMs);

    const battery = this.battery.getState();
    const motor = this.motor.getState();
    const thermal = this.thermal.getState();

    if (elapsedHours > 0) {
      // W · h = Wh, km/h · h = km
      this.totalEnergy += motor.power * elapsedHours;
      this.totalDistance += motor.speed * elapsedHours;
    }

    const energyEfficiency = computeEnergyEfficiency(this.totalEnergy, this.totalDistance);

    return {
      timestamp,
      uptime: (nowMs - this.startMs) / 1000,

      batteryLevel: battery.level,
      batteryVoltage: battery.voltage,
      batteryCurrent: battery.current,
      batteryTemperature: battery.temperature,
      batteryCharging: battery.charging,
      batteryCapacity: battery.capacity,

      speed: motor.speed,
      targetSpeed: motor.targetSpeed,
      motorPower: motor.power,
      motorTemperature: motor.temperature,
      motorRpm: motor.rpm,
      motorTorque: motor.torque,
      motorEfficiency: motor.efficiency,

      ambientTemperature: thermal.ambient,
      controllerTemperature: thermal.controller,

      totalEnergy: this.totalEnergy,
      totalDistance: this.totalDistance,
      energyEfficiency,
      estimatedRange: estimateRange(battery, energyEfficiency),
      systemHealth: computeSystemHealth(battery, motor, thermal),
    };
  }

  totals(): TelemetryTotals {
    return { totalEnergy: this.totalEnergy, totalDistance: this.totalDistance };
  }
}
