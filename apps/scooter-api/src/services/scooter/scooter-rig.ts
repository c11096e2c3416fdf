import type {
  ClockPort,
  EnvironmentalSample,
  MotionReading,
  RandomSourcePort,
  ScooterControlPort,
  TelemetrySnapshot,
} from '@evsim/domain';
import {
  EnvironmentalSensorSimulator,
  InertialSensorSimulator,
  TelemetryAggregator,
} from '@evsim/simulation';
import { BatteryModel } from './battery.model.js';
import { MotorModel } from './motor.model.js';
import { ThermalModel } from './thermal.model.js';

export interface ScooterRigOptions {
  clock: ClockPort;
  random: RandomSourcePort;
  /** °C */
  ambientTemperature: number;
  /** Wh */
  batteryCapacity: number;
  maxSpeedKph?: number;
}

/**
 * One simulated scooter on the test bench: component models feeding the
 * telemetry aggregator, plus the environmental and inertial sensors.
 *
 * Requests are served one at a time on the event loop, so each simulator
 * has a single owner.
 */
export class ScooterRig implements ScooterControlPort {
  private readonly motor: MotorModel;
  private readonly battery: BatteryModel;
  private readonly thermal: ThermalModel;
  private readonly aggregator: TelemetryAggregator;
  private readonly environment: EnvironmentalSensorSimulator;
  private readonly inertial: InertialSensorSimulator;

  constructor(options: ScooterRigOptions) {
    const { clock, random } = options;

    const thermal = new ThermalModel({
      clock,
      random,
      baseAmbient: options.ambientTemperature,
      loadPower: () => motor.currentPower,
    });
    const motor: MotorModel = new MotorModel({
      clock,
      ambientTemperature: () => thermal.ambient,
      maxSpeedKph: options.maxSpeedKph,
    });
    const battery = new BatteryModel({
      clock,
      capacity: options.batteryCapacity,
      loadPower: () => motor.currentPower,
      ambientTemperature: () => thermal.ambient,
    });

    this.thermal = thermal;
    this.motor = motor;
    this.battery = battery;
    this.aggregator = new TelemetryAggregator({ battery, motor, thermal, clock });

    this.environment = new EnvironmentalSensorSimulator({ clock, random });
    this.environment.setGasStatus(true);
    this.environment.setGasHeaterTemperature(320);
    this.environment.setGasHeaterDuration(150);

    this.inertial = new InertialSensorSimulator({ clock, random });
  }

  getStatus(): TelemetrySnapshot {
    return this.aggregator.aggregate();
  }

  setTargetSpeed(speedKph: number): number {
    return this.motor.setTargetSpeed(speedKph);
  }

  setCharging(charging: boolean): boolean {
    return this.battery.setCharging(charging);
  }

  readEnvironment(): EnvironmentalSample {
    return this.environment.sample();
  }

  readMotion(): MotionReading {
    const sample = this.inertial.update();
    return { ...sample, scenario: this.inertial.scenario.kind };
  }
}
