import type { EnvironmentalSample } from '../../entities/environmental-sample.js';
import type { MotionSample } from '../../entities/motion-sample.js';
import type { ScenarioKind } from '../../entities/scenario-state.js';
import type { TelemetrySnapshot } from '../../entities/telemetry-snapshot.js';

export interface MotionReading extends MotionSample {
  readonly scenario: ScenarioKind;
}

export interface ScooterControlPort {
  getStatus(): TelemetrySnapshot;
  setTargetSpeed(speedKph: number): number;
  setCharging(charging: boolean): boolean;
  readEnvironment(): EnvironmentalSample;
  readMotion(): MotionReading;
}
