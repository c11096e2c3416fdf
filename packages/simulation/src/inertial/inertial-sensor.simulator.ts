import { GRAVITY } from '@evsim/domain';
import type {
  ClockPort,
  MotionSample,
  RandomSourcePort,
  ScenarioState,
  Vector3,
} from '@evsim/domain';
import { clamp, uniform } from '../random.js';
import { applyFall, applyNormalRiding, applyPothole } from './motion-signatures.js';
import { advanceScenario, normalScenario, scheduleNextEvent } from './scenario.js';

const MIN_TEMPERATURE_C = 15.0;
const MAX_TEMPERATURE_C = 45.0;

export interface InertialSensorOptions {
  clock: ClockPort;
  random: RandomSourcePort;
  /** °C, defaults to 25 */
  initialTemperature?: number;
}

/**
 * Accelerometer / gyroscope model with scheduled fall and pothole events.
 *
 * `tick(elapsedSeconds)` is the only mutating step; every getter reads the
 * state left by the latest tick, so reads can happen in any order.
 * `update()` ticks by the time elapsed on the injected clock.
 *
 * Not safe for concurrent use; a single owner drives it.
 */
export class InertialSensorSimulator {
  private readonly clock: ClockPort;
  private readonly random: RandomSourcePort;
  private readonly accel: Vector3 = { x: 0, y: 0, z: GRAVITY };
  private readonly gyro: Vector3 = { x: 0, y: 0, z: 0 };
  private temp: number;
  private simTimeMs: number;
  private lastClockMs: number;
  private state: ScenarioState;

  constructor(options: InertialSensorOptions) {
    this.clock = options.clock;
    this.random = options.random;
    this.temp = options.initialTemperature ?? 25.0;
    this.simTimeMs = this.clock.now().getTime();
    this.lastClockMs = this.simTimeMs;
    this.state = normalScenario(scheduleNextEvent(this.simTimeMs, this.random));
  }

  /** Advances by the wall time elapsed since the previous `update()`. */
  update(): MotionSample {
    const nowMs = this.clock.now().getTime();
    const elapsed = Math.max(0, nowMs - this.lastClockMs) / 1000;
    this.lastClockMs = Math.max(nowMs, this.lastClockMs);
    return this.tick(elapsed);
  }

  tick(elapsedSeconds: number): MotionSample {
    if (!Number.isFinite(elapsedSeconds) || elapsedSeconds < 0) {
      throw new RangeError(`elapsedSeconds must be a finite number >= 0, got ${elapsedSeconds}`);
    }
    this.simTimeMs += elapsedSeconds * 1000;

    this.temp = clamp(
      this.temp + uniform(this.random, -0.05, 0.05) * elapsedSeconds,
      MIN_TEMPERATURE_C,
      MAX_TEMPERATURE_C,
    );

    const step = advanceScenario(this.state, this.simTimeMs, this.random);
    this.state = step.state;

    const active = step.active;
    if (active === undefined) {
      applyNormalRiding(this.accel, this.gyro, this.random);
    } else if (active.kind === 'fall') {
      applyFall(active.progress, this.accel, this.gyro, this.random);
    } else {
      applyPothole(active.progress, this.accel, this.gyro, this.random);
    }

    return this.sample();
  }

  get acceleration(): Vector3 {
    return { ...this.accel };
  }

  get rotationRate(): Vector3 {
    return { ...this.gyro };
  }

  get temperature(): number {
    return this.temp;
  }

  get scenario(): ScenarioState {
    return this.state;
  }

  /** Simulation time in epoch ms. */
  get time(): number {
    return this.simTimeMs;
  }

  sample(): MotionSample {
    return {
      acceleration: this.acceleration,
      rotationRate: this.rotationRate,
      temperature: this.temp,
    };
  }
}
