import type { ClockPort, RandomSourcePort, ThermalState, ThermalStateProvider } from '@evsim/domain';
import { centred, clamp } from '@evsim/simulation';

const MAX_AMBIENT_DRIFT_C = 3;
const CONTROLLER_TIME_CONSTANT_SEC = 60;
const CONTROLLER_HEAT_PER_WATT = 0.05;

export interface ThermalModelOptions {
  clock: ClockPort;
  random: RandomSourcePort;
  /** °C */
  baseAmbient: number;
  /** Motor draw heating the controller, W */
  loadPower: () => number;
}

/** Ambient air plus the motor controller heat-sinking into it. */
export class ThermalModel implements ThermalStateProvider {
  private readonly clock: ClockPort;
  private readonly random: RandomSourcePort;
  private readonly baseAmbient: number;
  private readonly loadPower: () => number;
  private lastUpdateMs: number;
  private drift = 0;
  private controller: number;

  constructor(options: ThermalModelOptions) {
    this.clock = options.clock;
    this.random = options.random;
    this.baseAmbient = options.baseAmbient;
    this.loadPower = options.loadPower;
    this.controller = options.baseAmbient;
    this.lastUpdateMs = this.clock.now().getTime();
  }

  /** Ambient at the last update, without advancing time. */
  get ambient(): number {
    return this.baseAmbient + this.drift;
  }

  getState(): ThermalState {
    const nowMs = this.clock.now().getTime();
    const elapsed = Math.max(0, nowMs - this.lastUpdateMs) / 1000;
    this.lastUpdateMs = Math.max(nowMs, this.lastUpdateMs);

    this.drift = clamp(
      this.drift + centred(this.random, 0.02) * elapsed,
      -MAX_AMBIENT_DRIFT_C,
      MAX_AMBIENT_DRIFT_C,
    );
    const target = this.ambient + CONTROLLER_HEAT_PER_WATT * this.loadPower();
    this.controller +=
      (target - this.controller) * (1 - Math.exp(-elapsed / CONTROLLER_TIME_CONSTANT_SEC));

    return { ambient: this.ambient, controller: this.controller };
  }
}
