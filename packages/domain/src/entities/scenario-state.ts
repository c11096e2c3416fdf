export type ScenarioEventKind = 'fall' | 'pothole';

export type ScenarioKind = 'normal' | ScenarioEventKind;

/** Fixed event lengths in seconds. */
export const SCENARIO_DURATION_SEC: Readonly<Record<ScenarioEventKind, number>> = {
  fall: 2.0,
  pothole: 0.5,
};

/** Probability that a scheduled event is a fall; the rest are potholes. */
export const FALL_PROBABILITY = 0.3;

/** Inter-arrival window for scheduled events, in seconds. */
export const EVENT_INTERVAL_SEC = { min: 20, max: 60 } as const;

export interface ScheduledEvent {
  readonly kind: ScenarioEventKind;
  readonly startMs: number;
}

export interface NormalScenario {
  readonly kind: 'normal';
  readonly progress: 0;
  readonly next: ScheduledEvent;
}

export interface ActiveScenario {
  readonly kind: ScenarioEventKind;
  readonly startMs: number;
  readonly durationSec: number;
  /** Position within the event, 0..1 */
  readonly progress: number;
}

export type ScenarioState = NormalScenario | ActiveScenario;
