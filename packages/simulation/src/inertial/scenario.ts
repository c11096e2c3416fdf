import { EVENT_INTERVAL_SEC, FALL_PROBABILITY, SCENARIO_DURATION_SEC } from '@evsim/domain';
import type {
  ActiveScenario,
  NormalScenario,
  RandomSourcePort,
  ScenarioState,
  ScheduledEvent,
} from '@evsim/domain';
import { chance, uniform } from '../random.js';

export interface ScenarioStep {
  /** The event to render on this tick, including its final (progress 1) frame. */
  readonly active?: ActiveScenario;
  /** State to carry into the next tick. */
  readonly state: ScenarioState;
}

/** Draws the next event 20–60 s after `nowMs`: 30% falls, 70% potholes. */
export function scheduleNextEvent(nowMs: number, random: RandomSourcePort): ScheduledEvent {
  const delaySec = uniform(random, EVENT_INTERVAL_SEC.min, EVENT_INTERVAL_SEC.max);
  const kind = chance(random, FALL_PROBABILITY) ? 'fall' : 'pothole';
  return { kind, startMs: nowMs + delaySec * 1000 };
}

export function normalScenario(next: ScheduledEvent): NormalScenario {
  return { kind: 'normal', progress: 0, next };
}

/**
 * Scenario transition function.
 *
 * Normal stays Normal until `nowMs` reaches the scheduled start, then becomes
 * the scheduled event. An event reports progress = min(1, elapsed/duration);
 * once it reaches 1 the event is still rendered for this tick and the state
 * returns to Normal with a freshly scheduled event.
 */
export function advanceScenario(
  state: ScenarioState,
  nowMs: number,
  random: RandomSourcePort,
): ScenarioStep {
  let event: ActiveScenario;
  if (state.kind === 'normal') {
    if (nowMs < state.next.startMs) return { state };
    event = {
      kind: state.next.kind,
      startMs: state.next.startMs,
      durationSec: SCENARIO_DURATION_SEC[state.next.kind],
      progress: 0,
    };
  } else {
    event = state;
  }

  const progress = Math.min(1, (nowMs - event.startMs) / (event.durationSec * 1000));
  const active: ActiveScenario = { ...event, progress: Math.max(event.progress, progress) };

  if (active.progress >= 1) {
    return { active, state: normalScenario(scheduleNextEvent(nowMs, random)) };
  }
  return { active, state: active };
}
