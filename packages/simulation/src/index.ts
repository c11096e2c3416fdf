// ─── Environmental ────────────────────────────────────────────────────────────
export {
  EnvironmentalSensorSimulator,
  DEFAULT_ENVIRONMENTAL_CONFIG,
  isRushHour,
  dailyPhase,
  gasResistanceFor,
} from './environmental/environmental-sensor.simulator.js';
export type { EnvironmentalSensorOptions } from './environmental/environmental-sensor.simulator.js';

// ─── Inertial ─────────────────────────────────────────────────────────────────
export { InertialSensorSimulator } from './inertial/inertial-sensor.simulator.js';
export type { InertialSensorOptions } from './inertial/inertial-sensor.simulator.js';
export { advanceScenario, scheduleNextEvent, normalScenario } from './inertial/scenario.js';
export type { ScenarioStep } from './inertial/scenario.js';
export { applyFall, applyPothole, applyNormalRiding } from './inertial/motion-signatures.js';

// ─── Telemetry ────────────────────────────────────────────────────────────────
export { TelemetryAggregator } from './telemetry/telemetry-aggregator.js';
export type { TelemetryAggregatorOptions, TelemetryTotals } from './telemetry/telemetry-aggregator.js';
export {
  computeSystemHealth,
  computeEnergyEfficiency,
  estimateRange,
  HEALTH_THRESHOLDS,
} from './telemetry/health.js';

// ─── Numeric helpers ──────────────────────────────────────────────────────────
export { uniform, centred, chance, clamp, round2, degToRad } from './random.js';
