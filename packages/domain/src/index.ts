// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/environmental-sample.js';
export * from './entities/motion-sample.js';
export * from './entities/scenario-state.js';
export * from './entities/component-state.js';
export * from './entities/telemetry-snapshot.js';
export * from './entities/sensor-config.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/scooter-control.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/clock.port.js';
export * from './ports/outbound/random-source.port.js';
export * from './ports/outbound/state-provider.port.js';
export * from './ports/outbound/environmental-reading-repository.port.js';
