import type { BatteryState, MotorState, ThermalState } from '../../entities/component-state.js';

export interface StateProviderPort<TState> {
  getState(): TState;
}

export type BatteryStateProvider = StateProviderPort<BatteryState>;
export type MotorStateProvider = StateProviderPort<MotorState>;
export type ThermalStateProvider = StateProviderPort<ThermalState>;
