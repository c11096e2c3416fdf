import type { BatteryState, MotorState, ThermalState } from '@evsim/domain';
import { clamp } from '../random.js';

export const HEALTH_THRESHOLDS = {
  batteryLevelPct: 20,
  batteryTemperatureC: 40,
  motorTemperatureC: 60,
  controllerTemperatureC: 70,
} as const;

/**
 * Composite health score, 100 = nominal.
 * Penalties: 1/pt of battery below 20%, 2/°C battery above 40 °C,
 * 1.5/°C motor above 60 °C and 1.5/°C controller above 70 °C.
 */
export function computeSystemHealth(
  battery: Pick<BatteryState, 'level' | 'temperature'>,
  motor: Pick<MotorState, 'temperature'>,
  thermal: Pick<ThermalState, 'controller'>,
): number {
  let health = 100.0;

  if (battery.level < HEALTH_THRESHOLDS.batteryLevelPct) {
    health -= HEALTH_THRESHOLDS.batteryLevelPct - battery.level;
  }
  if (battery.temperature > HEALTH_THRESHOLDS.batteryTemperatureC) {
    health -= (battery.temperature - HEALTH_THRESHOLDS.batteryTemperatureC) * 2.0;
  }
  if (motor.temperature > HEALTH_THRESHOLDS.motorTemperatureC) {
    health -= (motor.temperature - HEALTH_THRESHOLDS.motorTemperatureC) * 1.5;
  }
  if (thermal.controller > HEALTH_THRESHOLDS.controllerTemperatureC) {
    health -= (thermal.controller - HEALTH_THRESHOLDS.controllerTemperatureC) * 1.5;
  }

  return clamp(health, 0, 100);
}

/** Wh/km, 0 until some distance has been covered. */
export function computeEnergyEfficiency(totalEnergyWh: number, totalDistanceKm: number): number {
  return totalDistanceKm > 0 ? totalEnergyWh / totalDistanceKm : 0;
}

/** Remaining energy (Wh) over current consumption (Wh/km); 0 without a consumption figure. */
export function estimateRange(
  battery: Pick<BatteryState, 'level' | 'voltage' | 'capacity'>,
  efficiencyWhPerKm: number,
): number {
  if (efficiencyWhPerKm <= 0) return 0;
  const remainingWh = (battery.level / 100) * battery.voltage * battery.capacity;
  return remainingWh / efficiencyWhPerKm;
}
