export interface BatteryState {
  /** % of charge, 0–100 */
  readonly level: number;
  /** V */
  readonly voltage: number;
  /** A; negative while charging */
  readonly current: number;
  /** °C */
  readonly temperature: number;
  readonly charging: boolean;
  /** Wh-equivalent rating of the full pack, used in the range estimate */
  readonly capacity: number;
}

export interface MotorState {
  /** W */
  readonly power: number;
  /** km/h */
  readonly speed: number;
  /** km/h */
  readonly targetSpeed: number;
  /** °C */
  readonly temperature: number;
  readonly rpm: number;
  /** N·m */
  readonly torque: number;
  /** 0–1 */
  readonly efficiency: number;
}

export interface ThermalState {
  /** °C */
  readonly ambient: number;
  /** °C */
  readonly controller: number;
}
