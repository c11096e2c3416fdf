export const Oversample = {
  NONE: 0,
  X1: 1,
  X2: 2,
  X4: 3,
  X8: 4,
  X16: 5,
} as const;

export type OversampleLevel = (typeof Oversample)[keyof typeof Oversample];

export const FilterSize = {
  SIZE_0: 0,
  SIZE_1: 1,
  SIZE_3: 2,
  SIZE_7: 3,
  SIZE_15: 4,
  SIZE_31: 5,
  SIZE_63: 6,
  SIZE_127: 7,
} as const;

export type FilterSizeLevel = (typeof FilterSize)[keyof typeof FilterSize];

export interface EnvironmentalSensorConfig {
  readonly humidityOversample: OversampleLevel;
  readonly pressureOversample: OversampleLevel;
  readonly temperatureOversample: OversampleLevel;
  readonly filterSize: FilterSizeLevel;
  readonly gasEnabled: boolean;
  /** °C */
  readonly gasHeaterTemperature: number;
  /** ms */
  readonly gasHeaterDuration: number;
  readonly gasHeaterProfile: number;
}

/** The heater reaches a stable reading above both thresholds. */
export const HEATER_STABLE_MIN_TEMPERATURE = 200;
export const HEATER_STABLE_MIN_DURATION = 100;
