export interface EnvironmentalSample {
  /** °C */
  readonly temperature: number;
  /** hPa */
  readonly pressure: number;
  /** %RH, always within [0, 100] */
  readonly humidity: number;
  /** Ω; only present when gas measurement is enabled and the heater is stable */
  readonly gasResistance?: number;
  readonly heatStable: boolean;
  readonly timestamp: Date;
}

/** Bounded random walks layered on the environmental readings. */
export interface TrendState {
  /** °C, within [-2, 2] */
  readonly temperature: number;
  /** hPa, within [-10, 10] */
  readonly pressure: number;
  /** %RH, within [-20, 20] */
  readonly humidity: number;
}
