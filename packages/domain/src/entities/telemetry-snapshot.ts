export interface TelemetrySnapshot {
  readonly timestamp: Date;
  /** Seconds since the aggregator was created */
  readonly uptime: number;

  // Battery
  readonly batteryLevel: number;
  readonly batteryVoltage: number;
  readonly batteryCurrent: number;
  readonly batteryTemperature: number;
  readonly batteryCharging: boolean;
  readonly batteryCapacity: number;

  // Motor
  readonly speed: number;
  readonly targetSpeed: number;
  readonly motorPower: number;
  readonly motorTemperature: number;
  readonly motorRpm: number;
  readonly motorTorque: number;
  readonly motorEfficiency: number;

  // Temperatures
  readonly ambientTemperature: number;
  readonly controllerTemperature: number;

  // Derived
  /** Wh, never decreases while power is non-negative */
  readonly totalEnergy: number;
  /** km, never decreases while speed is non-negative */
  readonly totalDistance: number;
  /** Wh/km */
  readonly energyEfficiency: number;
  /** km */
  readonly estimatedRange: number;
  /** 0 (critical) – 100 (nominal) */
  readonly systemHealth: number;
}
