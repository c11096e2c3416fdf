export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

export interface MotionSample {
  /** m/s² */
  readonly acceleration: Vector3;
  /** rad/s */
  readonly rotationRate: Vector3;
  /** °C, kept within [15, 45] */
  readonly temperature: number;
}

/** Standard gravity used by the inertial model (m/s²). */
export const GRAVITY = 9.8;
