/** Source of "now" for every time-advancing component. */
export interface ClockPort {
  now(): Date;
}
