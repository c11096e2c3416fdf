import type { RandomSourcePort } from '@evsim/domain';

/** Uniform float in [min, max). */
export function uniform(random: RandomSourcePort, min: number, max: number): number {
  return min + random.next() * (max - min);
}

/** Zero-centred noise: (r - 0.5) · span, i.e. within ±span/2. */
export function centred(random: RandomSourcePort, span: number): number {
  return (random.next() - 0.5) * span;
}

/** True with probability `p`. */
export function chance(random: RandomSourcePort, p: number): boolean {
  return random.next() < p;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function degToRad(deg: number): number {
  return (deg * Math.PI) / 180;
}
