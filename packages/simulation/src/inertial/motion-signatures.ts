import { GRAVITY } from '@evsim/domain';
import type { RandomSourcePort, Vector3 } from '@evsim/domain';
import { chance, degToRad, uniform } from '../random.js';

const TURN_PROBABILITY = 0.05;
const MAX_LEAN_DEG = 10;

// Axes not named in a phase keep their previous value.

/** Riding on a flat road: small vibrations and the occasional turn. */
export function applyNormalRiding(accel: Vector3, gyro: Vector3, random: RandomSourcePort): void {
  accel.x = uniform(random, -0.5, 0.5);
  accel.y = uniform(random, -0.5, 0.5);
  accel.z = GRAVITY + uniform(random, -0.3, 0.3);

  gyro.x = uniform(random, -0.2, 0.2);
  gyro.y = uniform(random, -0.2, 0.2);
  gyro.z = uniform(random, -0.1, 0.1);

  if (chance(random, TURN_PROBABILITY)) {
    const direction = chance(random, 0.5) ? 1 : -1;
    gyro.z = direction * uniform(random, 0.5, 1.5);
  }
}

/**
 * Fall: lean [0, 0.1), free fall [0.1, 0.3), impact [0.3, 0.4), rest [0.4, 1].
 */
export function applyFall(
  progress: number,
  accel: Vector3,
  gyro: Vector3,
  random: RandomSourcePort,
): void {
  if (progress < 0.1) {
    const lean = degToRad(progress * MAX_LEAN_DEG);
    accel.x = GRAVITY * Math.sin(lean);
    accel.z = GRAVITY * Math.cos(lean);
    gyro.x = uniform(random, 0.5, 1.0);
  } else if (progress < 0.3) {
    accel.x = uniform(random, -1.0, 1.0);
    accel.y = uniform(random, -1.0, 1.0);
    accel.z = uniform(random, -1.0, 1.0);
    gyro.x = uniform(random, 2.0, 5.0);
    gyro.y = uniform(random, -2.0, 2.0);
  } else if (progress < 0.4) {
    if (chance(random, 0.5)) {
      // side impact
      accel.x = uniform(random, 25.0, 35.0);
      accel.y = uniform(random, -5.0, 5.0);
    } else {
      // front impact
      accel.x = uniform(random, -5.0, 5.0);
      accel.y = uniform(random, 25.0, 35.0);
    }
    accel.z = uniform(random, 5.0, 10.0);
    gyro.x = uniform(random, -10.0, 10.0);
    gyro.y = uniform(random, -10.0, 10.0);
    gyro.z = uniform(random, -10.0, 10.0);
  } else {
    const tilt = degToRad(uniform(random, 60, 90));
    accel.x = GRAVITY * Math.sin(tilt);
    accel.y = uniform(random, -1.0, 1.0);
    accel.z = GRAVITY * Math.cos(tilt);
    gyro.x = uniform(random, -0.1, 0.1);
    gyro.y = uniform(random, -0.1, 0.1);
    gyro.z = uniform(random, -0.1, 0.1);
  }
}

/** Pothole: drop [0, 0.3), rebound [0.3, 0.7), damped settle [0.7, 1]. */
export function applyPothole(
  progress: number,
  accel: Vector3,
  gyro: Vector3,
  random: RandomSourcePort,
): void {
  if (progress < 0.3) {
    accel.z = -GRAVITY - uniform(random, 5.0, 15.0);
    accel.x = uniform(random, -2.0, 2.0);
    accel.y = uniform(random, -2.0, 2.0);
    gyro.x = uniform(random, 2.0, 4.0);
    gyro.y = uniform(random, -0.5, 0.5);
    gyro.z = uniform(random, -0.5, 0.5);
  } else if (progress < 0.7) {
    accel.z = GRAVITY + uniform(random, 5.0, 15.0);
    accel.x = uniform(random, -3.0, 3.0);
    accel.y = uniform(random, -3.0, 3.0);
    gyro.x = uniform(random, -3.0, -1.0);
    gyro.y = uniform(random, -0.5, 0.5);
    gyro.z = uniform(random, -0.5, 0.5);
  } else {
    const damping = (1.0 - progress) * 2;
    accel.z = GRAVITY + uniform(random, -2.0, 2.0) * damping;
    accel.x = uniform(random, -1.0, 1.0) * damping;
    accel.y = uniform(random, -1.0, 1.0) * damping;
    gyro.x = uniform(random, -1.0, 1.0) * damping;
    gyro.y = uniform(random, -0.5, 0.5) * damping;
    gyro.z = uniform(random, -0.5, 0.5) * damping;
  }
}
