import * as THREE from 'three';
import type { RandomSource } from './random';

/**
 * Sampling and optics helpers on top of THREE.Vector3.
 *
 * None of these mutate their arguments. Vector3's own `normalize()` falls back
 * to dividing by 1 for a zero vector, so `unitVector` divides by the length
 * directly and lets NaN through instead.
 */

export function unitVector(v: THREE.Vector3): THREE.Vector3 {
  return v.clone().divideScalar(v.length());
}

export function random(rng: RandomSource): THREE.Vector3 {
  return new THREE.Vector3(rng(), rng(), rng());
}

export function randomRange(min: number, max: number, rng: RandomSource): THREE.Vector3 {
  return new THREE.Vector3(
    min + (max - min) * rng(),
    min + (max - min) * rng(),
    min + (max - min) * rng()
  );
}

export function randomInUnitSphere(rng: RandomSource): THREE.Vector3 {
  for (;;) {
    const p = randomRange(-1, 1, rng);
    if (p.lengthSq() < 1) return p;
  }
}

export function randomUnitVector(rng: RandomSource): THREE.Vector3 {
  return unitVector(randomInUnitSphere(rng));
}

export function randomInUnitDisk(rng: RandomSource): THREE.Vector3 {
  for (;;) {
    const p = new THREE.Vector3(rng() * 2 - 1, rng() * 2 - 1, 0);
    if (p.lengthSq() < 1) return p;
  }
}

export function reflect(v: THREE.Vector3, n: THREE.Vector3): THREE.Vector3 {
  return v.clone().addScaledVector(n, -2 * v.dot(n));
}

/** Snell's law refraction of the unit vector `uv` through a surface with normal `n`. */
export function refract(uv: THREE.Vector3, n: THREE.Vector3, etaiOverEtat: number): THREE.Vector3 {
  const cosTheta = Math.min(-uv.dot(n), 1);
  const rOutPerp = uv.clone().addScaledVector(n, cosTheta).multiplyScalar(etaiOverEtat);
  const rOutParallel = n.clone().multiplyScalar(-Math.sqrt(Math.abs(1 - rOutPerp.lengthSq())));
  return rOutPerp.add(rOutParallel);
}
