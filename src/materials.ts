import * as THREE from 'three';

export interface Lambertian {
  readonly kind: 'lambertian';
  readonly albedo: THREE.Vector3;
}

export interface Metal {
  readonly kind: 'metal';
  readonly albedo: THREE.Vector3;
  // Not clamped: anything above 1 just widens the reflection cone further
  readonly fuzz: number;
}

export interface Dielectric {
  readonly kind: 'dielectric';
  // Index of refraction
  readonly ir: number;
}

export type Material = Lambertian | Metal | Dielectric;

export function lambertian(albedo: THREE.Vector3): Lambertian {
  return { kind: 'lambertian', albedo };
}

export function metal(albedo: THREE.Vector3, fuzz: number): Metal {
  return { kind: 'metal', albedo, fuzz };
}

export function dielectric(ir: number): Dielectric {
  return { kind: 'dielectric', ir };
}
