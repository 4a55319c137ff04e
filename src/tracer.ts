import * as THREE from 'three';
import { hit, type Intersection, type Scene } from './hittable';
import type { Dielectric, Lambertian, Metal } from './materials';
import type { RandomSource } from './random';
import { randomInUnitSphere, randomUnitVector, reflect, refract, unitVector } from './vec3';

// Skips self-intersection at the origin of a scattered ray
export const T_MIN = 0.001;

const WHITE = new THREE.Vector3(1, 1, 1);
const SKY_BLUE = new THREE.Vector3(0.5, 0.7, 1.0);

/** Schlick's approximation of Fresnel reflectance. */
export function schlick(cosine: number, ir: number): number {
  let r0 = (1 - ir) / (1 + ir);
  r0 = r0 * r0;
  return r0 + (1 - r0) * Math.pow(1 - cosine, 5);
}

/** White at the horizon blending to blue at the zenith. */
export function skyColor(ray: THREE.Ray): THREE.Vector3 {
  const t = 0.5 * (unitVector(ray.direction).y + 1);
  return WHITE.clone().multiplyScalar(1 - t).addScaledVector(SKY_BLUE, t);
}

/**
 * Radiance carried back along `ray`. Paths still bouncing when `depth` runs
 * out contribute black.
 */
export function rayColor(ray: THREE.Ray, scene: Scene, depth: number, rng: RandomSource): THREE.Vector3 {
  if (depth <= 0) return new THREE.Vector3(0, 0, 0);

  const rec = hit(scene, ray, T_MIN, Infinity);
  if (!rec) return skyColor(ray);

  switch (rec.material.kind) {
    case 'lambertian':
      return scatterLambertian(rec, rec.material, scene, depth, rng);
    case 'metal':
      return scatterMetal(ray, rec, rec.material, scene, depth, rng);
    case 'dielectric':
      return scatterDielectric(ray, rec, rec.material, scene, depth, rng);
  }
}

function scatterLambertian(
  rec: Intersection,
  mat: Lambertian,
  scene: Scene,
  depth: number,
  rng: RandomSource
): THREE.Vector3 {
  let direction = rec.normal.clone().add(randomUnitVector(rng));
  // Unit vector nearly opposite the normal
  if (direction.lengthSq() < 1e-8) direction = rec.normal.clone();
  const scattered = new THREE.Ray(rec.p, direction);
  return rayColor(scattered, scene, depth - 1, rng).multiply(mat.albedo);
}

function scatterMetal(
  ray: THREE.Ray,
  rec: Intersection,
  mat: Metal,
  scene: Scene,
  depth: number,
  rng: RandomSource
): THREE.Vector3 {
  const reflected = reflect(unitVector(ray.direction), rec.normal);
  const direction = reflected.addScaledVector(randomInUnitSphere(rng), mat.fuzz);
  if (direction.dot(rec.normal) > 0) {
    const scattered = new THREE.Ray(rec.p, direction);
    return rayColor(scattered, scene, depth - 1, rng).multiply(mat.albedo);
  }
  // Fuzzed below the surface: absorbed
  return new THREE.Vector3(0, 0, 0);
}

function scatterDielectric(
  ray: THREE.Ray,
  rec: Intersection,
  mat: Dielectric,
  scene: Scene,
  depth: number,
  rng: RandomSource
): THREE.Vector3 {
  const refractionRatio = rec.frontFace ? 1 / mat.ir : mat.ir;
  const unitDir = unitVector(ray.direction);

  const cosTheta = Math.min(-unitDir.dot(rec.normal), 1);
  const sinTheta = Math.sqrt(1 - cosTheta * cosTheta);
  const cannotRefract = refractionRatio * sinTheta > 1;

  const direction =
    cannotRefract || schlick(cosTheta, mat.ir) > rng()
      ? reflect(unitDir, rec.normal)
      : refract(unitDir, rec.normal, refractionRatio);

  // Glass doesn't tint: attenuation is (1, 1, 1)
  return rayColor(new THREE.Ray(rec.p, direction), scene, depth - 1, rng);
}
