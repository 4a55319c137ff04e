import * as THREE from 'three';
import type { Material } from './materials';

export interface Intersection {
  readonly p: THREE.Vector3;
  // Unit length, always facing against the incoming ray
  readonly normal: THREE.Vector3;
  readonly material: Material;
  readonly t: number;
  readonly frontFace: boolean;
}

export interface Sphere {
  readonly kind: 'sphere';
  readonly center: THREE.Vector3;
  readonly radius: number;
  readonly material: Material;
}

export interface HittableList {
  readonly kind: 'list';
  readonly objects: readonly Hittable[];
}

export type Hittable = Sphere | HittableList;

/** Flat, ordered, read-only set of spheres the hit query scans. */
export type Scene = readonly Sphere[];

export function sphere(center: THREE.Vector3, radius: number, material: Material): Sphere {
  return { kind: 'sphere', center, radius, material };
}

export function hittableList(objects: readonly Hittable[]): HittableList {
  return { kind: 'list', objects };
}

/**
 * Nested lists are only a construction-time convenience. They are flattened
 * depth-first here so `hit` only ever deals with spheres.
 */
export function flattenHittables(objects: readonly Hittable[]): Scene {
  const out: Sphere[] = [];
  const visit = (obj: Hittable) => {
    switch (obj.kind) {
      case 'sphere':
        out.push(obj);
        break;
      case 'list':
        obj.objects.forEach(visit);
        break;
    }
  };
  objects.forEach(visit);
  return out;
}

export function setFaceNormal(
  ray: THREE.Ray,
  outwardNormal: THREE.Vector3
): { frontFace: boolean; normal: THREE.Vector3 } {
  const frontFace = ray.direction.dot(outwardNormal) < 0;
  const normal = frontFace ? outwardNormal : outwardNormal.clone().negate();
  return { frontFace, normal };
}

export function hitSphere(
  center: THREE.Vector3,
  radius: number,
  material: Material,
  ray: THREE.Ray,
  tMin: number,
  tMax: number
): Intersection | null {
  // Scalar form of oc = origin - center; this runs once per sphere per bounce
  const d = ray.direction;
  const ocx = ray.origin.x - center.x;
  const ocy = ray.origin.y - center.y;
  const ocz = ray.origin.z - center.z;
  const a = d.x * d.x + d.y * d.y + d.z * d.z;
  const halfB = ocx * d.x + ocy * d.y + ocz * d.z;
  const c = ocx * ocx + ocy * ocy + ocz * ocz - radius * radius;
  const discriminant = halfB * halfB - a * c;
  if (discriminant < 0) return null;

  const sqrtd = Math.sqrt(discriminant);
  let root = (-halfB - sqrtd) / a;
  if (root < tMin || root > tMax) {
    root = (-halfB + sqrtd) / a;
    if (root < tMin || root > tMax) return null;
  }

  const p = ray.at(root, new THREE.Vector3());
  const outwardNormal = p.clone().sub(center).divideScalar(radius);
  const { frontFace, normal } = setFaceNormal(ray, outwardNormal);
  return { p, normal, material, t: root, frontFace };
}

/**
 * Closest intersection along `ray` within [tMin, tMax]. Each sphere is tested
 * against the interval narrowed by the nearest hit so far; on an exact tie the
 * earlier sphere wins.
 */
export function hit(scene: Scene, ray: THREE.Ray, tMin: number, tMax: number): Intersection | null {
  let closest: Intersection | null = null;
  let closestSoFar = tMax;
  for (const s of scene) {
    const rec = hitSphere(s.center, s.radius, s.material, ray, tMin, closestSoFar);
    // The interval is inclusive, so a later sphere at exactly closestSoFar still comes back
    if (rec && (closest === null || rec.t < closestSoFar)) {
      closestSoFar = rec.t;
      closest = rec;
    }
  }
  return closest;
}
