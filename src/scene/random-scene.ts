import * as THREE from 'three';
import { flattenHittables, hittableList, sphere } from '../hittable';
import type { Hittable, Scene } from '../hittable';
import { dielectric, lambertian, metal } from '../materials';
import type { RandomSource } from '../random';
import { random, randomRange } from '../vec3';

// Small spheres too close to this point would overlap the big metal sphere
const CLEARANCE_CENTER = new THREE.Vector3(4, 0.2, 0);

/**
 * The showcase scene: a ground sphere, a 22x22 grid of jittered small spheres
 * (80% diffuse, 15% metal, 5% glass) and one large sphere of each material.
 */
export function randomScene(rng: RandomSource): Scene {
  const ground = sphere(new THREE.Vector3(0, -1000, 0), 1000, lambertian(new THREE.Vector3(0.5, 0.5, 0.5)));

  const small: Hittable[] = [];
  for (let a = -11; a <= 11; a++) {
    for (let b = -11; b <= 11; b++) {
      const chooseMat = rng();
      const center = new THREE.Vector3(a + 0.9 * rng(), 0.2, b + 0.9 * rng());
      if (center.distanceTo(CLEARANCE_CENTER) <= 0.9) continue;

      if (chooseMat < 0.8) {
        const albedo = random(rng).multiply(random(rng));
        small.push(sphere(center, 0.2, lambertian(albedo)));
      } else if (chooseMat < 0.95) {
        const albedo = randomRange(0.5, 1, rng);
        const fuzz = rng() * 0.5;
        small.push(sphere(center, 0.2, metal(albedo, fuzz)));
      } else {
        small.push(sphere(center, 0.2, dielectric(1.5)));
      }
    }
  }

  const showcase = hittableList([
    sphere(new THREE.Vector3(0, 1, 0), 1, dielectric(1.5)),
    sphere(new THREE.Vector3(-4, 1, 0), 1, lambertian(new THREE.Vector3(0.4, 0.2, 0.1))),
    sphere(new THREE.Vector3(4, 1, 0), 1, metal(new THREE.Vector3(0.7, 0.6, 0.5), 0)),
  ]);

  return flattenHittables([ground, hittableList(small), showcase]);
}
