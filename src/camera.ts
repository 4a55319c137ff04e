import * as THREE from 'three';
import type { RandomSource } from './random';
import { randomInUnitDisk, unitVector } from './vec3';

export interface CameraConfig {
  lookFrom: THREE.Vector3;
  lookAt: THREE.Vector3;
  vup: THREE.Vector3;
  // Vertical field of view, degrees
  vfov: number;
  aspectRatio: number;
  aperture: number;
  focusDist: number;
}

/**
 * Thin-lens camera. Rays start on a disk of radius aperture/2 around
 * `lookFrom` and converge on the plane `focusDist` away, which is what gives
 * the depth-of-field blur.
 */
export class Camera {
  readonly origin: THREE.Vector3;
  readonly u: THREE.Vector3;
  readonly v: THREE.Vector3;
  readonly w: THREE.Vector3;
  readonly horizontal: THREE.Vector3;
  readonly vertical: THREE.Vector3;
  readonly lowerLeftCorner: THREE.Vector3;
  readonly lensRadius: number;

  constructor(config: CameraConfig) {
    const { lookFrom, lookAt, vup, vfov, aspectRatio, aperture, focusDist } = config;
    const theta = THREE.MathUtils.degToRad(vfov);
    const h = Math.tan(theta / 2);
    const viewportHeight = 2 * h;
    const viewportWidth = aspectRatio * viewportHeight;

    this.w = unitVector(lookFrom.clone().sub(lookAt));
    this.u = unitVector(new THREE.Vector3().crossVectors(vup, this.w));
    this.v = new THREE.Vector3().crossVectors(this.w, this.u);

    this.origin = lookFrom.clone();
    this.horizontal = this.u.clone().multiplyScalar(focusDist * viewportWidth);
    this.vertical = this.v.clone().multiplyScalar(focusDist * viewportHeight);
    this.lowerLeftCorner = this.origin
      .clone()
      .addScaledVector(this.horizontal, -0.5)
      .addScaledVector(this.vertical, -0.5)
      .addScaledVector(this.w, -focusDist);
    this.lensRadius = aperture / 2;
  }

  /** Ray through normalized image-plane coordinates (s, t), both in [0, 1]. */
  getRay(s: number, t: number, rng: RandomSource): THREE.Ray {
    const rd = randomInUnitDisk(rng).multiplyScalar(this.lensRadius);
    const offset = this.u.clone().multiplyScalar(rd.x).addScaledVector(this.v, rd.y);
    const origin = this.origin.clone().add(offset);
    const direction = this.lowerLeftCorner
      .clone()
      .addScaledVector(this.horizontal, s)
      .addScaledVector(this.vertical, t)
      .sub(origin);
    return new THREE.Ray(origin, direction);
  }
}
