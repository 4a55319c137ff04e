import * as THREE from 'three';
import type { CameraConfig } from '../camera';
import type { Scene } from '../hittable';
import { sphere } from '../hittable';
import type { Material } from '../materials';
import { dielectric, lambertian, metal } from '../materials';
import type { RenderSettings } from '../settings';
import { aspectRatio } from '../settings';
import type { SerializedCamera, SerializedMaterial, SerializedSphere, Vec3Tuple } from '../types';

// Vector3 loses its prototype across postMessage, so scenes travel as tuples
// and get rebuilt on the worker side.

export function toTuple(v: THREE.Vector3): Vec3Tuple {
  return [v.x, v.y, v.z];
}

export function fromTuple(t: Vec3Tuple): THREE.Vector3 {
  return new THREE.Vector3(t[0], t[1], t[2]);
}

export function serializeMaterial(mat: Material): SerializedMaterial {
  switch (mat.kind) {
    case 'lambertian':
      return { kind: 'lambertian', albedo: toTuple(mat.albedo) };
    case 'metal':
      return { kind: 'metal', albedo: toTuple(mat.albedo), fuzz: mat.fuzz };
    case 'dielectric':
      return { kind: 'dielectric', ir: mat.ir };
  }
}

export function deserializeMaterial(data: SerializedMaterial): Material {
  switch (data.kind) {
    case 'lambertian':
      return lambertian(fromTuple(data.albedo));
    case 'metal':
      return metal(fromTuple(data.albedo), data.fuzz);
    case 'dielectric':
      return dielectric(data.ir);
  }
}

export function serializeScene(scene: Scene): SerializedSphere[] {
  return scene.map((s) => ({
    center: toTuple(s.center),
    radius: s.radius,
    material: serializeMaterial(s.material),
  }));
}

export function deserializeScene(data: readonly SerializedSphere[]): Scene {
  return data.map((s) => sphere(fromTuple(s.center), s.radius, deserializeMaterial(s.material)));
}

export function cameraDescription(settings: RenderSettings): SerializedCamera {
  return {
    lookFrom: settings.lookFrom,
    lookAt: settings.lookAt,
    vup: settings.vup,
    vfov: settings.vfov,
    aspectRatio: aspectRatio(settings),
    aperture: settings.aperture,
    focusDist: settings.focusDist,
  };
}

export function cameraConfig(data: SerializedCamera): CameraConfig {
  return {
    lookFrom: fromTuple(data.lookFrom),
    lookAt: fromTuple(data.lookAt),
    vup: fromTuple(data.vup),
    vfov: data.vfov,
    aspectRatio: data.aspectRatio,
    aperture: data.aperture,
    focusDist: data.focusDist,
  };
}
