export type Vec3Tuple = [number, number, number];

// Plain-data forms of the scene that survive postMessage / workerData.

export type SerializedMaterial =
  | { kind: 'lambertian'; albedo: Vec3Tuple }
  | { kind: 'metal'; albedo: Vec3Tuple; fuzz: number }
  | { kind: 'dielectric'; ir: number };

export interface SerializedSphere {
  center: Vec3Tuple;
  radius: number;
  material: SerializedMaterial;
}

export interface SerializedCamera {
  lookFrom: Vec3Tuple;
  lookAt: Vec3Tuple;
  vup: Vec3Tuple;
  vfov: number;
  aspectRatio: number;
  aperture: number;
  focusDist: number;
}

/** Everything a worker needs to render any row of the image. */
export interface RenderJob {
  width: number;
  height: number;
  samplesPerPixel: number;
  maxDepth: number;
  seed?: number;
  camera: SerializedCamera;
  scene: SerializedSphere[];
}
