import * as THREE from 'three';
import { Camera } from '../camera';
import type { Scene } from '../hittable';
import { rowRandom, type RandomSource } from '../random';
import { cameraConfig, cameraDescription, deserializeScene, serializeScene } from '../scene/serialize';
import type { RenderSettings } from '../settings';
import { rayColor } from '../tracer';
import type { RenderJob } from '../types';

/** Accumulated radiance sums, row-major from the top row, three doubles per pixel. */
export interface RenderedImage {
  width: number;
  height: number;
  samplesPerPixel: number;
  pixels: Float64Array;
}

/** What a single row needs, rebuilt once per thread from a RenderJob. */
export interface RowContext {
  width: number;
  height: number;
  samplesPerPixel: number;
  maxDepth: number;
  camera: Camera;
  scene: Scene;
}

/**
 * Runs every row of `job` exactly once, handing each finished row to `onRow`.
 * Rows may arrive in any order.
 */
export interface RowExecutor {
  renderRows(job: RenderJob, onRow: (row: number, sums: Float64Array) => void): Promise<void>;
}

export function createRowContext(job: RenderJob): RowContext {
  return {
    width: job.width,
    height: job.height,
    samplesPerPixel: job.samplesPerPixel,
    maxDepth: job.maxDepth,
    camera: new Camera(cameraConfig(job.camera)),
    scene: deserializeScene(job.scene),
  };
}

/**
 * Radiance sums for image row `j` (0 is the top). The camera's t axis points
 * up, hence the flip to `scanline`.
 */
export function renderRow(j: number, ctx: RowContext, rng: RandomSource): Float64Array {
  const { width, height, samplesPerPixel, maxDepth, camera, scene } = ctx;
  const sums = new Float64Array(width * 3);
  const scanline = height - 1 - j;
  const color = new THREE.Vector3();

  for (let i = 0; i < width; i++) {
    color.set(0, 0, 0);
    for (let s = 0; s < samplesPerPixel; s++) {
      const u = (i + rng()) / (width - 1);
      const v = (scanline + rng()) / (height - 1);
      const ray = camera.getRay(u, v, rng);
      color.add(rayColor(ray, scene, maxDepth, rng));
    }
    sums[i * 3] = color.x;
    sums[i * 3 + 1] = color.y;
    sums[i * 3 + 2] = color.z;
  }
  return sums;
}

/**
 * Renders rows one after another in the calling thread. Each row gets its own
 * generator, by default seeded from the job.
 */
export class InlineRowExecutor implements RowExecutor {
  constructor(private readonly randomFor?: (row: number) => RandomSource) {}

  async renderRows(job: RenderJob, onRow: (row: number, sums: Float64Array) => void): Promise<void> {
    const ctx = createRowContext(job);
    const randomFor = this.randomFor ?? ((row: number) => rowRandom(job.seed, row));
    for (let j = 0; j < job.height; j++) {
      onRow(j, renderRow(j, ctx, randomFor(j)));
    }
  }
}

export function createRenderJob(scene: Scene, settings: RenderSettings): RenderJob {
  return {
    width: settings.width,
    height: settings.height,
    samplesPerPixel: settings.samplesPerPixel,
    maxDepth: settings.maxDepth,
    seed: settings.seed,
    camera: cameraDescription(settings),
    scene: serializeScene(scene),
  };
}

export async function renderImage(
  scene: Scene,
  settings: RenderSettings,
  executor: RowExecutor
): Promise<RenderedImage> {
  const { width, height, samplesPerPixel } = settings;
  const pixels = new Float64Array(width * height * 3);
  const rowStride = width * 3;

  await executor.renderRows(createRenderJob(scene, settings), (row, sums) => {
    pixels.set(sums, row * rowStride);
  });

  return { width, height, samplesPerPixel, pixels };
}

function clamp(x: number, min: number, max: number): number {
  if (x < min) return min;
  if (x > max) return max;
  return x;
}

/**
 * Averages, gamma-2 corrects, clamps into [0, 0.999] and quantizes each
 * channel to 8 bits. A NaN channel lands in the clamped array as 0.
 */
export function toRGB(image: RenderedImage): Uint8ClampedArray {
  const scale = 1 / image.samplesPerPixel;
  const out = new Uint8ClampedArray(image.pixels.length);
  for (let k = 0; k < image.pixels.length; k++) {
    out[k] = Math.floor(256 * clamp(Math.sqrt(image.pixels[k] * scale), 0, 0.999));
  }
  return out;
}

export function deriveHeight(width: number, aspectRatio: number): number {
  return Math.max(1, Math.trunc(width / aspectRatio));
}
