import { availableParallelism } from 'node:os';
import type { Vec3Tuple } from './types';

export interface RenderSettings {
  width: number;
  height: number;
  samplesPerPixel: number;
  maxDepth: number;
  lookFrom: Vec3Tuple;
  lookAt: Vec3Tuple;
  vup: Vec3Tuple;
  /** Vertical field of view in degrees. */
  vfov: number;
  aperture: number;
  focusDist: number;
  /** Worker threads rows are spread over; 1 renders in the calling thread. */
  workers: number;
  /**
   * Seeds the per-row generators (and the scene builder in the CLI). Left
   * undefined, every run samples differently.
   */
  seed?: number;
  output: string;
}

export const DEFAULT_RENDER_SETTINGS: Readonly<RenderSettings> = {
  width: 400,
  height: 225,
  samplesPerPixel: 50,
  maxDepth: 20,
  lookFrom: [13, 2, 3],
  lookAt: [0, 0, 0],
  vup: [0, 1, 0],
  vfov: 20,
  aperture: 0.1,
  focusDist: 10,
  workers: availableParallelism(),
  seed: undefined,
  output: 'output.ppm',
};

export function resolveRenderSettings(overrides: Partial<RenderSettings> = {}): RenderSettings {
  return { ...DEFAULT_RENDER_SETTINGS, ...overrides };
}

export function aspectRatio(settings: Pick<RenderSettings, 'width' | 'height'>): number {
  return settings.width / settings.height;
}
