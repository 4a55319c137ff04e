import { afterEach, describe, it, expect, vi } from 'vitest';
import { Worker } from 'node:worker_threads';
import * as THREE from 'three';
import { RenderWorkerError } from '../errors';
import { sphere, type Scene } from '../hittable';
import { dielectric, lambertian, metal } from '../materials';
import { createRenderJob, InlineRowExecutor, renderImage } from '../render/renderer';
import { resolveRenderSettings } from '../settings';
import { RowWorkerPool } from './pool';

const scene: Scene = [
  sphere(new THREE.Vector3(0, -1000, 0), 1000, lambertian(new THREE.Vector3(0.5, 0.5, 0.5))),
  sphere(new THREE.Vector3(0, 1, 0), 1, dielectric(1.5)),
  sphere(new THREE.Vector3(4, 1, 0), 1, metal(new THREE.Vector3(0.7, 0.6, 0.5), 0.2)),
];

const fixture = (name: string) => new URL(`./fixtures/${name}`, import.meta.url);

async function renderError(pool: RowWorkerPool, onRow = vi.fn()): Promise<RenderWorkerError> {
  const job = createRenderJob(scene, resolveRenderSettings({ width: 4, height: 3, samplesPerPixel: 1 }));
  const err = await pool.renderRows(job, onRow).then(
    () => null,
    (e: unknown) => e
  );
  if (!(err instanceof RenderWorkerError)) throw new Error(`expected RenderWorkerError, got ${String(err)}`);
  return err;
}

describe('RowWorkerPool', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('rejects a non-positive worker count', () => {
    expect(() => new RowWorkerPool(0)).toThrow(RangeError);
    expect(() => new RowWorkerPool(1.5)).toThrow(RangeError);
  });

  it('finishes an empty image without starting workers', async () => {
    const pool = new RowWorkerPool(2);
    const onRow = vi.fn();
    const job = createRenderJob([], resolveRenderSettings({ width: 4, height: 0 }));
    await pool.renderRows(job, onRow);
    expect(onRow).not.toHaveBeenCalled();
  });

  it('renders the same pixels as the in-thread executor for a seeded job', async () => {
    const settings = resolveRenderSettings({ width: 16, height: 9, samplesPerPixel: 3, maxDepth: 5, seed: 7 });

    const pooled = await renderImage(scene, settings, new RowWorkerPool(2));
    const inline = await renderImage(scene, settings, new InlineRowExecutor());

    expect(pooled.pixels.length).toBe(16 * 9 * 3);
    expect(Array.from(pooled.pixels)).toEqual(Array.from(inline.pixels));
  }, 60_000);

  it('delivers every row exactly once', async () => {
    const job = createRenderJob(scene, resolveRenderSettings({ width: 6, height: 5, samplesPerPixel: 1, seed: 3 }));
    const rows: number[] = [];
    await new RowWorkerPool(3).renderRows(job, (row, sums) => {
      expect(sums.length).toBe(6 * 3);
      rows.push(row);
    });
    expect(rows.sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4]);
  }, 60_000);

  it('rejects with the failing row and terminates when a worker throws', async () => {
    const terminate = vi.spyOn(Worker.prototype, 'terminate');
    const err = await renderError(new RowWorkerPool(1, fixture('throwing-worker.mjs')));
    expect(err.row).toBe(0);
    expect(err.workerId).toBe(0);
    expect(err.message).toBe('Worker 0 failed on row 0: cannot render row 0');
    expect(terminate).toHaveBeenCalledTimes(1);
  }, 60_000);

  it('rejects when a worker reports a row error', async () => {
    const terminate = vi.spyOn(Worker.prototype, 'terminate');
    const onRow = vi.fn();
    const err = await renderError(new RowWorkerPool(1, fixture('failing-row-worker.mjs')), onRow);
    expect(err.row).toBe(0);
    expect(err.workerId).toBe(0);
    expect(err.message).toBe('Worker 0 failed on row 0: scene is empty');
    expect(onRow).not.toHaveBeenCalled();
    expect(terminate).toHaveBeenCalledTimes(1);
  }, 60_000);
});
