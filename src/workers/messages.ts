import type { RenderJob } from '../types';

export interface RenderWorkerData {
  workerId: number;
  job: RenderJob;
}

export type MainToWorkerMessage = { type: 'row'; row: number };

export type WorkerToMainMessage =
  | { type: 'row'; row: number; sums: Float64Array }
  | { type: 'error'; row: number; error: string };
