import { Worker } from 'node:worker_threads';
import { RenderWorkerError } from '../errors';
import type { RowExecutor } from '../render/renderer';
import type { RenderJob } from '../types';
import type { MainToWorkerMessage, RenderWorkerData, WorkerToMainMessage } from './messages';

// Plain-JS bootstrap that registers tsx inside the thread, then loads worker.ts
const WORKER_ENTRY = new URL('./worker-entry.mjs', import.meta.url);

/**
 * Spreads image rows over a fixed set of worker threads. Each worker gets the
 * scene once through workerData and is then fed one row at a time; whoever
 * finishes first takes the next row in the queue.
 */
export class RowWorkerPool implements RowExecutor {
  constructor(
    private readonly size: number,
    private readonly entry: URL = WORKER_ENTRY
  ) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker count must be a positive integer, got ${size}`);
    }
  }

  renderRows(job: RenderJob, onRow: (row: number, sums: Float64Array) => void): Promise<void> {
    const queue: number[] = [];
    for (let j = 0; j < job.height; j++) queue.push(j);

    const count = Math.min(this.size, job.height);
    console.log(`[RowWorkerPool] Rendering ${job.height} rows on ${count} workers`);

    return new Promise<void>((resolve, reject) => {
      const workers: Worker[] = [];
      const current = new Map<Worker, number>();
      let completed = 0;
      let settled = false;

      const shutdown = async () => {
        await Promise.all(workers.map((w) => w.terminate()));
      };

      const finish = (err?: Error) => {
        if (settled) return;
        settled = true;
        if (err) console.warn(`[RowWorkerPool] Render failed: ${err.message}`);
        shutdown().then(
          () => (err ? reject(err) : resolve()),
          (terminateErr: unknown) => reject(err ?? terminateErr)
        );
      };

      const dispatch = (worker: Worker) => {
        const row = queue.shift();
        if (row === undefined) {
          current.delete(worker);
          return;
        }
        current.set(worker, row);
        const msg: MainToWorkerMessage = { type: 'row', row };
        worker.postMessage(msg);
      };

      if (job.height === 0) {
        finish();
        return;
      }

      for (let workerId = 0; workerId < count; workerId++) {
        const workerData: RenderWorkerData = { workerId, job };
        const worker = new Worker(this.entry, { workerData });
        workers.push(worker);

        worker.on('message', (msg: WorkerToMainMessage) => {
          if (settled) return;
          if (msg.type === 'error') {
            finish(new RenderWorkerError(msg.error, msg.row, workerId));
            return;
          }
          onRow(msg.row, msg.sums);
          completed++;
          if (completed === job.height) {
            finish();
          } else {
            dispatch(worker);
          }
        });

        worker.on('error', (err) => {
          finish(new RenderWorkerError(err.message, current.get(worker) ?? null, workerId));
        });

        worker.on('exit', (code) => {
          if (!settled && code !== 0) {
            finish(new RenderWorkerError(`exited with code ${code}`, current.get(worker) ?? null, workerId));
          }
        });

        dispatch(worker);
      }
    });
  }
}
