import { createRowContext, renderRow, type RowContext } from '../render/renderer';
import { rowRandom } from '../random';
import type { RenderJob } from '../types';
import type { MainToWorkerMessage, WorkerToMainMessage } from './messages';

/**
 * Worker-side state: the scene and camera are rebuilt from the job once, then
 * every row request reuses them.
 */
export class RowTaskHandler {
  private readonly ctx: RowContext;

  constructor(private readonly job: RenderJob) {
    this.ctx = createRowContext(job);
  }

  handle(message: MainToWorkerMessage): WorkerToMainMessage {
    const { row } = message;
    try {
      const sums = renderRow(row, this.ctx, rowRandom(this.job.seed, row));
      return { type: 'row', row, sums };
    } catch (err) {
      return { type: 'error', row, error: err instanceof Error ? err.message : 'Unknown error' };
    }
  }
}
