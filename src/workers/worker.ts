import { parentPort, workerData } from 'node:worker_threads';
import type { MainToWorkerMessage, RenderWorkerData } from './messages';
import { RowTaskHandler } from './tasks';

if (!parentPort) {
  throw new Error('Render worker must be run as a worker thread.');
}
const port = parentPort;

const { job }: RenderWorkerData = workerData;
const handler = new RowTaskHandler(job);

port.on('message', (msg: MainToWorkerMessage) => {
  if (msg.type !== 'row') return;
  const result = handler.handle(msg);
  if (result.type === 'row') {
    // Hand the row buffer over instead of copying it
    const { buffer } = result.sums;
    if (buffer instanceof ArrayBuffer) {
      port.postMessage(result, [buffer]);
      return;
    }
  }
  port.postMessage(result);
});
