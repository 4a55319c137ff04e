export class RenderWorkerError extends Error {
  constructor(
    message: string,
    public readonly row: number | null,
    public readonly workerId: number
  ) {
    super(row === null ? `Worker ${workerId}: ${message}` : `Worker ${workerId} failed on row ${row}: ${message}`);
    this.name = 'RenderWorkerError';
  }
}
