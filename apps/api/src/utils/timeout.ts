import { AnalyzerError, CheckTimeoutError } from './errors';

export const withTimeout = async <T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> => {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return work;
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new CheckTimeoutError(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
};

/**
 * Tracks the work one check starts. Once closed it refuses new work, and
 * `drain` waits for whatever is still in flight.
 */
export class WorkGate {
  private closed = false;
  private readonly started: Promise<unknown>[] = [];

  constructor(private readonly label: string) {}

  get isOpen() {
    return !this.closed;
  }

  run<T>(work: () => Promise<T>): Promise<T> {
    if (this.closed) return Promise.reject(new AnalyzerError(`${this.label} has already ended`));
    const task = work();
    this.started.push(task);
    return task;
  }

  async close() {
    this.closed = true;
    await Promise.allSettled(this.started);
  }
}
