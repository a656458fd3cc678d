/**
 * FIFO queue that runs at most `concurrency` renders at once. Jobs waiting here stay
 * `pending` in the store.
 */

interface QueuedRender {
  jobId: number;
  task: () => Promise<unknown>;
}

export class RenderQueue {
  private readonly waiting: QueuedRender[] = [];
  private readonly running = new Set<number>();
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`Render concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  get activeCount(): number {
    return this.running.size;
  }

  get pendingCount(): number {
    return this.waiting.length;
  }

  /**
   * Adds a render and returns its 1-based position in the waiting line, or 0 when it
   * started immediately.
   */
  enqueue(jobId: number, task: () => Promise<unknown>): number {
    this.waiting.push({ jobId, task });
    this.startNext();
    return this.waiting.findIndex((entry) => entry.jobId === jobId) + 1;
  }

  /** Resolves once nothing is running or waiting. */
  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private isIdle(): boolean {
    return this.running.size === 0 && this.waiting.length === 0;
  }

  private startNext(): void {
    while (this.running.size < this.concurrency) {
      const next = this.waiting.shift();
      if (!next) {
        break;
      }
      this.running.add(next.jobId);
      void this.execute(next).finally(() => {
        this.running.delete(next.jobId);
        this.startNext();
        if (this.isIdle()) {
          const waiters = this.idleWaiters;
          this.idleWaiters = [];
          waiters.forEach((resolve) => resolve());
        }
      });
    }
  }

  private async execute(entry: QueuedRender): Promise<void> {
    try {
      await entry.task();
    } catch (error) {
      console.error(`[RenderQueue] Render for job ${entry.jobId} threw:`, error);
    }
  }
}
