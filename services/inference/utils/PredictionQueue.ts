export type PredictionTask<T> = () => Promise<T>;

interface QueuedTask {
  run: () => Promise<void>;
  reject: (reason?: unknown) => void;
}

/**
 * Runs prediction tasks one at a time, in arrival order. A Scorer may hold
 * per-call resources (ONNX sessions, recurrent state), so two decode calls
 * must never interleave their steps on it.
 */
export class PredictionQueue {
  private pending: QueuedTask[] = [];
  private isProcessing = false;
  private disposed = false;

  public enqueue<T>(task: PredictionTask<T>): Promise<T> {
    if (this.disposed) {
      return Promise.reject(new Error('PredictionQueue: disposed'));
    }
    return new Promise<T>((resolve, reject) => {
      this.pending.push({
        run: () => Promise.resolve().then(task).then(resolve, reject),
        reject,
      });
      void this.processNext();
    });
  }

  private async processNext(): Promise<void> {
    if (this.isProcessing) return;

    const next = this.pending.shift();
    if (!next) return;

    this.isProcessing = true;
    try {
      await next.run();
    } finally {
      this.isProcessing = false;
      if (this.pending.length > 0) {
        void this.processNext();
      }
    }
  }

  /** Rejects everything still waiting; the running task finishes on its own. */
  public dispose(): void {
    this.disposed = true;
    const waiting = this.pending;
    this.pending = [];
    for (const task of waiting) {
      task.reject(new Error('PredictionQueue: disposed'));
    }
  }

  public get size(): number {
    return this.pending.length;
  }

  public getIsProcessing(): boolean {
    return this.isProcessing;
  }
}
