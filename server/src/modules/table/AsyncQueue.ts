// Serial executor for async tasks.
// Every state-changing operation on a table goes through its queue, so transitions never interleave.

type QueueTask<T> = () => Promise<T>;

export class AsyncQueue {
  private queue: (() => Promise<void>)[] = [];
  private running = false;
  private pending = 0;

  /**
   * Appends a task and runs tasks one at a time in arrival order.
   * The returned promise settles with the task's own result or error.
   */
  enqueue<T>(task: QueueTask<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.pending++;
      this.queue.push(async () => {
        try {
          const result = await task();
          this.pending--;
          resolve(result);
        } catch (err) {
          this.pending--;
          reject(err);
        }
      });
      if (!this.running) {
        void this.processAll();
      }
    });
  }

  private async processAll(): Promise<void> {
    this.running = true;
    let next = this.queue.shift();
    while (next) {
      await next();
      next = this.queue.shift();
    }
    this.running = false;
  }

  /** Tasks not yet settled, including the one running */
  get size(): number {
    return this.pending;
  }

  /** Resolves once every task enqueued so far has settled */
  drain(): Promise<void> {
    return this.enqueue(async () => undefined);
  }
}
