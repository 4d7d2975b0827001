export type Task = () => Promise<void>;

export interface ITaskQueue {
  /** Run a best-effort side effect detached from the caller. Failures are logged, never retried. */
  enqueue(name: string, task: Task): void;
  /** Resolve once every task enqueued so far, and any they enqueue, has settled. */
  drain(): Promise<void>;
}

export class InProcessTaskQueue implements ITaskQueue {
  private pending = new Set<Promise<void>>();

  enqueue(name: string, task: Task): void {
    const run = Promise.resolve()
      .then(task)
      .catch((err: unknown) => {
        console.error(`[tasks] ${name} failed:`, err);
      })
      .finally(() => {
        this.pending.delete(run);
      });
    this.pending.add(run);
  }

  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled([...this.pending]);
    }
  }

  get size(): number {
    return this.pending.size;
  }
}
