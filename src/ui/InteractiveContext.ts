export type UiTask = () => void;
export type TaskErrorHandler = (err: unknown) => void;

/**
 * The single context allowed to touch view and navigation state.
 * Background work hands results over with `post`; tasks run in FIFO order.
 */
export interface InteractiveContext {
  post(task: UiTask): void;
}

/** Runs posted tasks only when `drain` is called. */
export class QueuedContext implements InteractiveContext {
  private readonly queue: UiTask[] = [];
  private draining = false;

  constructor(private readonly onTaskError: TaskErrorHandler) {}

  get pending(): number {
    return this.queue.length;
  }

  post(task: UiTask): void {
    this.queue.push(task);
    this.schedule();
  }

  // Tasks posted while draining run in the same drain.
  drain(): number {
    if (this.draining) return 0;
    this.draining = true;
    let ran = 0;
    try {
      let task = this.queue.shift();
      while (task) {
        ran += 1;
        try {
          task();
        } catch (err) {
          this.onTaskError(err);
        }
        task = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
    return ran;
  }

  protected schedule(): void {}
}

/** Drains on the next event-loop turn after a post. */
export class EventLoopContext extends QueuedContext {
  private scheduled = false;
  private readonly waiters: Array<() => void> = [];

  flush(): Promise<void> {
    if (!this.scheduled && this.pending === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  protected override schedule(): void {
    if (this.scheduled) return;
    this.scheduled = true;
    setImmediate(() => {
      this.scheduled = false;
      this.drain();
      if (this.pending > 0) {
        this.schedule();
        return;
      }
      for (const resolve of this.waiters.splice(0, this.waiters.length)) resolve();
    });
  }
}
