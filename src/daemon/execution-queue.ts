/**
 * Execution Queue
 *
 * Single FIFO through which every device operation passes. Jobs run one at a
 * time in submission order, whichever connection submitted them.
 */

type QueuedJob = () => Promise<void>;

export class ExecutionQueue {
  private readonly jobs: QueuedJob[] = [];
  private running = false;
  private idleWaiters: (() => void)[] = [];

  /**
   * Jobs waiting to run (excluding the one in progress)
   */
  get size(): number {
    return this.jobs.length;
  }

  get isBusy(): boolean {
    return this.running;
  }

  /**
   * Submit a job; resolves or rejects with the job's own outcome once it has run
   */
  enqueue<T>(run: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.jobs.push(async () => {
        try {
          resolve(await run());
        } catch (error) {
          reject(error);
        }
      });
      void this.drain();
    });
  }

  /**
   * Resolves once no job is queued or running
   */
  onIdle(): Promise<void> {
    if (!this.running && this.jobs.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private async drain(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;

    let job = this.jobs.shift();
    while (job) {
      await job();
      job = this.jobs.shift();
    }

    this.running = false;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
