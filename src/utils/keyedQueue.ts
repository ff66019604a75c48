import { getErrorMessage } from './errors.js';

/**
 * Runs tasks one at a time per key, in the order they were enqueued.
 * Different keys run independently. A failing task is logged and does not
 * stop the tasks queued after it.
 */
export class KeyedSerialQueue {
  private tails = new Map<string, Promise<void>>();

  constructor(private readonly label = 'Queue') {}

  enqueue(key: string, task: () => Promise<void>): Promise<void> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const next = previous.then(task).catch((error: unknown) => {
      console.error(`[${this.label}] Task for ${key} failed: ${getErrorMessage(error)}`);
    });
    this.tails.set(key, next);
    void next.then(() => {
      if (this.tails.get(key) === next) {
        this.tails.delete(key);
      }
    });
    return next;
  }

  get pendingKeys(): number {
    return this.tails.size;
  }

  /**
   * Resolves once every task enqueued so far (and any enqueued while waiting) has settled
   */
  async drain(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all(this.tails.values());
    }
  }
}
