/**
 * Unbounded FIFO that workers push completions into and a single consumer
 * drains. `next` wakes on the first pushed item or after a timeout, whichever
 * comes first.
 */
export class CompletionChannel<T> {
  private items: T[] = [];
  private waiter: ((item: T | undefined) => void) | null = null;

  push(item: T): void {
    if (this.waiter) {
      const wake = this.waiter;
      this.waiter = null;
      wake(item);
      return;
    }
    this.items.push(item);
  }

  /** Resolve with the next item, or `undefined` once `timeoutMs` elapses. */
  next(timeoutMs: number): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.waiter) {
      return Promise.reject(new Error("CompletionChannel supports a single consumer"));
    }
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(undefined);
      }, timeoutMs);
      this.waiter = (item) => {
        clearTimeout(timer);
        resolve(item);
      };
    });
  }

  get size(): number {
    return this.items.length;
  }
}
