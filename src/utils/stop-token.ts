type StopListener = () => void;

/**
 * One-way cancellation flag shared between a running task and whoever may
 * force-stop it. Requesting a stop is a single flag flip followed by listener
 * notification; the flag never resets.
 */
export class StopToken {
  private requested = false;
  private listeners = new Set<StopListener>();

  get stopped(): boolean {
    return this.requested;
  }

  request(): void {
    if (this.requested) return;
    this.requested = true;
    const listeners = [...this.listeners];
    this.listeners.clear();
    for (const listener of listeners) listener();
  }

  /**
   * Run `listener` once when a stop is requested (immediately if it already
   * was). Returns an unsubscribe function.
   */
  onStop(listener: StopListener): () => void {
    if (this.requested) {
      listener();
      return () => {};
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
