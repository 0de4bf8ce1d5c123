/**
 * Single-consumer queue: producers push from promise callbacks, the control
 * loop awaits the next item without polling.
 */
export class CompletionChannel<T> {
  private readonly queue: T[] = [];
  private resolveWaiting: (() => void) | null = null;

  push(item: T): void {
    this.queue.push(item);
    if (this.resolveWaiting) {
      this.resolveWaiting();
      this.resolveWaiting = null;
    }
  }

  /** Waits until at least one item is queued, then returns all of them. */
  async drain(): Promise<T[]> {
    while (this.queue.length === 0) {
      await new Promise<void>((resolve) => {
        this.resolveWaiting = resolve;
      });
    }
    return this.queue.splice(0, this.queue.length);
  }

  get size(): number {
    return this.queue.length;
  }
}
