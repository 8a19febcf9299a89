/**
 * Unbounded FIFO between any number of producers and a single consumer.
 * `next()` resolves with the oldest event, waiting for one if the queue is
 * empty. Only one `next()` may be pending at a time.
 */
export class EventQueue<T> {
  private readonly buffered: T[] = [];
  private waiter: ((event: T) => void) | null = null;

  push(event: T): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(event);
      return;
    }
    this.buffered.push(event);
  }

  async next(): Promise<T> {
    if (this.buffered.length > 0) {
      const [event] = this.buffered.splice(0, 1);
      return event;
    }
    if (this.waiter) {
      throw new Error("EventQueue already has a pending consumer");
    }
    return new Promise<T>((resolve) => {
      this.waiter = resolve;
    });
  }

  get size(): number {
    return this.buffered.length;
  }
}
