/**
 * Result of {@link InstallQueue.dequeue}.
 */
export type DequeueResult<T> = { done: false; value: T } | { done: true };

export class InstallQueueError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "InstallQueueError";
  }
}

/**
 * Unbounded FIFO with a single suspending consumer.
 *
 * - `enqueue` never blocks and never rejects while the queue is open.
 * - `dequeue` resolves with the head, or waits until an item arrives or the
 *   queue is closed. A closed queue still hands out what it holds, then
 *   resolves `{ done: true }`.
 * - An item stays in the queue until the consumer actually takes it, so
 *   `discardPending` and `size` see it even while a parked consumer is waking.
 * - Only one `dequeue` may be pending at a time: the queue has exactly one consumer.
 */
export class InstallQueue<T> {
  private readonly items: T[] = [];
  private wake: (() => void) | null = null;
  private closed = false;

  public get size(): number {
    return this.items.length;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Append to the tail.
   *
   * @returns false if the queue is closed (the item is not accepted)
   */
  public enqueue(item: T): boolean {
    if (this.closed) return false;
    this.items.push(item);
    this.notify();
    return true;
  }

  /**
   * Remove and return the head, suspending while the queue is empty.
   *
   * @throws InstallQueueError if another dequeue is already pending
   */
  public async dequeue(): Promise<DequeueResult<T>> {
    if (this.wake) {
      throw new InstallQueueError("InstallQueue supports a single consumer");
    }
    while (this.items.length === 0) {
      if (this.closed) return { done: true };
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
    const [value] = this.items.splice(0, 1);
    return { done: false, value };
  }

  /**
   * Remove every queued item without handing it to the consumer.
   *
   * @returns The removed items, in queue order
   */
  public discardPending(): T[] {
    return this.items.splice(0, this.items.length);
  }

  /**
   * Make the queue terminal. A parked consumer wakes and sees `{ done: true }`
   * once the remaining items are gone.
   */
  public close(): void {
    if (this.closed) return;
    this.closed = true;
    this.notify();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}
