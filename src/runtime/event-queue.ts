/**
 * Single-producer / single-consumer FIFO handoff between the agent
 * callback and the consuming iterator. `push` never blocks; `take`
 * waits up to a timeout for the next item.
 */

export interface EventQueueOptions {
  /** Size above which `onHighWater` fires (once per crossing) */
  capacity?: number;
  onHighWater?: (size: number) => void;
}

interface Waiter<T> {
  resolve: (item: T | undefined) => void;
  timer: ReturnType<typeof setTimeout>;
}

export class EventQueue<T> {
  private items: T[] = [];
  private waiter: Waiter<T> | null = null;
  private readonly capacity: number;
  private readonly onHighWater?: (size: number) => void;
  private aboveHighWater = false;

  constructor(options: EventQueueOptions = {}) {
    this.capacity = options.capacity ?? Infinity;
    this.onHighWater = options.onHighWater;
  }

  push(item: T): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      clearTimeout(waiter.timer);
      waiter.resolve(item);
      return;
    }

    this.items.push(item);
    if (this.items.length > this.capacity && !this.aboveHighWater) {
      this.aboveHighWater = true;
      this.onHighWater?.(this.items.length);
    }
  }

  /**
   * Next item, or undefined if none arrives within `timeoutMs`
   */
  take(timeoutMs: number): Promise<T | undefined> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      if (this.items.length <= this.capacity) this.aboveHighWater = false;
      return Promise.resolve(item);
    }
    if (this.waiter) {
      return Promise.reject(new Error("EventQueue supports a single consumer"));
    }

    return new Promise<T | undefined>((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(undefined);
      }, timeoutMs);
      this.waiter = { resolve, timer };
    });
  }

  /**
   * Remove and return everything queued
   */
  drain(): T[] {
    const drained = this.items;
    this.items = [];
    this.aboveHighWater = false;
    return drained;
  }

  get size(): number {
    return this.items.length;
  }
}
