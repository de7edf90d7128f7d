import { QueueClosedError } from "../types/errors.js";
import type { QueueStats } from "./types.js";

type Waiter<T> = (item: T | null) => void;

/**
 * Task Queue
 *
 * In-memory FIFO mailbox shared by the coordinator (single producer) and
 * the workers (consumers). `pop` suspends while the queue is empty and
 * the producer has not called `markComplete`; once completed and
 * drained, every `pop` resolves to `null`.
 *
 * All state lives on the event loop thread. The emptiness check and the
 * registration of a suspended popper happen in one synchronous step, so
 * a push or completion can never slip in between them.
 *
 * Items may not be null or undefined: `null` is the "no more work" sentinel.
 */
export class TaskQueue<T extends NonNullable<unknown> = string> {
  private items: T[];
  private waiters: Waiter<T>[];
  private completed: boolean;
  private pushed: number;
  private delivered: number;

  constructor() {
    this.items = [];
    this.waiters = [];
    this.completed = false;
    this.pushed = 0;
    this.delivered = 0;
  }

  /**
   * Append an item, or hand it straight to the longest-waiting popper
   */
  push(item: T): void {
    if (this.completed) {
      throw new QueueClosedError("Cannot push onto a completed queue");
    }

    this.pushed++;

    // Waiters only exist while items is empty, so FIFO order holds
    const waiter = this.waiters.shift();
    if (waiter) {
      this.delivered++;
      waiter(item);
      return;
    }

    this.items.push(item);
  }

  /**
   * Take the head item. Resolves `null` when the queue is drained and
   * complete; suspends while it is empty but still open.
   */
  pop(): Promise<T | null> {
    const head = this.items.shift();
    if (head !== undefined) {
      this.delivered++;
      return Promise.resolve(head);
    }

    if (this.completed) {
      return Promise.resolve(null);
    }

    return new Promise<T | null>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Signal that no more items will arrive and release every suspended popper
   */
  markComplete(): void {
    this.completed = true;

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter(null);
    }
  }

  /**
   * Drop all pending items. Returns how many were dropped.
   */
  clear(): number {
    const dropped = this.items.length;
    this.items = [];
    return dropped;
  }

  get size(): number {
    return this.items.length;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  get isComplete(): boolean {
    return this.completed;
  }

  getStats(): QueueStats {
    return {
      pushed: this.pushed,
      pending: this.items.length,
      delivered: this.delivered,
    };
  }
}
