/**
 * Single-consumer outbox queue.
 *
 * Synchronous callbacks (event handlers) push into the queue; one async
 * consumer drains it in push order. push() never depends on the consumer
 * being ready and never drops an item.
 */

import { PipelineError } from "./errors.js";

export type QueueHandler<T> = (item: T) => void | Promise<void>;

export class EventQueue<T> {
  private readonly items: T[] = [];
  private wake: (() => void) | undefined;
  private closed = false;
  private consumer: Promise<void> | undefined;

  /**
   * @param onHandlerError - called when the consumer's handler throws; the
   *   item is considered delivered and draining continues
   */
  constructor(private readonly onHandlerError: (err: unknown, item: T) => void) {}

  push(item: T): void {
    if (this.closed) {
      throw new PipelineError("Cannot push to a closed queue");
    }
    this.items.push(item);
    this.notify();
  }

  /**
   * Start the consumer loop. Only one consumer may run per queue.
   *
   * @returns a promise that settles once the queue is closed and drained
   */
  consume(handler: QueueHandler<T>): Promise<void> {
    if (this.consumer) {
      throw new PipelineError("Queue already has a consumer");
    }
    this.consumer = this.loop(handler);
    return this.consumer;
  }

  /**
   * Stop accepting items and wait until everything pushed so far is delivered.
   */
  async close(): Promise<void> {
    this.closed = true;
    this.notify();
    if (this.consumer) {
      await this.consumer;
    }
  }

  get pending(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = undefined;
    wake?.();
  }

  private async loop(handler: QueueHandler<T>): Promise<void> {
    for (;;) {
      while (this.items.length > 0) {
        const [item] = this.items.splice(0, 1);
        try {
          await handler(item);
        } catch (err) {
          this.onHandlerError(err, item);
        }
      }

      if (this.closed) {
        return;
      }

      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }
}
