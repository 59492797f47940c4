/**
 * Single-consumer FIFO in front of one session.
 *
 * Producers push from anywhere (HTTP handlers, adapters, the watchdog);
 * events are handed to the consumer one at a time, in push order. A push
 * made while an event is being consumed queues behind it instead of
 * re-entering the consumer.
 */
export class EventChannel<T> {
  private readonly queue: T[] = [];
  private readonly consumer: (event: T) => void;
  private draining = false;
  private delivered = 0;

  constructor(consumer: (event: T) => void) {
    this.consumer = consumer;
  }

  push(event: T): void {
    this.queue.push(event);
    if (this.draining) return;

    this.draining = true;
    // a failing event does not strand the ones queued behind it; the first
    // failure is rethrown once the queue is empty
    let failure: { error: unknown } | null = null;
    try {
      for (let next = this.queue.shift(); next !== undefined; next = this.queue.shift()) {
        try {
          this.consumer(next);
          this.delivered++;
        } catch (err) {
          failure ??= { error: err };
        }
      }
    } finally {
      this.draining = false;
    }
    if (failure) throw failure.error;
  }

  get pending(): number {
    return this.queue.length;
  }

  get deliveredCount(): number {
    return this.delivered;
  }
}
