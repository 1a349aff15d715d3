import { randomUUID } from 'node:crypto';
import type { Event } from '../../domain/event.js';
import type { EventQueue, QueuedEvent } from '../../application/stream-coordinator.js';

interface Waiter {
  resolve: () => void;
  timer: NodeJS.Timeout;
}

/**
 * Process-local EventQueue.
 *
 * Keeps the same at-least-once contract as the Redis queue: received
 * events stay in flight until acked, and `requeueUnacked()` hands them out
 * again (what a restart does with a stream's pending entries).
 */
export class InMemoryEventQueue implements EventQueue {
  private readonly pending: QueuedEvent[] = [];
  private readonly inFlight: Map<string, QueuedEvent> = new Map();
  private readonly waiters: Set<Waiter> = new Set();

  push(event: Event): string {
    const receipt = randomUUID();
    this.pending.push({ receipt, event });
    this.wake();
    return receipt;
  }

  async receive(max: number, timeoutMs: number): Promise<QueuedEvent[]> {
    if (this.pending.length === 0 && timeoutMs > 0) {
      await new Promise<void>((resolve) => {
        const waiter: Waiter = {
          resolve,
          timer: setTimeout(() => {
            this.waiters.delete(waiter);
            resolve();
          }, timeoutMs),
        };
        this.waiters.add(waiter);
      });
    }

    const batch = this.pending.splice(0, Math.max(0, max));
    for (const item of batch) this.inFlight.set(item.receipt, item);
    return batch;
  }

  async ack(receipt: string): Promise<void> {
    this.inFlight.delete(receipt);
  }

  async depth(): Promise<number> {
    return this.pending.length + this.inFlight.size;
  }

  /** Moves every unacked event back to the front of the queue. */
  requeueUnacked(): number {
    const items = [...this.inFlight.values()];
    this.inFlight.clear();
    this.pending.unshift(...items);
    if (items.length > 0) this.wake();
    return items.length;
  }

  get unackedCount(): number {
    return this.inFlight.size;
  }

  /** Releases blocked receivers so they return immediately. */
  close(): void {
    this.wake();
  }

  private wake(): void {
    for (const waiter of this.waiters) {
      clearTimeout(waiter.timer);
      waiter.resolve();
    }
    this.waiters.clear();
  }
}
