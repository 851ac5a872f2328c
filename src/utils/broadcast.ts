/**
 * Broadcast Channel
 *
 * Fans each published item out to every open subscription.
 *
 * Each subscription either:
 * - has a sink: `publish` hands the item to `sink.deliver()` directly
 *   (used by the SSE route, which writes straight to the socket)
 * - has no sink: items queue up and are consumed with `for await`
 *
 * State machine per subscription: open -> closed (terminal).
 * A subscription closes on unsubscribe, consumer disconnect, a throwing sink,
 * or when its queue (or a sink's reported backlog) reaches `maxPending` (saturated).
 *
 * A failing subscription never affects the others or the publisher.
 * Subscriptions created after a publish do not receive that item.
 */

import { randomUUID } from 'crypto';

export type SubscriptionState = 'open' | 'closed';

export type CloseReason = 'unsubscribed' | 'disconnected' | 'delivery_failed' | 'saturated' | 'shutdown';

export interface DeliverySink<T> {
  /** Deliver one item. Throwing closes the subscription. */
  deliver(item: T): void;
  /** Items accepted but not yet flushed to the consumer */
  backlog?(): number;
  /** Called once when the subscription closes */
  close?(reason: CloseReason): void;
}

export interface SubscribeOptions<T> {
  sink?: DeliverySink<T>;
  /** Queue limit, or backlog limit for sinks that report one */
  maxPending?: number;
}

export interface BroadcastStats {
  active: number;
  published: number;
  delivered: number;
  failures: number;
  saturations: number;
}

const DEFAULT_MAX_PENDING = 256;

export class SubscriptionSaturatedError extends Error {
  constructor(readonly subscriptionId: string, readonly pending: number) {
    super(`Subscription ${subscriptionId} has ${pending} undelivered items`);
    this.name = 'SubscriptionSaturatedError';
  }
}

type CloseListener = (reason: CloseReason) => void;

export class Subscription<T> implements AsyncIterable<T> {
  readonly id = randomUUID();
  private _state: SubscriptionState = 'open';
  private _closeReason: CloseReason | undefined;
  private readonly pending: T[] = [];
  private waiter: ((result: IteratorResult<T, undefined>) => void) | undefined;
  private readonly closeListeners: CloseListener[] = [];

  constructor(
    private readonly sink: DeliverySink<T> | undefined,
    private readonly maxPending: number
  ) {}

  get state(): SubscriptionState {
    return this._state;
  }

  get closeReason(): CloseReason | undefined {
    return this._closeReason;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  /**
   * Hand one item to the consumer. Throws if the sink fails or the queue is full.
   */
  deliver(item: T): void {
    if (this._state === 'closed') {
      return;
    }

    if (this.sink) {
      const backlog = this.sink.backlog?.() ?? 0;
      if (backlog >= this.maxPending) {
        throw new SubscriptionSaturatedError(this.id, backlog);
      }
      this.sink.deliver(item);
      return;
    }

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = undefined;
      resolve({ value: item, done: false });
      return;
    }

    if (this.pending.length >= this.maxPending) {
      throw new SubscriptionSaturatedError(this.id, this.pending.length);
    }
    this.pending.push(item);
  }

  /**
   * Wait for the next item. Resolves with `done` once closed and drained.
   */
  next(): Promise<IteratorResult<T, undefined>> {
    const item = this.pending.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this._state === 'closed') {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.waiter) {
      return Promise.reject(new Error(`Subscription ${this.id} already has a pending read`));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close('unsubscribed');
        return { value: undefined, done: true };
      },
    };
  }

  onClose(listener: CloseListener): void {
    if (this._state === 'closed' && this._closeReason) {
      listener(this._closeReason);
      return;
    }
    this.closeListeners.push(listener);
  }

  /**
   * Close the subscription. Idempotent; only the first reason sticks.
   */
  close(reason: CloseReason = 'unsubscribed'): void {
    if (this._state === 'closed') {
      return;
    }
    this._state = 'closed';
    this._closeReason = reason;

    // Queued items are dropped, a pending read ends now
    this.pending.length = 0;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = undefined;
      resolve({ value: undefined, done: true });
    }

    this.sink?.close?.(reason);
    for (const listener of this.closeListeners.splice(0)) {
      listener(reason);
    }
  }
}

export class BroadcastChannel<T> {
  private readonly subscriptions = new Set<Subscription<T>>();
  private published = 0;
  private delivered = 0;
  private failures = 0;
  private saturations = 0;

  constructor(private readonly defaultMaxPending: number = DEFAULT_MAX_PENDING) {}

  get size(): number {
    return this.subscriptions.size;
  }

  subscribe(options: SubscribeOptions<T> = {}): Subscription<T> {
    const subscription = new Subscription<T>(options.sink, options.maxPending ?? this.defaultMaxPending);
    this.subscriptions.add(subscription);
    subscription.onClose(() => {
      this.subscriptions.delete(subscription);
    });
    return subscription;
  }

  unsubscribe(subscription: Subscription<T>): void {
    subscription.close('unsubscribed');
  }

  /**
   * Deliver to every subscription open right now.
   * Returns how many received the item.
   */
  publish(item: T): number {
    this.published++;
    let count = 0;

    // Iterate a copy: delivery can close (and remove) subscriptions
    for (const subscription of Array.from(this.subscriptions)) {
      if (subscription.state !== 'open') {
        continue;
      }
      try {
        subscription.deliver(item);
        count++;
      } catch (err) {
        if (err instanceof SubscriptionSaturatedError) {
          this.saturations++;
          subscription.close('saturated');
        } else {
          this.failures++;
          subscription.close('delivery_failed');
        }
      }
    }

    this.delivered += count;
    return count;
  }

  closeAll(reason: CloseReason = 'shutdown'): void {
    for (const subscription of Array.from(this.subscriptions)) {
      subscription.close(reason);
    }
  }

  stats(): BroadcastStats {
    return {
      active: this.subscriptions.size,
      published: this.published,
      delivered: this.delivered,
      failures: this.failures,
      saturations: this.saturations,
    };
  }
}
