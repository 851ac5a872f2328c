import { describe, it, expect, vi } from 'vitest';
import { BroadcastChannel, CloseReason, DeliverySink } from '../utils/broadcast';

function recordingSink(received: number[]): DeliverySink<number> {
  return {
    deliver(item) {
      received.push(item);
    },
  };
}

describe('BroadcastChannel', () => {
  it('delivers each item to every open subscription', () => {
    const channel = new BroadcastChannel<number>();
    const a: number[] = [];
    const b: number[] = [];
    channel.subscribe({ sink: recordingSink(a) });
    channel.subscribe({ sink: recordingSink(b) });

    expect(channel.publish(1)).toBe(2);
    expect(channel.publish(2)).toBe(2);

    expect(a).toEqual([1, 2]);
    expect(b).toEqual([1, 2]);
  });

  it('isolates a failing subscription and closes it', () => {
    const channel = new BroadcastChannel<number>();
    const first: number[] = [];
    const third: number[] = [];
    const closeReasons: CloseReason[] = [];

    const ok1 = channel.subscribe({ sink: recordingSink(first) });
    const failing = channel.subscribe({
      sink: {
        deliver() {
          throw new Error('consumer gone');
        },
        close(reason) {
          closeReasons.push(reason);
        },
      },
    });
    const ok2 = channel.subscribe({ sink: recordingSink(third) });

    const delivered = channel.publish(42);

    expect(delivered).toBe(2);
    expect(first).toEqual([42]);
    expect(third).toEqual([42]);
    expect(failing.state).toBe('closed');
    expect(failing.closeReason).toBe('delivery_failed');
    expect(closeReasons).toEqual(['delivery_failed']);
    expect(ok1.state).toBe('open');
    expect(ok2.state).toBe('open');
    expect(channel.size).toBe(2);
    expect(channel.stats()).toEqual({ active: 2, published: 1, delivered: 2, failures: 1, saturations: 0 });
  });

  it('does not replay earlier items to a late subscriber', async () => {
    const channel = new BroadcastChannel<number>();
    channel.publish(1);

    const subscription = channel.subscribe();
    channel.publish(2);

    await expect(subscription.next()).resolves.toEqual({ value: 2, done: false });
    expect(subscription.pendingCount).toBe(0);
  });

  it('queues items in publish order for sink-less subscriptions', async () => {
    const channel = new BroadcastChannel<number>();
    const subscription = channel.subscribe();

    channel.publish(1);
    channel.publish(2);
    channel.publish(3);

    const received: number[] = [];
    for await (const item of subscription) {
      received.push(item);
      if (received.length === 3) break;
    }

    expect(received).toEqual([1, 2, 3]);
    // Leaving the loop early unsubscribes
    expect(subscription.state).toBe('closed');
    expect(subscription.closeReason).toBe('unsubscribed');
    expect(channel.size).toBe(0);
  });

  it('keeps a pending read waiting until the next publish', async () => {
    const channel = new BroadcastChannel<string>();
    const subscription = channel.subscribe();

    const pending = subscription.next();
    channel.publish('hello');

    await expect(pending).resolves.toEqual({ value: 'hello', done: false });
  });

  it('ends a pending read as soon as the subscription is closed', async () => {
    const channel = new BroadcastChannel<string>();
    const subscription = channel.subscribe();

    const pending = subscription.next();
    channel.unsubscribe(subscription);

    await expect(pending).resolves.toEqual({ value: undefined, done: true });
    await expect(subscription.next()).resolves.toEqual({ value: undefined, done: true });
    expect(channel.size).toBe(0);
  });

  it('closes a subscription that stops draining its queue', () => {
    const channel = new BroadcastChannel<number>();
    const hung = channel.subscribe({ maxPending: 2 });
    const healthy: number[] = [];
    channel.subscribe({ sink: recordingSink(healthy) });

    channel.publish(1);
    channel.publish(2);
    channel.publish(3);

    expect(hung.state).toBe('closed');
    expect(hung.closeReason).toBe('saturated');
    expect(healthy).toEqual([1, 2, 3]);
    expect(channel.stats().saturations).toBe(1);
    expect(channel.size).toBe(1);
  });

  it('closes a sink whose reported backlog reaches the limit', () => {
    const channel = new BroadcastChannel<number>(3);
    const accepted: number[] = [];
    const stuck = channel.subscribe({
      sink: {
        deliver(item) {
          accepted.push(item);
        },
        backlog() {
          return accepted.length;
        },
      },
    });

    for (let i = 1; i <= 5; i++) {
      channel.publish(i);
    }

    expect(accepted).toEqual([1, 2, 3]);
    expect(stuck.closeReason).toBe('saturated');
    expect(channel.stats()).toEqual({ active: 0, published: 5, delivered: 3, failures: 0, saturations: 1 });
  });

  it('uses the channel default queue limit', () => {
    const channel = new BroadcastChannel<number>(1);
    const subscription = channel.subscribe();

    channel.publish(1);
    expect(subscription.state).toBe('open');
    channel.publish(2);
    expect(subscription.state).toBe('closed');
  });

  it('stops delivering after unsubscribe and notifies close listeners once', () => {
    const channel = new BroadcastChannel<number>();
    const received: number[] = [];
    const subscription = channel.subscribe({ sink: recordingSink(received) });
    const listener = vi.fn();
    subscription.onClose(listener);

    channel.publish(1);
    channel.unsubscribe(subscription);
    subscription.close('disconnected');
    channel.publish(2);

    expect(received).toEqual([1]);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith('unsubscribed');
    expect(subscription.closeReason).toBe('unsubscribed');
  });

  it('calls a close listener registered after the subscription closed', () => {
    const channel = new BroadcastChannel<number>();
    const subscription = channel.subscribe();
    subscription.close('disconnected');

    const listener = vi.fn();
    subscription.onClose(listener);

    expect(listener).toHaveBeenCalledWith('disconnected');
  });

  it('closes everything on closeAll', () => {
    const channel = new BroadcastChannel<number>();
    const a = channel.subscribe();
    const b = channel.subscribe();

    channel.closeAll();

    expect(a.closeReason).toBe('shutdown');
    expect(b.closeReason).toBe('shutdown');
    expect(channel.size).toBe(0);
  });

  it('gives each subscription its own id', () => {
    const channel = new BroadcastChannel<number>();
    expect(channel.subscribe().id).not.toBe(channel.subscribe().id);
  });
});
