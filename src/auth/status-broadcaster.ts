/**
 * Replay-latest status broadcaster
 *
 * New subscribers receive the current value synchronously from `subscribe`.
 * Every later value is queued per subscriber and delivered on a microtask,
 * so the publisher never runs subscriber code and a slow or throwing
 * subscriber cannot hold up the others. Each subscriber sees values in
 * publication order, none skipped.
 */

import createDebug from 'debug';
import { InvalidOperationError, assertPresent } from './auth-errors.js';

const debug = createDebug('auth-session:status');

export interface StatusObserver<T> {
  next(value: T): void;
  complete?(): void;
}

export type StatusListener<T> = StatusObserver<T> | ((value: T) => void);

export interface StatusSubscription {
  unsubscribe(): void;
  readonly closed: boolean;
}

/**
 * Read side of a broadcaster
 */
export interface StatusFeed<T> {
  subscribe(listener: StatusListener<T>): StatusSubscription;
}

export interface StatusBroadcasterOptions<T> {
  /** Receives errors thrown by subscribers; traced on `auth-session:status` when absent */
  onListenerError?: (error: unknown, value: T | undefined) => void;
}

type Delivery<T> = { kind: 'next'; value: T } | { kind: 'complete' };

class Subscriber<T> implements StatusSubscription {
  private readonly queue: Delivery<T>[] = [];
  private scheduled = false;
  private active = true;

  constructor(
    private readonly observer: StatusObserver<T>,
    private readonly owner: StatusBroadcaster<T>
  ) {}

  get closed(): boolean {
    return !this.active;
  }

  get pending(): number {
    return this.queue.length;
  }

  unsubscribe(): void {
    if (!this.active) {
      return;
    }
    this.active = false;
    this.queue.length = 0;
    this.owner.detach(this);
  }

  deliverNow(value: T): void {
    this.invoke({ kind: 'next', value });
  }

  enqueue(delivery: Delivery<T>): void {
    if (!this.active) {
      return;
    }
    this.queue.push(delivery);
    if (!this.scheduled) {
      this.scheduled = true;
      queueMicrotask(() => this.drain());
    }
  }

  private drain(): void {
    this.scheduled = false;
    while (this.active && this.queue.length > 0) {
      const delivery = this.queue.shift();
      if (delivery === undefined) {
        break;
      }
      if (delivery.kind === 'complete') {
        this.active = false;
        this.queue.length = 0;
      }
      this.invoke(delivery);
    }
    this.owner.settle();
  }

  private invoke(delivery: Delivery<T>): void {
    try {
      if (delivery.kind === 'next') {
        this.observer.next(delivery.value);
      } else {
        this.observer.complete?.();
      }
    } catch (error) {
      this.owner.reportListenerError(
        error,
        delivery.kind === 'next' ? delivery.value : undefined
      );
    }
  }
}

export class StatusBroadcaster<T> implements StatusFeed<T> {
  private value: T;
  private isClosed = false;
  private readonly subscribers = new Set<Subscriber<T>>();
  private readonly draining = new Set<Subscriber<T>>();
  private idleWaiters: Array<() => void> = [];
  private readonly onListenerError?: (error: unknown, value: T | undefined) => void;

  constructor(initial: T, options: StatusBroadcasterOptions<T> = {}) {
    this.value = initial;
    this.onListenerError = options.onListenerError;
  }

  get current(): T {
    return this.value;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  subscribe(listener: StatusListener<T>): StatusSubscription {
    assertPresent(listener, 'listener');
    const observer: StatusObserver<T> =
      typeof listener === 'function' ? { next: listener } : listener;
    const subscriber = new Subscriber(observer, this);

    if (this.isClosed) {
      // A finished stream only signals completion to late subscribers
      subscriber.enqueue({ kind: 'complete' });
      this.draining.add(subscriber);
      return subscriber;
    }

    this.subscribers.add(subscriber);
    subscriber.deliverNow(this.value);
    return subscriber;
  }

  publish(value: T): void {
    if (this.isClosed) {
      throw new InvalidOperationError('Cannot publish to a closed status broadcaster');
    }
    this.value = value;
    for (const subscriber of this.subscribers) {
      subscriber.enqueue({ kind: 'next', value });
      this.draining.add(subscriber);
    }
  }

  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    for (const subscriber of this.subscribers) {
      subscriber.enqueue({ kind: 'complete' });
      this.draining.add(subscriber);
    }
    this.subscribers.clear();
  }

  /**
   * Resolves once every queued delivery has been handed to its subscriber
   */
  whenIdle(): Promise<void> {
    if (this.draining.size === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.idleWaiters.push(resolve);
    });
  }

  /** @internal */
  detach(subscriber: Subscriber<T>): void {
    this.subscribers.delete(subscriber);
    if (this.draining.delete(subscriber)) {
      this.notifyIfIdle();
    }
  }

  /** @internal */
  settle(): void {
    for (const subscriber of this.draining) {
      if (subscriber.pending === 0) {
        this.draining.delete(subscriber);
      }
    }
    this.notifyIfIdle();
  }

  /** @internal */
  reportListenerError(error: unknown, value: T | undefined): void {
    if (this.onListenerError) {
      this.onListenerError(error, value);
      return;
    }
    debug(
      'Status subscriber threw: %s',
      error instanceof Error ? (error.stack ?? error.message) : String(error)
    );
  }

  private notifyIfIdle(): void {
    if (this.draining.size > 0 || this.idleWaiters.length === 0) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
