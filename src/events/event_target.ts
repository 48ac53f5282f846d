/**
 * @fileoverview Generic publish/subscribe bus
 *
 * EventTarget<T> delivers every emitted value to every registered handler,
 * synchronously and in emission order, and feeds any number of independent
 * EventStream views.
 *
 * Delivery works on a copy of the listener set taken at emit time, so a
 * handler may emit, subscribe or unsubscribe without disturbing the loop.
 * The flip side: a subscription removed while an emit is in flight still
 * receives that one value.
 */

import { randomUUID } from 'crypto';
import { logError } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { EventStream } from './event_stream.js';

export type EventHandler<T> = (value: T) => void;

/**
 * Registration handle. It is the only owner of the registration;
 * `unsubscribe` removes it exactly once.
 */
export class Subscription<T> {
  readonly id: string = randomUUID();
  private active: boolean;

  constructor(
    private readonly handler: EventHandler<T>,
    private readonly detach: (id: string) => void,
    active = true,
  ) {
    this.active = active;
  }

  isActive(): boolean {
    return this.active;
  }

  unsubscribe(): void {
    if (!this.active) return;
    this.active = false;
    this.detach(this.id);
  }

  /** @internal */
  deliver(value: T): void {
    this.handler(value);
  }
}

export class EventTarget<T> {
  private readonly listeners = new Map<string, Subscription<T>>();
  private readonly streams = new Set<EventStream<T>>();
  private defaultView: EventStream<T> | null = null;
  private disposed = false;

  /**
   * Publish `value` to every current handler, then to the default stream.
   * Handler errors are logged and do not stop delivery to the others.
   */
  emit(value: T): void {
    if (this.disposed) return;

    const snapshot = Array.from(this.listeners.values());
    for (const subscription of snapshot) {
      try {
        subscription.deliver(value);
      } catch (error: unknown) {
        logError('Event handler error', {
          subscription: subscription.id,
          error: getErrorMessage(error),
        });
      }
    }

    this.defaultView?.push(value);
  }

  subscribe(handler: EventHandler<T>): Subscription<T> {
    const subscription = new Subscription(
      handler,
      (id) => this.listeners.delete(id),
      !this.disposed,
    );
    if (!this.disposed) {
      this.listeners.set(subscription.id, subscription);
    }
    return subscription;
  }

  on(handler: EventHandler<T>): Subscription<T> {
    return this.subscribe(handler);
  }

  unsubscribe(subscription: Subscription<T>): void {
    subscription.unsubscribe();
  }

  off(subscription: Subscription<T>): void {
    subscription.unsubscribe();
  }

  /**
   * Run `fn` with a live subscription and remove it once `fn` settles.
   */
  async withSubscription<R>(
    handler: EventHandler<T>,
    fn: (subscription: Subscription<T>) => R | Promise<R>,
  ): Promise<R> {
    const subscription = this.subscribe(handler);
    try {
      return await fn(subscription);
    } finally {
      subscription.unsubscribe();
    }
  }

  /**
   * A fresh stream backed by its own subscription. It sees only values
   * emitted after this call.
   */
  asStream(): EventStream<T> {
    let subscription: Subscription<T> | null = null;
    const stream: EventStream<T> = new EventStream<T>(() => {
      subscription?.unsubscribe();
      this.streams.delete(stream);
    });

    if (this.disposed) {
      stream.close();
      return stream;
    }

    subscription = this.subscribe((value) => stream.push(value));
    this.streams.add(stream);
    return stream;
  }

  /**
   * The bus-owned stream view, opened on first call and fed by every later emit.
   */
  defaultStream(): EventStream<T> {
    if (!this.defaultView) {
      const view: EventStream<T> = new EventStream<T>(() => {
        if (this.defaultView === view) this.defaultView = null;
      });
      if (this.disposed) {
        view.close();
        return view;
      }
      this.defaultView = view;
    }
    return this.defaultView;
  }

  listenerCount(): number {
    return this.listeners.size;
  }

  /**
   * Drop every handler and complete every stream. Later emits do nothing.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    for (const subscription of Array.from(this.listeners.values())) {
      subscription.unsubscribe();
    }
    for (const stream of Array.from(this.streams)) {
      stream.close();
    }
    this.defaultView?.close();
  }

  isDisposed(): boolean {
    return this.disposed;
  }
}
