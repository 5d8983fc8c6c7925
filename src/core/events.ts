import type { Logger } from 'pino';
import type { HotReloadEvent } from './types.js';

export type OverflowPolicy = 'drop-oldest' | 'backpressure';

export interface SubscribeOptions {
  name?: string;
  capacity?: number;
  policy?: OverflowPolicy;
}

type Waiter<T> = (value: T | undefined) => void;

/**
 * A single subscriber's bounded queue. Consumed with `next()` or `for await`.
 * `next()` resolves `undefined` once the subscription is closed and drained.
 */
export class Subscription<E> implements AsyncIterable<E> {
  private queue: E[] = [];
  private readers: Array<Waiter<E>> = [];
  private writers: Array<() => void> = [];
  private closed = false;
  dropped = 0;

  constructor(
    readonly name: string,
    readonly capacity: number,
    readonly policy: OverflowPolicy,
    private readonly detach: (sub: Subscription<E>) => void
  ) {}

  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Resolves once the event is queued (immediately unless under backpressure).
   * Resolves `true` when an older event was dropped to make room.
   */
  async offer(event: E): Promise<boolean> {
    if (this.closed) return false;
    const reader = this.readers.shift();
    if (reader) {
      reader(event);
      return false;
    }
    let dropped = false;
    while (this.queue.length >= this.capacity) {
      if (this.policy === 'drop-oldest') {
        this.queue.shift();
        this.dropped++;
        dropped = true;
        break;
      }
      await new Promise<void>((resolve) => this.writers.push(resolve));
      if (this.closed) return false;
    }
    this.queue.push(event);
    return dropped;
  }

  next(): Promise<E | undefined> {
    const event = this.queue.shift();
    if (event !== undefined) {
      this.writers.shift()?.();
      return Promise.resolve(event);
    }
    if (this.closed) return Promise.resolve(undefined);
    return new Promise((resolve) => this.readers.push(resolve));
  }

  /** Takes everything queued right now without waiting. */
  drain(): E[] {
    const events = this.queue;
    this.queue = [];
    for (const w of this.writers.splice(0)) w();
    return events;
  }

  unsubscribe(): void {
    if (this.closed) return;
    this.closed = true;
    this.detach(this);
    for (const r of this.readers.splice(0)) r(undefined);
    for (const w of this.writers.splice(0)) w();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<E> {
    for (;;) {
      const event = await this.next();
      if (event === undefined) return;
      yield event;
    }
  }
}

/**
 * In-process publish/subscribe. Every subscriber sees every event in publish
 * order; publishes are delivered one at a time.
 */
export class EventBus<E = HotReloadEvent> {
  private subscribers = new Set<Subscription<E>>();
  private tail: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(
    private readonly log: Logger,
    private readonly defaults: { capacity: number; policy: OverflowPolicy } = { capacity: 256, policy: 'drop-oldest' }
  ) {}

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  subscribe(options: SubscribeOptions = {}): Subscription<E> {
    const sub = new Subscription<E>(
      options.name ?? `sub-${this.subscribers.size + 1}`,
      options.capacity ?? this.defaults.capacity,
      options.policy ?? this.defaults.policy,
      (s) => this.subscribers.delete(s)
    );
    if (this.closed) {
      sub.unsubscribe();
      return sub;
    }
    this.subscribers.add(sub);
    return sub;
  }

  /**
   * Subscribes and pumps events into `handler` until unsubscribed. A throwing
   * handler is logged and does not stop delivery.
   */
  on(handler: (event: E) => void | Promise<void>, options: SubscribeOptions = {}): Subscription<E> {
    const sub = this.subscribe(options);
    const pump = async () => {
      for await (const event of sub) {
        try {
          await handler(event);
        } catch (err) {
          this.log.error({ err, subscriber: sub.name }, 'event handler failed');
        }
      }
    };
    pump().catch((err: unknown) => this.log.error({ err, subscriber: sub.name }, 'event pump failed'));
    return sub;
  }

  publish(event: E): Promise<void> {
    if (this.closed) return Promise.resolve();
    const deliver = async () => {
      for (const sub of [...this.subscribers]) {
        if (await sub.offer(event)) {
          this.log.debug({ subscriber: sub.name, dropped: sub.dropped }, 'subscriber lagging, dropped oldest');
        }
      }
    };
    const delivery = this.tail.then(deliver);
    // The chain outlives a failed delivery; the caller still sees the rejection.
    this.tail = delivery.catch((err: unknown) => this.log.debug({ err }, 'Delivery failed; later events still flow'));
    return delivery;
  }

  /** Publish for callers that cannot wait; a failed delivery is logged. */
  emit(event: E): void {
    this.publish(event).catch((err: unknown) => this.log.error({ err }, 'Event delivery failed'));
  }

  close(): void {
    this.closed = true;
    for (const sub of [...this.subscribers]) sub.unsubscribe();
  }
}

/** Fixed-size buffer of the most recent events, oldest first. */
export class EventRing<E = HotReloadEvent> {
  private buffer: E[] = [];

  constructor(private readonly maxSize: number) {}

  push(evt: E): void {
    if (this.buffer.length >= this.maxSize) {
      this.buffer.shift();
    }
    this.buffer.push(evt);
  }

  toArray(): E[] {
    return [...this.buffer];
  }
}
