import { StatusRecord } from '../codec/types';
import { ConnectionState } from '../types';
import { Logger } from '../utils/logger';

export interface ConnectionStateEvent {
  state: ConnectionState;
  previous: ConnectionState;
  text: string;
  /** Retry attempt, present on `retrying` events. */
  attempt?: number;
  error?: Error;
}

export interface BufferOccupancyEvent {
  bufferedBytes: number;
  maxBufferBytes: number;
  queueLength: number;
}

export interface StatusTopics {
  connectionState: ConnectionStateEvent;
  packetText: string;
  bufferOccupancy: BufferOccupancyEvent;
  deviceStatus: StatusRecord;
  error: Error;
}

export type Topic = keyof StatusTopics;

export type StatusHandler<T extends Topic> = (payload: StatusTopics[T]) => void | Promise<void>;

export interface SubscribeOptions {
  /** Events held for a busy subscriber before further ones are dropped. */
  capacity?: number;
}

export interface Subscription {
  unsubscribe(): void;
  readonly dropped: number;
}

export const DEFAULT_SUBSCRIBER_CAPACITY = 64;

class Subscriber<T extends Topic> implements Subscription {
  private backlog: Array<StatusTopics[T]> = [];
  private busy = false;
  private active = true;
  dropped = 0;

  constructor(
    private readonly handler: StatusHandler<T>,
    private readonly capacity: number,
    private readonly detach: () => void,
    private readonly logger: Logger
  ) {}

  offer(payload: StatusTopics[T]): void {
    if (!this.active) return;
    if (this.busy) {
      if (this.backlog.length >= this.capacity) {
        this.dropped++;
        return;
      }
      this.backlog.push(payload);
      return;
    }
    this.deliver(payload);
  }

  unsubscribe(): void {
    this.active = false;
    this.backlog = [];
    this.detach();
  }

  private deliver(payload: StatusTopics[T]): void {
    let result: void | Promise<void>;
    try {
      result = this.handler(payload);
    } catch (error) {
      this.logger.error('Subscriber threw', error);
      return;
    }
    if (result instanceof Promise) {
      this.busy = true;
      result
        .catch((error: unknown) => this.logger.error('Subscriber rejected', error))
        .finally(() => this.drain());
    }
  }

  private drain(): void {
    this.busy = false;
    while (this.active && !this.busy) {
      const next = this.backlog.shift();
      if (next === undefined) return;
      this.deliver(next);
    }
  }
}

/**
 * Typed publish/subscribe hub for controller status. Publishing never blocks:
 * a subscriber whose async handler is still running buffers up to its
 * capacity and drops the rest.
 */
export class StatusBus {
  private subscribers: { [T in Topic]: Set<Subscriber<T>> } = {
    connectionState: new Set(),
    packetText: new Set(),
    bufferOccupancy: new Set(),
    deviceStatus: new Set(),
    error: new Set(),
  };
  private logger = new Logger('StatusBus');

  subscribe<T extends Topic>(
    topic: T,
    handler: StatusHandler<T>,
    options: SubscribeOptions = {}
  ): Subscription {
    const capacity = options.capacity ?? DEFAULT_SUBSCRIBER_CAPACITY;
    const set: Set<Subscriber<T>> = this.subscribers[topic];
    const subscriber: Subscriber<T> = new Subscriber(
      handler,
      Math.max(0, capacity),
      () => set.delete(subscriber),
      this.logger
    );
    set.add(subscriber);
    return subscriber;
  }

  publish<T extends Topic>(topic: T, payload: StatusTopics[T]): void {
    const set: Set<Subscriber<T>> = this.subscribers[topic];
    for (const subscriber of [...set]) {
      subscriber.offer(payload);
    }
  }

  subscriberCount(topic: Topic): number {
    return this.subscribers[topic].size;
  }
}
