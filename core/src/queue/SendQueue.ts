import EventEmitter from 'eventemitter3';
import { Packet } from '../codec/types';

export type EnqueueResult =
  | { accepted: true; bufferedBytes: number }
  | { accepted: false; reason: string; bufferedBytes: number };

interface SendQueueEvents {
  change: [bufferedBytes: number];
}

interface Waiter {
  resolve: (packet: Packet | undefined) => void;
  priorityOnly: boolean;
}

/**
 * Bounded FIFO of encoded packets with a priority lane that is always served
 * first. Byte accounting covers both lanes and the packet currently in
 * flight, which stays counted until acknowledged.
 */
export class SendQueue extends EventEmitter<SendQueueEvents> {
  private queue: Packet[] = [];
  private urgent: Packet[] = [];
  private inFlight: Packet | null = null;
  private inFlightPriority = false;
  private bytes = 0;
  private waiters: Waiter[] = [];

  constructor(readonly maxBufferBytes: number) {
    super();
  }

  enqueue(packet: Packet, priority: boolean = false): EnqueueResult {
    const size = packet.bytes.length;
    if (this.bytes + size > this.maxBufferBytes) {
      return {
        accepted: false,
        reason: `buffer full (${this.bytes} + ${size} > ${this.maxBufferBytes} bytes)`,
        bufferedBytes: this.bytes,
      };
    }

    this.bytes += size;
    const index = this.waiters.findIndex((waiter) => priority || !waiter.priorityOnly);
    if (index >= 0) {
      const [waiter] = this.waiters.splice(index, 1);
      this.take(packet, priority);
      waiter.resolve(packet);
    } else {
      (priority ? this.urgent : this.queue).push(packet);
    }
    this.emit('change', this.bytes);
    return { accepted: true, bufferedBytes: this.bytes };
  }

  /**
   * Resolves the next packet, priority lane first, waiting while nothing is
   * eligible. With `priorityOnly` the normal lane is left untouched.
   */
  dequeue(priorityOnly: boolean = false): Promise<Packet | undefined> {
    const urgent = this.urgent.shift();
    if (urgent) {
      this.take(urgent, true);
      return Promise.resolve(urgent);
    }
    const packet = priorityOnly ? undefined : this.queue.shift();
    if (packet) {
      this.take(packet, false);
      return Promise.resolve(packet);
    }
    return new Promise((resolve) => this.waiters.push({ resolve, priorityOnly }));
  }

  acknowledge(packet: Packet): void {
    if (this.inFlight !== packet) return;
    this.inFlight = null;
    this.bytes -= packet.bytes.length;
    this.emit('change', this.bytes);
  }

  /** Puts an undelivered packet back at the head of its lane so it keeps its position. */
  restore(packet: Packet): void {
    if (this.inFlight !== packet) return;
    this.inFlight = null;
    (this.inFlightPriority ? this.urgent : this.queue).unshift(packet);
  }

  /** Wakes every pending `dequeue` with `undefined`. */
  cancelWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach((waiter) => waiter.resolve(undefined));
  }

  clear(): void {
    this.queue = [];
    this.urgent = [];
    this.bytes = this.inFlight ? this.inFlight.bytes.length : 0;
    this.emit('change', this.bytes);
  }

  get length(): number {
    return this.queue.length + this.urgent.length;
  }

  get bufferedBytes(): number {
    return this.bytes;
  }

  get hasInFlight(): boolean {
    return this.inFlight !== null;
  }

  private take(packet: Packet, priority: boolean): void {
    this.inFlight = packet;
    this.inFlightPriority = priority;
  }
}
