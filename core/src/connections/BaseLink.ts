import EventEmitter from 'eventemitter3';
import { ITransportLink } from '../interfaces/TransportLink';
import { TransportKind } from '../types';
import { ErrorHandler, TransportIOError, TransportOpenError } from '../utils/error-handler';
import { Logger } from '../utils/logger';

export interface LinkTimeouts {
  connectTimeoutMs: number;
  sendTimeoutMs: number;
  receiveTimeoutMs: number;
}

export interface TrafficEntry {
  direction: 'out' | 'in';
  hex: string;
  timestamp: Date;
}

interface LinkEvents {
  data: [chunk: Buffer];
  lost: [error: Error];
}

interface PendingRead {
  resolve: (chunk: Buffer) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

const HISTORY_LIMIT = 100;
/** Unread chunks kept while nobody is receiving; older ones are dropped. */
export const INBOUND_LIMIT = 64;

/**
 * Shared plumbing for transport links: inbound chunk buffering, bounded
 * send/receive, lost-handle detection and a short traffic history. Variants
 * only implement opening, closing and writing their handle.
 */
export abstract class BaseLink extends EventEmitter<LinkEvents> implements ITransportLink {
  abstract readonly kind: TransportKind;
  abstract readonly description: string;

  protected alive = false;
  protected logger: Logger;
  private inbound: Buffer[] = [];
  private readers: PendingRead[] = [];
  private history: TrafficEntry[] = [];

  constructor(protected readonly timeouts: LinkTimeouts, context: string) {
    super();
    this.logger = new Logger(context);
  }

  protected abstract openHandle(): Promise<void>;
  protected abstract closeHandle(): Promise<void>;
  protected abstract write(bytes: Buffer): Promise<void>;

  async open(): Promise<void> {
    if (this.alive) return;
    this.inbound = [];
    try {
      await this.openHandle();
    } catch (error) {
      if (error instanceof TransportOpenError) throw error;
      const cause = ErrorHandler.toError(error);
      throw new TransportOpenError('Unknown', `Failed to open ${this.description}: ${cause.message}`);
    }
    this.alive = true;
    this.logger.debug(`Opened ${this.description}`);
  }

  async close(): Promise<void> {
    const wasAlive = this.alive;
    this.alive = false;
    this.failReaders(new TransportIOError(`${this.description} closed`));
    this.inbound = [];
    await this.closeHandle();
    if (wasAlive) this.logger.debug(`Closed ${this.description}`);
  }

  async send(bytes: Buffer): Promise<void> {
    if (!this.alive) {
      throw new TransportIOError(`${this.description} is not open`);
    }
    this.logTraffic('out', bytes);
    try {
      await this.withTimeout(
        this.write(bytes),
        this.timeouts.sendTimeoutMs,
        () => new TransportIOError(`Send timed out after ${this.timeouts.sendTimeoutMs}ms`)
      );
    } catch (error) {
      throw ErrorHandler.asTransportIOError(error, `Send on ${this.description} failed`);
    }
  }

  receive(timeoutMs: number = this.timeouts.receiveTimeoutMs): Promise<Buffer> {
    const chunk = this.inbound.shift();
    if (chunk) return Promise.resolve(chunk);
    if (!this.alive) {
      return Promise.reject(new TransportIOError(`${this.description} is not open`));
    }

    return new Promise<Buffer>((resolve, reject) => {
      const reader: PendingRead = {
        resolve,
        reject,
        timer: setTimeout(() => {
          this.readers = this.readers.filter((r) => r !== reader);
          reject(new TransportIOError(`No reply within ${timeoutMs}ms`, { timeoutMs }));
        }, timeoutMs),
      };
      this.readers.push(reader);
    });
  }

  isAlive(): boolean {
    return this.alive;
  }

  discardInbound(): void {
    this.inbound = [];
  }

  onLost(listener: (error: Error) => void): () => void {
    this.on('lost', listener);
    return () => {
      this.off('lost', listener);
    };
  }

  getTrafficHistory(): TrafficEntry[] {
    return [...this.history];
  }

  protected pushInbound(chunk: Buffer): void {
    this.logTraffic('in', chunk);
    this.emit('data', chunk);
    const reader = this.readers.shift();
    if (reader) {
      clearTimeout(reader.timer);
      reader.resolve(chunk);
    } else {
      this.inbound.push(chunk);
      if (this.inbound.length > INBOUND_LIMIT) {
        const dropped = this.inbound.shift();
        this.logger.debug(`Dropped unread chunk ${dropped?.toString('hex') ?? ''}`);
      }
    }
  }

  /** The handle failed or vanished while the link was open. */
  protected handleLost(error: Error): void {
    if (!this.alive) return;
    this.alive = false;
    this.logger.warn(`Lost ${this.description}: ${error.message}`);
    this.failReaders(ErrorHandler.asTransportIOError(error, `${this.description} lost`));
    this.emit('lost', error);
  }

  protected withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => reject(onTimeout()), ms);
      promise.then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }

  private failReaders(error: Error): void {
    const readers = this.readers;
    this.readers = [];
    for (const reader of readers) {
      clearTimeout(reader.timer);
      reader.reject(error);
    }
  }

  private logTraffic(direction: TrafficEntry['direction'], bytes: Buffer): void {
    this.history.push({ direction, hex: bytes.toString('hex'), timestamp: new Date() });

    // Keep only the most recent frames
    if (this.history.length > HISTORY_LIMIT) {
      this.history.shift();
    }
  }
}
