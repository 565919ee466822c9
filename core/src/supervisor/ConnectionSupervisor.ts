import { PacketCodec, StatusStream } from '../codec/PacketCodec';
import { Packet, StatusRecord } from '../codec/types';
import { StatusBus } from '../events/StatusBus';
import { ITransportLink } from '../interfaces/TransportLink';
import { SendQueue } from '../queue/SendQueue';
import { StatisticsTracker } from '../stats/StatisticsTracker';
import { ConnectionState, ControllerConfig } from '../types';
import {
  DecodeError,
  ErrorHandler,
  InvalidStateError,
  TransportIOError,
  TransportOpenError,
} from '../utils/error-handler';
import { Logger } from '../utils/logger';
import { backoffDelay } from './backoff';

export interface SupervisorDeps {
  config: ControllerConfig;
  link: ITransportLink;
  queue: SendQueue;
  codec: PacketCodec;
  stats: StatisticsTracker;
  bus: StatusBus;
}

const ALLOWED: Record<ConnectionState, readonly ConnectionState[]> = {
  [ConnectionState.Uninitialized]: [ConnectionState.Disconnected],
  [ConnectionState.Disconnected]: [ConnectionState.Connecting, ConnectionState.Uninitialized],
  [ConnectionState.Connecting]: [ConnectionState.Connected, ConnectionState.Failed],
  [ConnectionState.Connected]: [ConnectionState.Disconnecting, ConnectionState.Retrying],
  [ConnectionState.Retrying]: [
    ConnectionState.Retrying,
    ConnectionState.Connected,
    ConnectionState.Failed,
    ConnectionState.Disconnecting,
  ],
  [ConnectionState.Failed]: [
    ConnectionState.Connecting,
    ConnectionState.Suspended,
    ConnectionState.Disconnecting,
  ],
  [ConnectionState.Suspended]: [ConnectionState.Connecting, ConnectionState.Disconnecting],
  [ConnectionState.Disconnecting]: [ConnectionState.Disconnected],
};

interface TransitionInfo {
  attempt?: number;
  error?: Error;
}

/**
 * Owns the connection lifecycle: opening and handshaking the link, the sender
 * loop that drains the SendQueue, per-packet retries with backoff, reconnects
 * after failures and suspension once failures pile up.
 *
 * The failure count only resets when a packet reaches the device, so a link
 * that opens but never carries data still ends up suspended.
 */
export class ConnectionSupervisor {
  private state = ConnectionState.Uninitialized;
  private failures = 0;
  private stopRequested = false;
  private paused = false;
  private deviceBusy = false;
  private lostCause: TransportIOError | null = null;
  private connecting: Promise<void> | null = null;
  private disconnecting: Promise<void> | null = null;
  private sender: Promise<void> | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;
  private detachLost: (() => void) | null = null;
  private readonly statusStream: StatusStream;
  private readonly logger = new Logger('Supervisor');

  constructor(private readonly deps: SupervisorDeps) {
    this.statusStream = new StatusStream(deps.codec);
  }

  get connectionState(): ConnectionState {
    return this.state;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  /** Holds queued packets back; priority packets still go out. */
  pause(): void {
    if (this.paused) return;
    this.paused = true;
    this.deps.queue.cancelWaiters();
    this.logger.info('Sending paused');
  }

  resume(): void {
    if (!this.paused) return;
    this.paused = false;
    this.deps.queue.cancelWaiters();
    this.logger.info('Sending resumed');
  }

  initialize(): void {
    if (this.state !== ConnectionState.Uninitialized) return;
    this.detachLost = this.deps.link.onLost((error) => this.onLinkLost(error));
    this.transition(ConnectionState.Disconnected);
  }

  /**
   * Opens the link and starts draining the queue. Rejects with a
   * `TransportOpenError` when the attempt fails; automatic reconnects, if
   * enabled, are scheduled regardless.
   */
  async connect(): Promise<void> {
    switch (this.state) {
      case ConnectionState.Connected:
      case ConnectionState.Retrying:
        return;
      case ConnectionState.Connecting:
        return this.connecting ?? undefined;
      case ConnectionState.Uninitialized:
        throw new InvalidStateError('Controller is not initialized');
      case ConnectionState.Disconnecting:
        throw new InvalidStateError('Cannot connect while disconnecting');
      case ConnectionState.Suspended:
        this.failures = 0;
        break;
      default:
        break;
    }
    this.clearReconnectTimer();
    return this.startSession();
  }

  disconnect(): Promise<void> {
    if (!this.disconnecting) {
      this.disconnecting = this.teardown().finally(() => {
        this.disconnecting = null;
      });
    }
    return this.disconnecting;
  }

  async shutdown(): Promise<void> {
    if (this.state === ConnectionState.Uninitialized) return;
    await this.disconnect();
    this.deps.queue.clear();
    this.detachLost?.();
    this.detachLost = null;
    this.transition(ConnectionState.Uninitialized);
  }

  private startSession(): Promise<void> {
    const session = this.openSession().finally(() => {
      this.connecting = null;
    });
    this.connecting = session;
    return session;
  }

  private async openSession(): Promise<void> {
    const { link, config } = this.deps;
    this.stopRequested = false;
    this.lostCause = null;
    this.deviceBusy = false;
    this.transition(ConnectionState.Connecting);
    this.statusStream.reset();

    try {
      await link.open();
      if (config.handshake) await this.handshake();
    } catch (error) {
      await this.closeLinkQuietly();
      const openError =
        error instanceof TransportOpenError
          ? error
          : new TransportOpenError('Unknown', ErrorHandler.toError(error).message);
      this.enterFailed(openError);
      throw openError;
    }

    this.transition(ConnectionState.Connected);
    this.logger.success(`Connected to ${link.description}`);
    this.sender = this.runSender().catch((error: unknown) => {
      this.logger.error('Sender loop stopped unexpectedly', error);
    });
  }

  private async handshake(): Promise<void> {
    const hello = this.deps.codec.encode({ kind: 'getVersion' });
    try {
      await this.deps.link.send(hello.bytes);
      const status = await this.readStatus();
      this.logger.info(`Controller answered handshake: ${status.text}`);
    } catch (error) {
      throw new TransportOpenError(
        'HandshakeFailed',
        `No handshake reply from ${this.deps.link.description}: ${ErrorHandler.toError(error).message}`
      );
    }
  }

  private async teardown(): Promise<void> {
    if (this.connecting) {
      await this.connecting.catch((error: unknown) => {
        this.logger.debug(`Pending connect ended with: ${ErrorHandler.toError(error).message}`);
      });
    }
    if (this.state === ConnectionState.Disconnected || this.state === ConnectionState.Uninitialized) {
      return;
    }

    this.clearReconnectTimer();
    this.stopRequested = true;
    this.transition(ConnectionState.Disconnecting);
    this.deps.queue.cancelWaiters();
    this.wake?.();

    if (this.sender) await this.sender;
    this.sender = null;
    await this.closeLinkQuietly();
    this.transition(ConnectionState.Disconnected);
    this.logger.info(`Disconnected from ${this.deps.link.description}`);
  }

  private async runSender(): Promise<void> {
    const { queue } = this.deps;

    while (this.state === ConnectionState.Connected && !this.stopRequested) {
      const lost = this.lostCause;
      if (lost) {
        if (!(await this.retry(null, lost))) return;
        continue;
      }

      const packet = await queue.dequeue(this.paused);
      if (!packet) continue;
      if (this.stopRequested) {
        queue.restore(packet);
        return;
      }

      try {
        await this.transmit(packet);
      } catch (error) {
        if (this.stopRequested) {
          queue.restore(packet);
          return;
        }
        const delivered = await this.retry(packet, ErrorHandler.asTransportIOError(error, 'Send failed'));
        if (!delivered) return;
        continue;
      }
      this.markDelivered(packet);
    }
  }

  private async transmit(packet: Packet): Promise<void> {
    if (!packet.expectsReply) {
      await this.waitWhileBusy();
      if (this.stopRequested) throw new TransportIOError(`Send of ${packet.text} cancelled`);
    }
    await this.deps.link.send(packet.bytes);
    if (packet.expectsReply) await this.readStatus();
  }

  /** Polls the list status until the device stops reporting busy. */
  private async waitWhileBusy(): Promise<void> {
    const { codec, link, config } = this.deps;
    while (this.deviceBusy && !this.stopRequested) {
      await this.sleep(config.busyPollIntervalMs);
      if (this.stopRequested) return;
      await link.send(codec.encode({ kind: 'getListStatus' }).bytes);
      await this.readStatus();
    }
  }

  /**
   * Reopens the link up to `retryLimit` times and re-sends `packet`, if any.
   * Returns false when the supervisor stopped or gave up; an undelivered
   * packet is put back on the queue.
   */
  private async retry(packet: Packet | null, cause: TransportIOError): Promise<boolean> {
    const { config, queue, stats, bus, link } = this.deps;
    const subject = packet ? packet.text : `link to ${link.description}`;
    this.lostCause = null;
    this.logger.warn(`${packet ? `Send of ${packet.text}` : 'Link'} failed: ${cause.message}`);
    bus.publish('error', cause);

    let lastError: Error = cause;
    for (let attempt = 1; attempt <= config.retryLimit; attempt++) {
      stats.record({ type: 'retry' });
      this.transition(ConnectionState.Retrying, { attempt, error: lastError });
      await this.closeLinkQuietly();
      await this.sleep(backoffDelay(config.backoffPolicy, attempt));
      if (this.stopRequested) {
        if (packet) queue.restore(packet);
        return false;
      }

      try {
        await link.open();
        link.discardInbound();
        this.statusStream.reset();
        this.deviceBusy = false;
        if (packet) await this.transmit(packet);
      } catch (error) {
        if (this.stopRequested) {
          if (packet) queue.restore(packet);
          return false;
        }
        lastError = ErrorHandler.toError(error);
        this.logger.warn(`Retry ${attempt}/${config.retryLimit} failed: ${lastError.message}`);
        continue;
      }

      if (packet) this.markDelivered(packet);
      if (this.stopRequested) return false;
      this.transition(ConnectionState.Connected);
      this.logger.success(`Recovered on attempt ${attempt}`);
      return true;
    }

    if (packet) queue.restore(packet);
    await this.closeLinkQuietly();
    this.enterFailed(
      new TransportIOError(`Giving up on ${subject} after ${config.retryLimit} retries: ${lastError.message}`, {
        sequence: packet?.sequence,
        retries: config.retryLimit,
      })
    );
    return false;
  }

  private markDelivered(packet: Packet): void {
    this.failures = 0;
    this.deps.queue.acknowledge(packet);
    this.deps.stats.record({ type: 'sent', text: packet.text });
    this.deps.bus.publish('packetText', packet.text);
  }

  /** Reads chunks until a complete status frame arrives or the receive timeout elapses. */
  private async readStatus(): Promise<StatusRecord> {
    const { link, config, stats, bus } = this.deps;
    const deadline = Date.now() + config.receiveTimeoutMs;
    let status: StatusRecord | null = null;

    while (!status) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new TransportIOError(`No status reply within ${config.receiveTimeoutMs}ms`);
      }
      const chunk = await link.receive(remaining);
      for (const result of this.statusStream.push(chunk)) {
        if (result instanceof DecodeError) {
          stats.record({ type: 'decodeError' });
          bus.publish('error', result);
          this.logger.warn(`Discarded malformed status bytes: ${result.message}`);
          continue;
        }
        stats.record({ type: 'received' });
        this.deviceBusy = result.busy;
        bus.publish('deviceStatus', result);
        status = status ?? result;
      }
    }
    return status;
  }

  private enterFailed(error: Error): void {
    const { config, stats, bus } = this.deps;
    this.failures++;
    stats.record({ type: 'connectionError' });
    bus.publish('error', error);
    this.logger.error(`Connection failed (${this.failures} in a row): ${ErrorHandler.formatError(error)}`);
    this.transition(ConnectionState.Failed, { error });

    if (this.failures >= config.suspendThreshold) {
      this.transition(ConnectionState.Suspended, { error });
      this.logger.warn('Automatic reconnection suspended; call connect() to try again');
      return;
    }
    if (config.autoReconnect) this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    this.clearReconnectTimer();
    const delay = backoffDelay(this.deps.config.backoffPolicy, this.failures);
    this.logger.info(`Reconnecting in ${delay}ms`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.state !== ConnectionState.Failed) return;
      this.startSession().catch((error: unknown) => {
        this.logger.debug(`Reconnect attempt failed: ${ErrorHandler.toError(error).message}`);
      });
    }, delay);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  /** Backoff wait that `disconnect()` can cut short. */
  private sleep(ms: number): Promise<void> {
    if (this.stopRequested) return Promise.resolve();
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }

  private async closeLinkQuietly(): Promise<void> {
    try {
      await this.deps.link.close();
    } catch (error) {
      this.logger.warn(`Closing ${this.deps.link.description} failed: ${ErrorHandler.toError(error).message}`);
    }
  }

  /** A link lost while connected goes through the retry path, idle or not. */
  private onLinkLost(error: Error): void {
    if (this.state !== ConnectionState.Connected || this.stopRequested) return;
    this.lostCause = ErrorHandler.asTransportIOError(error, `${this.deps.link.description} lost`);
    this.deps.queue.cancelWaiters();
  }

  private transition(next: ConnectionState, info: TransitionInfo = {}): void {
    const previous = this.state;
    if (!ALLOWED[previous].includes(next)) {
      throw new InvalidStateError(`Illegal transition ${previous} -> ${next}`, { previous, next });
    }
    this.state = next;
    this.logger.debug(`${previous} -> ${next}`);
    this.deps.bus.publish('connectionState', {
      state: next,
      previous,
      text: this.describe(next, info.attempt),
      ...info,
    });
  }

  private describe(state: ConnectionState, attempt?: number): string {
    const target = this.deps.link.description;
    switch (state) {
      case ConnectionState.Uninitialized:
        return 'Not initialized';
      case ConnectionState.Disconnected:
        return 'Disconnected';
      case ConnectionState.Connecting:
        return `Connecting to ${target}`;
      case ConnectionState.Connected:
        return `Connected to ${target}`;
      case ConnectionState.Retrying:
        return `Retrying ${target} (attempt ${attempt ?? 1}/${this.deps.config.retryLimit})`;
      case ConnectionState.Failed:
        return `Connection to ${target} failed`;
      case ConnectionState.Suspended:
        return `Suspended after ${this.failures} consecutive failures`;
      case ConnectionState.Disconnecting:
        return `Disconnecting from ${target}`;
    }
  }
}
