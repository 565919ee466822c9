import { PacketCodec } from '../codec/PacketCodec';
import { LaserCommand, Packet } from '../codec/types';
import { LinkFactory } from '../connections/LinkFactory';
import { StatusBus, StatusHandler, SubscribeOptions, Subscription, Topic } from '../events/StatusBus';
import { ILaserController, SendOptions, SendResult } from '../interfaces/LaserController';
import { ITransportLink } from '../interfaces/TransportLink';
import { SendQueue } from '../queue/SendQueue';
import { StatisticsTracker } from '../stats/StatisticsTracker';
import { ConnectionSupervisor } from '../supervisor/ConnectionSupervisor';
import { ConnectionState, ControllerConfig, Statistics } from '../types';
import { ConfigOverrides, resolveConfig } from '../config/config';
import { BufferFullError, EncodeError } from '../utils/error-handler';
import { Logger } from '../utils/logger';

export interface LaserControllerOptions {
  /** Replaces the link `LinkFactory` would build from the config. */
  link?: ITransportLink;
}

/**
 * Facade over the codec, send queue, supervisor, statistics and status bus.
 * `send` never blocks: a packet is either queued or rejected on the spot.
 */
export class LaserController implements ILaserController {
  readonly config: ControllerConfig;
  readonly link: ITransportLink;
  private readonly codec = new PacketCodec();
  private readonly stats = new StatisticsTracker();
  private readonly bus = new StatusBus();
  private readonly queue: SendQueue;
  private readonly supervisor: ConnectionSupervisor;
  private readonly logger = new Logger('LaserController');

  constructor(config: ConfigOverrides = {}, options: LaserControllerOptions = {}) {
    this.config = resolveConfig(config);
    this.link = options.link ?? LinkFactory.create(this.config);
    this.queue = new SendQueue(this.config.maxBufferBytes);

    this.queue.on('change', (bufferedBytes) => {
      this.stats.record({ type: 'buffer', bytes: bufferedBytes });
      this.bus.publish('bufferOccupancy', {
        bufferedBytes,
        maxBufferBytes: this.queue.maxBufferBytes,
        queueLength: this.queue.length,
      });
    });

    this.supervisor = new ConnectionSupervisor({
      config: this.config,
      link: this.link,
      queue: this.queue,
      codec: this.codec,
      stats: this.stats,
      bus: this.bus,
    });
    this.supervisor.initialize();
  }

  /** Brings a shut-down controller back to `disconnected`. */
  initialize(): void {
    this.supervisor.initialize();
  }

  connect(): Promise<void> {
    return this.supervisor.connect();
  }

  disconnect(): Promise<void> {
    return this.supervisor.disconnect();
  }

  shutdown(): Promise<void> {
    return this.supervisor.shutdown();
  }

  /**
   * Encodes and queues a command. Throws `EncodeError` for commands that
   * cannot be represented; a full buffer is reported in the result.
   */
  send(command: LaserCommand, options: SendOptions = {}): SendResult {
    const priority = options.priority ?? false;
    let packet: Packet;
    try {
      packet = this.codec.encode(command);
    } catch (error) {
      if (error instanceof EncodeError) {
        this.bus.publish('error', error);
      }
      throw error;
    }

    const result = this.queue.enqueue(packet, priority);
    if (result.accepted) {
      this.logger.debug(`Queued #${packet.sequence} ${packet.text}${priority ? ' (priority)' : ''}`);
      return { accepted: true, sequence: packet.sequence, bufferedBytes: result.bufferedBytes };
    }

    const error = new BufferFullError(packet.bytes.length, result.bufferedBytes, this.queue.maxBufferBytes);
    this.stats.record({ type: 'rejected' });
    this.bus.publish('error', error);
    this.logger.warn(`Rejected ${packet.text}: ${result.reason}`);
    return { accepted: false, reason: result.reason, error };
  }

  pause(): void {
    this.supervisor.pause();
  }

  resume(): void {
    this.supervisor.resume();
  }

  /**
   * Drops every queued packet. While a session is up, stop and laser-off
   * frames follow on the priority lane.
   */
  abort(): SendResult[] {
    this.queue.clear();
    this.logger.warn('Aborted: send queue cleared');
    const state = this.supervisor.connectionState;
    if (state !== ConnectionState.Connected && state !== ConnectionState.Retrying) return [];
    return [this.send({ kind: 'stop' }, { priority: true }), this.send({ kind: 'laserOff' }, { priority: true })];
  }

  resetStatistics(): void {
    this.stats.reset();
  }

  clearQueue(): void {
    this.queue.clear();
  }

  subscribe<T extends Topic>(topic: T, handler: StatusHandler<T>, options?: SubscribeOptions): Subscription {
    return this.bus.subscribe(topic, handler, options);
  }

  statistics(): Readonly<Statistics> {
    return this.stats.snapshot();
  }

  connectionState(): ConnectionState {
    return this.supervisor.connectionState;
  }

  queueLength(): number {
    return this.queue.length;
  }

  isPaused(): boolean {
    return this.supervisor.isPaused;
  }

  /** Consecutive connection failures since a packet last reached the device. */
  failureCount(): number {
    return this.supervisor.consecutiveFailures;
  }
}
