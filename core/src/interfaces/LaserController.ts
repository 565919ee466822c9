import { LaserCommand } from '../codec/types';
import { StatusHandler, SubscribeOptions, Subscription, Topic } from '../events/StatusBus';
import { ConnectionState, Statistics } from '../types';
import { BufferFullError } from '../utils/error-handler';

export type SendResult =
  | { accepted: true; sequence: number; bufferedBytes: number }
  | { accepted: false; reason: string; error: BufferFullError };

export interface SendOptions {
  /** Jump ahead of queued packets and go out even while paused. */
  priority?: boolean;
}

export interface ILaserController {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  send(command: LaserCommand, options?: SendOptions): SendResult;
  pause(): void;
  resume(): void;
  abort(): SendResult[];
  resetStatistics(): void;
  clearQueue(): void;
  shutdown(): Promise<void>;

  subscribe<T extends Topic>(topic: T, handler: StatusHandler<T>, options?: SubscribeOptions): Subscription;
  statistics(): Readonly<Statistics>;
  connectionState(): ConnectionState;
  queueLength(): number;
  isPaused(): boolean;
}
