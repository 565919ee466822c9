import { TransportKind } from '../types';

export interface ITransportLink {
  readonly kind: TransportKind;
  readonly description: string;

  /** Throws `TransportOpenError` with a classified reason. */
  open(): Promise<void>;
  close(): Promise<void>;
  /** Throws `TransportIOError` on failure or timeout. */
  send(bytes: Buffer): Promise<void>;
  /** Next inbound chunk; throws `TransportIOError` on timeout or a lost handle. */
  receive(timeoutMs?: number): Promise<Buffer>;
  isAlive(): boolean;
  /** Drops inbound chunks nobody has read yet. */
  discardInbound(): void;

  /** Called when the handle goes away outside of `close()`. Returns an unsubscribe. */
  onLost(listener: (error: Error) => void): () => void;
}
