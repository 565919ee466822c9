import * as net from 'net';
import { TransportKind } from '../types';
import { ErrorHandler, TransportOpenError } from '../utils/error-handler';
import { BaseLink, LinkTimeouts } from './BaseLink';

/** The subset of `net.Socket` the link relies on. */
export interface NetSocketLike {
  readonly destroyed: boolean;
  write(data: Buffer, callback: (error?: Error | null) => void): boolean;
  end(callback?: () => void): unknown;
  destroy(error?: Error): unknown;
  setNoDelay(noDelay?: boolean): unknown;
  once(event: 'connect', listener: () => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'data', listener: (chunk: Buffer) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'close', listener: (hadError: boolean) => void): unknown;
  removeAllListeners(): unknown;
}

export type SocketFactory = (host: string, port: number) => NetSocketLike;

export interface NetworkLinkOptions extends LinkTimeouts {
  host: string;
  port: number;
  socketFactory?: SocketFactory;
}

const defaultSocketFactory: SocketFactory = (host, port) => net.createConnection({ host, port });

const UNRESOLVABLE = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_NONAME']);
const REFUSED = new Set(['ECONNREFUSED', 'ECONNRESET']);
const UNREACHABLE = new Set(['ETIMEDOUT', 'EHOSTUNREACH', 'ENETUNREACH', 'EHOSTDOWN']);

export function classifyNetworkError(error: Error, target: string): TransportOpenError {
  const code = ErrorHandler.errnoCode(error);
  const details = { target, code };

  if (code && UNRESOLVABLE.has(code)) {
    return new TransportOpenError('AddressUnresolvable', `Cannot resolve ${target}`, details);
  }
  if (code && REFUSED.has(code)) {
    return new TransportOpenError('ConnectionRefused', `Connection to ${target} refused`, details);
  }
  if (code && UNREACHABLE.has(code)) {
    return new TransportOpenError('Timeout', `${target} did not answer`, details);
  }
  return new TransportOpenError('Unknown', `Failed to connect to ${target}: ${error.message}`, details);
}

/** TCP link to a network-attached controller. */
export class NetworkLink extends BaseLink {
  readonly kind = TransportKind.Network;
  private socket: NetSocketLike | null = null;
  private readonly socketFactory: SocketFactory;

  constructor(private readonly options: NetworkLinkOptions) {
    super(options, 'NetworkLink');
    this.socketFactory = options.socketFactory ?? defaultSocketFactory;
  }

  get description(): string {
    return `tcp ${this.options.host}:${this.options.port}`;
  }

  protected async openHandle(): Promise<void> {
    const { host, port } = this.options;
    const target = `${host}:${port}`;
    const socket = this.socketFactory(host, port);

    const connecting = new Promise<void>((resolve, reject) => {
      socket.once('connect', () => resolve());
      socket.once('error', (error) => reject(classifyNetworkError(error, target)));
    });
    try {
      await this.withTimeout(
        connecting,
        this.timeouts.connectTimeoutMs,
        () =>
          new TransportOpenError(
            'Timeout',
            `Connecting to ${target} timed out after ${this.timeouts.connectTimeoutMs}ms`,
            { target }
          )
      );
    } catch (error) {
      socket.removeAllListeners();
      socket.on('error', (late) => this.logger.debug(`Error after failed connect: ${late.message}`));
      socket.destroy();
      throw error;
    }

    socket.removeAllListeners();
    socket.setNoDelay(true);
    socket.on('data', (chunk) => this.pushInbound(chunk));
    socket.on('error', (error) => this.handleLost(error));
    socket.on('close', () => {
      if (this.socket === socket) this.handleLost(new Error('Socket closed by peer'));
    });
    this.socket = socket;
  }

  protected async closeHandle(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    if (!socket) return;
    socket.removeAllListeners();
    socket.on('error', (error) => this.logger.debug(`Error while closing: ${error.message}`));
    if (socket.destroyed) return;
    await this.withTimeout(
      new Promise<void>((resolve) => socket.end(() => resolve())),
      this.timeouts.sendTimeoutMs,
      () => new Error('Socket end timed out')
    ).catch((error: unknown) => {
      this.logger.debug(`Forcing close: ${ErrorHandler.toError(error).message}`);
    });
    socket.destroy();
  }

  protected write(bytes: Buffer): Promise<void> {
    const socket = this.socket;
    if (!socket) return Promise.reject(new Error('Socket is not open'));
    return new Promise((resolve, reject) => {
      socket.write(bytes, (error) => (error ? reject(error) : resolve()));
    });
  }
}
