import { SerialPort } from 'serialport';
import { TransportKind } from '../types';
import { ErrorHandler, TransportOpenError } from '../utils/error-handler';
import { BaseLink, LinkTimeouts } from './BaseLink';

/** The subset of a serialport handle the link relies on. */
export interface SerialPortLike {
  readonly isOpen: boolean;
  open(callback: (error: Error | null) => void): void;
  write(data: Buffer, callback: (error: Error | null | undefined) => void): boolean;
  drain(callback: (error: Error | null) => void): void;
  close(callback: (error: Error | null) => void): void;
  on(event: 'data', listener: (chunk: Buffer) => void): unknown;
  on(event: 'close', listener: (error?: Error | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  removeAllListeners(): unknown;
}

export interface SerialPortOptions {
  path: string;
  baudRate: number;
}

export type SerialPortFactory = (options: SerialPortOptions) => SerialPortLike;

export interface LocalLinkOptions extends LinkTimeouts {
  path: string;
  baudRate: number;
  portFactory?: SerialPortFactory;
}

export interface DeviceInfo {
  path: string;
  manufacturer?: string;
  serialNumber?: string;
  vendorId?: string;
  productId?: string;
}

const defaultPortFactory: SerialPortFactory = ({ path, baudRate }) =>
  new SerialPort({ path, baudRate, autoOpen: false });

/** Maps an OS error from opening a serial device to an open-failure reason. */
export function classifySerialError(error: Error, path: string): TransportOpenError {
  const code = ErrorHandler.errnoCode(error);
  const message = error.message;
  const details = { path, code };

  if (code === 'ENOENT' || /no such file|not found/i.test(message)) {
    return new TransportOpenError('NotFound', `Serial device ${path} not found`, details);
  }
  if (code === 'EBUSY' || /resource busy|cannot lock port|access denied/i.test(message)) {
    return new TransportOpenError('Busy', `Serial device ${path} is in use`, details);
  }
  if (code === 'EACCES' || /permission denied/i.test(message)) {
    return new TransportOpenError('PermissionDenied', `No permission to open ${path}`, details);
  }
  return new TransportOpenError('Unknown', `Failed to open ${path}: ${message}`, details);
}

/** Serial (USB CDC) link to a locally attached controller. */
export class LocalLink extends BaseLink {
  readonly kind = TransportKind.Local;
  private port: SerialPortLike | null = null;
  private readonly portFactory: SerialPortFactory;

  constructor(private readonly options: LocalLinkOptions) {
    super(options, 'LocalLink');
    this.portFactory = options.portFactory ?? defaultPortFactory;
  }

  get description(): string {
    return `serial ${this.options.path}@${this.options.baudRate}`;
  }

  static async listDevices(): Promise<DeviceInfo[]> {
    const ports = await SerialPort.list();
    return ports.map((p) => ({
      path: p.path,
      manufacturer: p.manufacturer,
      serialNumber: p.serialNumber,
      vendorId: p.vendorId,
      productId: p.productId,
    }));
  }

  protected async openHandle(): Promise<void> {
    const { path, baudRate } = this.options;
    const port = this.portFactory({ path, baudRate });

    const opening = new Promise<void>((resolve, reject) => {
      port.open((error) => (error ? reject(classifySerialError(error, path)) : resolve()));
    });
    try {
      await this.withTimeout(
        opening,
        this.timeouts.connectTimeoutMs,
        () => new TransportOpenError('Timeout', `Opening ${path} timed out`, { path })
      );
    } catch (error) {
      port.removeAllListeners();
      if (port.isOpen) port.close(() => undefined);
      throw error;
    }

    port.on('data', (chunk) => this.pushInbound(chunk));
    port.on('error', (error) => this.handleLost(error));
    port.on('close', (error) => {
      if (this.port === port) this.handleLost(error ?? new Error('Port closed'));
    });
    this.port = port;
  }

  protected async closeHandle(): Promise<void> {
    const port = this.port;
    this.port = null;
    if (!port) return;
    port.removeAllListeners();
    port.on('error', (error) => this.logger.debug(`Error while closing: ${error.message}`));
    if (!port.isOpen) return;
    await new Promise<void>((resolve, reject) => {
      port.close((error) => (error ? reject(error) : resolve()));
    });
  }

  protected write(bytes: Buffer): Promise<void> {
    const port = this.port;
    if (!port) return Promise.reject(new Error('Serial port is not open'));
    return new Promise((resolve, reject) => {
      port.write(bytes, (error) => {
        if (error) return reject(error);
        port.drain((drainError) => (drainError ? reject(drainError) : resolve()));
      });
    });
  }
}
