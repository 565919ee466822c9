// Connection lifecycle
export enum ConnectionState {
  Uninitialized = 'uninitialized',
  Disconnected = 'disconnected',
  Connecting = 'connecting',
  Connected = 'connected',
  Retrying = 'retrying',
  Failed = 'failed',
  Suspended = 'suspended',
  Disconnecting = 'disconnecting'
}

// Transport variants
export enum TransportKind {
  Local = 'local',
  Network = 'network',
  Mock = 'mock'
}

export interface BackoffPolicy {
  initialDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
}

export interface ControllerConfig {
  transportKind: TransportKind;
  /** Serial device path for local links, host name or IP for network links. */
  address: string;
  /** TCP port, network links only. */
  port: number;
  baudRate: number;
  maxBufferBytes: number;
  retryLimit: number;
  backoffPolicy: BackoffPolicy;
  /** Consecutive failures after which automatic reconnection stops. */
  suspendThreshold: number;
  autoReconnect: boolean;
  handshake: boolean;
  connectTimeoutMs: number;
  sendTimeoutMs: number;
  receiveTimeoutMs: number;
  /** Interval between list-status polls while the device reports busy. */
  busyPollIntervalMs: number;
}

// Error types
export enum ErrorCode {
  Encode = 'ENCODE_ERROR',
  Decode = 'DECODE_ERROR',
  TransportOpen = 'TRANSPORT_OPEN_ERROR',
  TransportIO = 'TRANSPORT_IO_ERROR',
  BufferFull = 'BUFFER_FULL',
  Config = 'CONFIG_ERROR',
  InvalidState = 'INVALID_STATE'
}

export type OpenFailureReason =
  | 'NotFound'
  | 'Busy'
  | 'PermissionDenied'
  | 'AddressUnresolvable'
  | 'ConnectionRefused'
  | 'Timeout'
  | 'HandshakeFailed'
  | 'Unknown';

// Statistics
export interface Statistics {
  sentCount: number;
  rejectedCount: number;
  currentBufferBytes: number;
  peakBufferBytes: number;
  lastPacketText: string;
  retryCount: number;
  receivedCount: number;
  decodeErrorCount: number;
  connectionErrorCount: number;
}

export type StatisticsEvent =
  | { type: 'sent'; text: string }
  | { type: 'rejected' }
  | { type: 'buffer'; bytes: number }
  | { type: 'retry' }
  | { type: 'received' }
  | { type: 'decodeError' }
  | { type: 'connectionError' };
