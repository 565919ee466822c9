import { BackoffPolicy, ControllerConfig, TransportKind } from '../types';
import { ConfigError } from '../utils/error-handler';

export const DEFAULT_CONFIG: Readonly<ControllerConfig> = Object.freeze({
  transportKind: TransportKind.Local,
  address: '/dev/ttyUSB0',
  port: 1022,
  baudRate: 115200,
  maxBufferBytes: 900,
  retryLimit: 3,
  backoffPolicy: Object.freeze({ initialDelayMs: 500, multiplier: 2, maxDelayMs: 10000 }),
  suspendThreshold: 10,
  autoReconnect: true,
  handshake: true,
  connectTimeoutMs: 5000,
  sendTimeoutMs: 2000,
  receiveTimeoutMs: 1000,
  busyPollIntervalMs: 10,
});

export type ConfigOverrides = Partial<Omit<ControllerConfig, 'backoffPolicy'>> & {
  backoffPolicy?: Partial<BackoffPolicy>;
};

function requireInt(name: string, value: number, min: number, max = Number.MAX_SAFE_INTEGER): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`${name} must be an integer in ${min}..${max}, got ${value}`, { field: name, value });
  }
}

const TRANSPORT_KINDS: readonly string[] = [TransportKind.Local, TransportKind.Network, TransportKind.Mock];

function isTransportKind(value: string): value is TransportKind {
  return TRANSPORT_KINDS.includes(value);
}

/** Merges overrides onto the defaults and validates the result. */
export function resolveConfig(overrides: ConfigOverrides = {}): ControllerConfig {
  const config: ControllerConfig = {
    ...DEFAULT_CONFIG,
    ...overrides,
    backoffPolicy: { ...DEFAULT_CONFIG.backoffPolicy, ...overrides.backoffPolicy },
  };

  if (!isTransportKind(config.transportKind)) {
    throw new ConfigError(`Unknown transport kind: ${String(config.transportKind)}`);
  }
  if (config.transportKind !== TransportKind.Mock && config.address.trim() === '') {
    throw new ConfigError('address is required for local and network transports');
  }
  requireInt('port', config.port, 1, 65535);
  requireInt('baudRate', config.baudRate, 1);
  requireInt('maxBufferBytes', config.maxBufferBytes, 1);
  requireInt('retryLimit', config.retryLimit, 1);
  requireInt('suspendThreshold', config.suspendThreshold, 1);
  requireInt('connectTimeoutMs', config.connectTimeoutMs, 1);
  requireInt('sendTimeoutMs', config.sendTimeoutMs, 1);
  requireInt('receiveTimeoutMs', config.receiveTimeoutMs, 1);
  requireInt('busyPollIntervalMs', config.busyPollIntervalMs, 1);

  const { initialDelayMs, multiplier, maxDelayMs } = config.backoffPolicy;
  requireInt('backoffPolicy.initialDelayMs', initialDelayMs, 0);
  requireInt('backoffPolicy.maxDelayMs', maxDelayMs, initialDelayMs);
  if (!Number.isFinite(multiplier) || multiplier < 1) {
    throw new ConfigError(`backoffPolicy.multiplier must be >= 1, got ${multiplier}`, { multiplier });
  }

  return config;
}

function parseBool(v: string | undefined): boolean | undefined {
  if (v === undefined) return undefined;
  const n = v.trim().toLowerCase();
  if (n === 'true' || n === '1' || n === 'yes') return true;
  if (n === 'false' || n === '0' || n === 'no') return false;
  return undefined;
}

function parseNumber(v: string | undefined): number | undefined {
  if (v === undefined || v.trim() === '') return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}

function parseTransportKind(v: string | undefined): TransportKind | undefined {
  const n = v?.trim().toLowerCase();
  return n && isTransportKind(n) ? n : undefined;
}

/**
 * Reads `LASERLINK_*` variables. Unparseable values fall back to the
 * defaults; out-of-range ones are rejected by `resolveConfig`.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ControllerConfig {
  const overrides: ConfigOverrides = {};
  const backoff: Partial<BackoffPolicy> = {};

  const kind = parseTransportKind(env.LASERLINK_TRANSPORT);
  if (kind) overrides.transportKind = kind;
  if (env.LASERLINK_ADDRESS) overrides.address = env.LASERLINK_ADDRESS.trim();

  const numbers: Array<[string, (n: number) => void]> = [
    ['LASERLINK_PORT', (n) => (overrides.port = n)],
    ['LASERLINK_BAUD_RATE', (n) => (overrides.baudRate = n)],
    ['LASERLINK_MAX_BUFFER_BYTES', (n) => (overrides.maxBufferBytes = n)],
    ['LASERLINK_RETRY_LIMIT', (n) => (overrides.retryLimit = n)],
    ['LASERLINK_SUSPEND_THRESHOLD', (n) => (overrides.suspendThreshold = n)],
    ['LASERLINK_CONNECT_TIMEOUT_MS', (n) => (overrides.connectTimeoutMs = n)],
    ['LASERLINK_SEND_TIMEOUT_MS', (n) => (overrides.sendTimeoutMs = n)],
    ['LASERLINK_RECEIVE_TIMEOUT_MS', (n) => (overrides.receiveTimeoutMs = n)],
    ['LASERLINK_BUSY_POLL_MS', (n) => (overrides.busyPollIntervalMs = n)],
    ['LASERLINK_BACKOFF_INITIAL_MS', (n) => (backoff.initialDelayMs = n)],
    ['LASERLINK_BACKOFF_MULTIPLIER', (n) => (backoff.multiplier = n)],
    ['LASERLINK_BACKOFF_MAX_MS', (n) => (backoff.maxDelayMs = n)],
  ];
  for (const [name, assign] of numbers) {
    const value = parseNumber(env[name]);
    if (value !== undefined) assign(value);
  }

  const autoReconnect = parseBool(env.LASERLINK_AUTO_RECONNECT);
  if (autoReconnect !== undefined) overrides.autoReconnect = autoReconnect;
  const handshake = parseBool(env.LASERLINK_HANDSHAKE);
  if (handshake !== undefined) overrides.handshake = handshake;

  return resolveConfig({ ...overrides, backoffPolicy: backoff });
}
