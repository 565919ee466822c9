// Types
export * from './types';
export * from './codec/types';

// Controller
export { LaserController, LaserControllerOptions } from './controller/LaserController';
export { ILaserController, SendOptions, SendResult } from './interfaces/LaserController';
export { ITransportLink } from './interfaces/TransportLink';

// Building blocks
export { PacketCodec, StatusStream, encodeStatusFrame, describeCommand } from './codec/PacketCodec';
export { parseCommandLine } from './codec/parseCommand';
export * from './connections';
export { SendQueue, EnqueueResult } from './queue/SendQueue';
export { ConnectionSupervisor, SupervisorDeps } from './supervisor/ConnectionSupervisor';
export { backoffDelay } from './supervisor/backoff';
export { StatisticsTracker } from './stats/StatisticsTracker';
export * from './events/StatusBus';

// Configuration
export { DEFAULT_CONFIG, ConfigOverrides, resolveConfig, loadConfigFromEnv } from './config/config';

// Utilities
export { Logger, LogLevel } from './utils/logger';
export * from './utils/error-handler';
