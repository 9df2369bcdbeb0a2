// src/index.ts

export { HeatPumpPoller } from './heat-pump-poller.js';
export type {
  EntityDescription,
  HeatPumpPollerOptions,
  HeatPumpPollerStats,
} from './heat-pump-poller.js';

export { resolveConfig } from './config.js';
export { compileSchema, compileRegister, entityIdsOf } from './schema/register-schema.js';
export { planBlocks } from './planner/block-planner.js';
export { decodeBlock, decodeDescriptor } from './codec/decoder.js';
export type { BlockData, DecodedEntity, DecodeOutcome } from './codec/decoder.js';
export { encodeValue, writableRange } from './codec/encoder.js';
export { ConnectionManager } from './transport/connection-manager.js';
export type { ConnectionManagerOptions, ConnectionStats } from './transport/connection-manager.js';
export { ExponentialBackoff } from './transport/backoff.js';
export { NodeTcpTransport } from './transport/node-transports/node-tcp-transport.js';
export { AvailabilityTracker } from './transport/trackers/availability-tracker.js';
export { EntityStore } from './store/entity-store.js';
export { DerivedMetricsEngine } from './derived/derived-metrics.js';
export { heatPumpIndicators, heatPumpMetrics } from './derived/heat-pump-metrics.js';
export { WritePath } from './write/write-path.js';
export type { WriteValue } from './write/write-path.js';
export { PollScheduler } from './polling/poll-scheduler.js';
export { Logger, logger } from './logger.js';

export * from './errors.js';
export * from './types/modbus-types.js';
export * from './constants/constants.js';
