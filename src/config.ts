// src/config.ts

import { DEFAULTS, MAX_READ_REGISTERS, MAX_UNIT_ID, MIN_UNIT_ID } from './constants/constants.js';
import { ConfigError } from './errors.js';
import { HeatPumpPollerConfig, LogLevel, ResolvedConfig } from './types/modbus-types.js';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

function integerIn(field: string, value: number | undefined, fallback: number, min: number, max: number): number {
  const resolved = value ?? fallback;
  if (!Number.isInteger(resolved) || resolved < min || resolved > max) {
    throw new ConfigError(field, `must be an integer between ${min} and ${max}, got ${resolved}`);
  }
  return resolved;
}

function numberIn(field: string, value: number | undefined, fallback: number, min: number, max: number): number {
  const resolved = value ?? fallback;
  if (!Number.isFinite(resolved) || resolved < min || resolved > max) {
    throw new ConfigError(field, `must be between ${min} and ${max}, got ${resolved}`);
  }
  return resolved;
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Applies defaults and checks every field.
 * @throws ConfigError naming the first invalid field
 */
export function resolveConfig(input: HeatPumpPollerConfig): ResolvedConfig {
  if (typeof input.host !== 'string' || input.host.trim().length === 0) {
    throw new ConfigError('host', 'is required');
  }

  const minDelayMs = integerIn(
    'backoff.minDelayMs',
    input.backoff?.minDelayMs,
    DEFAULTS.BACKOFF_MIN_DELAY_MS,
    1,
    Number.MAX_SAFE_INTEGER
  );
  const maxDelayMs = integerIn(
    'backoff.maxDelayMs',
    input.backoff?.maxDelayMs,
    DEFAULTS.BACKOFF_MAX_DELAY_MS,
    minDelayMs,
    Number.MAX_SAFE_INTEGER
  );

  const systemElements = input.systemElements ?? [];
  for (const element of systemElements) {
    if (typeof element !== 'string' || element.length === 0) {
      throw new ConfigError('systemElements', 'entries must be non-empty strings');
    }
  }

  const logLevel = input.logLevel ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigError('logLevel', `must be one of ${LOG_LEVELS.join(', ')}`);
  }

  return {
    host: input.host.trim(),
    port: integerIn('port', input.port, DEFAULTS.PORT, 1, 65535),
    unitId: integerIn('unitId', input.unitId, DEFAULTS.UNIT_ID, MIN_UNIT_ID, MAX_UNIT_ID),
    pollIntervalSeconds: numberIn(
      'pollIntervalSeconds',
      input.pollIntervalSeconds,
      DEFAULTS.POLL_INTERVAL_SECONDS,
      DEFAULTS.MIN_POLL_INTERVAL_SECONDS,
      DEFAULTS.MAX_POLL_INTERVAL_SECONDS
    ),
    requestTimeoutMs: integerIn(
      'requestTimeoutMs',
      input.requestTimeoutMs,
      DEFAULTS.REQUEST_TIMEOUT_MS,
      1,
      Number.MAX_SAFE_INTEGER
    ),
    connectTimeoutMs: integerIn(
      'connectTimeoutMs',
      input.connectTimeoutMs,
      DEFAULTS.CONNECT_TIMEOUT_MS,
      1,
      Number.MAX_SAFE_INTEGER
    ),
    failureThreshold: integerIn('failureThreshold', input.failureThreshold, DEFAULTS.FAILURE_THRESHOLD, 1, 100),
    protocolErrorLimit: integerIn(
      'protocolErrorLimit',
      input.protocolErrorLimit,
      DEFAULTS.PROTOCOL_ERROR_LIMIT,
      1,
      100
    ),
    maxGap: integerIn('maxGap', input.maxGap, DEFAULTS.MAX_GAP, 0, MAX_READ_REGISTERS),
    maxRegistersPerRead: integerIn(
      'maxRegistersPerRead',
      input.maxRegistersPerRead,
      MAX_READ_REGISTERS,
      1,
      MAX_READ_REGISTERS
    ),
    backoff: { minDelayMs, maxDelayMs },
    maxQueuedWrites: integerIn('maxQueuedWrites', input.maxQueuedWrites, DEFAULTS.MAX_QUEUED_WRITES, 1, 1000),
    systemElements: Object.freeze([...systemElements]),
    electricityRate: numberIn(
      'electricityRate',
      input.electricityRate,
      DEFAULTS.ELECTRICITY_RATE,
      0,
      Number.MAX_VALUE
    ),
    logLevel,
  };
}
