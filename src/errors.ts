// src/errors.ts

import { EXCEPTION_CODES } from './constants/constants.js';

/**
 * Base class for all errors raised by the poller
 */
export class ModbusError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModbusError';
  }
}

// --- Startup errors ---

/**
 * Invalid register descriptor or derived metric definition.
 * Fatal to the offending entry only.
 */
export class SchemaError extends ModbusError {
  entityId: string | null;

  constructor(message: string, entityId: string | null = null) {
    super(entityId ? `Schema error in "${entityId}": ${message}` : `Schema error: ${message}`);
    this.name = 'SchemaError';
    this.entityId = entityId;
  }
}

export class ConfigError extends ModbusError {
  field: string;

  constructor(field: string, message: string) {
    super(`Invalid configuration "${field}": ${message}`);
    this.name = 'ConfigError';
    this.field = field;
  }
}

// --- Connection level ---

/**
 * Socket level failure
 */
export class TransportError extends ModbusError {
  constructor(message: string = 'Transport failure') {
    super(message);
    this.name = 'TransportError';
  }
}

export class ModbusTimeoutError extends ModbusError {
  constructor(message: string = 'Modbus request timed out') {
    super(message);
    this.name = 'ModbusTimeoutError';
  }
}

export class ModbusConnectionTimeoutError extends TransportError {
  constructor(host: string, port: number, timeout: number) {
    super(`Connection to ${host}:${port} timed out after ${timeout}ms`);
    this.name = 'ModbusConnectionTimeoutError';
  }
}

export class ModbusNotConnectedError extends ModbusError {
  constructor(message: string = 'Modbus connection is not established') {
    super(message);
    this.name = 'ModbusNotConnectedError';
  }
}

// --- Protocol level ---

/**
 * Response that cannot be matched to the request it answers
 */
export class ProtocolError extends ModbusError {
  constructor(message: string = 'Invalid Modbus response') {
    super(message);
    this.name = 'ProtocolError';
  }
}

export class ModbusMalformedFrameError extends ProtocolError {
  constructor(message: string) {
    super(`Malformed frame: ${message}`);
    this.name = 'ModbusMalformedFrameError';
  }
}

export class ModbusUnexpectedUnitIdError extends ProtocolError {
  constructor(expected: number, received: number) {
    super(`Unexpected unit id: expected ${expected}, received ${received}`);
    this.name = 'ModbusUnexpectedUnitIdError';
  }
}

export class ModbusUnexpectedFunctionCodeError extends ProtocolError {
  constructor(sent: number, received: number) {
    super(
      `Unexpected function code: sent 0x${sent.toString(16)}, received 0x${received.toString(16)}`
    );
    this.name = 'ModbusUnexpectedFunctionCodeError';
  }
}

export class ModbusEchoMismatchError extends ProtocolError {
  constructor(what: string, expected: number, received: number) {
    super(`Write echo mismatch on ${what}: expected ${expected}, received ${received}`);
    this.name = 'ModbusEchoMismatchError';
  }
}

// --- Device level ---

/**
 * Exception response reported by the device
 */
export class ModbusExceptionError extends ModbusError {
  functionCode: number;
  exceptionCode: number;

  constructor(functionCode: number, exceptionCode: number) {
    const exceptionMessage =
      EXCEPTION_CODES[exceptionCode] ?? `Unknown exception code: ${exceptionCode}`;
    super(
      `Modbus exception: function 0x${functionCode.toString(16)}, code 0x${exceptionCode.toString(16)} (${exceptionMessage})`
    );
    this.name = 'ModbusExceptionError';
    this.functionCode = functionCode;
    this.exceptionCode = exceptionCode;
  }
}

// --- Entity level ---

export class DecodeError extends ModbusError {
  entityId: string;

  constructor(entityId: string, message: string) {
    super(`Cannot decode "${entityId}": ${message}`);
    this.name = 'DecodeError';
    this.entityId = entityId;
  }
}

/**
 * Rejected write request. Nothing was sent.
 */
export class ValidationError extends ModbusError {
  entityId: string;

  constructor(entityId: string, message: string) {
    super(`Invalid value for "${entityId}": ${message}`);
    this.name = 'ValidationError';
    this.entityId = entityId;
  }
}

export class WriteQueueFullError extends ModbusError {
  constructor(limit: number) {
    super(`Write queue is full (${limit} pending requests)`);
    this.name = 'WriteQueueFullError';
  }
}

export class PollSchedulerError extends ModbusError {
  constructor(message: string) {
    super(message);
    this.name = 'PollSchedulerError';
  }
}

/**
 * True for failures that mean the session itself is gone.
 */
export function isConnectionFailure(err: unknown): boolean {
  return err instanceof TransportError || err instanceof ModbusTimeoutError;
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new ModbusError(String(err));
}
