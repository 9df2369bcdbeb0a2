// src/constants/constants.ts

/**
 * Modbus Function Codes used by the poller
 */
export const FUNCTION_CODES = {
  READ_COILS: 0x01,
  READ_HOLDING_REGISTERS: 0x03,
  READ_INPUT_REGISTERS: 0x04,
  WRITE_SINGLE_COIL: 0x05,
  WRITE_SINGLE_REGISTER: 0x06,
  WRITE_MULTIPLE_REGISTERS: 0x10,
} as const;

export type FunctionCode = (typeof FUNCTION_CODES)[keyof typeof FUNCTION_CODES];

export const FUNCTION_CODE_NAMES: ReadonlyMap<number, string> = new Map<number, string>(
  Object.entries(FUNCTION_CODES).map(([name, code]) => [code, name])
);

/**
 * Modbus Exception Codes
 */
export const EXCEPTION_CODES: Readonly<Record<number, string>> = {
  1: 'Illegal Function',
  2: 'Illegal Data Address',
  3: 'Illegal Data Value',
  4: 'Slave Device Failure',
  5: 'Acknowledge',
  6: 'Slave Device Busy',
  8: 'Memory Parity Error',
  10: 'Gateway Path Unavailable',
  11: 'Gateway Target Device Failed to Respond',
};

export const EXCEPTION_FLAG = 0x80;

export const MBAP_HEADER_LENGTH = 7;
export const MODBUS_PROTOCOL_ID = 0;
// Largest PDU allowed by the protocol (253 bytes) plus the unit id byte.
export const MAX_MBAP_LENGTH = 254;

export const MAX_READ_REGISTERS = 125;
export const MAX_WRITE_REGISTERS = 0x7b;
export const MAX_READ_COILS = 2000;

export const MIN_UNIT_ID = 1;
export const MAX_UNIT_ID = 247;

export const DEFAULTS = {
  PORT: 502,
  UNIT_ID: 1,
  POLL_INTERVAL_SECONDS: 30,
  MIN_POLL_INTERVAL_SECONDS: 10,
  MAX_POLL_INTERVAL_SECONDS: 300,
  REQUEST_TIMEOUT_MS: 5000,
  CONNECT_TIMEOUT_MS: 5000,
  FAILURE_THRESHOLD: 3,
  PROTOCOL_ERROR_LIMIT: 3,
  MAX_GAP: 8,
  BACKOFF_MIN_DELAY_MS: 1000,
  BACKOFF_MAX_DELAY_MS: 60000,
  MAX_QUEUED_WRITES: 16,
  ELECTRICITY_RATE: 0.3,
} as const;

/** Specific heat capacity of water, kJ/(kg*K). */
export const WATER_SPECIFIC_HEAT = 4.186;
