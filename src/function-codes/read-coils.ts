// src/function-codes/read-coils.ts

import { FUNCTION_CODES, MAX_READ_COILS } from '../constants/constants.js';
import { ModbusMalformedFrameError } from '../errors.js';
import { ReadCoilsResponse } from '../types/modbus-types.js';
import { validateAddress } from './register-pdu.js';

const FUNCTION_CODE = FUNCTION_CODES.READ_COILS;
const MIN_QUANTITY = 1;
const REQUEST_SIZE = 5;
const RESPONSE_HEADER_SIZE = 2;

/**
 * Builds the FC 0x01 request PDU.
 * @param quantity - number of coils (1-2000)
 */
export function buildReadCoilsRequest(startAddress: number, quantity: number): Uint8Array {
  validateAddress(startAddress);
  if (!Number.isInteger(quantity) || quantity < MIN_QUANTITY || quantity > MAX_READ_COILS) {
    throw new RangeError(`Quantity must be integer ${MIN_QUANTITY}-${MAX_READ_COILS}`);
  }

  const buffer = new ArrayBuffer(REQUEST_SIZE);
  const view = new DataView(buffer);

  view.setUint8(0, FUNCTION_CODE);
  view.setUint16(1, startAddress, false);
  view.setUint16(3, quantity, false);

  return new Uint8Array(buffer);
}

/**
 * Unpacks coil states, least significant bit of the first byte first.
 * The response does not carry the quantity, so the caller passes the
 * requested one.
 */
export function parseReadCoilsResponse(pdu: Uint8Array, quantity: number): ReadCoilsResponse {
  if (pdu.length < RESPONSE_HEADER_SIZE) {
    throw new ModbusMalformedFrameError('coil response too short');
  }
  if (pdu[0] !== FUNCTION_CODE) {
    throw new ModbusMalformedFrameError(
      `expected function 0x01, got 0x${(pdu[0] ?? 0).toString(16)}`
    );
  }

  const byteCount = pdu[1] ?? 0;
  if (pdu.length !== RESPONSE_HEADER_SIZE + byteCount) {
    throw new ModbusMalformedFrameError(
      `expected ${RESPONSE_HEADER_SIZE + byteCount} bytes of PDU, got ${pdu.length}`
    );
  }
  if (byteCount !== Math.ceil(quantity / 8)) {
    throw new ModbusMalformedFrameError(`byte count ${byteCount} does not fit ${quantity} coils`);
  }

  const result: ReadCoilsResponse = [];
  for (let i = 0; i < quantity; i++) {
    const byte = pdu[RESPONSE_HEADER_SIZE + (i >> 3)] ?? 0;
    result.push((byte & (1 << (i & 7))) !== 0);
  }
  return result;
}
