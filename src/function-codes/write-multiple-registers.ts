// src/function-codes/write-multiple-registers.ts

import { FUNCTION_CODES, MAX_WRITE_REGISTERS } from '../constants/constants.js';
import { ModbusMalformedFrameError } from '../errors.js';
import { WriteMultipleRegistersResponse } from '../types/modbus-types.js';
import { isUint16 } from '../utils/utils.js';
import { validateAddress } from './register-pdu.js';

const FUNCTION_CODE = FUNCTION_CODES.WRITE_MULTIPLE_REGISTERS;
const MIN_REGISTERS = 1;
const REQUEST_HEADER_SIZE = 6;
const RESPONSE_SIZE = 5;
const UINT16_SIZE = 2;

/**
 * Builds the FC 0x10 request PDU. All words go out in one request, so a
 * 32-bit value is never observed half written.
 * @throws RangeError if the count or any word is out of range
 */
export function buildWriteMultipleRegistersRequest(
  startAddress: number,
  values: readonly number[]
): Uint8Array {
  validateAddress(startAddress);

  const quantity = values.length;
  if (quantity < MIN_REGISTERS || quantity > MAX_WRITE_REGISTERS) {
    throw new RangeError(
      `Values count must be ${MIN_REGISTERS}-${MAX_WRITE_REGISTERS}, got ${quantity}`
    );
  }
  for (const value of values) {
    if (!isUint16(value)) {
      throw new RangeError(`Value must be 0-65535, got ${value}`);
    }
  }

  const byteCount = quantity * UINT16_SIZE;
  const pdu = new Uint8Array(REQUEST_HEADER_SIZE + byteCount);
  const view = new DataView(pdu.buffer);

  view.setUint8(0, FUNCTION_CODE);
  view.setUint16(1, startAddress, false);
  view.setUint16(3, quantity, false);
  view.setUint8(5, byteCount);
  values.forEach((value, i) => view.setUint16(REQUEST_HEADER_SIZE + i * UINT16_SIZE, value, false));

  return pdu;
}

export function parseWriteMultipleRegistersResponse(
  pdu: Uint8Array
): WriteMultipleRegistersResponse {
  if (pdu.length !== RESPONSE_SIZE) {
    throw new ModbusMalformedFrameError(
      `expected ${RESPONSE_SIZE} bytes of PDU, got ${pdu.length}`
    );
  }
  if (pdu[0] !== FUNCTION_CODE) {
    throw new ModbusMalformedFrameError(
      `expected function 0x10, got 0x${(pdu[0] ?? 0).toString(16)}`
    );
  }

  const view = new DataView(pdu.buffer, pdu.byteOffset, RESPONSE_SIZE);
  return {
    startAddress: view.getUint16(1, false),
    quantity: view.getUint16(3, false),
  };
}
