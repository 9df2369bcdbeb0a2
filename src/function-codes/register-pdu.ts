// src/function-codes/register-pdu.ts

import { MAX_READ_REGISTERS } from '../constants/constants.js';
import { ModbusMalformedFrameError } from '../errors.js';
import { ReadRegistersResponse } from '../types/modbus-types.js';
import { isUint16, readWordsBE } from '../utils/utils.js';

const MIN_QUANTITY = 1;
const REQUEST_SIZE = 5; // FC + address + quantity
const RESPONSE_HEADER_SIZE = 2; // FC + byte count
const UINT16_SIZE = 2;

export function validateAddress(address: number): void {
  if (!isUint16(address)) {
    throw new RangeError(`Address must be 0-65535, got ${address}`);
  }
}

/**
 * Request PDU shared by FC 0x03 and FC 0x04.
 */
export function buildReadRegistersPdu(
  functionCode: number,
  startAddress: number,
  quantity: number
): Uint8Array {
  validateAddress(startAddress);
  if (!Number.isInteger(quantity) || quantity < MIN_QUANTITY || quantity > MAX_READ_REGISTERS) {
    throw new RangeError(`Quantity must be integer ${MIN_QUANTITY}-${MAX_READ_REGISTERS}`);
  }
  if (startAddress + quantity > 0x10000) {
    throw new RangeError(`Range ${startAddress}+${quantity} exceeds the address space`);
  }

  const pdu = new Uint8Array(REQUEST_SIZE);
  const view = new DataView(pdu.buffer);
  view.setUint8(0, functionCode);
  view.setUint16(1, startAddress, false);
  view.setUint16(3, quantity, false);
  return pdu;
}

/**
 * Response parser shared by FC 0x03 and FC 0x04. Words are big-endian.
 */
export function parseReadRegistersPdu(
  functionCode: number,
  pdu: Uint8Array,
  expectedQuantity?: number
): ReadRegistersResponse {
  if (pdu.length < RESPONSE_HEADER_SIZE) {
    throw new ModbusMalformedFrameError('register response too short');
  }
  if (pdu[0] !== functionCode) {
    throw new ModbusMalformedFrameError(
      `expected function 0x${functionCode.toString(16)}, got 0x${(pdu[0] ?? 0).toString(16)}`
    );
  }

  const byteCount = pdu[1] ?? 0;
  if (byteCount % UINT16_SIZE !== 0) {
    throw new ModbusMalformedFrameError(`odd byte count ${byteCount}`);
  }
  const expectedLength = RESPONSE_HEADER_SIZE + byteCount;
  if (pdu.length !== expectedLength) {
    throw new ModbusMalformedFrameError(
      `expected ${expectedLength} bytes of PDU, got ${pdu.length}`
    );
  }

  const registerCount = byteCount / UINT16_SIZE;
  if (expectedQuantity !== undefined && registerCount !== expectedQuantity) {
    throw new ModbusMalformedFrameError(
      `expected ${expectedQuantity} registers, got ${registerCount}`
    );
  }

  return readWordsBE(pdu, RESPONSE_HEADER_SIZE, registerCount);
}
