// src/function-codes/write-single-register.ts

import { FUNCTION_CODES } from '../constants/constants.js';
import { ModbusMalformedFrameError } from '../errors.js';
import { WriteSingleRegisterResponse } from '../types/modbus-types.js';
import { isUint16 } from '../utils/utils.js';
import { validateAddress } from './register-pdu.js';

const FUNCTION_CODE = FUNCTION_CODES.WRITE_SINGLE_REGISTER;
const PDU_SIZE = 5;

/**
 * Builds the FC 0x06 request PDU.
 * @param value - raw register word (0-65535)
 * @throws RangeError if the address or value is out of range
 */
export function buildWriteSingleRegisterRequest(address: number, value: number): Uint8Array {
  validateAddress(address);
  if (!isUint16(value)) {
    throw new RangeError(`Value must be 0-65535, got ${value}`);
  }

  const buffer = new ArrayBuffer(PDU_SIZE);
  const view = new DataView(buffer);

  view.setUint8(0, FUNCTION_CODE);
  view.setUint16(1, address, false);
  view.setUint16(3, value, false);

  return new Uint8Array(buffer);
}

export function parseWriteSingleRegisterResponse(pdu: Uint8Array): WriteSingleRegisterResponse {
  if (pdu.length !== PDU_SIZE) {
    throw new ModbusMalformedFrameError(`expected ${PDU_SIZE} bytes of PDU, got ${pdu.length}`);
  }
  if (pdu[0] !== FUNCTION_CODE) {
    throw new ModbusMalformedFrameError(
      `expected function 0x06, got 0x${(pdu[0] ?? 0).toString(16)}`
    );
  }

  const view = new DataView(pdu.buffer, pdu.byteOffset, PDU_SIZE);
  return {
    address: view.getUint16(1, false),
    value: view.getUint16(3, false),
  };
}
