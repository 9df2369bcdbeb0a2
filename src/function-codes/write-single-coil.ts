// src/function-codes/write-single-coil.ts

import { FUNCTION_CODES } from '../constants/constants.js';
import { ModbusMalformedFrameError } from '../errors.js';
import { WriteSingleCoilResponse } from '../types/modbus-types.js';
import { validateAddress } from './register-pdu.js';

const FUNCTION_CODE = FUNCTION_CODES.WRITE_SINGLE_COIL;
const COIL_ON = 0xff00;
const COIL_OFF = 0x0000;
const PDU_SIZE = 5;

export function buildWriteSingleCoilRequest(address: number, value: boolean): Uint8Array {
  validateAddress(address);

  const buffer = new ArrayBuffer(PDU_SIZE);
  const view = new DataView(buffer);

  view.setUint8(0, FUNCTION_CODE);
  view.setUint16(1, address, false);
  view.setUint16(3, value ? COIL_ON : COIL_OFF, false);

  return new Uint8Array(buffer);
}

/**
 * Parses the echo of a single coil write.
 * @throws ModbusMalformedFrameError on a wrong length or coil value
 */
export function parseWriteSingleCoilResponse(pdu: Uint8Array): WriteSingleCoilResponse {
  if (pdu.length !== PDU_SIZE) {
    throw new ModbusMalformedFrameError(`expected ${PDU_SIZE} bytes of PDU, got ${pdu.length}`);
  }
  if (pdu[0] !== FUNCTION_CODE) {
    throw new ModbusMalformedFrameError(
      `expected function 0x05, got 0x${(pdu[0] ?? 0).toString(16)}`
    );
  }

  const view = new DataView(pdu.buffer, pdu.byteOffset, PDU_SIZE);
  const address = view.getUint16(1, false);
  const valueRaw = view.getUint16(3, false);

  switch (valueRaw) {
    case COIL_ON:
      return { address, value: true };
    case COIL_OFF:
      return { address, value: false };
    default:
      throw new ModbusMalformedFrameError(`invalid coil value 0x${valueRaw.toString(16)}`);
  }
}
