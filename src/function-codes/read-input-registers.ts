// src/function-codes/read-input-registers.ts

import { FUNCTION_CODES } from '../constants/constants.js';
import { ReadRegistersResponse } from '../types/modbus-types.js';
import { buildReadRegistersPdu, parseReadRegistersPdu } from './register-pdu.js';

const FUNCTION_CODE = FUNCTION_CODES.READ_INPUT_REGISTERS;

/**
 * Builds the FC 0x04 request PDU.
 * @param startAddress - 0x0000-0xFFFF
 * @param quantity - 1-125
 */
export function buildReadInputRegistersRequest(startAddress: number, quantity: number): Uint8Array {
  return buildReadRegistersPdu(FUNCTION_CODE, startAddress, quantity);
}

export function parseReadInputRegistersResponse(
  pdu: Uint8Array,
  expectedQuantity?: number
): ReadRegistersResponse {
  return parseReadRegistersPdu(FUNCTION_CODE, pdu, expectedQuantity);
}
