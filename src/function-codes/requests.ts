// src/function-codes/requests.ts

import { FUNCTION_CODES } from '../constants/constants.js';
import {
  ModbusRequest,
  ReadCoilsResponse,
  ReadRegistersResponse,
  WriteMultipleRegistersResponse,
  WriteSingleCoilResponse,
  WriteSingleRegisterResponse,
} from '../types/modbus-types.js';
import { buildReadCoilsRequest, parseReadCoilsResponse } from './read-coils.js';
import {
  buildReadHoldingRegistersRequest,
  parseReadHoldingRegistersResponse,
} from './read-holding-registers.js';
import {
  buildReadInputRegistersRequest,
  parseReadInputRegistersResponse,
} from './read-input-registers.js';
import {
  buildWriteMultipleRegistersRequest,
  parseWriteMultipleRegistersResponse,
} from './write-multiple-registers.js';
import { buildWriteSingleCoilRequest, parseWriteSingleCoilResponse } from './write-single-coil.js';
import {
  buildWriteSingleRegisterRequest,
  parseWriteSingleRegisterResponse,
} from './write-single-register.js';

export function readHoldingRegisters(
  address: number,
  quantity: number
): ModbusRequest<ReadRegistersResponse> {
  return {
    functionCode: FUNCTION_CODES.READ_HOLDING_REGISTERS,
    address,
    quantity,
    pdu: buildReadHoldingRegistersRequest(address, quantity),
    parse: pdu => parseReadHoldingRegistersResponse(pdu, quantity),
  };
}

export function readInputRegisters(
  address: number,
  quantity: number
): ModbusRequest<ReadRegistersResponse> {
  return {
    functionCode: FUNCTION_CODES.READ_INPUT_REGISTERS,
    address,
    quantity,
    pdu: buildReadInputRegistersRequest(address, quantity),
    parse: pdu => parseReadInputRegistersResponse(pdu, quantity),
  };
}

export function readCoils(address: number, quantity: number): ModbusRequest<ReadCoilsResponse> {
  return {
    functionCode: FUNCTION_CODES.READ_COILS,
    address,
    quantity,
    pdu: buildReadCoilsRequest(address, quantity),
    parse: pdu => parseReadCoilsResponse(pdu, quantity),
  };
}

export function writeSingleRegister(
  address: number,
  value: number
): ModbusRequest<WriteSingleRegisterResponse> {
  return {
    functionCode: FUNCTION_CODES.WRITE_SINGLE_REGISTER,
    address,
    quantity: 1,
    pdu: buildWriteSingleRegisterRequest(address, value),
    parse: parseWriteSingleRegisterResponse,
  };
}

export function writeMultipleRegisters(
  address: number,
  values: readonly number[]
): ModbusRequest<WriteMultipleRegistersResponse> {
  return {
    functionCode: FUNCTION_CODES.WRITE_MULTIPLE_REGISTERS,
    address,
    quantity: values.length,
    pdu: buildWriteMultipleRegistersRequest(address, values),
    parse: parseWriteMultipleRegistersResponse,
  };
}

export function writeSingleCoil(
  address: number,
  value: boolean
): ModbusRequest<WriteSingleCoilResponse> {
  return {
    functionCode: FUNCTION_CODES.WRITE_SINGLE_COIL,
    address,
    quantity: 1,
    pdu: buildWriteSingleCoilRequest(address, value),
    parse: parseWriteSingleCoilResponse,
  };
}
