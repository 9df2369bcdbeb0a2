// src/framers/tcp-framer.ts

import { EXCEPTION_FLAG, MAX_MBAP_LENGTH, MODBUS_PROTOCOL_ID } from '../constants/constants.js';
import {
  ModbusExceptionError,
  ModbusMalformedFrameError,
  ModbusUnexpectedFunctionCodeError,
  ModbusUnexpectedUnitIdError,
} from '../errors.js';
import { MbapHeader } from '../types/modbus-types.js';
import { concatUint8Arrays } from '../utils/utils.js';
import { TransactionCounter, buildMbapHeader, parseMbapHeader } from '../utils/tcp-utils.js';

export interface TcpFrame {
  transactionId: number;
  unitId: number;
  pdu: Uint8Array;
}

/**
 * MBAP framing for one session. Transaction ids keep increasing across
 * reconnects so that a late answer to an old request never matches a new one.
 */
export class TcpFramer {
  private readonly _transactions = new TransactionCounter();

  public buildAdu(unitId: number, pdu: Uint8Array): { transactionId: number; adu: Uint8Array } {
    const transactionId = this._transactions.next();
    const mbap = buildMbapHeader(transactionId, unitId, pdu.length);
    return { transactionId, adu: concatUint8Arrays([mbap, pdu]) };
  }

  /**
   * Validates the header of an incoming frame.
   * @returns the header; `length - 1` more bytes of PDU follow it
   */
  public parseHeader(header: Uint8Array): MbapHeader {
    const mbap = parseMbapHeader(header);
    if (mbap.protocolId !== MODBUS_PROTOCOL_ID) {
      throw new ModbusMalformedFrameError(`invalid protocol id ${mbap.protocolId}`);
    }
    // Unit id plus at least a function code and one byte of payload.
    if (mbap.length < 3 || mbap.length > MAX_MBAP_LENGTH) {
      throw new ModbusMalformedFrameError(`invalid MBAP length ${mbap.length}`);
    }
    return mbap;
  }
}

/**
 * Checks a frame already matched by transaction id against the request it
 * answers. Throws the device exception when the response carries one.
 */
export function validateResponse(frame: TcpFrame, unitId: number, functionCode: number): void {
  if (frame.unitId !== unitId) {
    throw new ModbusUnexpectedUnitIdError(unitId, frame.unitId);
  }

  const responseCode = frame.pdu[0] ?? 0;
  if ((responseCode & ~EXCEPTION_FLAG) !== functionCode) {
    throw new ModbusUnexpectedFunctionCodeError(functionCode, responseCode);
  }

  if (responseCode & EXCEPTION_FLAG) {
    if (frame.pdu.length < 2) {
      throw new ModbusMalformedFrameError('exception response without exception code');
    }
    throw new ModbusExceptionError(functionCode, frame.pdu[1] ?? 0);
  }
}
