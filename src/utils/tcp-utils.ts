// src/utils/tcp-utils.ts

import { MBAP_HEADER_LENGTH } from '../constants/constants.js';
import { ModbusMalformedFrameError } from '../errors.js';
import { MbapHeader } from '../types/modbus-types.js';

/**
 * Transaction ID counter. Starts at 1; the id after 65535 is 0, and counting
 * goes on from there. Every request of a session gets the next value.
 */
export class TransactionCounter {
  private _currentId: number = 0;

  next(): number {
    this._currentId = (this._currentId + 1) % 65536;
    return this._currentId;
  }
}

/**
 * Builds the 7-byte MBAP header.
 * @param pduLength - PDU length in bytes, without the unit id
 */
export function buildMbapHeader(
  transactionId: number,
  unitId: number,
  pduLength: number
): Uint8Array {
  const header = new Uint8Array(MBAP_HEADER_LENGTH);
  const view = new DataView(header.buffer);

  view.setUint16(0, transactionId, false);
  view.setUint16(2, 0, false); // protocol id
  view.setUint16(4, pduLength + 1, false); // PDU + unit id
  view.setUint8(6, unitId);

  return header;
}

export function parseMbapHeader(data: Uint8Array): MbapHeader {
  if (data.length < MBAP_HEADER_LENGTH) {
    throw new ModbusMalformedFrameError(`MBAP header too short (${data.length} bytes)`);
  }

  const view = new DataView(data.buffer, data.byteOffset, MBAP_HEADER_LENGTH);
  return {
    transactionId: view.getUint16(0, false),
    protocolId: view.getUint16(2, false),
    length: view.getUint16(4, false),
    unitId: view.getUint8(6),
  };
}
