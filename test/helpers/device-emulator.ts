// test/helpers/device-emulator.ts

import {
  EXCEPTION_FLAG,
  FUNCTION_CODES,
  MBAP_HEADER_LENGTH,
} from '../../src/constants/constants.js';
import { ModbusTimeoutError, TransportError } from '../../src/errors.js';
import { Transport, TransportFactory } from '../../src/types/modbus-types.js';
import { buildMbapHeader, parseMbapHeader } from '../../src/utils/tcp-utils.js';
import { concatUint8Arrays } from '../../src/utils/utils.js';

export interface RecordedRequest {
  transactionId: number;
  unitId: number;
  functionCode: number;
  address: number;
  quantity: number;
  values: number[];
}

interface PendingRead {
  length: number;
  resolve(data: Uint8Array): void;
  reject(err: Error): void;
  timer: NodeJS.Timeout;
}

/**
 * In-process Modbus TCP unit. Answers MBAP frames from its register maps
 * and can be told to misbehave.
 */
export class DeviceEmulator {
  public readonly requests: RecordedRequest[] = [];
  public connectAttempts: number = 0;

  private readonly coils = new Map<number, boolean>();
  private readonly holdingRegisters = new Map<number, number>();
  private readonly inputRegisters = new Map<number, number>();
  private readonly exceptions = new Map<string, number>();

  private _refuseConnections: boolean = false;
  private _silentRequests: number = 0;
  private _staleBeforeNext: number = 0;
  private _unitIdOverride: number | null = null;
  private _tamperWriteEcho: boolean = false;
  private _transport: EmulatorTransport | null = null;

  constructor(public readonly unitId: number = 1) {}

  /**
   * Transport factory for the connection manager. Every call opens a new
   * session on this unit.
   */
  public get factory(): TransportFactory {
    return () => {
      const transport = new EmulatorTransport(this);
      this._transport = transport;
      return transport;
    };
  }

  public get transport(): EmulatorTransport | null {
    return this._transport;
  }

  public setHoldingRegister(address: number, value: number): void {
    this.holdingRegisters.set(address, value & 0xffff);
  }

  public setHoldingRegisters(start: number, values: number[]): void {
    values.forEach((value, i) => this.setHoldingRegister(start + i, value));
  }

  public getHoldingRegister(address: number): number {
    return this.holdingRegisters.get(address) ?? 0;
  }

  public setInputRegister(address: number, value: number): void {
    this.inputRegisters.set(address, value & 0xffff);
  }

  public setInputRegisters(start: number, values: number[]): void {
    values.forEach((value, i) => this.setInputRegister(start + i, value));
  }

  public setCoil(address: number, value: boolean): void {
    this.coils.set(address, value);
  }

  public getCoil(address: number): boolean {
    return this.coils.get(address) ?? false;
  }

  /**
   * Any request of `functionCode` touching `address` gets the exception.
   */
  public setException(functionCode: number, address: number, exceptionCode: number): void {
    this.exceptions.set(`${functionCode}_${address}`, exceptionCode);
  }

  public clearExceptions(): void {
    this.exceptions.clear();
  }

  public refuseConnections(refuse: boolean): void {
    this._refuseConnections = refuse;
  }

  /** The next `count` requests get no response at all. */
  public dropResponses(count: number): void {
    this._silentRequests = count;
  }

  /** Sends `count` answers with an old transaction id before the real one. */
  public sendStaleResponses(count: number): void {
    this._staleBeforeNext = count;
  }

  /** Answers with this unit id instead of the requested one; `null` to stop. */
  public answerAsUnit(unitId: number | null): void {
    this._unitIdOverride = unitId;
  }

  /** Write echoes carry a value off by one. */
  public tamperWriteEcho(on: boolean): void {
    this._tamperWriteEcho = on;
  }

  /** Closes the current session from the device side. */
  public closeConnection(): void {
    this._transport?.peerClose();
  }

  /** @internal */
  public acceptConnection(): boolean {
    this.connectAttempts++;
    return !this._refuseConnections;
  }

  /**
   * Handles one request ADU.
   * @returns the response frames to send, possibly none
   */
  public handleRequest(adu: Uint8Array): Uint8Array[] {
    const mbap = parseMbapHeader(adu);
    const pdu = adu.subarray(MBAP_HEADER_LENGTH);
    const view = new DataView(pdu.buffer, pdu.byteOffset, pdu.length);
    const functionCode = pdu[0] ?? 0;
    const address = pdu.length >= 3 ? view.getUint16(1, false) : 0;
    const second = pdu.length >= 5 ? view.getUint16(3, false) : 0;

    const values: number[] = [];
    if (functionCode === FUNCTION_CODES.WRITE_MULTIPLE_REGISTERS) {
      for (let i = 0; i < second; i++) values.push(view.getUint16(6 + i * 2, false));
    } else if (
      functionCode === FUNCTION_CODES.WRITE_SINGLE_REGISTER ||
      functionCode === FUNCTION_CODES.WRITE_SINGLE_COIL
    ) {
      values.push(second);
    }
    const isRead =
      functionCode === FUNCTION_CODES.READ_COILS ||
      functionCode === FUNCTION_CODES.READ_HOLDING_REGISTERS ||
      functionCode === FUNCTION_CODES.READ_INPUT_REGISTERS;
    const quantity =
      isRead || functionCode === FUNCTION_CODES.WRITE_MULTIPLE_REGISTERS ? second : 1;

    this.requests.push({
      transactionId: mbap.transactionId,
      unitId: mbap.unitId,
      functionCode,
      address,
      quantity,
      values,
    });

    if (mbap.unitId !== this.unitId) return [];
    if (this._silentRequests > 0) {
      this._silentRequests--;
      return [];
    }

    const responsePdu = this._respond(functionCode, address, quantity, pdu);
    const unitId = this._unitIdOverride ?? mbap.unitId;
    const frames: Uint8Array[] = [];
    for (; this._staleBeforeNext > 0; this._staleBeforeNext--) {
      const staleId = (mbap.transactionId + 0xffff) & 0xffff;
      frames.push(frame(staleId, unitId, responsePdu));
    }
    frames.push(frame(mbap.transactionId, unitId, responsePdu));
    return frames;
  }

  private _respond(functionCode: number, address: number, quantity: number, pdu: Uint8Array): Uint8Array {
    const exceptionCode = this._checkException(functionCode, address, quantity);
    if (exceptionCode !== null) {
      return this._createExceptionResponse(functionCode, exceptionCode);
    }

    switch (functionCode) {
      case FUNCTION_CODES.READ_COILS:
        return this._handleReadCoils(address, quantity);
      case FUNCTION_CODES.READ_HOLDING_REGISTERS:
        return this._handleReadRegisters(functionCode, this.holdingRegisters, address, quantity);
      case FUNCTION_CODES.READ_INPUT_REGISTERS:
        return this._handleReadRegisters(functionCode, this.inputRegisters, address, quantity);
      case FUNCTION_CODES.WRITE_SINGLE_COIL:
        return this._handleWriteSingleCoil(pdu);
      case FUNCTION_CODES.WRITE_SINGLE_REGISTER:
        return this._handleWriteSingleRegister(pdu);
      case FUNCTION_CODES.WRITE_MULTIPLE_REGISTERS:
        return this._handleWriteMultipleRegisters(pdu);
      default:
        return this._createExceptionResponse(functionCode, 0x01);
    }
  }

  private _checkException(functionCode: number, address: number, quantity: number): number | null {
    for (let i = 0; i < quantity; i++) {
      const code = this.exceptions.get(`${functionCode}_${address + i}`);
      if (code !== undefined) return code;
    }
    return null;
  }

  private _handleReadCoils(address: number, quantity: number): Uint8Array {
    const byteCount = Math.ceil(quantity / 8);
    const response = new Uint8Array(2 + byteCount);
    response[0] = FUNCTION_CODES.READ_COILS;
    response[1] = byteCount;
    for (let i = 0; i < quantity; i++) {
      if (this.getCoil(address + i)) {
        const index = 2 + (i >> 3);
        response[index] = (response[index] ?? 0) | (1 << (i & 7));
      }
    }
    return response;
  }

  private _handleReadRegisters(
    functionCode: number,
    registers: Map<number, number>,
    address: number,
    quantity: number
  ): Uint8Array {
    const response = new Uint8Array(2 + quantity * 2);
    const view = new DataView(response.buffer);
    response[0] = functionCode;
    response[1] = quantity * 2;
    for (let i = 0; i < quantity; i++) {
      view.setUint16(2 + i * 2, registers.get(address + i) ?? 0, false);
    }
    return response;
  }

  private _handleWriteSingleCoil(pdu: Uint8Array): Uint8Array {
    const view = new DataView(pdu.buffer, pdu.byteOffset, pdu.length);
    const address = view.getUint16(1, false);
    const raw = view.getUint16(3, false);
    if (raw !== 0xff00 && raw !== 0x0000) {
      return this._createExceptionResponse(FUNCTION_CODES.WRITE_SINGLE_COIL, 0x03);
    }
    this.setCoil(address, raw === 0xff00);
    const echo = pdu.slice(0, 5);
    if (this._tamperWriteEcho) echo[3] = raw === 0xff00 ? 0x00 : 0xff;
    return echo;
  }

  private _handleWriteSingleRegister(pdu: Uint8Array): Uint8Array {
    const view = new DataView(pdu.buffer, pdu.byteOffset, pdu.length);
    const address = view.getUint16(1, false);
    const value = view.getUint16(3, false);
    this.setHoldingRegister(address, value);
    const echo = pdu.slice(0, 5);
    if (this._tamperWriteEcho) {
      new DataView(echo.buffer).setUint16(3, (value + 1) & 0xffff, false);
    }
    return echo;
  }

  private _handleWriteMultipleRegisters(pdu: Uint8Array): Uint8Array {
    const view = new DataView(pdu.buffer, pdu.byteOffset, pdu.length);
    const address = view.getUint16(1, false);
    const quantity = view.getUint16(3, false);
    for (let i = 0; i < quantity; i++) {
      this.setHoldingRegister(address + i, view.getUint16(6 + i * 2, false));
    }
    const echo = pdu.slice(0, 5);
    if (this._tamperWriteEcho) {
      new DataView(echo.buffer).setUint16(3, quantity + 1, false);
    }
    return echo;
  }

  private _createExceptionResponse(functionCode: number, exceptionCode: number): Uint8Array {
    return new Uint8Array([functionCode | EXCEPTION_FLAG, exceptionCode]);
  }
}

function frame(transactionId: number, unitId: number, pdu: Uint8Array): Uint8Array {
  return concatUint8Arrays([buildMbapHeader(transactionId, unitId, pdu.length), pdu]);
}

/**
 * One session with a {@link DeviceEmulator}.
 */
export class EmulatorTransport implements Transport {
  public isOpen: boolean = false;
  public readonly written: Uint8Array[] = [];

  private _buffer: Uint8Array = new Uint8Array(0);
  private _pending: PendingRead | null = null;
  private _closeHandler: ((err?: Error) => void) | null = null;

  constructor(private readonly device: DeviceEmulator) {}

  public onClose(handler: (err?: Error) => void): void {
    this._closeHandler = handler;
  }

  public async connect(): Promise<void> {
    if (!this.device.acceptConnection()) {
      throw new TransportError('Connection refused');
    }
    this.isOpen = true;
  }

  public async disconnect(): Promise<void> {
    this.isOpen = false;
    this._failPending(new TransportError('Transport closed'));
  }

  public async write(data: Uint8Array): Promise<void> {
    if (!this.isOpen) throw new TransportError('Transport not open');
    this.written.push(data.slice());
    for (const response of this.device.handleRequest(data)) {
      this.push(response);
    }
  }

  public read(length: number, timeout: number): Promise<Uint8Array> {
    if (this._buffer.length >= length) {
      return Promise.resolve(this._take(length));
    }
    if (!this.isOpen) {
      return Promise.reject(new TransportError('Connection closed while reading'));
    }
    return new Promise<Uint8Array>((resolve, reject) => {
      const timer = setTimeout(() => {
        this._pending = null;
        reject(new ModbusTimeoutError(`No response within ${timeout}ms`));
      }, timeout);
      this._pending = { length, resolve, reject, timer };
    });
  }

  public async flush(): Promise<void> {
    this._buffer = new Uint8Array(0);
  }

  /** Appends raw bytes to the receive buffer. */
  public push(data: Uint8Array): void {
    this._buffer = concatUint8Arrays([this._buffer, data]);
    const pending = this._pending;
    if (pending && this._buffer.length >= pending.length) {
      this._pending = null;
      clearTimeout(pending.timer);
      pending.resolve(this._take(pending.length));
    }
  }

  public peerClose(): void {
    if (!this.isOpen) return;
    this.isOpen = false;
    const err = new TransportError('Connection closed by peer');
    this._failPending(err);
    this._closeHandler?.(err);
  }

  private _take(length: number): Uint8Array {
    const data = this._buffer.slice(0, length);
    this._buffer = this._buffer.slice(length);
    return data;
  }

  private _failPending(err: Error): void {
    const pending = this._pending;
    if (!pending) return;
    this._pending = null;
    clearTimeout(pending.timer);
    pending.reject(err);
  }
}
