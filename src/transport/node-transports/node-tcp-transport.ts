// src/transport/node-transports/node-tcp-transport.ts

import * as net from 'net';
import { Mutex } from 'async-mutex';
import { concatUint8Arrays, sliceUint8Array, allocUint8Array, toHex } from '../../utils/utils.js';
import { logger as rootLogger } from '../../logger.js';
import {
  ModbusConnectionTimeoutError,
  ModbusTimeoutError,
  TransportError,
} from '../../errors.js';
import { Transport } from '../../types/modbus-types.js';
import { DEFAULTS } from '../../constants/constants.js';

export interface NodeTcpTransportOptions {
  connectTimeout?: number;
  maxBufferSize?: number;
}

const logger = rootLogger.createLogger('NodeTcpTransport');

const READ_POLL_INTERVAL_MS = 10;

/**
 * One TCP session. Reconnecting is the connection manager's job: once
 * closed, an instance stays closed and a new one is created.
 */
export class NodeTcpTransport implements Transport {
  public isOpen: boolean = false;
  private host: string;
  private port: number;
  private options: Required<NodeTcpTransportOptions>;
  private socket: net.Socket | null = null;
  private readBuffer: Uint8Array = allocUint8Array(0);

  private _isConnecting: boolean = false;
  private _isDisconnecting: boolean = false;
  private _lastError: Error | null = null;
  private _closeHandler: ((err?: Error) => void) | null = null;
  private _operationMutex: Mutex = new Mutex();

  constructor(host: string, port: number, options: NodeTcpTransportOptions = {}) {
    this.host = host;
    this.port = port;
    this.options = {
      connectTimeout: options.connectTimeout ?? DEFAULTS.CONNECT_TIMEOUT_MS,
      maxBufferSize: options.maxBufferSize ?? 8192,
    };
  }

  public onClose(handler: (err?: Error) => void): void {
    this._closeHandler = handler;
  }

  public async connect(): Promise<void> {
    if (this._isConnecting || this.isOpen) return;
    this._isConnecting = true;

    return new Promise((resolve, reject) => {
      logger.info(`Connecting to ${this.host}:${this.port}...`);

      const socket = net.connect({ host: this.host, port: this.port }, () => {
        this.isOpen = true;
        this._isConnecting = false;
        socket.setTimeout(0);
        socket.setNoDelay(true);
        logger.info(`Connected to ${this.host}:${this.port}`);
        resolve();
      });
      this.socket = socket;

      socket.on('data', (data: Buffer) => this._onData(data));

      socket.on('error', err => {
        if (this._isConnecting) {
          this._isConnecting = false;
          reject(new TransportError(`Cannot connect to ${this.host}:${this.port}: ${err.message}`));
          return;
        }
        logger.error(`Socket error: ${err.message}`);
        this._lastError = new TransportError(err.message);
      });

      socket.on('close', () => this._onClose());

      socket.setTimeout(this.options.connectTimeout);
      socket.on('timeout', () => {
        if (this._isConnecting) {
          this._isConnecting = false;
          socket.destroy();
          reject(
            new ModbusConnectionTimeoutError(this.host, this.port, this.options.connectTimeout)
          );
        }
      });
    });
  }

  private _onData(data: Buffer): void {
    const chunk = new Uint8Array(data);
    logger.trace(`RX ${chunk.length} bytes: ${toHex(chunk)}`);
    if (this.readBuffer.length + chunk.length > this.options.maxBufferSize) {
      logger.warn('Receive buffer overflow, dropping buffered data', {
        buffered: this.readBuffer.length,
        incoming: chunk.length,
      });
      this.readBuffer = allocUint8Array(0);
      return;
    }
    this.readBuffer = concatUint8Arrays([this.readBuffer, chunk]);
  }

  private _onClose(): void {
    const wasOpen = this.isOpen;
    this.isOpen = false;
    this.socket = null;
    if (wasOpen && !this._isDisconnecting) {
      logger.warn(`Connection closed for ${this.host}:${this.port}`);
      this._closeHandler?.(this._lastError ?? new TransportError('Connection closed by peer'));
    }
  }

  public async write(buffer: Uint8Array): Promise<void> {
    const socket = this.socket;
    if (!this.isOpen || !socket) throw new TransportError('Transport not open');
    logger.trace(`TX ${buffer.length} bytes: ${toHex(buffer)}`);
    await new Promise<void>((resolve, reject) => {
      socket.write(Buffer.from(buffer), err => {
        if (err) reject(new TransportError(`Write failed: ${err.message}`));
        else resolve();
      });
    });
  }

  /**
   * Resolves with exactly `length` bytes, or rejects with ModbusTimeoutError
   * once `timeout` ms have passed without them.
   */
  public async read(length: number, timeout: number): Promise<Uint8Array> {
    const start = Date.now();
    const release = await this._operationMutex.acquire();
    try {
      return await new Promise<Uint8Array>((resolve, reject) => {
        const check = (): void => {
          if (this.readBuffer.length >= length) {
            const data = sliceUint8Array(this.readBuffer, 0, length).slice();
            this.readBuffer = sliceUint8Array(this.readBuffer, length);
            resolve(data);
            return;
          }
          if (!this.isOpen) {
            reject(this._lastError ?? new TransportError('Connection closed while reading'));
            return;
          }
          if (Date.now() - start >= timeout) {
            reject(new ModbusTimeoutError(`No response within ${timeout}ms`));
            return;
          }
          setTimeout(check, READ_POLL_INTERVAL_MS);
        };
        check();
      });
    } finally {
      release();
    }
  }

  public async disconnect(): Promise<void> {
    this._isDisconnecting = true;
    const socket = this.socket;
    if (!socket) {
      this.isOpen = false;
      return;
    }
    await new Promise<void>(resolve => {
      socket.once('close', () => resolve());
      socket.end(() => socket.destroy());
    });
    this.isOpen = false;
  }

  public async flush(): Promise<void> {
    this.readBuffer = allocUint8Array(0);
  }
}
