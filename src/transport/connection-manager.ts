// src/transport/connection-manager.ts

import { Mutex } from 'async-mutex';
import { MBAP_HEADER_LENGTH } from '../constants/constants.js';
import {
  ModbusExceptionError,
  ModbusMalformedFrameError,
  ModbusNotConnectedError,
  ProtocolError,
  TransportError,
  isConnectionFailure,
  toError,
} from '../errors.js';
import { TcpFrame, TcpFramer, validateResponse } from '../framers/tcp-framer.js';
import { logger as rootLogger } from '../logger.js';
import {
  BackoffOptions,
  ConnectionState,
  ConnectionStateListener,
  MbapHeader,
  ModbusRequest,
  Transport,
  TransportFactory,
} from '../types/modbus-types.js';
import { ExponentialBackoff } from './backoff.js';
import { NodeTcpTransport } from './node-transports/node-tcp-transport.js';

const logger = rootLogger.createLogger('ConnectionManager');

export interface ConnectionManagerOptions {
  host: string;
  port: number;
  unitId: number;
  requestTimeoutMs: number;
  connectTimeoutMs: number;
  protocolErrorLimit: number;
  backoff: Required<BackoffOptions>;
  transportFactory?: TransportFactory;
}

export interface ConnectionStats {
  requests: number;
  failedRequests: number;
  staleResponses: number;
  protocolErrors: number;
  sessions: number;
}

/**
 * Owns the TCP session to one device.
 *
 * States: disconnected -> connecting -> connected, and backoff after any
 * failed attempt or lost session. Backoff delays double up to the cap and
 * only return to the minimum once a whole poll cycle succeeds
 * (see {@link markCycleSucceeded}). At most one request is on the wire.
 */
export class ConnectionManager {
  private _state: ConnectionState = { kind: 'disconnected' };
  private _transport: Transport | null = null;
  private _running: boolean = false;
  private _reconnectTimer: NodeJS.Timeout | null = null;
  private _consecutiveProtocolErrors: number = 0;

  private readonly _framer = new TcpFramer();
  private readonly _requestMutex = new Mutex();
  private readonly _backoff: ExponentialBackoff;
  private readonly _listeners = new Set<ConnectionStateListener>();
  private readonly _transportFactory: TransportFactory;
  private readonly _stats: ConnectionStats = {
    requests: 0,
    failedRequests: 0,
    staleResponses: 0,
    protocolErrors: 0,
    sessions: 0,
  };

  constructor(private readonly options: ConnectionManagerOptions) {
    this._backoff = new ExponentialBackoff(options.backoff.minDelayMs, options.backoff.maxDelayMs);
    this._transportFactory =
      options.transportFactory ??
      ((host, port) => new NodeTcpTransport(host, port, { connectTimeout: options.connectTimeoutMs }));
  }

  public get state(): ConnectionState {
    return this._state;
  }

  public get isConnected(): boolean {
    return this._state.kind === 'connected';
  }

  public get isRunning(): boolean {
    return this._running;
  }

  /**
   * @returns a function that removes the listener
   */
  public onStateChange(listener: ConnectionStateListener): () => void {
    this._listeners.add(listener);
    return () => {
      this._listeners.delete(listener);
    };
  }

  /**
   * Makes the first connection attempt. A failed attempt is not an error:
   * the manager moves to backoff and keeps retrying until {@link stop}.
   */
  public async start(): Promise<void> {
    if (this._running) return;
    this._running = true;
    await this._connect();
  }

  /**
   * Waits for the request on the wire, if any, then closes the session.
   * No reconnect is scheduled afterwards.
   */
  public async stop(): Promise<void> {
    this._running = false;
    this._clearReconnectTimer();

    const release = await this._requestMutex.acquire();
    try {
      const transport = this._transport;
      this._transport = null;
      if (transport) await transport.disconnect();
    } finally {
      release();
    }

    this._backoff.reset();
    this._consecutiveProtocolErrors = 0;
    this._transition({ kind: 'disconnected' });
  }

  /**
   * Resets the backoff delay to its minimum.
   */
  public markCycleSucceeded(): void {
    if (this._backoff.failures > 0) {
      logger.debug('Backoff reset after successful cycle');
    }
    this._backoff.reset();
  }

  /**
   * Sends one request and waits for its response.
   *
   * @throws ModbusNotConnectedError when there is no session
   * @throws ModbusExceptionError when the device answers with an exception
   * @throws ProtocolError for a response that does not fit the request
   * @throws TransportError or ModbusTimeoutError; the session is dropped first
   */
  public async send<T>(request: ModbusRequest<T>): Promise<T> {
    const release = await this._requestMutex.acquire();
    try {
      const transport = this._transport;
      if (!transport || this._state.kind !== 'connected') {
        throw new ModbusNotConnectedError();
      }
      this._stats.requests++;
      try {
        return await this._exchange(transport, request);
      } catch (err: unknown) {
        this._stats.failedRequests++;
        await this._handleRequestFailure(transport, err);
        throw err;
      }
    } finally {
      release();
    }
  }

  public getStats(): ConnectionStats {
    return { ...this._stats };
  }

  private async _exchange<T>(transport: Transport, request: ModbusRequest<T>): Promise<T> {
    const { unitId, requestTimeoutMs } = this.options;
    const startedAt = Date.now();
    const deadline = startedAt + requestTimeoutMs;
    const { transactionId, adu } = this._framer.buildAdu(unitId, request.pdu);

    logger.debug('Sending request', {
      unitId,
      funcCode: request.functionCode,
      address: request.address,
      quantity: request.quantity,
      transactionId,
    });
    await transport.write(adu);

    for (;;) {
      const frame = await this._readFrame(transport, deadline);
      if (frame.transactionId !== transactionId) {
        this._stats.staleResponses++;
        logger.warn('Discarding response with stale transaction id', {
          unitId,
          funcCode: request.functionCode,
          expected: transactionId,
          received: frame.transactionId,
        });
        continue;
      }

      try {
        validateResponse(frame, unitId, request.functionCode);
      } catch (err: unknown) {
        if (err instanceof ModbusExceptionError) {
          // A well-formed answer, even if negative.
          this._consecutiveProtocolErrors = 0;
          logger.warn('Device exception', {
            unitId,
            funcCode: request.functionCode,
            exceptionCode: err.exceptionCode,
            address: request.address,
            quantity: request.quantity,
          });
        }
        throw err;
      }

      const result = request.parse(frame.pdu);
      this._consecutiveProtocolErrors = 0;
      logger.debug('Response received', {
        unitId,
        funcCode: request.functionCode,
        address: request.address,
        quantity: request.quantity,
        responseTime: Date.now() - startedAt,
      });
      return result;
    }
  }

  private async _readFrame(transport: Transport, deadline: number): Promise<TcpFrame> {
    const header = await transport.read(MBAP_HEADER_LENGTH, remaining(deadline));
    let mbap: MbapHeader;
    try {
      mbap = this._framer.parseHeader(header);
    } catch (err: unknown) {
      // The stream is out of step; whatever is buffered cannot be trusted.
      await transport.flush();
      throw err;
    }
    const pdu = await transport.read(mbap.length - 1, remaining(deadline));
    return { transactionId: mbap.transactionId, unitId: mbap.unitId, pdu };
  }

  private async _handleRequestFailure(transport: Transport, err: unknown): Promise<void> {
    if (isConnectionFailure(err)) {
      this._dropSession(transport, toError(err));
      return;
    }
    if (err instanceof ProtocolError) {
      this._stats.protocolErrors++;
      this._consecutiveProtocolErrors++;
      logger.warn(`Protocol error: ${err.message}`, {
        unitId: this.options.unitId,
        consecutive: this._consecutiveProtocolErrors,
      });
      if (err instanceof ModbusMalformedFrameError) {
        await transport.flush();
      }
      if (this._consecutiveProtocolErrors >= this.options.protocolErrorLimit) {
        this._dropSession(
          transport,
          new TransportError(`${this._consecutiveProtocolErrors} consecutive protocol errors`)
        );
      }
    }
  }

  private async _connect(): Promise<void> {
    if (!this._running) return;
    this._transition({ kind: 'connecting' });

    const { host, port } = this.options;
    const transport = this._transportFactory(host, port);
    transport.onClose(err => {
      this._dropSession(transport, err ?? new TransportError('Connection closed'));
    });

    try {
      await transport.connect();
    } catch (err: unknown) {
      logger.warn(`Connection attempt to ${host}:${port} failed: ${toError(err).message}`);
      this._scheduleReconnect();
      return;
    }

    if (!this._running) {
      // stop() was called while the attempt was in flight.
      await transport.disconnect();
      return;
    }

    this._transport = transport;
    this._consecutiveProtocolErrors = 0;
    this._stats.sessions++;
    logger.info(`Connected to ${host}:${port}`, { unitId: this.options.unitId });
    this._transition({ kind: 'connected' });
  }

  private _dropSession(transport: Transport, reason: Error): void {
    if (transport !== this._transport) return;
    this._transport = null;
    this._consecutiveProtocolErrors = 0;
    logger.warn(`Session lost: ${reason.message}`, { unitId: this.options.unitId });
    transport.disconnect().catch((err: unknown) => {
      logger.debug(`Error while closing transport: ${toError(err).message}`);
    });
    this._scheduleReconnect();
  }

  private _scheduleReconnect(): void {
    if (!this._running) {
      this._transition({ kind: 'disconnected' });
      return;
    }
    if (this._reconnectTimer) return;

    const delayMs = this._backoff.next();
    logger.info(`Reconnecting in ${delayMs}ms`, { attempt: this._backoff.failures });
    this._transition({ kind: 'backoff', delayMs });

    this._reconnectTimer = setTimeout(() => {
      this._reconnectTimer = null;
      this._connect().catch((err: unknown) => {
        logger.error(`Reconnect failed: ${toError(err).message}`);
      });
    }, delayMs);
  }

  private _clearReconnectTimer(): void {
    if (this._reconnectTimer) {
      clearTimeout(this._reconnectTimer);
      this._reconnectTimer = null;
    }
  }

  private _transition(next: ConnectionState): void {
    const previous = this._state;
    if (previous.kind === next.kind && next.kind !== 'backoff') return;
    this._state = next;
    logger.debug(`State ${previous.kind} -> ${next.kind}`);
    for (const listener of this._listeners) {
      try {
        listener(next, previous);
      } catch (err: unknown) {
        logger.error(`State listener threw: ${toError(err).message}`);
      }
    }
  }
}

function remaining(deadline: number): number {
  return Math.max(deadline - Date.now(), 0);
}
