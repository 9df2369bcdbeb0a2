// src/write/write-path.ts

import { decodeDescriptor, scaleInteger } from '../codec/decoder.js';
import { encodeValue, valueToInteger, writableRange } from '../codec/encoder.js';
import { DerivedMetricsEngine } from '../derived/derived-metrics.js';
import {
  ModbusEchoMismatchError,
  ValidationError,
  WriteQueueFullError,
  toError,
} from '../errors.js';
import {
  writeMultipleRegisters,
  writeSingleCoil,
  writeSingleRegister,
} from '../function-codes/requests.js';
import { logger as rootLogger } from '../logger.js';
import { EntityStore } from '../store/entity-store.js';
import { ConnectionManager } from '../transport/connection-manager.js';
import {
  EntityScalar,
  LocalInputDescriptor,
  RegisterDescriptor,
  WriteResult,
} from '../types/modbus-types.js';

const logger = rootLogger.createLogger('WritePath');

/** A number, a boolean for coils, or an option label for enumerations. */
export type WriteValue = EntityScalar | string;

export type WriteSender = Pick<ConnectionManager, 'send'>;

export interface WritePathOptions {
  maxQueuedWrites: number;
  unitId?: number;
}

interface PendingWrite {
  descriptor: RegisterDescriptor;
  words: number[];
  resolve(result: WriteResult): void;
  reject(err: Error): void;
}

/**
 * Validated writes to the device.
 *
 * `setValue` either rejects at once with a ValidationError, without any
 * side effect, or queues the write. The queue is emptied by {@link drain},
 * which the poll scheduler calls between reads. A confirmed write updates
 * the stored value straight away instead of waiting for the next poll.
 */
export class WritePath {
  private readonly _queue: PendingWrite[] = [];
  private readonly _registers = new Map<string, RegisterDescriptor>();
  private readonly _readOnlyBits = new Set<string>();
  private readonly _localInputs = new Map<string, LocalInputDescriptor>();
  private readonly _enqueueListeners = new Set<() => void>();
  private readonly _writtenListeners = new Set<(result: WriteResult) => void>();
  private _draining: boolean = false;

  constructor(
    private readonly connection: WriteSender,
    private readonly store: EntityStore,
    private readonly metrics: DerivedMetricsEngine,
    descriptors: readonly RegisterDescriptor[],
    localInputs: readonly LocalInputDescriptor[],
    private readonly options: WritePathOptions
  ) {
    for (const descriptor of descriptors) {
      this._registers.set(descriptor.id, descriptor);
      if (descriptor.kind.type === 'bitfield') {
        descriptor.kind.bits.forEach(b => this._readOnlyBits.add(b.id));
      }
    }
    for (const input of localInputs) {
      this._localInputs.set(input.id, input);
    }
  }

  public get pending(): number {
    return this._queue.length;
  }

  /**
   * Called whenever a write is queued.
   * @returns a function that removes the listener
   */
  public onEnqueue(listener: () => void): () => void {
    this._enqueueListeners.add(listener);
    return () => {
      this._enqueueListeners.delete(listener);
    };
  }

  /**
   * Called after every confirmed write, local inputs included.
   */
  public onWritten(listener: (result: WriteResult) => void): () => void {
    this._writtenListeners.add(listener);
    return () => {
      this._writtenListeners.delete(listener);
    };
  }

  public setValue(entityId: string, value: WriteValue): Promise<WriteResult> {
    try {
      const local = this._localInputs.get(entityId);
      if (local) {
        return Promise.resolve(this._applyLocal(local, value));
      }

      const descriptor = this._writableDescriptor(entityId);
      const words = this._encode(descriptor, value);

      if (this._queue.length >= this.options.maxQueuedWrites) {
        throw new WriteQueueFullError(this.options.maxQueuedWrites);
      }

      const promise = new Promise<WriteResult>((resolve, reject) => {
        this._queue.push({ descriptor, words, resolve, reject });
      });
      logger.debug(`Queued write of ${String(value)}`, {
        entity: entityId,
        address: descriptor.address,
        pending: this._queue.length,
      });
      this._enqueueListeners.forEach(listener => listener());
      return promise;
    } catch (err: unknown) {
      return Promise.reject(toError(err));
    }
  }

  /**
   * Sends queued writes one by one until the queue is empty. A second call
   * while draining returns at once.
   * @returns how many writes were processed
   */
  public async drain(): Promise<number> {
    if (this._draining) return 0;
    this._draining = true;
    let processed = 0;
    try {
      for (let job = this._queue.shift(); job; job = this._queue.shift()) {
        await this._execute(job);
        processed++;
      }
    } finally {
      this._draining = false;
    }
    return processed;
  }

  /**
   * Fails every queued write, e.g. on shutdown.
   */
  public rejectAll(err: Error): void {
    const jobs = this._queue.splice(0, this._queue.length);
    jobs.forEach(job => job.reject(err));
  }

  private _writableDescriptor(entityId: string): RegisterDescriptor {
    if (this._readOnlyBits.has(entityId)) {
      throw new ValidationError(entityId, 'entity is read-only');
    }
    const descriptor = this._registers.get(entityId);
    if (!descriptor) {
      throw new ValidationError(entityId, 'unknown entity');
    }
    if (descriptor.access !== 'read-write') {
      throw new ValidationError(entityId, 'entity is read-only');
    }
    return descriptor;
  }

  private _encode(descriptor: RegisterDescriptor, value: WriteValue): number[] {
    if (descriptor.kind.type === 'coil') {
      if (typeof value !== 'boolean') {
        throw new ValidationError(descriptor.id, `expected a boolean, got ${typeof value}`);
      }
      return [value ? 1 : 0];
    }

    const numeric = this._numericValue(descriptor, value);
    if (!Number.isFinite(numeric)) {
      throw new ValidationError(descriptor.id, `${numeric} is not a finite number`);
    }

    const range = writableRange(descriptor);
    if (numeric < range.min || numeric > range.max) {
      throw new ValidationError(
        descriptor.id,
        `${numeric} is outside the range ${range.min}..${range.max}`
      );
    }

    if (descriptor.options) {
      const integer = valueToInteger(descriptor, numeric);
      if (!descriptor.options.has(integer) || scaleInteger(descriptor, integer) !== numeric) {
        throw new ValidationError(descriptor.id, `${numeric} is not one of the allowed options`);
      }
    }
    return encodeValue(descriptor, numeric);
  }

  private _numericValue(descriptor: RegisterDescriptor, value: WriteValue): number {
    if (typeof value === 'number') return value;
    if (typeof value === 'string' && descriptor.options) {
      for (const [raw, label] of descriptor.options) {
        if (label === value) return scaleInteger(descriptor, raw);
      }
      throw new ValidationError(descriptor.id, `"${value}" is not one of the allowed options`);
    }
    throw new ValidationError(descriptor.id, `expected a number, got ${typeof value}`);
  }

  private _applyLocal(input: LocalInputDescriptor, value: WriteValue): WriteResult {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new ValidationError(input.id, 'expected a finite number');
    }
    if (value < input.range.min || value > input.range.max) {
      throw new ValidationError(
        input.id,
        `${value} is outside the range ${input.range.min}..${input.range.max}`
      );
    }
    const now = Date.now();
    this.store.setValue(input.id, { raw: null, value, label: null }, now);
    this.metrics.onEntityUpdated(input.id, now);
    logger.info(`Set ${input.id} to ${value}`, { entity: input.id });

    const result: WriteResult = { entityId: input.id, value, raw: [] };
    this._notifyWritten(result);
    return result;
  }

  private async _execute(job: PendingWrite): Promise<void> {
    const { descriptor, words } = job;
    try {
      await this._send(descriptor, words);

      const now = Date.now();
      const [decoded] = decodeDescriptor(descriptor, words);
      if (decoded) {
        this.store.setValue(
          descriptor.id,
          { raw: words, value: decoded.value, label: decoded.label },
          now
        );
        this.metrics.onEntityUpdated(descriptor.id, now);
      }
      const value = decoded?.value ?? words[0] ?? 0;
      logger.info(`Wrote ${String(value)}`, {
        unitId: this.options.unitId,
        entity: descriptor.id,
        address: descriptor.address,
        quantity: words.length,
      });

      const result: WriteResult = { entityId: descriptor.id, value, raw: words };
      this._notifyWritten(result);
      job.resolve(result);
    } catch (err: unknown) {
      const error = toError(err);
      logger.warn(`Write failed: ${error.message}`, {
        entity: descriptor.id,
        address: descriptor.address,
      });
      job.reject(error);
    }
  }

  private async _send(descriptor: RegisterDescriptor, words: number[]): Promise<void> {
    const address = descriptor.address;

    if (descriptor.kind.type === 'coil') {
      const on = words[0] === 1;
      const echo = await this.connection.send(writeSingleCoil(address, on));
      if (echo.address !== address) throw new ModbusEchoMismatchError('address', address, echo.address);
      if (echo.value !== on) throw new ModbusEchoMismatchError('value', Number(on), Number(echo.value));
      return;
    }

    if (words.length === 1) {
      const word = words[0] ?? 0;
      const echo = await this.connection.send(writeSingleRegister(address, word));
      if (echo.address !== address) throw new ModbusEchoMismatchError('address', address, echo.address);
      if (echo.value !== word) throw new ModbusEchoMismatchError('value', word, echo.value);
      return;
    }

    const echo = await this.connection.send(writeMultipleRegisters(address, words));
    if (echo.startAddress !== address) {
      throw new ModbusEchoMismatchError('address', address, echo.startAddress);
    }
    if (echo.quantity !== words.length) {
      throw new ModbusEchoMismatchError('quantity', words.length, echo.quantity);
    }
  }

  private _notifyWritten(result: WriteResult): void {
    for (const listener of this._writtenListeners) {
      try {
        listener(result);
      } catch (err: unknown) {
        logger.error(`Write listener threw: ${toError(err).message}`);
      }
    }
  }
}
