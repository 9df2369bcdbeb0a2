// src/polling/poll-scheduler.ts

import { BlockData } from '../codec/decoder.js';
import { ModbusNotConnectedError, PollSchedulerError, isConnectionFailure, toError } from '../errors.js';
import { readCoils, readHoldingRegisters, readInputRegisters } from '../function-codes/requests.js';
import { logger as rootLogger } from '../logger.js';
import { ConnectionManager } from '../transport/connection-manager.js';
import { PollBlock, PollCycleResult, PollSchedulerStats } from '../types/modbus-types.js';
import { WritePath } from '../write/write-path.js';

const logger = rootLogger.createLogger('PollScheduler');

export type PollConnection = Pick<ConnectionManager, 'send' | 'isConnected' | 'markCycleSucceeded'>;

export interface PollSchedulerOptions {
  intervalMs: number;
  onBlockRead: (block: PollBlock, data: BlockData, now: number) => void;
  onBlockFailed: (block: PollBlock, error: Error) => void;
  onCycleComplete?: (result: PollCycleResult) => void;
}

/**
 * Runs one read cycle per interval over the planned blocks.
 *
 * Ticks are fixed-rate: the next one is armed before the cycle starts, so a
 * cycle that overruns the interval makes the following tick find it still
 * running, and that tick is dropped. Queued writes go out before the first
 * block, between blocks and after the last one.
 */
export class PollScheduler {
  private _stopped: boolean = true;
  private _timerId: NodeJS.Timeout | null = null;
  private _refreshTimerId: NodeJS.Timeout | null = null;
  private _currentCycle: Promise<PollCycleResult> | null = null;
  private _refreshPending: boolean = false;
  private _abortRequested: boolean = false;
  private _idleDrain: Promise<number> | null = null;
  private readonly _stats: PollSchedulerStats = {
    totalCycles: 0,
    skippedCycles: 0,
    droppedTicks: 0,
    successfulCycles: 0,
    lastCycle: null,
    lastError: null,
  };

  constructor(
    private readonly connection: PollConnection,
    private readonly blocks: readonly PollBlock[],
    private readonly writes: WritePath,
    private readonly options: PollSchedulerOptions
  ) {
    if (!(options.intervalMs > 0)) {
      throw new PollSchedulerError(`Interval must be positive, got ${options.intervalMs}`);
    }
    writes.onEnqueue(() => this._drainIfIdle());
  }

  public get isRunning(): boolean {
    return !this._stopped;
  }

  public get cycleInProgress(): boolean {
    return this._currentCycle !== null;
  }

  /**
   * Arms the timer. The first cycle runs immediately.
   */
  public start(): void {
    if (!this._stopped) {
      logger.debug('Scheduler already running');
      return;
    }
    this._stopped = false;
    logger.info('Scheduler started', {
      interval: this.options.intervalMs,
      blocks: this.blocks.length,
    });
    this._scheduleTick(0);
  }

  /**
   * Disarms the timer and waits for the cycle in progress, which stops
   * after its current request. Writes still queued are left for the owner
   * to fail.
   */
  public async stop(): Promise<void> {
    if (this._stopped) return;
    this._stopped = true;
    this._abortRequested = true;
    this._clearTimers();
    this._refreshPending = false;
    const inFlight = this._currentCycle;
    if (inFlight) await inFlight;
    if (this._idleDrain) await this._idleDrain;
    logger.info('Scheduler stopped');
  }

  /**
   * Runs an extra cycle as soon as possible without moving the regular
   * schedule. Coalesces with a cycle already running.
   */
  public requestRefresh(): void {
    if (this._stopped) return;
    if (this._currentCycle) {
      this._refreshPending = true;
      return;
    }
    if (this._refreshTimerId) return;
    this._refreshTimerId = setTimeout(() => {
      this._refreshTimerId = null;
      this._runAndLog();
    }, 0);
  }

  /**
   * Runs one cycle now.
   * @returns the result, or `null` when the cycle was dropped or skipped
   */
  public async runCycle(): Promise<PollCycleResult | null> {
    if (this._currentCycle) {
      this._stats.droppedTicks++;
      logger.debug('Cycle still in progress, tick dropped', {
        dropped: this._stats.droppedTicks,
      });
      return null;
    }
    if (!this.connection.isConnected) {
      this._stats.skippedCycles++;
      logger.debug('Not connected, cycle skipped', { skipped: this._stats.skippedCycles });
      return null;
    }

    this._abortRequested = false;
    const cycle = this._executeCycle();
    this._currentCycle = cycle;
    try {
      return await cycle;
    } finally {
      this._currentCycle = null;
      if (this.writes.pending > 0 && !this._stopped) this._drainIfIdle();
      if (this._refreshPending && !this._stopped) {
        this._refreshPending = false;
        this.requestRefresh();
      }
    }
  }

  public getStats(): PollSchedulerStats {
    return { ...this._stats };
  }

  private async _executeCycle(): Promise<PollCycleResult> {
    const startedAt = Date.now();
    let blocksRead = 0;
    let blocksFailed = 0;
    let aborted = false;
    this._stats.totalCycles++;

    await this.writes.drain();

    for (const block of this.blocks) {
      if (this._abortRequested || !this.connection.isConnected) {
        aborted = true;
        break;
      }

      try {
        const data = await this._readBlock(block);
        blocksRead++;
        this.options.onBlockRead(block, data, Date.now());
      } catch (err: unknown) {
        if (err instanceof ModbusNotConnectedError) {
          aborted = true;
          break;
        }
        const error = toError(err);
        blocksFailed++;
        this._stats.lastError = error;
        logger.warn(`Block read failed: ${error.message}`, {
          funcCode: block.functionCode,
          address: block.start,
          quantity: block.count,
        });
        this.options.onBlockFailed(block, error);
        if (isConnectionFailure(err)) {
          aborted = true;
          break;
        }
      }

      if (!this._abortRequested) await this.writes.drain();
    }

    if (aborted && !this._stopped) {
      // Fail queued writes now rather than leaving them to the next session.
      await this.writes.drain();
    }

    const succeeded = !aborted && blocksFailed === 0 && blocksRead === this.blocks.length;
    if (succeeded) {
      this._stats.successfulCycles++;
      this.connection.markCycleSucceeded();
    }

    const result: PollCycleResult = {
      startedAt,
      durationMs: Date.now() - startedAt,
      blocksRead,
      blocksFailed,
      aborted,
    };
    this._stats.lastCycle = result;
    logger.info('Cycle completed', {
      blocksRead,
      blocksFailed,
      aborted,
      responseTime: result.durationMs,
    });
    this.options.onCycleComplete?.(result);
    return result;
  }

  private async _readBlock(block: PollBlock): Promise<BlockData> {
    switch (block.space) {
      case 'coil': {
        const bits = await this.connection.send(readCoils(block.start, block.count));
        return { type: 'coils', bits };
      }
      case 'input': {
        const words = await this.connection.send(readInputRegisters(block.start, block.count));
        return { type: 'registers', words };
      }
      case 'holding': {
        const words = await this.connection.send(readHoldingRegisters(block.start, block.count));
        return { type: 'registers', words };
      }
    }
  }

  private _scheduleTick(delay: number): void {
    if (this._stopped) return;
    this._timerId = setTimeout(() => {
      this._timerId = null;
      if (this._stopped) return;
      this._scheduleTick(this.options.intervalMs);
      this._runAndLog();
    }, delay);
  }

  private _runAndLog(): void {
    this.runCycle().catch((err: unknown) => {
      const error = toError(err);
      this._stats.lastError = error;
      logger.error(`Fatal error during poll cycle: ${error.message}`);
    });
  }

  private _drainIfIdle(): void {
    if (this._currentCycle) return;
    this._idleDrain = this.writes.drain().catch((err: unknown) => {
      logger.error(`Write drain failed: ${toError(err).message}`);
      return 0;
    });
  }

  private _clearTimers(): void {
    if (this._timerId) {
      clearTimeout(this._timerId);
      this._timerId = null;
    }
    if (this._refreshTimerId) {
      clearTimeout(this._refreshTimerId);
      this._refreshTimerId = null;
    }
  }
}
