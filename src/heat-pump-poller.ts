// src/heat-pump-poller.ts

import { BlockData, decodeBlock } from './codec/decoder.js';
import { writableRange } from './codec/encoder.js';
import { resolveConfig } from './config.js';
import { DerivedMetricsEngine } from './derived/derived-metrics.js';
import { heatPumpIndicators, heatPumpMetrics } from './derived/heat-pump-metrics.js';
import {
  ModbusExceptionError,
  ModbusNotConnectedError,
  SchemaError,
  toError,
} from './errors.js';
import { logger as rootLogger } from './logger.js';
import { planBlocks } from './planner/block-planner.js';
import { PollScheduler } from './polling/poll-scheduler.js';
import { compileSchema, entityIdsOf } from './schema/register-schema.js';
import registerMap from './schema/heat-pump-registers.json' with { type: 'json' };
import { EntityStore } from './store/entity-store.js';
import { ConnectionManager, ConnectionStats } from './transport/connection-manager.js';
import { AvailabilityTracker } from './transport/trackers/availability-tracker.js';
import {
  ConnectionState,
  DerivedMetricDefinition,
  EntitySource,
  EntityValue,
  HeatPumpPollerConfig,
  PollBlock,
  PollSchedulerStats,
  RegisterDescriptor,
  ResolvedConfig,
  SchemaDocument,
  Snapshot,
  SnapshotListener,
  TransportFactory,
  ValueRange,
  WriteResult,
} from './types/modbus-types.js';
import { WritePath, WriteValue } from './write/write-path.js';

const logger = rootLogger.createLogger('HeatPumpPoller');

export interface HeatPumpPollerOptions {
  /** Register map; the bundled heat pump map by default. */
  schema?: SchemaDocument;
  /** Derived metrics; the built-in heat pump metrics and indicators by default. */
  metrics?: readonly DerivedMetricDefinition[];
  transportFactory?: TransportFactory;
}

export interface EntityDescription {
  id: string;
  name: string;
  source: EntitySource;
  unit: string | null;
  writable: boolean;
  range: ValueRange | null;
  options: string[] | null;
}

export interface HeatPumpPollerStats {
  scheduler: PollSchedulerStats;
  connection: ConnectionStats;
  pendingWrites: number;
}

/**
 * Polling engine for one heat pump controller: schema, connection,
 * scheduler and write path wired together behind a snapshot interface.
 */
export class HeatPumpPoller {
  public readonly config: ResolvedConfig;
  public readonly blocks: readonly PollBlock[];
  public readonly schemaErrors: readonly SchemaError[];

  private readonly _connection: ConnectionManager;
  private readonly _tracker: AvailabilityTracker;
  private readonly _store = new EntityStore();
  private readonly _metrics: DerivedMetricsEngine;
  private readonly _writes: WritePath;
  private readonly _scheduler: PollScheduler;
  private readonly _descriptions = new Map<string, EntityDescription>();
  private readonly _listeners = new Set<SnapshotListener>();
  private _stopped: boolean = false;

  /**
   * @throws ConfigError for an invalid configuration
   */
  constructor(config: HeatPumpPollerConfig, options: HeatPumpPollerOptions = {}) {
    this.config = resolveConfig(config);
    rootLogger.setLevel(this.config.logLevel);
    rootLogger.addGlobalContext({ unitId: this.config.unitId });

    const schema = compileSchema(options.schema ?? registerMap, {
      systemElements: this.config.systemElements,
    });
    const plan = planBlocks(schema.descriptors, {
      maxGap: this.config.maxGap,
      maxRegisters: this.config.maxRegistersPerRead,
    });
    this.blocks = plan.blocks;

    for (const descriptor of schema.descriptors) {
      this._describeRegister(descriptor);
    }
    for (const input of schema.localInputs) {
      this._store.define({ id: input.id, unit: input.unit, source: 'local' });
      if (input.initial !== null) {
        this._store.setValue(input.id, { raw: null, value: input.initial, label: null }, Date.now());
      }
      this._describe({
        id: input.id,
        name: input.name,
        source: 'local',
        unit: input.unit,
        writable: true,
        range: input.range,
        options: null,
      });
    }

    this._metrics = new DerivedMetricsEngine(this._store);
    this._tracker = new AvailabilityTracker({ failureThreshold: this.config.failureThreshold });
    this._tracker.track(schema.descriptors.flatMap(entityIdsOf));
    this._tracker.setHandler(changes => {
      for (const change of changes) {
        this._store.setAvailability(change.id, change.availability, change.reason);
      }
      this._metrics.onEntitiesUpdated(changes.map(c => c.id));
    });
    this._tracker.markExcluded(plan.excluded.flatMap(entityIdsOf));

    const metricDefinitions = options.metrics ?? this._builtInMetrics();
    const metricErrors = this._metrics.registerAll(metricDefinitions);
    for (const id of this._metrics.ids) {
      this._describe({
        id,
        name: metricDefinitions.find(m => m.id === id)?.name ?? id,
        source: 'computed',
        unit: this._store.get(id)?.unit ?? null,
        writable: false,
        range: null,
        options: null,
      });
    }
    this._metrics.recomputeAll();
    this.schemaErrors = [...schema.errors, ...plan.errors, ...metricErrors];

    this._connection = new ConnectionManager({
      host: this.config.host,
      port: this.config.port,
      unitId: this.config.unitId,
      requestTimeoutMs: this.config.requestTimeoutMs,
      connectTimeoutMs: this.config.connectTimeoutMs,
      protocolErrorLimit: this.config.protocolErrorLimit,
      backoff: this.config.backoff,
      transportFactory: options.transportFactory,
    });
    this._connection.onStateChange(state => this._onConnectionState(state));

    this._writes = new WritePath(
      this._connection,
      this._store,
      this._metrics,
      schema.descriptors,
      schema.localInputs,
      { maxQueuedWrites: this.config.maxQueuedWrites, unitId: this.config.unitId }
    );
    this._writes.onWritten(result => this._onWritten(result));

    this._scheduler = new PollScheduler(this._connection, this.blocks, this._writes, {
      intervalMs: this.config.pollIntervalSeconds * 1000,
      onBlockRead: (block, data, now) => this._applyBlock(block, data, now),
      onBlockFailed: (block, error) => this._failBlock(block, error),
    });

    logger.info('Poller ready', {
      host: this.config.host,
      port: this.config.port,
      blocks: this.blocks.length,
      entities: this._store.ids().length,
      schemaErrors: this.schemaErrors.length,
    });
  }

  /**
   * Connects and starts polling. Resolves after the first connection
   * attempt whether or not it succeeded; failures are retried with backoff.
   */
  public async start(): Promise<void> {
    this._stopped = false;
    await this._connection.start();
    this._scheduler.start();
  }

  /**
   * Stops polling, fails queued writes and closes the connection. The
   * request on the wire, if any, completes first.
   */
  public async stop(): Promise<void> {
    this._stopped = true;
    const stopped = new ModbusNotConnectedError('Poller stopped');
    this._writes.rejectAll(stopped);
    await this._scheduler.stop();
    this._writes.rejectAll(stopped);
    await this._connection.stop();
  }

  public getSnapshot(): Snapshot {
    return this._store.snapshot(this._connection.state);
  }

  public getEntity(id: string): EntityValue | undefined {
    return this._store.get(id);
  }

  public get connectionState(): ConnectionState {
    return this._connection.state;
  }

  /**
   * @returns a function that removes the listener
   */
  public onSnapshot(listener: SnapshotListener): () => void {
    this._listeners.add(listener);
    return () => {
      this._listeners.delete(listener);
    };
  }

  public listEntities(): EntityDescription[] {
    return Array.from(this._descriptions.values());
  }

  /**
   * Writes a value.
   * @throws ValidationError (as a rejection) with no request sent
   * @throws ModbusNotConnectedError (as a rejection) once stopped
   */
  public setValue(entityId: string, value: WriteValue): Promise<WriteResult> {
    if (this._stopped) {
      return Promise.reject(new ModbusNotConnectedError('Poller stopped'));
    }
    return this._writes.setValue(entityId, value);
  }

  /**
   * Runs one cycle immediately, outside the schedule.
   */
  public async refresh(): Promise<void> {
    await this._scheduler.runCycle();
  }

  public getStats(): HeatPumpPollerStats {
    return {
      scheduler: this._scheduler.getStats(),
      connection: this._connection.getStats(),
      pendingWrites: this._writes.pending,
    };
  }

  private _applyBlock(block: PollBlock, data: BlockData, now: number): void {
    const updated: string[] = [];
    for (const outcome of decodeBlock(block, data)) {
      if (outcome.ok) {
        for (const entity of outcome.entities) {
          this._store.setValue(
            entity.id,
            { raw: entity.raw, value: entity.value, label: entity.label },
            now
          );
          updated.push(entity.id);
        }
        this._tracker.recordSuccess(outcome.entities.map(e => e.id));
      } else {
        logger.warn(outcome.error.message, { entity: outcome.descriptor.id });
        this._tracker.recordDecodeError(outcome.entityIds);
      }
    }
    this._metrics.onEntitiesUpdated(updated, now);
    this._publish();
  }

  private _failBlock(block: PollBlock, error: Error): void {
    const ids = block.descriptors.flatMap(entityIdsOf);
    if (error instanceof ModbusExceptionError) {
      this._tracker.recordDeviceError(ids);
    } else {
      this._tracker.recordFailure(ids);
    }
    this._publish();
  }

  private _onConnectionState(state: ConnectionState): void {
    switch (state.kind) {
      case 'connected':
        this._tracker.setConnectionUp();
        this._scheduler.requestRefresh();
        break;
      case 'backoff':
      case 'disconnected':
        this._tracker.setConnectionDown();
        break;
      case 'connecting':
        break;
    }
    this._publish();
  }

  private _onWritten(result: WriteResult): void {
    if (this._tracker.hasState(result.entityId)) {
      this._tracker.recordSuccess([result.entityId]);
    }
    if (result.raw.length > 0) {
      this._scheduler.requestRefresh();
    }
    this._publish();
  }

  private _publish(): void {
    if (this._listeners.size === 0) return;
    const snapshot = this.getSnapshot();
    for (const listener of this._listeners) {
      try {
        listener(snapshot);
      } catch (err: unknown) {
        logger.error(`Snapshot listener threw: ${toError(err).message}`);
      }
    }
  }

  /**
   * Built-in metrics and indicators, minus those reading a register the
   * configured system elements leave out.
   */
  private _builtInMetrics(): DerivedMetricDefinition[] {
    const all = [
      ...heatPumpMetrics({ electricityRate: this.config.electricityRate }),
      ...heatPumpIndicators(),
    ];
    const metricIds = new Set(all.map(m => m.id));
    return all.filter(metric => {
      const missing = metric.inputs.find(id => !this._store.has(id) && !metricIds.has(id));
      if (missing !== undefined) {
        logger.debug(`Skipping "${metric.id}", requires ${missing}`);
      }
      return missing === undefined;
    });
  }

  private _describeRegister(descriptor: RegisterDescriptor): void {
    if (descriptor.kind.type === 'bitfield') {
      for (const bit of descriptor.kind.bits) {
        this._store.define({ id: bit.id, unit: null, source: 'measured' });
        this._describe({
          id: bit.id,
          name: bit.name,
          source: 'measured',
          unit: null,
          writable: false,
          range: null,
          options: null,
        });
      }
      return;
    }

    const writable = descriptor.access === 'read-write';
    this._store.define({ id: descriptor.id, unit: descriptor.unit, source: 'measured' });
    this._describe({
      id: descriptor.id,
      name: descriptor.name,
      source: 'measured',
      unit: descriptor.unit,
      writable,
      range: writable && descriptor.kind.type !== 'coil' ? writableRange(descriptor) : descriptor.range,
      options: descriptor.options ? Array.from(descriptor.options.values()) : null,
    });
  }

  private _describe(description: EntityDescription): void {
    this._descriptions.set(description.id, Object.freeze(description));
  }
}
