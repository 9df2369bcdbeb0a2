// src/derived/derived-metrics.ts

import { SchemaError, toError } from '../errors.js';
import { logger as rootLogger } from '../logger.js';
import { EntityStore } from '../store/entity-store.js';
import {
  DerivedMetricDefinition,
  EntityScalar,
  EntityValue,
  MetricInputs,
  ValueRange,
} from '../types/modbus-types.js';

const logger = rootLogger.createLogger('DerivedMetrics');

type InputCheck =
  | { status: 'ready'; inputs: MetricInputs }
  | { status: 'unknown' }
  | { status: 'unavailable' };

/**
 * Computes metrics from other entities and keeps them current.
 *
 * Metrics are entities of the store with source `computed`, so one metric
 * may feed another. Evaluation always follows dependency order.
 */
export class DerivedMetricsEngine {
  private readonly _definitions = new Map<string, DerivedMetricDefinition>();
  private readonly _dependents = new Map<string, Set<string>>();
  private readonly _order: string[] = [];

  constructor(private readonly store: EntityStore) {}

  /**
   * Registers one metric.
   * @throws SchemaError for an unknown input, a taken id or a cycle
   */
  public register(definition: DerivedMetricDefinition): void {
    const [error] = this.registerAll([definition]);
    if (error) throw error;
  }

  /**
   * Registers a batch of metrics that may refer to each other. Invalid
   * metrics are reported and left out; the rest are registered.
   */
  public registerAll(definitions: readonly DerivedMetricDefinition[]): SchemaError[] {
    const errors: SchemaError[] = [];
    const reject = (definition: DerivedMetricDefinition, message: string): void => {
      const error = new SchemaError(message, definition.id);
      errors.push(error);
      logger.error(error.message, { entity: definition.id });
    };

    const batch = new Map<string, DerivedMetricDefinition>();
    for (const definition of definitions) {
      if (definition.id.length === 0) {
        reject(definition, 'metric id must not be empty');
      } else if (this.store.has(definition.id) || batch.has(definition.id)) {
        reject(definition, 'id is already taken');
      } else if (definition.inputs.length === 0) {
        reject(definition, 'metric needs at least one input');
      } else if (definition.range && definition.range.min > definition.range.max) {
        reject(definition, 'range min is greater than max');
      } else {
        batch.set(definition.id, definition);
      }
    }

    // Dropping a metric can orphan metrics that read it, so repeat until stable.
    let changed = true;
    while (changed) {
      changed = false;
      for (const definition of batch.values()) {
        const missing = definition.inputs.find(id => !this.store.has(id) && !batch.has(id));
        if (missing !== undefined) {
          reject(definition, `unknown input "${missing}"`);
          batch.delete(definition.id);
          changed = true;
        }
      }
    }

    const ordered = this._topologicalOrder(batch);
    for (const definition of batch.values()) {
      if (!ordered.includes(definition.id)) {
        reject(definition, 'inputs form a dependency cycle');
      }
    }

    for (const id of ordered) {
      const definition = batch.get(id);
      if (!definition) continue;
      this._definitions.set(id, definition);
      this._order.push(id);
      this.store.define({ id, unit: definition.unit, source: 'computed' });
      for (const input of definition.inputs) {
        let dependents = this._dependents.get(input);
        if (!dependents) {
          dependents = new Set();
          this._dependents.set(input, dependents);
        }
        dependents.add(id);
      }
    }

    return errors;
  }

  public has(id: string): boolean {
    return this._definitions.has(id);
  }

  /**
   * Metric ids in evaluation order.
   */
  public get ids(): readonly string[] {
    return this._order;
  }

  /**
   * Recomputes everything that depends on `id`, directly or through other
   * metrics. Synchronous.
   * @returns the metric values that changed
   */
  public onEntityUpdated(id: string, now: number = Date.now()): EntityValue[] {
    return this.onEntitiesUpdated([id], now);
  }

  /**
   * Recomputes after a batch of updates, each metric at most once.
   */
  public onEntitiesUpdated(ids: Iterable<string>, now: number = Date.now()): EntityValue[] {
    const affected = new Set<string>();
    const queue = Array.from(ids);
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined) break;
      for (const dependent of this._dependents.get(next) ?? []) {
        if (!affected.has(dependent)) {
          affected.add(dependent);
          queue.push(dependent);
        }
      }
    }
    return this._evaluateIn(this._order.filter(m => affected.has(m)), now);
  }

  public recomputeAll(now: number = Date.now()): EntityValue[] {
    return this._evaluateIn(this._order, now);
  }

  private _evaluateIn(ids: readonly string[], now: number): EntityValue[] {
    const changed: EntityValue[] = [];
    for (const id of ids) {
      const definition = this._definitions.get(id);
      if (!definition) continue;
      const value = this._evaluate(definition, now);
      if (value) changed.push(value);
    }
    return changed;
  }

  private _evaluate(definition: DerivedMetricDefinition, now: number): EntityValue | undefined {
    const check = this._collectInputs(definition);
    if (check.status === 'unknown') {
      return this.store.setAvailability(definition.id, 'unknown', null);
    }
    if (check.status === 'unavailable') {
      return this.store.setAvailability(definition.id, 'unavailable', 'input-unavailable');
    }

    if (!definition.predicate(check.inputs)) {
      return this.store.setAvailability(definition.id, 'unavailable', 'predicate-failed');
    }

    let result: EntityScalar;
    try {
      result = definition.formula(check.inputs);
    } catch (err: unknown) {
      logger.warn(`Formula failed: ${toError(err).message}`, { entity: definition.id });
      return this.store.setAvailability(definition.id, 'unavailable', 'out-of-range');
    }

    if (typeof result === 'number' && !isPlausible(result, definition.range)) {
      logger.debug(`Implausible result ${result}`, { entity: definition.id });
      return this.store.setAvailability(definition.id, 'unavailable', 'out-of-range');
    }

    return this.store.setValue(definition.id, { raw: null, value: result, label: null }, now);
  }

  private _collectInputs(definition: DerivedMetricDefinition): InputCheck {
    const inputs: Record<string, number> = {};
    let unknown = false;
    for (const id of definition.inputs) {
      const entity = this.store.get(id);
      if (!entity || entity.availability === 'unavailable') return { status: 'unavailable' };
      if (entity.availability === 'unknown' || entity.value === null) {
        unknown = true;
        continue;
      }
      inputs[id] = typeof entity.value === 'boolean' ? Number(entity.value) : entity.value;
    }
    return unknown ? { status: 'unknown' } : { status: 'ready', inputs };
  }

  /**
   * Kahn's algorithm over the batch. Metrics on or behind a cycle are
   * missing from the result.
   */
  private _topologicalOrder(batch: ReadonlyMap<string, DerivedMetricDefinition>): string[] {
    const inDegree = new Map<string, number>();
    const edges = new Map<string, string[]>();
    for (const definition of batch.values()) {
      const internal = definition.inputs.filter(id => batch.has(id));
      inDegree.set(definition.id, new Set(internal).size);
      for (const input of new Set(internal)) {
        const list = edges.get(input) ?? [];
        list.push(definition.id);
        edges.set(input, list);
      }
    }

    const ready = Array.from(batch.keys()).filter(id => inDegree.get(id) === 0);
    const order: string[] = [];
    while (ready.length > 0) {
      const id = ready.shift();
      if (id === undefined) break;
      order.push(id);
      for (const dependent of edges.get(id) ?? []) {
        const remaining = (inDegree.get(dependent) ?? 0) - 1;
        inDegree.set(dependent, remaining);
        if (remaining === 0) ready.push(dependent);
      }
    }
    return order;
  }
}

function isPlausible(value: number, range: ValueRange | undefined): boolean {
  if (!Number.isFinite(value)) return false;
  return !range || (value >= range.min && value <= range.max);
}
