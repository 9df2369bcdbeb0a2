// src/store/entity-store.ts

import {
  Availability,
  ConnectionState,
  EntityScalar,
  EntitySource,
  EntityValue,
  EntityView,
  Snapshot,
  UnavailableReason,
} from '../types/modbus-types.js';

export interface EntityDefinition {
  id: string;
  unit: string | null;
  source: EntitySource;
}

export interface MeasuredValue {
  raw: readonly number[] | null;
  value: EntityScalar;
  label: string | null;
}

/**
 * Current value of every entity. Each stored EntityValue is frozen and is
 * replaced as a whole on every change, so a reference handed out earlier
 * never changes under its holder.
 */
export class EntityStore {
  private readonly _values = new Map<string, EntityValue>();

  /**
   * Adds an entity in the `unknown` state. Defining an existing id is a no-op.
   */
  public define(definition: EntityDefinition): EntityValue {
    const existing = this._values.get(definition.id);
    if (existing) return existing;
    const value: EntityValue = Object.freeze({
      id: definition.id,
      raw: null,
      value: null,
      label: null,
      unit: definition.unit,
      lastUpdated: null,
      availability: 'unknown',
      reason: null,
      source: definition.source,
    });
    this._values.set(definition.id, value);
    return value;
  }

  public has(id: string): boolean {
    return this._values.has(id);
  }

  public get(id: string): EntityValue | undefined {
    return this._values.get(id);
  }

  public ids(): string[] {
    return Array.from(this._values.keys());
  }

  public values(): EntityValue[] {
    return Array.from(this._values.values());
  }

  /**
   * Stores a freshly read or computed value and marks it available.
   */
  public setValue(id: string, measured: MeasuredValue, now: number): EntityValue | undefined {
    return this._replace(id, current => ({
      ...current,
      raw: measured.raw === null ? null : Object.freeze([...measured.raw]),
      value: measured.value,
      label: measured.label,
      lastUpdated: now,
      availability: 'available',
      reason: null,
    }));
  }

  /**
   * Changes availability only. The last known value is kept.
   */
  public setAvailability(
    id: string,
    availability: Availability,
    reason: UnavailableReason | null
  ): EntityValue | undefined {
    const current = this._values.get(id);
    if (!current || (current.availability === availability && current.reason === reason)) {
      return undefined;
    }
    return this._replace(id, value => ({ ...value, availability, reason }));
  }

  public snapshot(connection: ConnectionState, takenAt: number = Date.now()): Snapshot {
    const entities: Record<string, EntityView> = {};
    for (const value of this._values.values()) {
      entities[value.id] = toView(value);
    }
    return Object.freeze({ takenAt, connection, entities: Object.freeze(entities) });
  }

  private _replace(
    id: string,
    build: (current: EntityValue) => EntityValue
  ): EntityValue | undefined {
    const current = this._values.get(id);
    if (!current) return undefined;
    const next = Object.freeze(build(current));
    this._values.set(id, next);
    return next;
  }
}

export function toView(value: EntityValue): EntityView {
  return Object.freeze({
    value: value.value,
    label: value.label,
    unit: value.unit,
    availability: value.availability,
    lastUpdated: value.lastUpdated,
    source: value.source,
  });
}
