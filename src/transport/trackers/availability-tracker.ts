// src/transport/trackers/availability-tracker.ts

import { Availability, UnavailableReason } from '../../types/modbus-types.js';

export interface AvailabilityTrackerOptions {
  /** Consecutive failed reads before an entity goes unavailable. */
  failureThreshold?: number;
}

export interface AvailabilityState {
  readonly availability: Availability;
  readonly reason: UnavailableReason | null;
}

export interface AvailabilityChange extends AvailabilityState {
  readonly id: string;
}

export type AvailabilityHandler = (changes: readonly AvailabilityChange[]) => void;

interface EntityHealth {
  availability: Availability;
  reason: UnavailableReason | null;
  consecutiveFailures: number;
  excluded: boolean;
}

const UNKNOWN: AvailabilityState = { availability: 'unknown', reason: null };

/**
 * Tracks whether each polled entity is live.
 *
 * Each entity moves `unknown -> available -> unavailable -> available` from
 * its own read results. On top of that sits the connection: while it is down
 * every entity reads as unavailable, and the individual states come back
 * unchanged once it is up again. Before the first connection, and until the
 * connection is first reported down, all entities are unknown.
 *
 * The handler only hears about changes of the effective state.
 */
export class AvailabilityTracker {
  private _handler?: AvailabilityHandler;
  private readonly _entities = new Map<string, EntityHealth>();
  private readonly _failureThreshold: number;
  private _connectionDown: boolean = false;
  private _wasEverConnected: boolean = false;

  constructor(options: AvailabilityTrackerOptions = {}) {
    this._failureThreshold = options.failureThreshold ?? 3;
  }

  public setHandler(handler: AvailabilityHandler): void {
    this._handler = handler;
  }

  public removeHandler(): void {
    this._handler = undefined;
  }

  /**
   * Starts tracking entities. Already tracked ids are left as they are.
   */
  public track(ids: readonly string[]): void {
    for (const id of ids) {
      if (!this._entities.has(id)) {
        this._entities.set(id, {
          availability: 'unknown',
          reason: null,
          consecutiveFailures: 0,
          excluded: false,
        });
      }
    }
  }

  /**
   * Entities that can never be read. They stay unavailable for good.
   */
  public markExcluded(ids: readonly string[]): void {
    this.track(ids);
    this._update(ids, health => {
      health.excluded = true;
      health.availability = 'unavailable';
      health.reason = 'schema-error';
    });
  }

  public recordSuccess(ids: readonly string[]): void {
    this._update(ids, health => {
      health.consecutiveFailures = 0;
      health.availability = 'available';
      health.reason = null;
    });
  }

  /**
   * A failed read. The entity goes unavailable once the threshold is reached.
   */
  public recordFailure(ids: readonly string[]): void {
    this._update(ids, health => {
      health.consecutiveFailures++;
      if (health.consecutiveFailures >= this._failureThreshold) {
        health.availability = 'unavailable';
        health.reason = 'read-failures';
      }
    });
  }

  /**
   * The device answered with an exception for these entities.
   */
  public recordDeviceError(ids: readonly string[]): void {
    this._update(ids, health => {
      health.consecutiveFailures = Math.max(health.consecutiveFailures + 1, this._failureThreshold);
      health.availability = 'unavailable';
      health.reason = 'device-error';
    });
  }

  public recordDecodeError(ids: readonly string[]): void {
    this._update(ids, health => {
      health.availability = 'unavailable';
      health.reason = 'decode-error';
    });
  }

  public setConnectionUp(): void {
    if (!this._connectionDown && this._wasEverConnected) return;
    this._updateAll(() => {
      this._connectionDown = false;
      this._wasEverConnected = true;
    });
  }

  public setConnectionDown(): void {
    if (this._connectionDown) return;
    this._updateAll(() => {
      this._connectionDown = true;
    });
  }

  public get isConnectionDown(): boolean {
    return this._connectionDown;
  }

  /**
   * Effective state of an entity. Untracked ids read as unknown.
   */
  public getState(id: string): AvailabilityState {
    const health = this._entities.get(id);
    if (!health) return UNKNOWN;
    return this._effective(health);
  }

  public getAllStates(): AvailabilityChange[] {
    return Array.from(this._entities.entries(), ([id, health]) => ({
      id,
      ...this._effective(health),
    }));
  }

  public getConsecutiveFailures(id: string): number {
    return this._entities.get(id)?.consecutiveFailures ?? 0;
  }

  public hasState(id: string): boolean {
    return this._entities.has(id);
  }

  public getAvailableIds(): string[] {
    return this.getAllStates()
      .filter(s => s.availability === 'available')
      .map(s => s.id);
  }

  public clear(): void {
    this._entities.clear();
    this._connectionDown = false;
    this._wasEverConnected = false;
    this._handler = undefined;
  }

  private _effective(health: EntityHealth): AvailabilityState {
    if (health.excluded) return { availability: 'unavailable', reason: 'schema-error' };
    if (this._connectionDown) return { availability: 'unavailable', reason: 'connection' };
    if (!this._wasEverConnected) return UNKNOWN;
    return { availability: health.availability, reason: health.reason };
  }

  private _update(ids: readonly string[], mutate: (health: EntityHealth) => void): void {
    const changes: AvailabilityChange[] = [];
    for (const id of ids) {
      const health = this._entities.get(id);
      if (!health || health.excluded) continue;
      const before = this._effective(health);
      mutate(health);
      const after = this._effective(health);
      if (before.availability !== after.availability || before.reason !== after.reason) {
        changes.push({ id, ...after });
      }
    }
    this._emit(changes);
  }

  private _updateAll(mutate: () => void): void {
    const before = new Map<string, AvailabilityState>();
    for (const [id, health] of this._entities) before.set(id, this._effective(health));
    mutate();
    const changes: AvailabilityChange[] = [];
    for (const [id, health] of this._entities) {
      const after = this._effective(health);
      const prev = before.get(id) ?? UNKNOWN;
      if (prev.availability !== after.availability || prev.reason !== after.reason) {
        changes.push({ id, ...after });
      }
    }
    this._emit(changes);
  }

  private _emit(changes: AvailabilityChange[]): void {
    if (changes.length > 0) this._handler?.(changes);
  }
}
