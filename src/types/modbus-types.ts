// src/types/modbus-types.ts

// !=============================================================================
// ! Logging
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  unitId?: number;
  funcCode?: number;
  exceptionCode?: number;
  address?: number;
  quantity?: number;
  responseTime?: number;
  entity?: string;
  logger?: string;
  [key: string]: string | number | boolean | null | undefined;
}

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

// !=============================================================================
// ! Register schema
// !=============================================================================

export type RegisterSpace = 'input' | 'holding' | 'coil';
export type RegisterAccess = 'read-only' | 'read-write';
export type RegisterEncoding = 'unsigned' | 'signed' | 'bitfield' | 'boolean';
export type RegisterWidth = 1 | 2;
export type WordOrder = 'high-low' | 'low-high';

/** `[numerator, denominator]`, e.g. `[1, 10]` for tenths. */
export type Rational = readonly [number, number];

export interface ValueRange {
  readonly min: number;
  readonly max: number;
}

export interface BitDefinition {
  readonly bit: number;
  readonly id: string;
  readonly name: string;
}

/**
 * One entry of the register map as written in the schema document,
 * after shape validation.
 */
export interface RegisterDefinition {
  id: string;
  name: string;
  space: RegisterSpace;
  address: number;
  access?: RegisterAccess;
  width?: RegisterWidth;
  encoding?: RegisterEncoding;
  scale?: Rational;
  offset?: number;
  unit?: string | null;
  range?: ValueRange;
  wordOrder?: WordOrder;
  options?: Record<string, string>;
  bits?: BitDefinition[];
  reservedMask?: number;
  poll?: boolean;
  requires?: string;
}

export interface LocalInputDefinition {
  id: string;
  name: string;
  unit?: string | null;
  range: ValueRange;
  initial?: number;
}

export interface SchemaDocument {
  registers: unknown[];
  localInputs?: unknown[];
}

export type DescriptorKind =
  | { readonly type: 'u16' }
  | { readonly type: 's16' }
  | { readonly type: 'u32'; readonly wordOrder: WordOrder }
  | { readonly type: 's32'; readonly wordOrder: WordOrder }
  | {
      readonly type: 'bitfield';
      readonly bits: readonly BitDefinition[];
      readonly reservedMask: number;
    }
  | { readonly type: 'coil' };

export interface RegisterDescriptor {
  readonly id: string;
  readonly name: string;
  readonly space: RegisterSpace;
  readonly address: number;
  readonly access: RegisterAccess;
  readonly width: RegisterWidth;
  readonly encoding: RegisterEncoding;
  readonly scale: Rational;
  readonly offset: number;
  readonly unit: string | null;
  readonly range: ValueRange | null;
  readonly options: ReadonlyMap<number, string> | null;
  readonly poll: boolean;
  readonly requires: string | null;
  readonly kind: DescriptorKind;
}

export interface LocalInputDescriptor {
  readonly id: string;
  readonly name: string;
  readonly unit: string | null;
  readonly range: ValueRange;
  readonly initial: number | null;
}

export interface PollBlock {
  readonly space: RegisterSpace;
  readonly functionCode: number;
  readonly start: number;
  readonly count: number;
  readonly descriptors: readonly RegisterDescriptor[];
}

// !=============================================================================
// ! Entities and snapshots
// !=============================================================================

export type Availability = 'unknown' | 'available' | 'unavailable';

export type UnavailableReason =
  | 'connection'
  | 'read-failures'
  | 'device-error'
  | 'decode-error'
  | 'schema-error'
  | 'input-unavailable'
  | 'predicate-failed'
  | 'out-of-range';

export type EntitySource = 'measured' | 'computed' | 'local';

export type EntityScalar = number | boolean;

export interface EntityValue {
  readonly id: string;
  readonly raw: readonly number[] | null;
  readonly value: EntityScalar | null;
  readonly label: string | null;
  readonly unit: string | null;
  readonly lastUpdated: number | null;
  readonly availability: Availability;
  readonly reason: UnavailableReason | null;
  readonly source: EntitySource;
}

export interface EntityView {
  readonly value: EntityScalar | null;
  readonly label: string | null;
  readonly unit: string | null;
  readonly availability: Availability;
  readonly lastUpdated: number | null;
  readonly source: EntitySource;
}

export interface Snapshot {
  readonly takenAt: number;
  readonly connection: ConnectionState;
  readonly entities: Readonly<Record<string, EntityView>>;
}

export type SnapshotListener = (snapshot: Snapshot) => void;

// !=============================================================================
// ! Connection
// !=============================================================================

export type ConnectionState =
  | { readonly kind: 'disconnected' }
  | { readonly kind: 'connecting' }
  | { readonly kind: 'connected' }
  | { readonly kind: 'backoff'; readonly delayMs: number };

export type ConnectionStateListener = (state: ConnectionState, previous: ConnectionState) => void;

/**
 * Byte stream to the device. One instance per session attempt.
 */
export interface Transport {
  readonly isOpen: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  write(data: Uint8Array): Promise<void>;
  read(length: number, timeout: number): Promise<Uint8Array>;
  flush(): Promise<void>;
  onClose(handler: (err?: Error) => void): void;
}

export type TransportFactory = (host: string, port: number) => Transport;

// !=============================================================================
// ! Requests and responses
// !=============================================================================

export type ReadRegistersResponse = number[];

export type ReadCoilsResponse = boolean[];

export interface WriteSingleCoilResponse {
  address: number;
  value: boolean;
}

export interface WriteSingleRegisterResponse {
  address: number;
  value: number;
}

export interface WriteMultipleRegistersResponse {
  startAddress: number;
  quantity: number;
}

/**
 * Request PDU together with the parser for its successful response.
 */
export interface ModbusRequest<T> {
  readonly functionCode: number;
  readonly address: number;
  readonly quantity: number;
  readonly pdu: Uint8Array;
  parse(pdu: Uint8Array): T;
}

export interface MbapHeader {
  transactionId: number;
  protocolId: number;
  length: number;
  unitId: number;
}

// !=============================================================================
// ! Derived metrics
// !=============================================================================

export type MetricInputs = Readonly<Record<string, number>>;

export interface DerivedMetricDefinition {
  readonly id: string;
  readonly name: string;
  readonly unit: string | null;
  readonly inputs: readonly string[];
  predicate(inputs: MetricInputs): boolean;
  formula(inputs: MetricInputs): EntityScalar;
  /** Plausible bounds; numeric results only. */
  readonly range?: ValueRange;
}

// !=============================================================================
// ! Polling and writes
// !=============================================================================

export interface PollCycleResult {
  startedAt: number;
  durationMs: number;
  blocksRead: number;
  blocksFailed: number;
  aborted: boolean;
}

export interface PollSchedulerStats {
  totalCycles: number;
  skippedCycles: number;
  droppedTicks: number;
  successfulCycles: number;
  lastCycle: PollCycleResult | null;
  lastError: Error | null;
}

export interface WriteResult {
  entityId: string;
  value: EntityScalar;
  raw: readonly number[];
}

// !=============================================================================
// ! Configuration
// !=============================================================================

export interface BackoffOptions {
  minDelayMs?: number;
  maxDelayMs?: number;
}

export interface HeatPumpPollerConfig {
  host: string;
  port?: number;
  unitId?: number;
  pollIntervalSeconds?: number;
  requestTimeoutMs?: number;
  connectTimeoutMs?: number;
  failureThreshold?: number;
  protocolErrorLimit?: number;
  maxGap?: number;
  maxRegistersPerRead?: number;
  backoff?: BackoffOptions;
  maxQueuedWrites?: number;
  systemElements?: string[];
  electricityRate?: number;
  logLevel?: LogLevel;
}

export interface ResolvedConfig {
  host: string;
  port: number;
  unitId: number;
  pollIntervalSeconds: number;
  requestTimeoutMs: number;
  connectTimeoutMs: number;
  failureThreshold: number;
  protocolErrorLimit: number;
  maxGap: number;
  maxRegistersPerRead: number;
  backoff: Required<BackoffOptions>;
  maxQueuedWrites: number;
  systemElements: readonly string[];
  electricityRate: number;
  logLevel: LogLevel;
}
