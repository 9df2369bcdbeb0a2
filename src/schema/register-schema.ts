// src/schema/register-schema.ts

import { logger as rootLogger } from '../logger.js';
import { SchemaError } from '../errors.js';
import {
  BitDefinition,
  DescriptorKind,
  LocalInputDescriptor,
  Rational,
  RegisterAccess,
  RegisterDescriptor,
  RegisterEncoding,
  RegisterSpace,
  RegisterWidth,
  SchemaDocument,
  ValueRange,
  WordOrder,
} from '../types/modbus-types.js';

const logger = rootLogger.createLogger('RegisterSchema');

const SPACES: readonly RegisterSpace[] = ['input', 'holding', 'coil'];
const ACCESSES: readonly RegisterAccess[] = ['read-only', 'read-write'];
const ENCODINGS: readonly RegisterEncoding[] = ['unsigned', 'signed', 'bitfield', 'boolean'];
const WORD_ORDERS: readonly WordOrder[] = ['high-low', 'low-high'];

export interface CompileOptions {
  /** Installed system elements; entries requiring anything else are dropped. */
  systemElements?: readonly string[];
}

export interface CompiledSchema {
  descriptors: RegisterDescriptor[];
  localInputs: LocalInputDescriptor[];
  errors: SchemaError[];
}

type Entry = Record<string, unknown>;

function isRecord(value: unknown): value is Entry {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isWidth(value: unknown): value is RegisterWidth {
  return value === 1 || value === 2;
}

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return values.some(v => v === value);
}

function requireString(entry: Entry, key: string, id: string | null): string {
  const value = entry[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new SchemaError(`"${key}" must be a non-empty string`, id);
  }
  return value;
}

function optionalFinite(entry: Entry, key: string, id: string, fallback: number): number {
  const value = entry[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new SchemaError(`"${key}" must be a finite number`, id);
  }
  return value;
}

function parseRange(value: unknown, id: string): ValueRange | null {
  if (value === undefined) return null;
  if (
    !isRecord(value) ||
    typeof value.min !== 'number' ||
    typeof value.max !== 'number' ||
    !Number.isFinite(value.min) ||
    !Number.isFinite(value.max) ||
    value.min > value.max
  ) {
    throw new SchemaError('"range" must be {min, max} with min <= max', id);
  }
  return { min: value.min, max: value.max };
}

function parseScale(value: unknown, id: string): Rational {
  if (value === undefined) return [1, 1];
  if (!Array.isArray(value) || value.length !== 2) {
    throw new SchemaError('"scale" must be [numerator, denominator]', id);
  }
  const [numerator, denominator]: unknown[] = value;
  if (
    typeof numerator !== 'number' ||
    typeof denominator !== 'number' ||
    !Number.isInteger(numerator) ||
    !Number.isInteger(denominator) ||
    numerator === 0 ||
    denominator <= 0
  ) {
    throw new SchemaError('"scale" terms must be non-zero integers, denominator positive', id);
  }
  return [numerator, denominator];
}

function parseOptions(value: unknown, id: string): ReadonlyMap<number, string> | null {
  if (value === undefined) return null;
  if (!isRecord(value)) {
    throw new SchemaError('"options" must map raw values to labels', id);
  }
  const options = new Map<number, string>();
  for (const [key, label] of Object.entries(value)) {
    const raw = Number(key);
    if (!Number.isInteger(raw) || typeof label !== 'string') {
      throw new SchemaError(`invalid option "${key}"`, id);
    }
    options.set(raw, label);
  }
  if (options.size === 0) {
    throw new SchemaError('"options" must not be empty', id);
  }
  return options;
}

function parseBits(value: unknown, id: string): BitDefinition[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new SchemaError('bitfield needs a non-empty "bits" list', id);
  }
  const seen = new Set<number>();
  return value.map((bit: unknown) => {
    if (
      !isRecord(bit) ||
      typeof bit.bit !== 'number' ||
      !Number.isInteger(bit.bit) ||
      bit.bit < 0 ||
      bit.bit > 15
    ) {
      throw new SchemaError('each bit needs an index 0-15', id);
    }
    if (seen.has(bit.bit)) {
      throw new SchemaError(`bit ${bit.bit} declared twice`, id);
    }
    seen.add(bit.bit);
    const bitId = requireString(bit, 'id', id);
    const name = typeof bit.name === 'string' ? bit.name : bitId;
    return { bit: bit.bit, id: bitId, name };
  });
}

function kindOf(
  encoding: RegisterEncoding,
  width: RegisterWidth,
  wordOrder: WordOrder,
  bits: BitDefinition[],
  reservedMask: number
): DescriptorKind {
  switch (encoding) {
    case 'boolean':
      return { type: 'coil' };
    case 'bitfield':
      return { type: 'bitfield', bits, reservedMask };
    case 'signed':
      return width === 2 ? { type: 's32', wordOrder } : { type: 's16' };
    case 'unsigned':
      return width === 2 ? { type: 'u32', wordOrder } : { type: 'u16' };
  }
}

/**
 * Validates one register entry.
 * @throws SchemaError describing the first problem found
 */
export function compileRegister(entry: unknown): RegisterDescriptor {
  if (!isRecord(entry)) {
    throw new SchemaError('register entry must be an object');
  }
  const id = requireString(entry, 'id', null);
  const name = typeof entry.name === 'string' ? entry.name : id;

  const space = entry.space;
  if (!isOneOf(SPACES, space)) {
    throw new SchemaError(`"space" must be one of ${SPACES.join(', ')}`, id);
  }

  const address = entry.address;
  if (typeof address !== 'number' || !Number.isInteger(address) || address < 0 || address > 0xffff) {
    throw new SchemaError('"address" must be an integer 0-65535', id);
  }

  const access = entry.access ?? 'read-only';
  if (!isOneOf(ACCESSES, access)) {
    throw new SchemaError(`"access" must be one of ${ACCESSES.join(', ')}`, id);
  }
  if (space === 'input' && access === 'read-write') {
    throw new SchemaError('input registers cannot be written', id);
  }

  const encoding = entry.encoding ?? (space === 'coil' ? 'boolean' : 'unsigned');
  if (!isOneOf(ENCODINGS, encoding)) {
    throw new SchemaError(`"encoding" must be one of ${ENCODINGS.join(', ')}`, id);
  }
  if ((space === 'coil') !== (encoding === 'boolean')) {
    throw new SchemaError('coils and only coils use the boolean encoding', id);
  }

  const width = entry.width ?? 1;
  if (!isWidth(width)) {
    throw new SchemaError('"width" must be 1 or 2 words', id);
  }
  if (width === 2 && (encoding === 'bitfield' || encoding === 'boolean')) {
    throw new SchemaError(`${encoding} registers are one word wide`, id);
  }
  if (address + width - 1 > 0xffff) {
    throw new SchemaError('register runs past the end of the address space', id);
  }

  const wordOrder = entry.wordOrder ?? 'high-low';
  if (!isOneOf(WORD_ORDERS, wordOrder)) {
    throw new SchemaError(`"wordOrder" must be one of ${WORD_ORDERS.join(', ')}`, id);
  }

  const bits = encoding === 'bitfield' ? parseBits(entry.bits, id) : [];
  if (encoding !== 'bitfield' && entry.bits !== undefined) {
    throw new SchemaError('"bits" is only valid on bitfield registers', id);
  }
  if (encoding === 'bitfield' && access === 'read-write') {
    throw new SchemaError('bitfield registers are read-only', id);
  }

  const reservedMask = optionalFinite(entry, 'reservedMask', id, 0);
  if (!Number.isInteger(reservedMask) || reservedMask < 0 || reservedMask > 0xffff) {
    throw new SchemaError('"reservedMask" must be a 16-bit mask', id);
  }
  const declaredMask = bits.reduce((mask, b) => mask | (1 << b.bit), 0);
  if (reservedMask & declaredMask) {
    throw new SchemaError('"reservedMask" overlaps declared bits', id);
  }

  const poll = entry.poll ?? true;
  if (typeof poll !== 'boolean') {
    throw new SchemaError('"poll" must be a boolean', id);
  }
  if (!poll && access === 'read-only') {
    throw new SchemaError('a register that is neither polled nor writable is unusable', id);
  }

  if (entry.unit !== undefined && entry.unit !== null && typeof entry.unit !== 'string') {
    throw new SchemaError('"unit" must be a string or null', id);
  }
  const unit = typeof entry.unit === 'string' ? entry.unit : null;
  if (entry.requires !== undefined && typeof entry.requires !== 'string') {
    throw new SchemaError('"requires" must be a string', id);
  }
  const requires = typeof entry.requires === 'string' ? entry.requires : null;

  return Object.freeze({
    id,
    name,
    space,
    address,
    access,
    width,
    encoding,
    scale: parseScale(entry.scale, id),
    offset: optionalFinite(entry, 'offset', id, 0),
    unit,
    range: parseRange(entry.range, id),
    options: parseOptions(entry.options, id),
    poll,
    requires,
    kind: kindOf(encoding, width, wordOrder, bits, reservedMask),
  });
}

export function compileLocalInput(entry: unknown): LocalInputDescriptor {
  if (!isRecord(entry)) {
    throw new SchemaError('local input entry must be an object');
  }
  const id = requireString(entry, 'id', null);
  const range = parseRange(entry.range, id);
  if (range === null) {
    throw new SchemaError('local inputs need a "range"', id);
  }
  let initial: number | null = null;
  if (entry.initial !== undefined) {
    if (
      typeof entry.initial !== 'number' ||
      entry.initial < range.min ||
      entry.initial > range.max
    ) {
      throw new SchemaError('"initial" must lie within "range"', id);
    }
    initial = entry.initial;
  }
  return Object.freeze({
    id,
    name: typeof entry.name === 'string' ? entry.name : id,
    unit: typeof entry.unit === 'string' ? entry.unit : null,
    range,
    initial,
  });
}

/**
 * Entity ids a descriptor publishes. A bitfield publishes one binary
 * entity per declared bit instead of its own id.
 */
export function entityIdsOf(descriptor: RegisterDescriptor): string[] {
  return descriptor.kind.type === 'bitfield'
    ? descriptor.kind.bits.map(b => b.id)
    : [descriptor.id];
}

/**
 * Compiles a schema document. Bad entries are reported and skipped so that
 * one typo does not take the rest of the map down.
 */
export function compileSchema(
  document: SchemaDocument,
  options: CompileOptions = {}
): CompiledSchema {
  const elements = new Set(options.systemElements ?? []);
  const descriptors: RegisterDescriptor[] = [];
  const localInputs: LocalInputDescriptor[] = [];
  const errors: SchemaError[] = [];
  const usedIds = new Set<string>();

  const claim = (ids: string[], owner: string): void => {
    for (const id of ids) {
      if (usedIds.has(id)) {
        throw new SchemaError(`entity id "${id}" is already taken`, owner);
      }
    }
    ids.forEach(id => usedIds.add(id));
  };

  const report = (err: unknown): void => {
    const schemaError = err instanceof SchemaError ? err : new SchemaError(String(err));
    errors.push(schemaError);
    logger.error(schemaError.message, { entity: schemaError.entityId ?? undefined });
  };

  for (const entry of document.registers) {
    try {
      const descriptor = compileRegister(entry);
      if (descriptor.requires !== null && !elements.has(descriptor.requires)) {
        logger.debug(`Skipping "${descriptor.id}", requires ${descriptor.requires}`);
        continue;
      }
      const ids = entityIdsOf(descriptor);
      if (descriptor.kind.type === 'bitfield') ids.push(descriptor.id);
      claim(ids, descriptor.id);
      descriptors.push(descriptor);
    } catch (err: unknown) {
      report(err);
    }
  }

  for (const entry of document.localInputs ?? []) {
    try {
      const input = compileLocalInput(entry);
      claim([input.id], input.id);
      localInputs.push(input);
    } catch (err: unknown) {
      report(err);
    }
  }

  logger.info(
    `Compiled ${descriptors.length} registers and ${localInputs.length} local inputs`,
    { errors: errors.length }
  );
  return { descriptors, localInputs, errors };
}
