// src/codec/encoder.ts

import { ValidationError } from '../errors.js';
import { DescriptorKind, RegisterDescriptor, ValueRange } from '../types/modbus-types.js';

const TWO_POW_16 = 0x10000;
const TWO_POW_32 = 0x100000000;

/**
 * Integer limits of the raw encoding.
 */
export function integerLimits(kind: DescriptorKind): ValueRange {
  switch (kind.type) {
    case 'coil':
      return { min: 0, max: 1 };
    case 'u16':
    case 'bitfield':
      return { min: 0, max: 0xffff };
    case 's16':
      return { min: -0x8000, max: 0x7fff };
    case 'u32':
      return { min: 0, max: TWO_POW_32 - 1 };
    case 's32':
      return { min: -0x80000000, max: 0x7fffffff };
  }
}

/**
 * Range a value may take: the declared range, or else whatever the raw
 * encoding can carry after scaling.
 */
export function writableRange(descriptor: RegisterDescriptor): ValueRange {
  if (descriptor.range) return descriptor.range;
  const limits = integerLimits(descriptor.kind);
  const [numerator, denominator] = descriptor.scale;
  const a = (limits.min * numerator) / denominator + descriptor.offset;
  const b = (limits.max * numerator) / denominator + descriptor.offset;
  return { min: Math.min(a, b), max: Math.max(a, b) };
}

/**
 * Converts an engineering value to the integer the device stores, rounded
 * to the nearest scale step.
 */
export function valueToInteger(descriptor: RegisterDescriptor, value: number): number {
  const [numerator, denominator] = descriptor.scale;
  const integer = Math.round(((value - descriptor.offset) * denominator) / numerator);
  const limits = integerLimits(descriptor.kind);
  if (integer < limits.min || integer > limits.max) {
    throw new ValidationError(
      descriptor.id,
      `raw value ${integer} does not fit the ${descriptor.kind.type} encoding`
    );
  }
  return integer;
}

/**
 * Register words for a value, in the descriptor's word order.
 * @throws ValidationError if the value cannot be encoded
 */
export function encodeValue(descriptor: RegisterDescriptor, value: number): number[] {
  const kind = descriptor.kind;
  const integer = valueToInteger(descriptor, value);

  switch (kind.type) {
    case 'coil':
    case 'u16':
    case 'bitfield':
      return [integer];
    case 's16':
      return [integer < 0 ? integer + TWO_POW_16 : integer];
    case 'u32':
    case 's32': {
      const unsigned = integer < 0 ? integer + TWO_POW_32 : integer;
      const hi = Math.floor(unsigned / TWO_POW_16);
      const lo = unsigned % TWO_POW_16;
      return kind.wordOrder === 'high-low' ? [hi, lo] : [lo, hi];
    }
  }
}
