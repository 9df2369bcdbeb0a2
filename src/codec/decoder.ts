// src/codec/decoder.ts

import { DecodeError } from '../errors.js';
import { entityIdsOf } from '../schema/register-schema.js';
import {
  DescriptorKind,
  EntityScalar,
  PollBlock,
  RegisterDescriptor,
} from '../types/modbus-types.js';

export type BlockData =
  | { readonly type: 'registers'; readonly words: readonly number[] }
  | { readonly type: 'coils'; readonly bits: readonly boolean[] };

export interface DecodedEntity {
  id: string;
  raw: readonly number[];
  value: EntityScalar;
  label: string | null;
  unit: string | null;
}

export type DecodeOutcome =
  | { ok: true; descriptor: RegisterDescriptor; entities: DecodedEntity[] }
  | { ok: false; descriptor: RegisterDescriptor; entityIds: string[]; error: DecodeError };

const TWO_POW_16 = 0x10000;
const TWO_POW_32 = 0x100000000;

/**
 * Combines a descriptor's words into its integer value.
 */
export function wordsToInteger(kind: DescriptorKind, words: readonly number[]): number {
  const first = words[0] ?? 0;
  const second = words[1] ?? 0;
  switch (kind.type) {
    case 'u16':
    case 'bitfield':
    case 'coil':
      return first;
    case 's16':
      return first >= 0x8000 ? first - TWO_POW_16 : first;
    case 'u32':
    case 's32': {
      const [hi, lo] = kind.wordOrder === 'high-low' ? [first, second] : [second, first];
      const unsigned = hi * TWO_POW_16 + lo;
      if (kind.type === 'u32') return unsigned;
      return unsigned >= 0x80000000 ? unsigned - TWO_POW_32 : unsigned;
    }
  }
}

/**
 * integer * numerator / denominator + offset, keeping fractions.
 */
export function scaleInteger(descriptor: RegisterDescriptor, integer: number): number {
  const [numerator, denominator] = descriptor.scale;
  return (integer * numerator) / denominator + descriptor.offset;
}

/**
 * Decodes the words of one descriptor.
 * @throws DecodeError when the raw value is not one the descriptor allows
 */
export function decodeDescriptor(
  descriptor: RegisterDescriptor,
  words: readonly number[]
): DecodedEntity[] {
  if (words.length < descriptor.width) {
    throw new DecodeError(
      descriptor.id,
      `expected ${descriptor.width} words, got ${words.length}`
    );
  }
  const raw = words.slice(0, descriptor.width);
  const kind = descriptor.kind;

  switch (kind.type) {
    case 'coil':
      return [{ id: descriptor.id, raw, value: raw[0] === 1, label: null, unit: descriptor.unit }];

    case 'bitfield': {
      const word = wordsToInteger(kind, raw);
      const reserved = word & kind.reservedMask;
      if (reserved !== 0) {
        throw new DecodeError(
          descriptor.id,
          `reserved bits set (0x${reserved.toString(16).padStart(4, '0')})`
        );
      }
      return kind.bits.map(b => ({
        id: b.id,
        raw,
        value: (word & (1 << b.bit)) !== 0,
        label: null,
        unit: null,
      }));
    }

    case 'u16':
    case 's16':
    case 'u32':
    case 's32': {
      const integer = wordsToInteger(kind, raw);
      let label: string | null = null;
      if (descriptor.options) {
        const option = descriptor.options.get(integer);
        if (option === undefined) {
          throw new DecodeError(descriptor.id, `unknown option value ${integer}`);
        }
        label = option;
      }
      return [
        {
          id: descriptor.id,
          raw,
          value: scaleInteger(descriptor, integer),
          label,
          unit: descriptor.unit,
        },
      ];
    }
  }
}

function slotOf(block: PollBlock, descriptor: RegisterDescriptor, data: BlockData): number[] {
  const offset = descriptor.address - block.start;
  if (data.type === 'coils') {
    return data.bits.slice(offset, offset + 1).map(bit => (bit ? 1 : 0));
  }
  return data.words.slice(offset, offset + descriptor.width);
}

/**
 * Decodes every descriptor of a block. A failure affects only the
 * descriptor it belongs to.
 */
export function decodeBlock(block: PollBlock, data: BlockData): DecodeOutcome[] {
  return block.descriptors.map((descriptor): DecodeOutcome => {
    try {
      const entities = decodeDescriptor(descriptor, slotOf(block, descriptor, data));
      return { ok: true, descriptor, entities };
    } catch (err: unknown) {
      const error =
        err instanceof DecodeError
          ? err
          : new DecodeError(descriptor.id, err instanceof Error ? err.message : String(err));
      return { ok: false, descriptor, entityIds: entityIdsOf(descriptor), error };
    }
  });
}
