// src/planner/block-planner.ts

import {
  DEFAULTS,
  FUNCTION_CODES,
  MAX_READ_COILS,
  MAX_READ_REGISTERS,
} from '../constants/constants.js';
import { SchemaError } from '../errors.js';
import { logger as rootLogger } from '../logger.js';
import { PollBlock, RegisterDescriptor, RegisterSpace } from '../types/modbus-types.js';

const logger = rootLogger.createLogger('BlockPlanner');

export interface PlannerOptions {
  /** Largest run of unused addresses a block may bridge. */
  maxGap?: number;
  /** Register cap per read, at most 125. Coil blocks use the protocol cap of 2000. */
  maxRegisters?: number;
}

export interface ReadPlan {
  blocks: PollBlock[];
  /** Descriptors excluded from polling. Their entities stay unavailable. */
  excluded: RegisterDescriptor[];
  errors: SchemaError[];
}

const SPACE_ORDER: readonly RegisterSpace[] = ['input', 'holding', 'coil'];

const READ_FUNCTION: Record<RegisterSpace, number> = {
  input: FUNCTION_CODES.READ_INPUT_REGISTERS,
  holding: FUNCTION_CODES.READ_HOLDING_REGISTERS,
  coil: FUNCTION_CODES.READ_COILS,
};

function compareDescriptors(a: RegisterDescriptor, b: RegisterDescriptor): number {
  if (a.address !== b.address) return a.address - b.address;
  if (a.width !== b.width) return a.width - b.width;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function makeBlock(space: RegisterSpace, members: RegisterDescriptor[]): PollBlock {
  const first = members[0];
  const start = first ? first.address : 0;
  const end = members.reduce((max, d) => Math.max(max, d.address + d.width), start);
  return Object.freeze({
    space,
    functionCode: READ_FUNCTION[space],
    start,
    count: end - start,
    descriptors: Object.freeze([...members]),
  });
}

/**
 * Greedy plan over one register space. Input must already be sorted.
 */
function planSpace(
  space: RegisterSpace,
  sorted: RegisterDescriptor[],
  maxGap: number,
  maxCount: number,
  rejected: RegisterDescriptor[]
): PollBlock[] {
  const blocks: PollBlock[] = [];
  let members: RegisterDescriptor[] = [];
  let blockStart = 0;
  let blockEnd = 0;

  for (const descriptor of sorted) {
    const end = descriptor.address + descriptor.width;
    if (members.length > 0) {
      const gap = descriptor.address - blockEnd;
      const span = Math.max(blockEnd, end) - blockStart;
      if (gap <= maxGap && span <= maxCount) {
        members.push(descriptor);
        blockEnd = Math.max(blockEnd, end);
        continue;
      }
      if (gap < 0) {
        // Straddles the end of a full block; a new block would overlap it.
        rejected.push(descriptor);
        continue;
      }
      blocks.push(makeBlock(space, members));
    }
    members = [descriptor];
    blockStart = descriptor.address;
    blockEnd = end;
  }

  if (members.length > 0) blocks.push(makeBlock(space, members));
  return blocks;
}

/**
 * Merges polled descriptors into the fewest contiguous reads.
 *
 * Descriptors are grouped by register space and sorted by address (ties by
 * width, then id), so the result depends only on the set of descriptors and
 * not on their order. A block is extended while the next descriptor starts
 * at most `maxGap` addresses past the block end and the block stays within
 * the per-request cap. Blocks come out ordered by space, then address.
 */
export function planBlocks(
  descriptors: readonly RegisterDescriptor[],
  options: PlannerOptions = {}
): ReadPlan {
  const maxGap = options.maxGap ?? DEFAULTS.MAX_GAP;
  const maxRegisters = Math.min(options.maxRegisters ?? MAX_READ_REGISTERS, MAX_READ_REGISTERS);
  const blocks: PollBlock[] = [];
  const excluded: RegisterDescriptor[] = [];
  const errors: SchemaError[] = [];

  for (const space of SPACE_ORDER) {
    const maxCount = space === 'coil' ? MAX_READ_COILS : maxRegisters;
    const candidates: RegisterDescriptor[] = [];

    for (const descriptor of descriptors) {
      if (descriptor.space !== space || !descriptor.poll) continue;
      if (descriptor.width > maxCount) {
        const error = new SchemaError(
          `width ${descriptor.width} exceeds the ${maxCount}-register read limit`,
          descriptor.id
        );
        logger.error(error.message, { entity: descriptor.id });
        errors.push(error);
        excluded.push(descriptor);
        continue;
      }
      candidates.push(descriptor);
    }

    candidates.sort(compareDescriptors);
    const rejected: RegisterDescriptor[] = [];
    blocks.push(...planSpace(space, candidates, maxGap, maxCount, rejected));
    for (const descriptor of rejected) {
      const error = new SchemaError(
        `overlaps the end of a full ${maxCount}-register block`,
        descriptor.id
      );
      logger.error(error.message, { entity: descriptor.id });
      errors.push(error);
      excluded.push(descriptor);
    }
  }

  logger.info(`Planned ${blocks.length} read blocks`, {
    excluded: excluded.length,
  });
  return { blocks, excluded, errors };
}
