// test/helpers/descriptors.ts

import { compileRegister } from '../../src/schema/register-schema.js';
import { RegisterDescriptor } from '../../src/types/modbus-types.js';

/**
 * Compiles a register entry, filling in a name.
 */
export function register(entry: Record<string, unknown>): RegisterDescriptor {
  return compileRegister({ name: entry.id, ...entry });
}

export function inputRegister(id: string, address: number, extra: Record<string, unknown> = {}): RegisterDescriptor {
  return register({ id, space: 'input', address, ...extra });
}

export function holdingRegister(id: string, address: number, extra: Record<string, unknown> = {}): RegisterDescriptor {
  return register({ id, space: 'holding', address, access: 'read-write', ...extra });
}

export function coil(id: string, address: number, extra: Record<string, unknown> = {}): RegisterDescriptor {
  return register({ id, space: 'coil', address, access: 'read-write', ...extra });
}
