import { DiagnosticIds } from '../diagnostics/types.js';
import { fail } from '../diagnostics/errors.js';
import type { FailureSite } from '../diagnostics/errors.js';
import type { FieldRef, Instruction } from '../il/types.js';

/**
 * The 16 key slots generated code can reference, by field name.
 */
export const KeySlots = {
  KeyI0: 0,
  KeyI1: 1,
  KeyI2: 2,
  KeyI3: 3,
  KeyI4: 4,
  KeyI5: 5,
  KeyI6: 6,
  KeyI7: 7,
  KeyI8: 8,
  KeyI9: 9,
  KeyI10: 10,
  KeyI11: 11,
  KeyI12: 12,
  KeyI13: 13,
  KeyI14: 14,
  KeyI15: 15,
} as const;

export type KeySlot = keyof typeof KeySlots;

export type KeyFieldValues = ReadonlyMap<KeySlot, number>;

const keyFieldPattern = /^KeyI(?:0|[1-9][0-9]?)$/;
const keyFieldLike = /^KeyI[0-9]+$/;

const INT32_MIN = -0x80000000;
const UINT32_MAX = 0xffffffff;

function isKeySlot(name: string): name is KeySlot {
  return Object.prototype.hasOwnProperty.call(KeySlots, name);
}

/**
 * Parse a field name into a key slot. Accepts exactly `KeyI0` .. `KeyI15`.
 */
export function parseKeyField(name: string): KeySlot | undefined {
  if (!keyFieldPattern.test(name)) return undefined;
  return isKeySlot(name) ? name : undefined;
}

/**
 * Build a key value mapping from a plain record.
 */
export function keyValuesFrom(record: Readonly<Partial<Record<KeySlot, number>>>): KeyFieldValues {
  const out = new Map<KeySlot, number>();
  for (const [name, value] of Object.entries(record)) {
    if (isKeySlot(name) && value !== undefined) out.set(name, value);
  }
  return out;
}

/**
 * Replace a key field load with a constant load of the configured slot value, in place.
 *
 * Only the slot the load names is validated; values must be integers in the signed or unsigned
 * 32-bit range and are stored as signed 32-bit.
 */
export function resolveKeyField(
  instr: Instruction,
  field: FieldRef,
  values: KeyFieldValues,
  site: FailureSite,
): void {
  const slot = parseKeyField(field.name);
  if (slot === undefined) {
    if (keyFieldLike.test(field.name)) {
      fail(
        DiagnosticIds.UnrecognizedKeyField,
        `Unrecognized mutation key field ${field.name}; expected KeyI0..KeyI15.`,
        site,
      );
    }
    fail(
      DiagnosticIds.UnexpectedMarkerUse,
      `Unexpected load of mutation field ${field.name}.`,
      site,
    );
  }

  const value = values.get(slot);
  if (value === undefined) {
    fail(
      DiagnosticIds.MissingKeyValue,
      `Code requests mutation key ${field.name}, but no value is set for it.`,
      site,
    );
  }
  if (!Number.isInteger(value) || value < INT32_MIN || value > UINT32_MAX) {
    fail(
      DiagnosticIds.InvalidKeyValue,
      `Value for mutation key ${slot} is not a 32-bit integer (${String(value)}).`,
      site,
    );
  }

  instr.opcode = 'ldc.i4';
  instr.operand = value | 0;
}
