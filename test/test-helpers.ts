import { MutationError } from '../src/diagnostics/errors.js';
import { fieldRef, methodRef, typeHandle } from '../src/il/builder.js';
import { writeListing } from '../src/il/listing.js';
import type { FieldRef, MethodRef, Procedure } from '../src/il/types.js';
import { keyValuesFrom } from '../src/mutation/keyFields.js';
import type { KeySlot } from '../src/mutation/keyFields.js';
import { MutationProcessor } from '../src/mutation/processor.js';
import type { MutationProcessorServices } from '../src/mutation/processor.js';
import { RuntimeTypeRegistry } from '../src/runtime/registry.js';

export const Mutation = typeHandle('Mutation', 'Runtime');

export const placeholderMethod: MethodRef = methodRef(Mutation, 'Placeholder', { paramCount: 1 });
export const cryptMethod: MethodRef = methodRef(Mutation, 'Crypt', {
  paramCount: 2,
  returnsValue: false,
});

export function markerField(name: string): FieldRef {
  return fieldRef(Mutation, name);
}

export function newProcessor(
  keys: Partial<Record<KeySlot, number>> = {},
  services: Partial<MutationProcessorServices> = {},
): MutationProcessor {
  const processor = new MutationProcessor({
    runtime: new RuntimeTypeRegistry([Mutation]),
    ...services,
  });
  processor.keyFieldValues = keyValuesFrom(keys);
  return processor;
}

export function bodyLines(procedure: Procedure): string[] {
  return writeListing(procedure, { header: false }).trimEnd().split('\n');
}

export function captureMutationError(fn: () => unknown): MutationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof MutationError) return err;
    throw err;
  }
  throw new Error('Expected a MutationError to be thrown.');
}
