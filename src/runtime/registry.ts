import { DiagnosticIds } from '../diagnostics/types.js';
import { fail } from '../diagnostics/errors.js';
import type { TypeHandle } from '../il/types.js';

/**
 * Well-known name of the runtime type whose members are mutation markers.
 */
export const MutationTypeName = 'Mutation';

/**
 * Resolves runtime helper types injected into the module being processed.
 */
export interface RuntimeService {
  getRuntimeType(name: string): TypeHandle;
}

/**
 * In-memory {@link RuntimeService} over a fixed set of runtime types, keyed by simple name.
 */
export class RuntimeTypeRegistry implements RuntimeService {
  private readonly types = new Map<string, TypeHandle>();

  constructor(types: Iterable<TypeHandle> = []) {
    for (const t of types) this.register(t);
  }

  register(type: TypeHandle): void {
    this.types.set(type.name, type);
  }

  getRuntimeType(name: string): TypeHandle {
    const t = this.types.get(name);
    if (t === undefined) {
      return fail(DiagnosticIds.MarkerTypeNotFound, `Runtime type "${name}" is not available.`, {
        procedure: '<module>',
      });
    }
    return t;
  }
}
