import { DiagnosticIds } from '../diagnostics/types.js';
import { fail } from '../diagnostics/errors.js';
import { labelOf } from '../il/listing.js';
import type { Procedure, TypeHandle } from '../il/types.js';
import type { ProcedureProcessor } from '../pipeline.js';
import type { RuntimeService } from '../runtime/registry.js';
import { MutationTypeName } from '../runtime/registry.js';
import type { TraceService } from '../trace/tracer.js';
import { stackTraceService } from '../trace/tracer.js';
import { MarkerCatalog } from './catalog.js';
import type { CryptProcessor } from './crypt.js';
import { expandCrypt } from './crypt.js';
import type { KeyFieldValues } from './keyFields.js';
import { resolveKeyField } from './keyFields.js';
import type { PlaceholderProcessor } from './placeholder.js';
import { expandPlaceholder } from './placeholder.js';

export interface MutationProcessorServices {
  runtime: RuntimeService;
  /** Defaults to the backward stack tracer. */
  tracer?: TraceService;
}

/**
 * Resolves mutation markers in a procedure body:
 *
 * - `ldsfld Mutation::KeyI<n>` becomes `ldc.i4 <value>`;
 * - `<arg>; call Mutation::Placeholder` becomes the placeholder processor's output for `<arg>`;
 * - `ldloc block; ldloc key; call Mutation::Crypt` becomes the crypt processor's output.
 *
 * Configuration must be set before {@link process} and is read once per run.
 */
export class MutationProcessor implements ProcedureProcessor {
  private readonly catalog: MarkerCatalog;
  private readonly traceService: TraceService;

  keyFieldValues: KeyFieldValues = new Map();
  placeholderProcessor: PlaceholderProcessor | undefined;
  cryptProcessor: CryptProcessor | undefined;

  constructor(services: MutationProcessorServices) {
    this.traceService = services.tracer ?? stackTraceService;
    this.catalog = new MarkerCatalog(services.runtime.getRuntimeType(MutationTypeName));
  }

  get markerType(): TypeHandle {
    return this.catalog.markerType;
  }

  process(procedure: Procedure): void {
    const values = this.keyFieldValues;
    const placeholder = this.placeholderProcessor;
    const crypt = this.cryptProcessor;
    const body = procedure.body;

    // Expansions splice at or before the cursor; resume right after what was inserted.
    let cursor = 0;
    while (cursor < body.length) {
      const instr = body[cursor];
      if (instr === undefined) break;
      const site = { procedure: procedure.name, index: cursor };
      const c = this.catalog.classify(instr);

      switch (c.kind) {
        case 'not-a-marker':
          cursor += 1;
          break;
        case 'key-field':
          resolveKeyField(instr, c.field, values, site);
          cursor += 1;
          break;
        case 'placeholder-call': {
          const tracer = this.traceService.trace(procedure);
          const r = expandPlaceholder(procedure, cursor, c.method, placeholder, tracer);
          cursor = r.start + r.inserted;
          break;
        }
        case 'crypt-call': {
          const r = expandCrypt(procedure, cursor, crypt);
          cursor = r.start + r.inserted;
          break;
        }
        case 'unexpected':
          fail(
            DiagnosticIds.UnexpectedMarkerUse,
            `Unexpected ${instr.opcode} of mutation member ${c.member.name}.`,
            site,
          );
      }
    }

    this.verifyNoMarkers(procedure);
  }

  private verifyNoMarkers(procedure: Procedure): void {
    procedure.body.forEach((instr, index) => {
      if (!this.catalog.references(instr)) return;
      fail(
        DiagnosticIds.UnexpectedMarkerUse,
        `Mutation marker ${instr.opcode} left at ${labelOf(index)} by a processor's output.`,
        { procedure: procedure.name, index },
      );
    });
  }
}
