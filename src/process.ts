import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import { isMutationError } from './diagnostics/errors.js';
import { restoreProcedure, snapshotProcedure } from './il/body.js';
import type { Procedure } from './il/types.js';
import type {
  ProcessFn,
  ProcessOptions,
  ProcessResult,
  ProcedureProcessor,
} from './pipeline.js';

function withDefaults(options: ProcessOptions): Required<ProcessOptions> {
  return { atomic: options.atomic ?? true };
}

function toDiagnostic(err: unknown, procedure: Procedure): Diagnostic {
  if (isMutationError(err)) return err.toDiagnostic();
  return {
    id: DiagnosticIds.InternalError,
    severity: 'error',
    message: `Internal error while processing: ${err instanceof Error ? err.message : String(err)}`,
    procedure: procedure.name,
  };
}

/**
 * Run every processor over every procedure, in order.
 *
 * A failure aborts the remaining processors for that procedure only and is reported as a
 * diagnostic; the run continues with the next procedure.
 */
export const processProcedures: ProcessFn = (
  procedures: readonly Procedure[],
  processors: readonly ProcedureProcessor[],
  options: ProcessOptions = {},
): ProcessResult => {
  const { atomic } = withDefaults(options);
  const diagnostics: Diagnostic[] = [];
  const processed: string[] = [];

  for (const procedure of procedures) {
    const snapshot = atomic ? snapshotProcedure(procedure) : undefined;
    try {
      for (const p of processors) p.process(procedure);
    } catch (err) {
      if (snapshot) restoreProcedure(procedure, snapshot);
      diagnostics.push(toDiagnostic(err, procedure));
      continue;
    }
    processed.push(procedure.name);
  }

  return { diagnostics, processed };
};
