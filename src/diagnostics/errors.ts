import type { Diagnostic, DiagnosticId } from './types.js';
import { DiagnosticIds } from './types.js';

/**
 * Where a failure happened: the procedure name and, when known, the instruction index.
 */
export interface FailureSite {
  procedure: string;
  index?: number;
}

/**
 * Fatal error raised by the mutation pass. The pass aborts on the first one.
 */
export class MutationError extends Error {
  readonly id: DiagnosticId;
  readonly procedure: string;
  readonly index: number | undefined;

  constructor(id: DiagnosticId, message: string, site: FailureSite) {
    super(message);
    this.name = 'MutationError';
    this.id = id;
    this.procedure = site.procedure;
    this.index = site.index;
  }

  toDiagnostic(): Diagnostic {
    const d: Diagnostic = {
      id: this.id,
      severity: 'error',
      message: this.message,
      procedure: this.procedure,
    };
    if (this.index !== undefined) d.index = this.index;
    return d;
  }
}

const configurationIds: ReadonlySet<DiagnosticId> = new Set([
  DiagnosticIds.MissingProcessor,
  DiagnosticIds.InvalidKeyValue,
  DiagnosticIds.MarkerTypeNotFound,
]);

export function fail(id: DiagnosticId, message: string, site: FailureSite): never {
  throw new MutationError(id, message, site);
}

export function isMutationError(err: unknown): err is MutationError {
  return err instanceof MutationError;
}

/**
 * True when the failure comes from how the pass was set up rather than from the code it was given.
 */
export function isConfigurationError(err: unknown): boolean {
  return isMutationError(err) && configurationIds.has(err.id);
}

function toHexIndex(index: number): string {
  return index.toString(16).toUpperCase().padStart(4, '0');
}

/**
 * Render a diagnostic as a single line: `<procedure>[@IL_xxxx]: <severity> <id>: <message>`.
 */
export function formatDiagnostic(d: Diagnostic): string {
  const where = d.index === undefined ? d.procedure : `${d.procedure}@IL_${toHexIndex(d.index)}`;
  return `${where}: ${d.severity} ${d.id}: ${d.message}`;
}
