import { DiagnosticIds } from '../diagnostics/types.js';
import { fail } from '../diagnostics/errors.js';
import { spliceBody } from '../il/body.js';
import type { Instruction, MethodRef, Procedure, SpliceResult } from '../il/types.js';
import type { ProvenanceTracer } from '../trace/tracer.js';

/**
 * Rewrites the isolated argument span of a placeholder into concrete instructions.
 */
export type PlaceholderProcessor = (argument: readonly Instruction[]) => readonly Instruction[];

/**
 * Replace `<argument span>; call Mutation::Placeholder` with the processor's output.
 *
 * `index` is the position of `call` in the body.
 */
export function expandPlaceholder(
  procedure: Procedure,
  index: number,
  call: MethodRef,
  processor: PlaceholderProcessor | undefined,
  tracer: ProvenanceTracer,
): SpliceResult {
  const site = { procedure: procedure.name, index };
  if (!processor) {
    fail(
      DiagnosticIds.MissingProcessor,
      'Found mutation placeholder, but no placeholder processor is configured.',
      site,
    );
  }
  if (call.paramCount !== 1 || call.hasThis) {
    fail(
      DiagnosticIds.UnexpectedMarkerUse,
      `Mutation placeholder must take exactly one argument (${call.name} takes ${call.paramCount}).`,
      site,
    );
  }

  const instr = procedure.body[index];
  if (instr === undefined) {
    fail(DiagnosticIds.TraceFailure, 'Failed to trace placeholder argument: no call at index.', site);
  }
  const trace = tracer.traceArguments(instr);
  if (trace.kind === 'failed') {
    fail(DiagnosticIds.TraceFailure, `Failed to trace placeholder argument: ${trace.reason}.`, site);
  }
  const start = trace.starts[0];
  if (start === undefined || start >= index) {
    fail(DiagnosticIds.TraceFailure, 'Failed to trace placeholder argument: empty span.', site);
  }
  if (!Number.isInteger(start) || start < 0) {
    fail(
      DiagnosticIds.TraceFailure,
      `Failed to trace placeholder argument: span start ${String(start)} is outside the body.`,
      site,
    );
  }

  // The processor never sees the call itself.
  const argument = procedure.body.slice(start, index);
  const transform: PlaceholderProcessor = processor;
  return spliceBody(procedure, start, argument.length + 1, () => transform(argument));
}
