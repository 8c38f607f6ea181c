import { collectBranchTargets, stackEffect } from '../il/body.js';
import { labelOf } from '../il/listing.js';
import { opCodeInfo } from '../il/opcodes.js';
import type { Instruction, Procedure } from '../il/types.js';

/**
 * Outcome of tracing a consuming instruction.
 *
 * `starts` holds, per consumed stack argument in argument order, the index of the first instruction
 * of the contiguous sub-sequence that produces it. Zero-argument consumers yield `starts: []`.
 */
export type TraceResult = { kind: 'ok'; starts: number[] } | { kind: 'failed'; reason: string };

export interface ProvenanceTracer {
  traceArguments(consumer: Instruction): TraceResult;
}

/**
 * Builds a tracer over the current state of a procedure body.
 */
export interface TraceService {
  trace(procedure: Procedure): ProvenanceTracer;
}

function failed(reason: string): TraceResult {
  return { kind: 'failed', reason };
}

/**
 * Backward stack-depth tracer for straight-line code.
 *
 * Each argument is attributed to the shortest run of instructions ending where the previous
 * argument began whose net stack effect is exactly one value. Tracing gives up on control transfer
 * inside a span, on branches landing inside a span, and on producers that push more than the
 * argument needs (e.g. `dup`).
 */
export class StackTracer implements ProvenanceTracer {
  constructor(private readonly procedure: Procedure) {}

  traceArguments(consumer: Instruction): TraceResult {
    const body = this.procedure.body;
    const index = body.indexOf(consumer);
    if (index < 0) return failed('consumer is not part of the procedure body');

    const effect = stackEffect(consumer, this.procedure);
    if (effect === undefined) {
      return failed(`cannot determine stack effect of ${consumer.opcode} at ${labelOf(index)}`);
    }
    if (effect.pops === 0) return { kind: 'ok', starts: [] };

    const starts = new Array<number>(effect.pops).fill(0);
    let j = index - 1;
    for (let arg = effect.pops - 1; arg >= 0; arg--) {
      let need = 1;
      for (;;) {
        const producer = body[j];
        if (producer === undefined) {
          return failed(`argument ${arg} has no producer before ${labelOf(index)}`);
        }
        if (opCodeInfo(producer.opcode).flow !== 'next') {
          return failed(`control transfer (${producer.opcode}) at ${labelOf(j)}`);
        }
        const e = stackEffect(producer, this.procedure);
        if (e === undefined) {
          return failed(`cannot determine stack effect of ${producer.opcode} at ${labelOf(j)}`);
        }
        if (e.pushes > need) {
          return failed(`${producer.opcode} at ${labelOf(j)} produces more than one argument`);
        }
        need = need - e.pushes + e.pops;
        j--;
        if (need === 0) {
          starts[arg] = j + 1;
          break;
        }
      }
    }

    const first = starts[0] ?? index;
    const targets = collectBranchTargets(body);
    for (let k = first + 1; k <= index; k++) {
      const instr = body[k];
      if (instr !== undefined && targets.has(instr)) {
        return failed(`branch target at ${labelOf(k)} inside the argument span`);
      }
    }

    return { kind: 'ok', starts };
  }
}

export const stackTraceService: TraceService = {
  trace: (procedure) => new StackTracer(procedure),
};
