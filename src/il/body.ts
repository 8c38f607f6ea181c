import { DiagnosticIds } from '../diagnostics/types.js';
import { fail } from '../diagnostics/errors.js';
import { opCodeInfo } from './opcodes.js';
import type { Instruction, Local, Operand, Procedure, SpliceResult } from './types.js';
import { isInstruction, isMethodRef } from './types.js';

/**
 * Number of stack values an instruction consumes and produces.
 */
export interface StackEffect {
  pops: number;
  pushes: number;
}

/**
 * Compute the stack effect of `instr` inside `procedure`.
 *
 * Returns `undefined` when the effect depends on an operand that is missing or of the wrong kind
 * (e.g. a `call` without a method reference).
 */
export function stackEffect(instr: Instruction, procedure: Procedure): StackEffect | undefined {
  const info = opCodeInfo(instr.opcode);
  let pops: number;
  let pushes: number;

  if (info.pops === 'call' || info.pushes === 'call') {
    const m = instr.operand;
    if (!isMethodRef(m)) return undefined;
    pops = m.paramCount + (m.hasThis && instr.opcode !== 'newobj' ? 1 : 0);
    pushes = info.pushes === 'call' ? (m.returnsValue ? 1 : 0) : info.pushes;
    return { pops, pushes };
  }

  if (info.pops === 'ret') {
    pops = procedure.returnsValue ? 1 : 0;
  } else {
    pops = info.pops;
  }
  pushes = info.pushes;
  return { pops, pushes };
}

/**
 * Instructions an instruction may transfer control to (empty for non-branching opcodes).
 */
export function branchTargets(instr: Instruction): Instruction[] {
  const flow = opCodeInfo(instr.opcode).flow;
  if (flow !== 'branch' && flow !== 'cond-branch') return [];
  const operand = instr.operand;
  if (Array.isArray(operand)) return operand;
  return isInstruction(operand) ? [operand] : [];
}

/**
 * Collect every instruction that is the target of some branch in `body`.
 */
export function collectBranchTargets(body: readonly Instruction[]): Set<Instruction> {
  const targets = new Set<Instruction>();
  for (const instr of body) {
    for (const t of branchTargets(instr)) targets.add(t);
  }
  return targets;
}

function retarget(body: readonly Instruction[], from: Instruction, to: Instruction): void {
  for (const instr of body) {
    const operand = instr.operand;
    if (operand === from) {
      instr.operand = to;
    } else if (Array.isArray(operand) && operand.includes(from)) {
      instr.operand = operand.map((t) => (t === from ? to : t));
    }
  }
}

/**
 * Remove `removeCount` instructions at `start` and insert a replacement in their place.
 *
 * When `replacement` is a function it is called after the removal, so it observes the body
 * without the span. Branches that targeted the first removed instruction are redirected to the
 * first inserted one, or to the instruction that now follows the splice when the replacement is
 * empty; with neither, such a branch is a failure. Branches into the rest of the removed span must
 * have been rejected by the caller.
 */
export function spliceBody(
  procedure: Procedure,
  start: number,
  removeCount: number,
  replacement: readonly Instruction[] | (() => readonly Instruction[]),
): SpliceResult {
  const body = procedure.body;
  const removed = body.splice(start, removeCount);
  const inserted = typeof replacement === 'function' ? replacement() : replacement;
  body.splice(start, 0, ...inserted);

  const head = removed[0];
  if (head !== undefined && !body.includes(head)) {
    const next = body[start];
    if (next !== undefined) {
      retarget(body, head, next);
    } else if (collectBranchTargets(body).has(head)) {
      fail(
        DiagnosticIds.DanglingBranchTarget,
        'Branch target removed with nothing left to redirect it to.',
        { procedure: procedure.name, index: start },
      );
    }
  }
  return { start, inserted: inserted.length };
}

/**
 * Saved state of a procedure: instruction order, locals, and each instruction's opcode/operand.
 */
export interface ProcedureSnapshot {
  body: Instruction[];
  locals: Local[];
  states: Map<Instruction, { opcode: Instruction['opcode']; operand: Operand }>;
}

export function snapshotProcedure(procedure: Procedure): ProcedureSnapshot {
  const states: ProcedureSnapshot['states'] = new Map();
  for (const instr of procedure.body) {
    states.set(instr, { opcode: instr.opcode, operand: instr.operand });
  }
  return { body: [...procedure.body], locals: [...procedure.locals], states };
}

/**
 * Put a procedure back into the state captured by {@link snapshotProcedure}, reusing the original
 * instruction objects.
 */
export function restoreProcedure(procedure: Procedure, snapshot: ProcedureSnapshot): void {
  procedure.body.splice(0, procedure.body.length, ...snapshot.body);
  procedure.locals.splice(0, procedure.locals.length, ...snapshot.locals);
  for (const [instr, state] of snapshot.states) {
    instr.opcode = state.opcode;
    instr.operand = state.operand;
  }
}
