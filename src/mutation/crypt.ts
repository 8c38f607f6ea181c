import { DiagnosticIds } from '../diagnostics/types.js';
import { fail } from '../diagnostics/errors.js';
import { collectBranchTargets, spliceBody } from '../il/body.js';
import type { Instruction, Local, Procedure, SpliceResult } from '../il/types.js';
import { isLocal } from '../il/types.js';

/**
 * Produces the instructions that encrypt/decrypt `block` with `key` inside `procedure`.
 */
export type CryptProcessor = (
  procedure: Procedure,
  block: Local,
  key: Local,
) => readonly Instruction[];

/**
 * Replace `ldloc block; ldloc key; call Mutation::Crypt` with the processor's output.
 *
 * `index` is the position of `call` in the body.
 */
export function expandCrypt(
  procedure: Procedure,
  index: number,
  processor: CryptProcessor | undefined,
): SpliceResult {
  const site = { procedure: procedure.name, index };
  if (!processor) {
    fail(
      DiagnosticIds.MissingProcessor,
      'Found mutation crypt, but no crypt processor is configured.',
      site,
    );
  }

  const body = procedure.body;
  const call = body[index];
  const ldBlock = body[index - 2];
  const ldKey = body[index - 1];
  if (
    call === undefined ||
    ldBlock === undefined ||
    ldKey === undefined ||
    ldBlock.opcode !== 'ldloc' ||
    ldKey.opcode !== 'ldloc'
  ) {
    fail(
      DiagnosticIds.MalformedCryptOperands,
      'Mutation crypt must be preceded by two local variable loads (block, key).',
      site,
    );
  }
  const block = ldBlock.operand;
  const key = ldKey.operand;
  if (!isLocal(block) || !isLocal(key)) {
    fail(DiagnosticIds.MalformedCryptOperands, 'Mutation crypt operands must be locals.', site);
  }
  const targets = collectBranchTargets(body);
  if (targets.has(ldKey) || targets.has(call)) {
    fail(
      DiagnosticIds.MalformedCryptOperands,
      'Mutation crypt operand loads must not be branch targets.',
      site,
    );
  }

  const transform: CryptProcessor = processor;
  return spliceBody(procedure, index - 2, 3, () => transform(procedure, block, key));
}
