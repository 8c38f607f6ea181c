/**
 * Control-flow behaviour of an opcode.
 *
 * - `next`: falls through to the following instruction.
 * - `branch`: unconditional transfer to the operand target.
 * - `cond-branch`: may transfer to the operand target(s) or fall through.
 * - `return` / `throw`: leaves the procedure.
 */
export type FlowKind = 'next' | 'branch' | 'cond-branch' | 'return' | 'throw';

/**
 * Static stack behaviour of an opcode.
 *
 * `'call'` marks counts that depend on the referenced method signature; `'ret'` marks counts that
 * depend on whether the owning procedure returns a value.
 */
export interface OpCodeInfo {
  pops: number | 'call' | 'ret';
  pushes: number | 'call';
  flow: FlowKind;
}

export const OpCodes = {
  nop: { pops: 0, pushes: 0, flow: 'next' },

  'ldc.i4': { pops: 0, pushes: 1, flow: 'next' },
  ldstr: { pops: 0, pushes: 1, flow: 'next' },
  ldnull: { pops: 0, pushes: 1, flow: 'next' },
  ldarg: { pops: 0, pushes: 1, flow: 'next' },
  starg: { pops: 1, pushes: 0, flow: 'next' },
  ldloc: { pops: 0, pushes: 1, flow: 'next' },
  stloc: { pops: 1, pushes: 0, flow: 'next' },

  ldsfld: { pops: 0, pushes: 1, flow: 'next' },
  ldsflda: { pops: 0, pushes: 1, flow: 'next' },
  stsfld: { pops: 1, pushes: 0, flow: 'next' },
  ldfld: { pops: 1, pushes: 1, flow: 'next' },
  stfld: { pops: 2, pushes: 0, flow: 'next' },

  call: { pops: 'call', pushes: 'call', flow: 'next' },
  callvirt: { pops: 'call', pushes: 'call', flow: 'next' },
  newobj: { pops: 'call', pushes: 1, flow: 'next' },

  add: { pops: 2, pushes: 1, flow: 'next' },
  sub: { pops: 2, pushes: 1, flow: 'next' },
  mul: { pops: 2, pushes: 1, flow: 'next' },
  div: { pops: 2, pushes: 1, flow: 'next' },
  rem: { pops: 2, pushes: 1, flow: 'next' },
  and: { pops: 2, pushes: 1, flow: 'next' },
  or: { pops: 2, pushes: 1, flow: 'next' },
  xor: { pops: 2, pushes: 1, flow: 'next' },
  shl: { pops: 2, pushes: 1, flow: 'next' },
  shr: { pops: 2, pushes: 1, flow: 'next' },
  'shr.un': { pops: 2, pushes: 1, flow: 'next' },
  neg: { pops: 1, pushes: 1, flow: 'next' },
  not: { pops: 1, pushes: 1, flow: 'next' },

  'conv.i4': { pops: 1, pushes: 1, flow: 'next' },
  'conv.u4': { pops: 1, pushes: 1, flow: 'next' },
  'conv.u1': { pops: 1, pushes: 1, flow: 'next' },

  dup: { pops: 1, pushes: 2, flow: 'next' },
  pop: { pops: 1, pushes: 0, flow: 'next' },

  newarr: { pops: 1, pushes: 1, flow: 'next' },
  ldlen: { pops: 1, pushes: 1, flow: 'next' },
  'ldelem.u1': { pops: 2, pushes: 1, flow: 'next' },
  'ldelem.u4': { pops: 2, pushes: 1, flow: 'next' },
  'stelem.i1': { pops: 3, pushes: 0, flow: 'next' },
  'stelem.i4': { pops: 3, pushes: 0, flow: 'next' },

  br: { pops: 0, pushes: 0, flow: 'branch' },
  brtrue: { pops: 1, pushes: 0, flow: 'cond-branch' },
  brfalse: { pops: 1, pushes: 0, flow: 'cond-branch' },
  beq: { pops: 2, pushes: 0, flow: 'cond-branch' },
  'bne.un': { pops: 2, pushes: 0, flow: 'cond-branch' },
  blt: { pops: 2, pushes: 0, flow: 'cond-branch' },
  bge: { pops: 2, pushes: 0, flow: 'cond-branch' },
  switch: { pops: 1, pushes: 0, flow: 'cond-branch' },
  ret: { pops: 'ret', pushes: 0, flow: 'return' },
  throw: { pops: 1, pushes: 0, flow: 'throw' },
} as const satisfies Record<string, OpCodeInfo>;

export type OpCode = keyof typeof OpCodes;

export function opCodeInfo(opcode: OpCode): OpCodeInfo {
  return OpCodes[opcode];
}

export function isOpCode(value: string): value is OpCode {
  return Object.prototype.hasOwnProperty.call(OpCodes, value);
}
