import type { OpCode } from './opcodes.js';
import type {
  FieldRef,
  Instruction,
  Local,
  MethodRef,
  Operand,
  Procedure,
  TypeHandle,
} from './types.js';

export function createInstruction(opcode: OpCode, operand?: Operand): Instruction {
  return { kind: 'Instruction', opcode, operand };
}

export function typeHandle(name: string, namespace?: string): TypeHandle {
  return namespace === undefined ? { kind: 'Type', name } : { kind: 'Type', name, namespace };
}

export function fieldRef(declaringType: TypeHandle, name: string): FieldRef {
  return { kind: 'Field', name, declaringType };
}

/**
 * Build a method reference. Defaults describe a static method returning a value.
 */
export function methodRef(
  declaringType: TypeHandle,
  name: string,
  signature: Partial<Pick<MethodRef, 'paramCount' | 'hasThis' | 'returnsValue'>> = {},
): MethodRef {
  return {
    kind: 'Method',
    name,
    declaringType,
    paramCount: signature.paramCount ?? 0,
    hasThis: signature.hasThis ?? false,
    returnsValue: signature.returnsValue ?? true,
  };
}

export function local(index: number, name?: string): Local {
  return name === undefined ? { kind: 'Local', index } : { kind: 'Local', index, name };
}

export function createProcedure(
  name: string,
  body: Instruction[],
  opts: { locals?: Local[]; returnsValue?: boolean; declaringType?: TypeHandle } = {},
): Procedure {
  const procedure: Procedure = {
    name,
    locals: opts.locals ?? [],
    returnsValue: opts.returnsValue ?? false,
    body,
  };
  if (opts.declaringType) procedure.declaringType = opts.declaringType;
  return procedure;
}

// Shorthands for the common shapes.

export const ldc = (value: number): Instruction => createInstruction('ldc.i4', value | 0);
export const ldstr = (value: string): Instruction => createInstruction('ldstr', value);
export const ldarg = (index: number): Instruction =>
  createInstruction('ldarg', { kind: 'Param', index });
export const ldloc = (l: Local): Instruction => createInstruction('ldloc', l);
export const stloc = (l: Local): Instruction => createInstruction('stloc', l);
export const ldsfld = (f: FieldRef): Instruction => createInstruction('ldsfld', f);
export const stsfld = (f: FieldRef): Instruction => createInstruction('stsfld', f);
export const call = (m: MethodRef): Instruction => createInstruction('call', m);
export const op = (opcode: OpCode): Instruction => createInstruction(opcode);
export const branch = (opcode: OpCode, target: Instruction): Instruction =>
  createInstruction(opcode, target);
export const ret = (): Instruction => createInstruction('ret');
