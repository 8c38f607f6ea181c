/**
 * IL contracts for the stack-machine procedures the mutation pass rewrites.
 *
 * Symbols (types, fields, methods, locals) are compared by object identity, never by name.
 */
import type { OpCode } from './opcodes.js';

/**
 * Opaque handle for a declaring type.
 */
export interface TypeHandle {
  kind: 'Type';
  /** Simple name, e.g. `Mutation`. Informational only. */
  name: string;
  namespace?: string;
}

/**
 * Reference to a field declared on a type.
 */
export interface FieldRef {
  kind: 'Field';
  name: string;
  declaringType: TypeHandle;
}

/**
 * Reference to a method declared on a type, with the signature facts stack tracing needs.
 */
export interface MethodRef {
  kind: 'Method';
  name: string;
  declaringType: TypeHandle;
  /** Number of declared parameters (excluding `this`). */
  paramCount: number;
  /** Instance methods consume one extra stack value for the receiver. */
  hasThis: boolean;
  /** Whether a call leaves a result on the stack. */
  returnsValue: boolean;
}

/**
 * A local variable slot of a procedure. Never created or destroyed by the pass.
 */
export interface Local {
  kind: 'Local';
  index: number;
  name?: string;
}

/**
 * A procedure parameter slot, referenced by `ldarg`/`starg`.
 */
export interface ParamRef {
  kind: 'Param';
  index: number;
}

export type MemberRef = FieldRef | MethodRef;

export type Operand =
  | undefined
  | number
  | string
  | TypeHandle
  | FieldRef
  | MethodRef
  | Local
  | ParamRef
  | Instruction
  | Instruction[];

/**
 * A single instruction. Mutable in place; its identity is its object reference.
 */
export interface Instruction {
  kind: 'Instruction';
  opcode: OpCode;
  operand: Operand;
}

/**
 * A procedure together with the instruction sequence it owns.
 */
export interface Procedure {
  name: string;
  declaringType?: TypeHandle;
  locals: Local[];
  /** Whether `ret` consumes a value. */
  returnsValue: boolean;
  /** Ordered, index-addressable instruction sequence. */
  body: Instruction[];
}

/**
 * Position and length of a replacement spliced into a body.
 */
export interface SpliceResult {
  /** Index where the replacement begins. */
  start: number;
  /** Number of instructions inserted at `start`. */
  inserted: number;
}

export function isInstruction(operand: Operand): operand is Instruction {
  return typeof operand === 'object' && !Array.isArray(operand) && operand.kind === 'Instruction';
}

export function isLocal(operand: Operand): operand is Local {
  return typeof operand === 'object' && !Array.isArray(operand) && operand.kind === 'Local';
}

export function isFieldRef(operand: Operand): operand is FieldRef {
  return typeof operand === 'object' && !Array.isArray(operand) && operand.kind === 'Field';
}

export function isMethodRef(operand: Operand): operand is MethodRef {
  return typeof operand === 'object' && !Array.isArray(operand) && operand.kind === 'Method';
}

export function isMemberRef(operand: Operand): operand is MemberRef {
  return isFieldRef(operand) || isMethodRef(operand);
}
