import type { Instruction, Operand, Procedure, TypeHandle } from './types.js';

export interface WriteListingOptions {
  lineEnding?: string;
  /** Include the header comment lines (default true). */
  header?: boolean;
}

function toHexIndex(n: number): string {
  return n.toString(16).toUpperCase().padStart(4, '0');
}

export function labelOf(index: number): string {
  return `IL_${toHexIndex(index)}`;
}

function typeName(t: TypeHandle): string {
  return t.namespace ? `${t.namespace}.${t.name}` : t.name;
}

function targetLabel(target: Instruction, body: readonly Instruction[]): string {
  const i = body.indexOf(target);
  return i < 0 ? 'IL_????' : labelOf(i);
}

/**
 * Format an operand for display. Branch targets are resolved against `body`.
 */
export function formatOperand(operand: Operand, body: readonly Instruction[] = []): string {
  if (operand === undefined) return '';
  if (typeof operand === 'number') return String(operand);
  if (typeof operand === 'string') return JSON.stringify(operand);
  if (Array.isArray(operand)) {
    return `(${operand.map((t) => targetLabel(t, body)).join(', ')})`;
  }
  switch (operand.kind) {
    case 'Type':
      return typeName(operand);
    case 'Field':
      return `${typeName(operand.declaringType)}::${operand.name}`;
    case 'Method':
      return `${typeName(operand.declaringType)}::${operand.name}/${operand.paramCount}`;
    case 'Local':
      return operand.name ?? `V_${operand.index}`;
    case 'Param':
      return `A_${operand.index}`;
    case 'Instruction':
      return targetLabel(operand, body);
  }
}

export function formatInstruction(instr: Instruction, body: readonly Instruction[] = []): string {
  const operand = formatOperand(instr.operand, body);
  return operand.length > 0 ? `${instr.opcode} ${operand}` : instr.opcode;
}

/**
 * Render a procedure body as a deterministic listing, one `IL_xxxx: opcode operand` line per
 * instruction.
 */
export function writeListing(procedure: Procedure, opts?: WriteListingOptions): string {
  const lineEnding = opts?.lineEnding ?? '\n';
  const lines: string[] = [];
  if (opts?.header ?? true) {
    lines.push(`; ${procedure.name}`);
    lines.push(`; instructions: ${procedure.body.length}`);
  }
  procedure.body.forEach((instr, index) => {
    lines.push(`${labelOf(index)}: ${formatInstruction(instr, procedure.body)}`);
  });
  return lines.join(lineEnding) + lineEnding;
}
