import type { FieldRef, Instruction, MemberRef, MethodRef, TypeHandle } from '../il/types.js';
import { isFieldRef, isMemberRef, isMethodRef } from '../il/types.js';

export const PlaceholderMethodName = 'Placeholder';
export const CryptMethodName = 'Crypt';

/**
 * What a single instruction means to the mutation pass.
 */
export type Classification =
  | { kind: 'key-field'; field: FieldRef }
  | { kind: 'placeholder-call'; method: MethodRef }
  | { kind: 'crypt-call'; method: MethodRef }
  /** References the marker type in a shape no resolver accepts. */
  | { kind: 'unexpected'; member: MemberRef }
  | { kind: 'not-a-marker' };

const notAMarker: Classification = { kind: 'not-a-marker' };

/**
 * Recognizes marker operations by comparing declaring types against one resolved handle.
 */
export class MarkerCatalog {
  constructor(readonly markerType: TypeHandle) {}

  isMarkerMember(member: MemberRef): boolean {
    return member.declaringType === this.markerType;
  }

  /**
   * True when the instruction's operand is a member of the marker type, whatever the opcode.
   */
  references(instr: Instruction): boolean {
    return isMemberRef(instr.operand) && this.isMarkerMember(instr.operand);
  }

  classify(instr: Instruction): Classification {
    const operand = instr.operand;
    if (!isMemberRef(operand) || !this.isMarkerMember(operand)) return notAMarker;

    if (instr.opcode === 'ldsfld' && isFieldRef(operand)) {
      return { kind: 'key-field', field: operand };
    }
    if (instr.opcode === 'call' && isMethodRef(operand)) {
      if (operand.name === PlaceholderMethodName) return { kind: 'placeholder-call', method: operand };
      if (operand.name === CryptMethodName) return { kind: 'crypt-call', method: operand };
    }
    return { kind: 'unexpected', member: operand };
  }
}
