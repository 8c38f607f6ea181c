export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
export { DiagnosticIds } from './diagnostics/types.js';
export type { FailureSite } from './diagnostics/errors.js';
export {
  MutationError,
  formatDiagnostic,
  isConfigurationError,
  isMutationError,
} from './diagnostics/errors.js';

export type {
  FieldRef,
  Instruction,
  Local,
  MemberRef,
  MethodRef,
  Operand,
  ParamRef,
  Procedure,
  SpliceResult,
  TypeHandle,
} from './il/types.js';
export type { FlowKind, OpCode, OpCodeInfo } from './il/opcodes.js';
export { OpCodes, isOpCode, opCodeInfo } from './il/opcodes.js';
export type { ProcedureSnapshot, StackEffect } from './il/body.js';
export {
  branchTargets,
  collectBranchTargets,
  restoreProcedure,
  snapshotProcedure,
  spliceBody,
  stackEffect,
} from './il/body.js';
export * from './il/builder.js';
export type { WriteListingOptions } from './il/listing.js';
export { formatInstruction, formatOperand, labelOf, writeListing } from './il/listing.js';

export type { RuntimeService } from './runtime/registry.js';
export { MutationTypeName, RuntimeTypeRegistry } from './runtime/registry.js';

export type { ProvenanceTracer, TraceResult, TraceService } from './trace/tracer.js';
export { StackTracer, stackTraceService } from './trace/tracer.js';

export type { Classification } from './mutation/catalog.js';
export { CryptMethodName, MarkerCatalog, PlaceholderMethodName } from './mutation/catalog.js';
export type { KeyFieldValues, KeySlot } from './mutation/keyFields.js';
export { KeySlots, keyValuesFrom, parseKeyField } from './mutation/keyFields.js';
export type { PlaceholderProcessor } from './mutation/placeholder.js';
export type { CryptProcessor } from './mutation/crypt.js';
export type { MutationProcessorServices } from './mutation/processor.js';
export { MutationProcessor } from './mutation/processor.js';

export type { ProcedureProcessor, ProcessFn, ProcessOptions, ProcessResult } from './pipeline.js';
export { processProcedures } from './process.js';
