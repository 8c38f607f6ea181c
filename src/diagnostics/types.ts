/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A pass diagnostic with an optional instruction location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `MUT100`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  /** Name of the procedure being processed. */
  procedure: string;
  /** 0-based instruction index in the body at the time of failure, when known. */
  index?: number;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /** Unexpected exception thrown by a processor or a caller-supplied transform. */
  InternalError: 'MUT001',

  /** Field load or call to the marker type that no resolver accepts. */
  UnexpectedMarkerUse: 'MUT100',

  /** Key field name outside the `KeyI0`..`KeyI15` pattern. */
  UnrecognizedKeyField: 'MUT101',

  /** Recognized key slot absent from the key value mapping. */
  MissingKeyValue: 'MUT102',

  /** Key value mapping entry that is not a 32-bit integer. */
  InvalidKeyValue: 'MUT103',

  /** Crypt call not preceded by the two local loads it takes its operands from. */
  MalformedCryptOperands: 'MUT104',

  /** Splice removed a branch target and left no instruction to redirect the branch to. */
  DanglingBranchTarget: 'MUT105',

  /** Provenance tracer could not isolate a placeholder argument. */
  TraceFailure: 'MUT200',

  /** Placeholder or crypt marker found with no transform configured. */
  MissingProcessor: 'MUT300',

  /** The marker type could not be resolved from the runtime types. */
  MarkerTypeNotFound: 'MUT301',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];
