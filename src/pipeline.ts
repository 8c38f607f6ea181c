import type { Diagnostic } from './diagnostics/types.js';
import type { Procedure } from './il/types.js';

/**
 * A pass that rewrites one procedure in place, throwing on failure.
 */
export interface ProcedureProcessor {
  process(procedure: Procedure): void;
}

/**
 * Options that influence how processors are applied to a set of procedures.
 */
export interface ProcessOptions {
  /**
   * Restore a procedure to its prior state (same instruction objects) when a processor fails.
   *
   * When `false`, a failing processor may leave its procedure partially rewritten.
   */
  atomic?: boolean;
}

/**
 * Result of a processing run: one error diagnostic per procedure that failed.
 */
export interface ProcessResult {
  diagnostics: Diagnostic[];
  /** Names of the procedures that were rewritten successfully, in input order. */
  processed: string[];
}

/**
 * Top-level processing function signature used by the pipeline contract.
 */
export type ProcessFn = (
  procedures: readonly Procedure[],
  processors: readonly ProcedureProcessor[],
  options?: ProcessOptions,
) => ProcessResult;
