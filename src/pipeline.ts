import type { Diagnostic } from './diagnostics/types.js';
import type { ProgramNode } from './frontend/ast.js';
import type { ElaboratedTree } from './semantics/tree.js';
import type { Value } from './semantics/values.js';

/**
 * Options that select what gets elaborated and how failures are handled.
 */
export interface ElaborateOptions {
  /**
   * Name of the top-level address map.
   *
   * Matches a root-level instance name first, then a root-scope addrmap definition. When absent,
   * every root-level instance is elaborated, or the last addrmap defined if there are none.
   */
  top?: string;
  /**
   * Parameter overrides for a top addrmap chosen by definition (not by root-level instance).
   */
  parameters?: Record<string, Value>;
  /**
   * Keep elaborating the remaining top-level sites after one fails.
   *
   * Failures inside a single body always stop that body at its first error.
   */
  continueOnError?: boolean;
}

/**
 * Result of an elaboration run: diagnostics plus one tree per successfully elaborated site.
 */
export interface ElaborateResult {
  diagnostics: Diagnostic[];
  trees: ElaboratedTree[];
}

/**
 * Top-level elaborate function signature used by the pipeline contract.
 */
export type ElaborateFn = (program: ProgramNode, options?: ElaborateOptions) => ElaborateResult;
