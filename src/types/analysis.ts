/**
 * Scope and analysis result types
 *
 * These types describe the binding state flowing through a single
 * analysis pass.
 */

import type { Ty } from './types.js';

/**
 * How the effects of a frame relate to the code after it.
 *
 * - normal: the guarded code ran exactly once
 * - indeterminate: it may or may not have run
 * - loop: it ran zero, one or many times
 */
export type ScopeKind = 'normal' | 'indeterminate' | 'loop';

/**
 * A control-flow frame on the scope stack
 */
export interface Scope {
  readonly kind: ScopeKind;
  readonly depth: number;
  /** Binding state written while this frame was on top */
  readonly bindings: Map<string, Ty>;
  /** Names declared in this frame (discarded when it is popped) */
  readonly declarations: Set<string>;
}

export type DeclarationKind = 'var' | 'let' | 'const' | 'param' | 'function';

/**
 * Inferred type recorded at a declaration site
 */
export interface BindingAnnotation {
  readonly name: string;
  readonly kind: DeclarationKind;
  /** Line number (1-based) */
  readonly line: number;
  /** Column number (0-based) */
  readonly column: number;
  readonly type: Ty;
  readonly typeString: string;
}

export interface AnalysisError {
  readonly message: string;
  readonly line: number;
  readonly column: number;
}

/**
 * Result of analyzing one source file
 */
export interface AnalysisResult {
  readonly filename: string;
  /** State of the outermost frame when the program ends */
  readonly bindings: ReadonlyMap<string, Ty>;
  readonly annotations: readonly BindingAnnotation[];
  readonly errors: readonly AnalysisError[];
  /** Number of compound unions allocated during the pass */
  readonly unionCount: number;
}
