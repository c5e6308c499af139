/**
 * Analyzer - state of one analysis pass and the union-consuming API
 *
 * Other analysis code goes through this façade to join, widen and query
 * types; it never manipulates UnionType internals directly.
 */

import type * as t from '@babel/types';
import type {
  Ty,
  InstanceTy,
  PropertyKeyType,
  ScopeKind,
  Scope,
  DeclarationKind,
  BindingAnnotation,
} from '../types/index.js';
import { resolveOptions, type AnalyzerOptions, type ResolvedAnalyzerOptions } from '../config.js';
import { TypeArena } from '../union/arena.js';
import { UnionTypeBuilder, type UnionHost } from '../union/builder.js';
import type { UnionType } from '../union/union-type.js';
import { Types } from '../utils/type-factory.js';
import type { Logger } from '../utils/logger.js';
import { printType, printUnionType } from '../output/printer.js';
import { formatType } from '../output/formatter.js';
import { ScopeStack } from './scope.js';
import { getProperty } from './properties.js';
import { unwrapGenericInstance } from './generics.js';

export class Analyzer implements UnionHost {
  readonly arena = new TypeArena();
  readonly options: ResolvedAnalyzerOptions;
  readonly logger: Logger;
  readonly scopes: ScopeStack;
  /** Interfaces and type aliases, by name */
  readonly typeDeclarations = new Map<string, Ty>();
  readonly annotations: BindingAnnotation[] = [];

  constructor(options: AnalyzerOptions = {}) {
    this.options = resolveOptions(options);
    this.logger = this.options.logger;
    this.scopes = new ScopeStack((types) => this.intoUnion(types), this.logger);
  }

  // ==========================================================================
  // Union API
  // ==========================================================================

  /**
   * Join a list of possible types into one canonical type.
   * An empty list yields `undefined`; a single member is returned as is.
   */
  intoUnion(types: readonly Ty[]): Ty {
    switch (types.length) {
      // FIXME: the empty union should be `never`
      case 0:
        return Types.undefined;
      case 1:
        return types[0] ?? Types.undefined;
      default: {
        const builder = new UnionTypeBuilder();
        builder.addAll(this, types);
        const result = builder.build(this);
        if (result.kind === 'error') {
          this.logger.debug('union escalated to error', { members: types.map((ty) => ty.kind) });
        }
        return result;
      }
    }
  }

  /**
   * `T | undefined` for optional bindings
   */
  getOptionalType(optional: boolean, ty: Ty): Ty {
    return optional ? this.intoUnion([Types.undefined, ty]) : ty;
  }

  /**
   * Property access distributes over union members
   */
  getUnionProperty(union: UnionType, key: PropertyKeyType): Ty {
    const builder = new UnionTypeBuilder();
    for (const member of union.members()) {
      builder.add(this, this.getProperty(member, key));
    }
    return builder.build(this);
  }

  printUnionType(union: UnionType): t.TSUnionType {
    return printUnionType(union);
  }

  // ==========================================================================
  // Collaborators
  // ==========================================================================

  getProperty(ty: Ty, key: PropertyKeyType): Ty {
    return getProperty(ty, key, this);
  }

  unwrapGenericInstance(instance: InstanceTy): Ty {
    return unwrapGenericInstance(instance, this);
  }

  printType(ty: Ty): t.TSType {
    return printType(ty);
  }

  // ==========================================================================
  // Scope Management
  // ==========================================================================

  pushScope(): void {
    this.scopes.push('normal');
  }

  pushIndeterminateScope(): void {
    this.scopes.push('indeterminate');
  }

  pushLoopScope(): void {
    this.scopes.push('loop');
  }

  popScope(): Scope {
    return this.scopes.pop();
  }

  /**
   * Run `fn` inside a frame of the given kind; the frame is popped on every
   * exit path.
   */
  inScope<T>(kind: ScopeKind, fn: () => T): T {
    switch (kind) {
      case 'normal':
        this.pushScope();
        break;
      case 'indeterminate':
        this.pushIndeterminateScope();
        break;
      case 'loop':
        this.pushLoopScope();
        break;
    }
    try {
      return fn();
    } finally {
      this.popScope();
    }
  }

  // ==========================================================================
  // Bindings
  // ==========================================================================

  lookup(name: string): Ty | undefined {
    return this.scopes.lookup(name);
  }

  declare(name: string, ty: Ty): void {
    this.scopes.declare(name, ty);
  }

  /**
   * `var` bindings are hoisted to the outermost frame as `undefined`
   */
  declareVar(name: string): void {
    if (!this.scopes.root.declarations.has(name)) {
      this.scopes.declare(name, Types.undefined, 'root');
    }
  }

  assign(name: string, ty: Ty): void {
    this.scopes.assign(name, ty);
  }

  annotate(node: t.Node, name: string, kind: DeclarationKind, ty: Ty): void {
    this.annotations.push({
      name,
      kind,
      line: node.loc?.start.line ?? 0,
      column: node.loc?.start.column ?? 0,
      type: ty,
      typeString: formatType(ty),
    });
  }

  /**
   * End of pass: release every union allocated by it
   */
  dispose(): void {
    this.logger.debug('dispose arena', { unions: this.arena.size });
    this.arena.dispose();
  }
}
