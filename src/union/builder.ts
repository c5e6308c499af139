/**
 * UnionTypeBuilder - monotone accumulator for union members
 *
 * States only move upward: never → compound → error | any | unknown.
 * Once a terminal state is reached further additions are ignored, so the
 * first of `any` and `unknown` to arrive wins.
 */

import type { Ty, InstanceTy } from '../types/index.js';
import { Types } from '../utils/type-factory.js';
import type { TypeArena } from './arena.js';
import { UnionType } from './union-type.js';

/**
 * What the builder needs from the running analysis
 */
export interface UnionHost {
  readonly arena: TypeArena;
  unwrapGenericInstance(instance: InstanceTy): Ty;
}

export type UnionBuilderState =
  | { readonly kind: 'never' }
  | { readonly kind: 'error' }
  | { readonly kind: 'any' }
  | { readonly kind: 'unknown' }
  | { readonly kind: 'compound'; readonly union: UnionType };

export class UnionTypeBuilder {
  private state: UnionBuilderState = { kind: 'never' };

  get kind(): UnionBuilderState['kind'] {
    return this.state.kind;
  }

  add(host: UnionHost, ty: Ty): void {
    const state = this.state;
    if (state.kind === 'error' || state.kind === 'any' || state.kind === 'unknown') {
      return;
    }

    switch (ty.kind) {
      case 'error':
      case 'generic':
      case 'intrinsic':
      case 'namespace':
        this.state = { kind: 'error' };
        return;
      case 'any':
        this.state = { kind: 'any' };
        return;
      case 'unknown':
        this.state = { kind: 'unknown' };
        return;
      case 'never':
        return;
      case 'union':
        for (const member of ty.union.members()) {
          this.add(host, member);
        }
        return;
      case 'instance':
        this.add(host, host.unwrapGenericInstance(ty));
        return;
      default:
        break;
    }

    if (state.kind === 'never') {
      const union = new UnionType();
      union.add(ty);
      this.state = { kind: 'compound', union };
    } else {
      state.union.add(ty);
    }
  }

  addAll(host: UnionHost, types: Iterable<Ty>): void {
    for (const ty of types) {
      this.add(host, ty);
    }
  }

  build(host: UnionHost): Ty {
    switch (this.state.kind) {
      case 'never':
        return Types.never;
      case 'error':
        return Types.error;
      case 'any':
        return Types.any;
      case 'unknown':
        return Types.unknown;
      case 'compound':
        return host.arena.alloc(this.state.union);
    }
  }
}
