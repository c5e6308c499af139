/**
 * Per-kind widening lattice: vacant → literals → any
 */

import type { Ty } from '../types/index.js';

export type LiteralAbleState<L> =
  | { readonly kind: 'vacant' }
  | { readonly kind: 'any' }
  | { readonly kind: 'literals'; readonly literals: Map<unknown, L> };

export class LiteralAble<L> {
  private state: LiteralAbleState<L> = { kind: 'vacant' };

  /**
   * @param keyOf - identity of a literal within the slot; defaults to the
   * literal itself (SameValueZero)
   */
  constructor(private readonly keyOf: (literal: L) => unknown = (literal) => literal) {}

  get kind(): LiteralAbleState<L>['kind'] {
    return this.state.kind;
  }

  /** Literals currently held; empty unless in the `literals` state */
  get literals(): readonly L[] {
    return this.state.kind === 'literals' ? [...this.state.literals.values()] : [];
  }

  add(literal: L): void {
    switch (this.state.kind) {
      case 'vacant':
        this.state = { kind: 'literals', literals: new Map([[this.keyOf(literal), literal]]) };
        break;
      case 'literals': {
        const key = this.keyOf(literal);
        if (!this.state.literals.has(key)) this.state.literals.set(key, literal);
        break;
      }
      case 'any':
        break;
    }
  }

  widen(): void {
    this.state = { kind: 'any' };
  }

  /**
   * The concrete types this slot stands for: nothing, the widened type,
   * or one type per literal in insertion order.
   */
  *expand(any: Ty, ctor: (literal: L) => Ty): Generator<Ty, void, undefined> {
    switch (this.state.kind) {
      case 'vacant':
        return;
      case 'any':
        yield any;
        return;
      case 'literals':
        for (const literal of this.state.literals.values()) {
          yield ctor(literal);
        }
        return;
    }
  }
}
