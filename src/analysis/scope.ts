/**
 * Scope stack - control-flow frames and their merge policy
 *
 * Frames nest strictly. Writes go to the top frame; when a frame is popped
 * its writes are merged into the frame below according to its kind:
 *
 * - normal: the writes replace the parent's state
 * - indeterminate, loop: each write is joined with the state before the frame
 *
 * Names declared inside a frame do not outlive it.
 */

import type { Ty, Scope, ScopeKind } from '../types/index.js';
import { Types } from '../utils/type-factory.js';
import { typeEquals } from '../utils/type-key.js';
import { InvariantError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export type JoinFn = (types: readonly Ty[]) => Ty;

function createScope(kind: ScopeKind, depth: number): Scope {
  return {
    kind,
    depth,
    bindings: new Map(),
    declarations: new Set(),
  };
}

export class ScopeStack {
  private readonly frames: Scope[] = [createScope('normal', 0)];

  constructor(
    private readonly join: JoinFn,
    private readonly logger: Logger
  ) {}

  /** Number of frames above the root */
  get depth(): number {
    return this.frames.length - 1;
  }

  get root(): Scope {
    return this.frameAt(0);
  }

  get current(): Scope {
    return this.frameAt(this.frames.length - 1);
  }

  private frameAt(index: number): Scope {
    const frame = this.frames[index];
    if (!frame) {
      throw new InvariantError('Scope stack is empty', { index });
    }
    return frame;
  }

  push(kind: ScopeKind): Scope {
    const scope = createScope(kind, this.frames.length);
    this.frames.push(scope);
    this.logger.trace('push scope', { kind, depth: scope.depth });
    return scope;
  }

  pop(): Scope {
    if (this.frames.length <= 1) {
      throw new InvariantError('Cannot pop the root scope');
    }
    const popped = this.frameAt(this.frames.length - 1);
    this.frames.pop();

    const parent = this.current;
    let merged = 0;
    for (const [name, after] of popped.bindings) {
      if (popped.declarations.has(name)) continue;
      parent.bindings.set(name, this.mergeBinding(popped.kind, name, after));
      merged++;
    }

    this.logger.trace('pop scope', { kind: popped.kind, depth: popped.depth, merged });
    return popped;
  }

  private mergeBinding(kind: ScopeKind, name: string, after: Ty): Ty {
    switch (kind) {
      case 'normal':
        return after;
      case 'indeterminate':
      case 'loop': {
        const before = this.lookup(name) ?? Types.undefined;
        if (typeEquals(before, after)) return before;
        return this.join([before, after]);
      }
    }
  }

  lookup(name: string): Ty | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const ty = this.frames[i]?.bindings.get(name);
      if (ty) return ty;
    }
    return undefined;
  }

  isDeclared(name: string): boolean {
    return this.frames.some((frame) => frame.declarations.has(name));
  }

  /**
   * Declare a name in the top frame, or in the root frame for hoisted names
   */
  declare(name: string, ty: Ty, target: 'current' | 'root' = 'current'): void {
    const scope = target === 'root' ? this.root : this.current;
    scope.declarations.add(name);
    scope.bindings.set(name, ty);
  }

  assign(name: string, ty: Ty): void {
    this.current.bindings.set(name, ty);
  }

  /**
   * All bindings visible from the top frame
   */
  snapshot(): Map<string, Ty> {
    const result = new Map<string, Ty>();
    for (const frame of this.frames) {
      for (const [name, ty] of frame.bindings) {
        result.set(name, ty);
      }
    }
    return result;
  }
}
