/**
 * Pass-scoped arena for compound unions
 *
 * Unions are sealed when allocated and released together when the pass
 * disposes the arena. Handles are arena indices.
 */

import type { UnionTy } from '../types/index.js';
import { InvariantError } from '../utils/errors.js';
import type { UnionType } from './union-type.js';

export class TypeArena {
  private unions: UnionType[] = [];
  private disposed = false;

  alloc(union: UnionType): UnionTy {
    if (this.disposed) {
      throw new InvariantError('Cannot allocate from a disposed arena');
    }
    union.seal();
    const id = this.unions.length;
    this.unions.push(union);
    return { kind: 'union', id, union };
  }

  get(id: number): UnionType {
    const union = this.unions[id];
    if (!union) {
      throw new InvariantError(`No union allocated with handle ${id}`, { id, size: this.unions.length });
    }
    return union;
  }

  get size(): number {
    return this.unions.length;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Drop every union allocated during the pass
   */
  dispose(): void {
    this.unions = [];
    this.disposed = true;
  }
}
