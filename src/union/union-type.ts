/**
 * Canonical union storage
 *
 * Members are partitioned by kind: literal-able slots for the primitive
 * kinds with literals, flags for the payload-free kinds, a (true, false)
 * pair for booleans, a structurally deduplicated set of complex shapes and
 * an ordered list of unresolved placeholders.
 *
 * A UnionType never holds a union, a sentinel or a kind that cannot be
 * modeled inside a union; those are dealt with by UnionTypeBuilder.
 */

import type { Ty, ComplexTy, UnresolvedTy, SymbolId } from '../types/index.js';
import { Types } from '../utils/type-factory.js';
import { typeKey } from '../utils/type-key.js';
import { InvariantError } from '../utils/errors.js';
import { LiteralAble } from './literal-able.js';

export class UnionType {
  readonly string = new LiteralAble<string>();
  // -0 is kept apart from 0
  readonly number = new LiteralAble<number>((value) => (Object.is(value, -0) ? '-0' : value));
  readonly bigint = new LiteralAble<bigint>();
  readonly symbol = new LiteralAble<SymbolId>();

  private hasObject = false;
  private hasVoid = false;
  private hasNull = false;
  private hasUndefined = false;
  private hasTrue = false;
  private hasFalse = false;

  private readonly complexByKey = new Map<string, ComplexTy>();
  private readonly complexRefs = new WeakSet<ComplexTy>();
  private readonly unresolvedList: UnresolvedTy[] = [];

  private isSealed = false;

  get object(): boolean {
    return this.hasObject;
  }

  get void(): boolean {
    return this.hasVoid;
  }

  get null(): boolean {
    return this.hasNull;
  }

  get undefined(): boolean {
    return this.hasUndefined;
  }

  /** (hasTrue, hasFalse) */
  get boolean(): readonly [boolean, boolean] {
    return [this.hasTrue, this.hasFalse];
  }

  get complex(): ReadonlyMap<string, ComplexTy> {
    return this.complexByKey;
  }

  get unresolved(): readonly UnresolvedTy[] {
    return this.unresolvedList;
  }

  get sealed(): boolean {
    return this.isSealed;
  }

  /**
   * Freeze the union. Called when the arena takes ownership.
   */
  seal(): void {
    this.isSealed = true;
  }

  add(ty: Ty): void {
    if (this.isSealed) {
      throw new InvariantError('Cannot add to a union after it has been built', { kind: ty.kind });
    }

    switch (ty.kind) {
      case 'void':
        this.hasVoid = true;
        break;
      case 'null':
        this.hasNull = true;
        break;
      case 'undefined':
        this.hasUndefined = true;
        break;
      case 'object':
        this.hasObject = true;
        break;

      case 'string':
        this.string.widen();
        break;
      case 'number':
        this.number.widen();
        break;
      case 'bigint':
        this.bigint.widen();
        break;
      case 'symbol':
        this.symbol.widen();
        break;
      case 'boolean':
        this.hasTrue = true;
        this.hasFalse = true;
        break;

      case 'string-literal':
        this.string.add(ty.value);
        break;
      case 'numeric-literal':
        this.number.add(ty.value);
        break;
      case 'bigint-literal':
        this.bigint.add(ty.value);
        break;
      case 'unique-symbol':
        this.symbol.add(ty.symbol);
        break;
      case 'boolean-literal':
        if (ty.value) {
          this.hasTrue = true;
        } else {
          this.hasFalse = true;
        }
        break;

      case 'record':
      case 'function':
      case 'constructor':
      case 'interface':
      case 'intersection':
        this.addComplex(ty);
        break;

      case 'unresolved':
        this.unresolvedList.push(ty);
        break;

      case 'never':
      case 'error':
      case 'any':
      case 'unknown':
      case 'union':
      case 'namespace':
      case 'generic':
      case 'intrinsic':
      case 'instance':
        throw new InvariantError(`Type kind '${ty.kind}' must be handled by UnionTypeBuilder`, {
          kind: ty.kind,
        });
    }
  }

  private addComplex(ty: ComplexTy): void {
    if (this.complexRefs.has(ty)) return;
    this.complexRefs.add(ty);
    const key = typeKey(ty);
    if (!this.complexByKey.has(key)) {
      this.complexByKey.set(key, ty);
    }
  }

  /**
   * Enumerate members in canonical order: string, number, bigint, symbol;
   * object, void, null, undefined; boolean; complex; unresolved.
   */
  *members(): Generator<Ty, void, undefined> {
    yield* this.string.expand(Types.string, Types.stringLiteral);
    yield* this.number.expand(Types.number, Types.numberLiteral);
    yield* this.bigint.expand(Types.bigint, Types.bigintLiteral);
    yield* this.symbol.expand(Types.symbol, Types.symbolById);

    if (this.hasObject) yield Types.object;
    if (this.hasVoid) yield Types.void;
    if (this.hasNull) yield Types.null;
    if (this.hasUndefined) yield Types.undefined;

    if (this.hasTrue && this.hasFalse) {
      yield Types.boolean;
    } else if (this.hasTrue) {
      yield Types.booleanLiteral(true);
    } else if (this.hasFalse) {
      yield Types.booleanLiteral(false);
    }

    yield* this.complexByKey.values();
    yield* this.unresolvedList;
  }

  [Symbol.iterator](): Iterator<Ty> {
    return this.members();
  }

  /** Number of enumerated members */
  get size(): number {
    return [...this.members()].length;
  }
}
