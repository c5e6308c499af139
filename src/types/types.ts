/**
 * Core type definitions for the flow analyzer.
 *
 * A `Ty` is one value shape a binding or expression may hold at a program
 * point. Values are immutable once produced.
 */

import type { UnionType } from '../union/union-type.js';

/** Identity of a unique symbol */
export type SymbolId = number;

/** Identity of an unresolved placeholder */
export type UnresolvedId = number;

/**
 * Kinds that carry no payload
 */
export type KeywordKind =
  | 'never'
  | 'error'
  | 'any'
  | 'unknown'
  | 'object'
  | 'void'
  | 'null'
  | 'undefined'
  | 'string'
  | 'number'
  | 'bigint'
  | 'symbol'
  | 'boolean';

export type KeywordTy = { [K in KeywordKind]: { readonly kind: K } }[KeywordKind];

export type KeywordTyOf<K extends KeywordKind> = Extract<KeywordTy, { kind: K }>;

/**
 * Literal types
 */
export interface StringLiteralTy {
  readonly kind: 'string-literal';
  readonly value: string;
}

export interface NumericLiteralTy {
  readonly kind: 'numeric-literal';
  readonly value: number;
}

export interface BigIntLiteralTy {
  readonly kind: 'bigint-literal';
  readonly value: bigint;
}

export interface UniqueSymbolTy {
  readonly kind: 'unique-symbol';
  readonly symbol: SymbolId;
  readonly description: string;
}

export interface BooleanLiteralTy {
  readonly kind: 'boolean-literal';
  readonly value: boolean;
}

/**
 * A canonical union, allocated from the pass arena.
 * `id` is the arena handle; `union` is never mutated after allocation.
 */
export interface UnionTy {
  readonly kind: 'union';
  readonly id: number;
  readonly union: UnionType;
}

export interface PropertyTy {
  readonly type: Ty;
  readonly optional: boolean;
}

export interface ParamTy {
  readonly name: string;
  readonly type: Ty;
  readonly optional: boolean;
  readonly rest: boolean;
}

/**
 * Complex shapes, deduplicated structurally inside unions
 */
export interface RecordTy {
  readonly kind: 'record';
  readonly properties: ReadonlyMap<string, PropertyTy>;
}

export interface FunctionTy {
  readonly kind: 'function';
  readonly params: readonly ParamTy[];
  readonly returnType: Ty;
}

export interface ConstructorTy {
  readonly kind: 'constructor';
  readonly name: string;
  readonly params: readonly ParamTy[];
  readonly instanceType: Ty;
}

export interface InterfaceTy {
  readonly kind: 'interface';
  readonly name: string;
  readonly properties: ReadonlyMap<string, PropertyTy>;
}

export interface IntersectionTy {
  readonly kind: 'intersection';
  readonly members: readonly Ty[];
}

/**
 * Kinds a union cannot hold; adding one escalates the union to `error`
 */
export interface NamespaceTy {
  readonly kind: 'namespace';
  readonly name: string;
  readonly exports: ReadonlyMap<string, Ty>;
}

export interface GenericTy {
  readonly kind: 'generic';
  readonly name: string;
  /** Placeholders the body refers to */
  readonly params: readonly UnresolvedTy[];
  readonly body: Ty;
}

export type IntrinsicName = 'Uppercase' | 'Lowercase' | 'Capitalize' | 'Uncapitalize' | 'NoInfer';

export interface IntrinsicTy {
  readonly kind: 'intrinsic';
  readonly name: IntrinsicName;
}

/**
 * A generic applied to arguments. Must be unwrapped before joining a union.
 */
export interface InstanceTy {
  readonly kind: 'instance';
  readonly generic: GenericTy;
  readonly args: readonly Ty[];
}

/**
 * Placeholder pending later resolution. Two placeholders are never merged,
 * even with the same name.
 */
export interface UnresolvedTy {
  readonly kind: 'unresolved';
  readonly id: UnresolvedId;
  readonly name: string;
}

export type LiteralTy =
  | StringLiteralTy
  | NumericLiteralTy
  | BigIntLiteralTy
  | UniqueSymbolTy
  | BooleanLiteralTy;

export type ComplexTy = RecordTy | FunctionTy | ConstructorTy | InterfaceTy | IntersectionTy;

export type Ty =
  | KeywordTy
  | LiteralTy
  | UnionTy
  | ComplexTy
  | NamespaceTy
  | GenericTy
  | IntrinsicTy
  | InstanceTy
  | UnresolvedTy;

export type TyKind = Ty['kind'];

export type TyByKind<K extends TyKind> = Extract<Ty, { kind: K }>;

/**
 * Key used for property lookups
 */
export type PropertyKeyType =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'symbol'; readonly symbol: SymbolId }
  | { readonly kind: 'any' };
