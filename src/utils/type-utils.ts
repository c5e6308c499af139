/**
 * Type utilities for type checking and manipulation
 */

import type { Ty, TyKind, TyByKind } from '../types/index.js';
import { UnionTypeBuilder, type UnionHost } from '../union/builder.js';
import { Types } from './type-factory.js';

/**
 * Check if a type is of a specific kind
 */
export function isTypeKind<K extends TyKind>(ty: Ty, kind: K): ty is TyByKind<K> {
  return ty.kind === kind;
}

/**
 * Members of a union, or the type itself
 */
export function getUnionMembers(ty: Ty): readonly Ty[] {
  if (ty.kind === 'union') {
    return [...ty.union.members()];
  }
  return [ty];
}

export function everyMember(ty: Ty, predicate: (member: Ty) => boolean): boolean {
  return getUnionMembers(ty).every(predicate);
}

export function someMember(ty: Ty, predicate: (member: Ty) => boolean): boolean {
  return getUnionMembers(ty).some(predicate);
}

function isNullish(ty: Ty): boolean {
  return ty.kind === 'undefined' || ty.kind === 'null' || ty.kind === 'void';
}

/**
 * Check if a type may be null or undefined
 */
export function isNullable(ty: Ty): boolean {
  return someMember(ty, isNullish);
}

export function isStringLike(ty: Ty): boolean {
  return everyMember(ty, (m) => m.kind === 'string' || m.kind === 'string-literal');
}

export function isNumberLike(ty: Ty): boolean {
  return everyMember(
    ty,
    (m) =>
      m.kind === 'number' ||
      m.kind === 'numeric-literal' ||
      m.kind === 'boolean' ||
      m.kind === 'boolean-literal' ||
      m.kind === 'null' ||
      m.kind === 'undefined'
  );
}

export function isBigIntLike(ty: Ty): boolean {
  return everyMember(ty, (m) => m.kind === 'bigint' || m.kind === 'bigint-literal');
}

function isUndefinedLike(ty: Ty): boolean {
  return ty.kind === 'undefined' || ty.kind === 'void';
}

/**
 * Check if a type may be undefined (a destructuring default applies)
 */
export function isPossiblyUndefined(ty: Ty): boolean {
  return someMember(ty, isUndefinedLike);
}

function removeMembers(ty: Ty, host: UnionHost, drop: (member: Ty) => boolean): Ty {
  if (ty.kind !== 'union') {
    return drop(ty) ? Types.never : ty;
  }
  if (!someMember(ty, drop)) return ty;

  const builder = new UnionTypeBuilder();
  for (const member of ty.union.members()) {
    if (!drop(member)) {
      builder.add(host, member);
    }
  }
  return builder.build(host);
}

/**
 * Remove null, undefined and void (for `x!`)
 */
export function removeNullable(ty: Ty, host: UnionHost): Ty {
  return removeMembers(ty, host, isNullish);
}

/**
 * Remove undefined and void; null is kept
 */
export function removeUndefined(ty: Ty, host: UnionHost): Ty {
  return removeMembers(ty, host, isUndefinedLike);
}
