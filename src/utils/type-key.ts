/**
 * Structural keys for types
 *
 * Two types with the same key are structurally identical. Keys are used to
 * deduplicate complex members of a union and to compare types in tests and
 * diagnostics. Shapes that refer back to an enclosing shape produce a
 * back-reference (`#n`) instead of recursing.
 */

import type { Ty, PropertyTy, ParamTy } from '../types/index.js';
import { unreachable } from './errors.js';

const keyCache = new WeakMap<Ty, string>();

export function typeKey(ty: Ty): string {
  const cached = keyCache.get(ty);
  if (cached !== undefined) return cached;
  const active: Ty[] = [];
  return keyOf(ty, active);
}

/**
 * Structural equality; identity short-circuits first
 */
export function typeEquals(t1: Ty, t2: Ty): boolean {
  if (t1 === t2) return true;
  if (t1.kind !== t2.kind) return false;
  return typeKey(t1) === typeKey(t2);
}

function keyOf(ty: Ty, active: Ty[]): string {
  const cached = keyCache.get(ty);
  if (cached !== undefined) return cached;

  const depth = active.indexOf(ty);
  if (depth >= 0) {
    return `#${active.length - depth}`;
  }

  active.push(ty);
  const key = computeKey(ty, active);
  active.pop();

  // Keys with back-references depend on the path that reached them.
  if (active.length === 0 || !key.includes('#')) {
    keyCache.set(ty, key);
  }
  return key;
}

function computeKey(ty: Ty, active: Ty[]): string {
  switch (ty.kind) {
    case 'never':
    case 'error':
    case 'any':
    case 'unknown':
    case 'object':
    case 'void':
    case 'null':
    case 'undefined':
    case 'string':
    case 'number':
    case 'bigint':
    case 'symbol':
    case 'boolean':
      return ty.kind;
    case 'string-literal':
      return `s:${JSON.stringify(ty.value)}`;
    case 'numeric-literal':
      return `n:${Object.is(ty.value, -0) ? '-0' : String(ty.value)}`;
    case 'bigint-literal':
      return `b:${ty.value}`;
    case 'unique-symbol':
      return `y:${ty.symbol}`;
    case 'boolean-literal':
      return ty.value ? 'true' : 'false';
    case 'union': {
      const members: string[] = [];
      for (const member of ty.union.members()) {
        members.push(keyOf(member, active));
      }
      return `(${members.sort().join('|')})`;
    }
    case 'record':
      return `{${propertiesKey(ty.properties, active)}}`;
    case 'interface':
      return `interface ${ty.name}{${propertiesKey(ty.properties, active)}}`;
    case 'function':
      return `fn(${paramsKey(ty.params, active)})=>${keyOf(ty.returnType, active)}`;
    case 'constructor':
      return `new ${ty.name}(${paramsKey(ty.params, active)})=>${keyOf(ty.instanceType, active)}`;
    case 'intersection':
      return `(${ty.members.map((m) => keyOf(m, active)).sort().join('&')})`;
    case 'namespace':
      return `namespace ${ty.name}`;
    case 'generic':
      return `generic ${ty.name}<${ty.params.map((p) => keyOf(p, active)).join(',')}>${keyOf(ty.body, active)}`;
    case 'intrinsic':
      return `intrinsic ${ty.name}`;
    case 'instance':
      return `${keyOf(ty.generic, active)}<${ty.args.map((a) => keyOf(a, active)).join(',')}>`;
    case 'unresolved':
      return `?${ty.id}`;
    default:
      return unreachable(ty, 'Unhandled type kind in typeKey');
  }
}

function propertiesKey(properties: ReadonlyMap<string, PropertyTy>, active: Ty[]): string {
  const names = [...properties.keys()].sort();
  return names
    .map((name) => {
      const prop = properties.get(name);
      if (!prop) return '';
      return `${JSON.stringify(name)}${prop.optional ? '?' : ''}:${keyOf(prop.type, active)}`;
    })
    .join(';');
}

function paramsKey(params: readonly ParamTy[], active: Ty[]): string {
  return params
    .map((p) => `${p.rest ? '...' : ''}${p.optional ? '?' : ''}${keyOf(p.type, active)}`)
    .join(',');
}
