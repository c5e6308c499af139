/**
 * Generic instantiation
 *
 * A generic's body refers to its parameters through unresolved
 * placeholders; instantiating it replaces each placeholder by the matching
 * argument.
 */

import type { Ty, InstanceTy, UnresolvedId, PropertyTy, ParamTy } from '../types/index.js';
import { Types } from '../utils/type-factory.js';
import { unreachable } from '../utils/errors.js';
import type { Analyzer } from './analyzer.js';

type Substitution = ReadonlyMap<UnresolvedId, Ty>;

export function unwrapGenericInstance(instance: InstanceTy, analyzer: Analyzer): Ty {
  const { generic, args } = instance;
  const mapping = new Map<UnresolvedId, Ty>();
  generic.params.forEach((param, i) => {
    mapping.set(param.id, args[i] ?? Types.unknown);
  });
  return substitute(generic.body, mapping, analyzer, new Map());
}

function substitute(ty: Ty, mapping: Substitution, analyzer: Analyzer, memo: Map<Ty, Ty>): Ty {
  const cached = memo.get(ty);
  if (cached) return cached;
  const result = substituteUncached(ty, mapping, analyzer, memo);
  memo.set(ty, result);
  return result;
}

function substituteUncached(ty: Ty, mapping: Substitution, analyzer: Analyzer, memo: Map<Ty, Ty>): Ty {
  const sub = (inner: Ty): Ty => substitute(inner, mapping, analyzer, memo);

  switch (ty.kind) {
    case 'unresolved':
      return mapping.get(ty.id) ?? ty;

    case 'union': {
      const members = [...ty.union.members()];
      const replaced = members.map(sub);
      if (replaced.every((m, i) => m === members[i])) return ty;
      return analyzer.intoUnion(replaced);
    }

    case 'record': {
      const properties = substituteProperties(ty.properties, sub);
      return properties === ty.properties ? ty : Types.recordOf(properties);
    }

    case 'interface': {
      const properties = substituteProperties(ty.properties, sub);
      return properties === ty.properties ? ty : Types.interface(ty.name, properties);
    }

    case 'function':
      return Types.func(substituteParams(ty.params, sub), sub(ty.returnType));

    case 'constructor':
      return Types.ctor(ty.name, substituteParams(ty.params, sub), sub(ty.instanceType));

    case 'intersection':
      return Types.intersection(ty.members.map(sub));

    case 'namespace': {
      const exports = new Map<string, Ty>();
      for (const [name, exported] of ty.exports) {
        exports.set(name, sub(exported));
      }
      return Types.namespace(ty.name, exports);
    }

    case 'generic': {
      // Inner parameters shadow outer ones
      const inner = new Map(mapping);
      for (const param of ty.params) inner.delete(param.id);
      return Types.generic(ty.name, ty.params, substitute(ty.body, inner, analyzer, new Map()));
    }

    case 'instance':
      return Types.instance(ty.generic, ty.args.map(sub));

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
    case 'string-literal':
    case 'numeric-literal':
    case 'bigint-literal':
    case 'unique-symbol':
    case 'boolean-literal':
    case 'intrinsic':
      return ty;

    default:
      return unreachable(ty, 'Unhandled type kind in substitute');
  }
}

function substituteProperties(
  properties: ReadonlyMap<string, PropertyTy>,
  sub: (ty: Ty) => Ty
): ReadonlyMap<string, PropertyTy> {
  let changed = false;
  const result = new Map<string, PropertyTy>();
  for (const [name, prop] of properties) {
    const type = sub(prop.type);
    if (type !== prop.type) changed = true;
    result.set(name, { type, optional: prop.optional });
  }
  return changed ? result : properties;
}

function substituteParams(params: readonly ParamTy[], sub: (ty: Ty) => Ty): ParamTy[] {
  return params.map((p) => ({ ...p, type: sub(p.type) }));
}
