/**
 * Property resolution per type kind
 */

import type { Ty, PropertyKeyType, PropertyTy, ParamTy } from '../types/index.js';
import { Types } from '../utils/type-factory.js';
import { unreachable } from '../utils/errors.js';
import type { Analyzer } from './analyzer.js';

const INDEX_KEY = /^(0|[1-9]\d*)$/;

export function getProperty(ty: Ty, key: PropertyKeyType, analyzer: Analyzer): Ty {
  switch (ty.kind) {
    case 'never':
    case 'error':
    case 'any':
    case 'unknown':
      return ty;

    // Reading a property of a nullish value throws
    case 'null':
    case 'undefined':
    case 'void':
      return Types.never;

    case 'string':
    case 'string-literal':
      return getStringProperty(ty.kind === 'string-literal' ? ty.value : null, key, analyzer);

    case 'symbol':
    case 'unique-symbol':
      if (isStringKey(key, 'description')) {
        return analyzer.getOptionalType(true, Types.string);
      }
      return Types.unknown;

    case 'number':
    case 'numeric-literal':
    case 'bigint':
    case 'bigint-literal':
    case 'boolean':
    case 'boolean-literal':
    case 'object':
      return Types.unknown;

    case 'record':
    case 'interface':
      return getMemberProperty(ty.properties, key, analyzer);

    case 'function':
      return getFunctionProperty(ty.params, key) ?? Types.unknown;

    case 'constructor':
      if (isStringKey(key, 'prototype')) return ty.instanceType;
      return getFunctionProperty(ty.params, key) ?? Types.unknown;

    case 'intersection': {
      const found = ty.members
        .map((member) => analyzer.getProperty(member, key))
        .filter((prop) => prop.kind !== 'undefined' && prop.kind !== 'unknown');
      return found.length === 0 ? Types.undefined : analyzer.intoUnion(found);
    }

    case 'namespace':
      if (key.kind === 'string') {
        return ty.exports.get(key.value) ?? Types.error;
      }
      return Types.error;

    case 'generic':
    case 'intrinsic':
      return Types.error;

    case 'instance':
      return analyzer.getProperty(analyzer.unwrapGenericInstance(ty), key);

    case 'unresolved':
      return Types.unknown;

    case 'union':
      return analyzer.getUnionProperty(ty.union, key);

    default:
      return unreachable(ty, 'Unhandled type kind in getProperty');
  }
}

function isStringKey(key: PropertyKeyType, name: string): boolean {
  return key.kind === 'string' && key.value === name;
}

function getStringProperty(value: string | null, key: PropertyKeyType, analyzer: Analyzer): Ty {
  if (key.kind !== 'string') return Types.unknown;

  if (key.value === 'length') {
    return value === null ? Types.number : Types.numberLiteral(value.length);
  }
  if (INDEX_KEY.test(key.value)) {
    if (value === null) {
      return analyzer.getOptionalType(true, Types.string);
    }
    const char = value[Number(key.value)];
    return char === undefined ? Types.undefined : Types.stringLiteral(char);
  }
  return Types.unknown;
}

function getMemberProperty(
  properties: ReadonlyMap<string, PropertyTy>,
  key: PropertyKeyType,
  analyzer: Analyzer
): Ty {
  switch (key.kind) {
    case 'string': {
      const prop = properties.get(key.value);
      if (!prop) return Types.undefined;
      return analyzer.getOptionalType(prop.optional, prop.type);
    }
    case 'symbol':
      return Types.undefined;
    case 'any': {
      const all = [...properties.values()].map((prop) => prop.type);
      return analyzer.intoUnion([...all, Types.undefined]);
    }
  }
}

function getFunctionProperty(params: readonly ParamTy[], key: PropertyKeyType): Ty | null {
  if (isStringKey(key, 'length')) {
    return Types.numberLiteral(params.filter((p) => !p.optional && !p.rest).length);
  }
  if (isStringKey(key, 'name')) {
    return Types.string;
  }
  return null;
}
