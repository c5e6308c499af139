/**
 * Type printer - converts types to Babel TSType nodes
 */

import * as t from '@babel/types';
import type { Ty, ParamTy, PropertyTy } from '../types/index.js';
import type { UnionType } from '../union/union-type.js';
import { unreachable } from '../utils/errors.js';

export function printType(ty: Ty): t.TSType {
  switch (ty.kind) {
    case 'never':
      return t.tsNeverKeyword();
    // An error is printed as the type a checker falls back to
    case 'error':
    case 'any':
      return t.tsAnyKeyword();
    case 'unknown':
      return t.tsUnknownKeyword();
    case 'object':
      return t.tsObjectKeyword();
    case 'void':
      return t.tsVoidKeyword();
    case 'null':
      return t.tsNullKeyword();
    case 'undefined':
      return t.tsUndefinedKeyword();
    case 'string':
      return t.tsStringKeyword();
    case 'number':
      return t.tsNumberKeyword();
    case 'bigint':
      return t.tsBigIntKeyword();
    case 'symbol':
      return t.tsSymbolKeyword();
    case 'boolean':
      return t.tsBooleanKeyword();

    case 'string-literal':
      return t.tsLiteralType(t.stringLiteral(ty.value));
    case 'numeric-literal':
      return printNumber(ty.value);
    case 'bigint-literal':
      return ty.value < 0n
        ? t.tsLiteralType(t.unaryExpression('-', t.bigIntLiteral((-ty.value).toString())))
        : t.tsLiteralType(t.bigIntLiteral(ty.value.toString()));
    case 'unique-symbol':
      return t.tsTypeQuery(t.identifier(ty.description));
    case 'boolean-literal':
      return t.tsLiteralType(t.booleanLiteral(ty.value));

    case 'union':
      return printUnionType(ty.union);

    case 'record':
      return t.tsTypeLiteral(printProperties(ty.properties));

    case 'function':
      return t.tsFunctionType(null, printParams(ty.params), t.tsTypeAnnotation(printType(ty.returnType)));

    case 'constructor':
      return t.tsConstructorType(null, printParams(ty.params), t.tsTypeAnnotation(printType(ty.instanceType)));

    case 'interface':
    case 'generic':
    case 'intrinsic':
    case 'unresolved':
      return t.tsTypeReference(t.identifier(ty.name));

    case 'intersection':
      return t.tsIntersectionType(ty.members.map(printType));

    case 'namespace':
      return t.tsTypeQuery(t.identifier(ty.name));

    case 'instance':
      return t.tsTypeReference(
        t.identifier(ty.generic.name),
        t.tsTypeParameterInstantiation(ty.args.map(printType))
      );

    default:
      return unreachable(ty, 'Unhandled type kind in printType');
  }
}

export function printUnionType(union: UnionType): t.TSUnionType {
  return t.tsUnionType([...union.members()].map(printType));
}

function printNumber(value: number): t.TSType {
  if (!Number.isFinite(value)) {
    return t.tsNumberKeyword();
  }
  if (value < 0 || Object.is(value, -0)) {
    return t.tsLiteralType(t.unaryExpression('-', t.numericLiteral(-value)));
  }
  return t.tsLiteralType(t.numericLiteral(value));
}

function printKey(name: string): t.Identifier | t.StringLiteral {
  return t.isValidIdentifier(name, false) ? t.identifier(name) : t.stringLiteral(name);
}

function printProperties(properties: ReadonlyMap<string, PropertyTy>): t.TSPropertySignature[] {
  return [...properties].map(([name, prop]) => {
    const signature = t.tsPropertySignature(printKey(name), t.tsTypeAnnotation(printType(prop.type)));
    if (prop.optional) signature.optional = true;
    return signature;
  });
}

function printParams(params: readonly ParamTy[]): Array<t.Identifier | t.RestElement> {
  return params.map((param) => {
    const id = t.identifier(param.name);
    const annotation = t.tsTypeAnnotation(printType(param.type));
    if (param.rest) {
      const rest = t.restElement(id);
      rest.typeAnnotation = annotation;
      return rest;
    }
    id.typeAnnotation = annotation;
    if (param.optional) id.optional = true;
    return id;
  });
}
