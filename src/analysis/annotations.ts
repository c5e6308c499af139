/**
 * Type Annotations - read TypeScript annotations into types
 *
 * Annotations give declared types for parameters, declared bindings and
 * interface/alias declarations. Flow-sensitive code prefers the type of
 * the value actually assigned over the declared one.
 */

import * as t from '@babel/types';
import type { Ty, ParamTy, PropertyTy, UnresolvedTy } from '../types/index.js';
import { Types, isIntrinsicName } from '../utils/type-factory.js';
import type { Analyzer } from './analyzer.js';

export type TypeParams = ReadonlyMap<string, UnresolvedTy>;

const NO_TYPE_PARAMS: TypeParams = new Map();

type Annotated = {
  typeAnnotation?: t.TypeAnnotation | t.TSTypeAnnotation | t.Noop | null;
};

/**
 * Resolve a TypeScript type node
 *
 * @param name - binding the annotation belongs to, used to describe `unique symbol`
 */
export function resolveTypeAnnotation(
  node: t.TSType,
  analyzer: Analyzer,
  typeParams: TypeParams = NO_TYPE_PARAMS,
  name?: string
): Ty {
  const resolve = (inner: t.TSType): Ty => resolveTypeAnnotation(inner, analyzer, typeParams);

  switch (node.type) {
    case 'TSAnyKeyword':
      return Types.any;
    case 'TSUnknownKeyword':
      return Types.unknown;
    case 'TSNeverKeyword':
      return Types.never;
    case 'TSVoidKeyword':
      return Types.void;
    case 'TSNullKeyword':
      return Types.null;
    case 'TSUndefinedKeyword':
      return Types.undefined;
    case 'TSObjectKeyword':
      return Types.object;
    case 'TSStringKeyword':
      return Types.string;
    case 'TSNumberKeyword':
      return Types.number;
    case 'TSBigIntKeyword':
      return Types.bigint;
    case 'TSSymbolKeyword':
      return Types.symbol;
    case 'TSBooleanKeyword':
      return Types.boolean;

    case 'TSLiteralType':
      return resolveLiteralType(node.literal);

    case 'TSUnionType':
      return analyzer.intoUnion(node.types.map(resolve));

    case 'TSIntersectionType':
      return Types.intersection(node.types.map(resolve));

    case 'TSParenthesizedType':
      return resolve(node.typeAnnotation);

    case 'TSTypeLiteral':
      return Types.recordOf(resolveMembers(node.members, analyzer, typeParams));

    case 'TSFunctionType':
      return Types.func(
        resolveParams(node.parameters, analyzer, typeParams),
        resolveReturnType(node.typeAnnotation, analyzer, typeParams)
      );

    case 'TSConstructorType':
      return Types.ctor(
        name ?? '',
        resolveParams(node.parameters, analyzer, typeParams),
        resolveReturnType(node.typeAnnotation, analyzer, typeParams)
      );

    case 'TSTypeReference':
      return resolveTypeReference(node, analyzer, typeParams);

    case 'TSTypeQuery':
      if (t.isIdentifier(node.exprName)) {
        return analyzer.lookup(node.exprName.name) ?? Types.unknown;
      }
      return Types.unknown;

    case 'TSTypeOperator':
      if (node.operator === 'unique' && node.typeAnnotation.type === 'TSSymbolKeyword') {
        return Types.uniqueSymbol(name ?? 'symbol');
      }
      if (node.operator === 'readonly') {
        return resolve(node.typeAnnotation);
      }
      return Types.unknown;

    case 'TSArrayType':
    case 'TSTupleType':
      return Types.object;

    default:
      return Types.unknown;
  }
}

function resolveLiteralType(literal: t.TSLiteralType['literal']): Ty {
  switch (literal.type) {
    case 'StringLiteral':
      return Types.stringLiteral(literal.value);
    case 'NumericLiteral':
      return Types.numberLiteral(literal.value);
    case 'BooleanLiteral':
      return Types.booleanLiteral(literal.value);
    case 'BigIntLiteral':
      return Types.bigintLiteral(parseBigInt(literal.value));
    case 'TemplateLiteral': {
      const [quasi] = literal.quasis;
      if (literal.expressions.length === 0 && quasi) {
        return Types.stringLiteral(quasi.value.cooked ?? quasi.value.raw);
      }
      return Types.string;
    }
    case 'UnaryExpression':
      if (literal.operator === '-' && t.isNumericLiteral(literal.argument)) {
        return Types.numberLiteral(-literal.argument.value);
      }
      if (literal.operator === '-' && t.isBigIntLiteral(literal.argument)) {
        return Types.bigintLiteral(-parseBigInt(literal.argument.value));
      }
      return Types.number;
    default:
      return Types.unknown;
  }
}

export function parseBigInt(value: string): bigint {
  return BigInt(value.replace(/_/g, ''));
}

function resolveTypeReference(node: t.TSTypeReference, analyzer: Analyzer, typeParams: TypeParams): Ty {
  if (!t.isIdentifier(node.typeName)) {
    return Types.unknown;
  }
  const name = node.typeName.name;

  const param = typeParams.get(name);
  if (param) return param;

  if (isIntrinsicName(name)) {
    return Types.intrinsic(name);
  }

  const declared = analyzer.typeDeclarations.get(name);
  if (!declared) {
    // Not declared yet: keep a placeholder for later resolution
    return Types.unresolved(name);
  }

  const args = node.typeParameters?.params ?? [];
  if (declared.kind === 'generic' && args.length > 0) {
    return Types.instance(
      declared,
      args.map((arg) => resolveTypeAnnotation(arg, analyzer, typeParams))
    );
  }
  return declared;
}

export function propertyName(key: t.Node, computed: boolean): string | null {
  if (t.isIdentifier(key) && !computed) return key.name;
  if (t.isStringLiteral(key)) return key.value;
  if (t.isNumericLiteral(key)) return String(key.value);
  return null;
}

function resolveMembers(
  members: readonly t.TSTypeElement[],
  analyzer: Analyzer,
  typeParams: TypeParams
): Map<string, PropertyTy> {
  const properties = new Map<string, PropertyTy>();
  for (const member of members) {
    if (t.isTSPropertySignature(member)) {
      const name = propertyName(member.key, member.computed ?? false);
      if (name === null) continue;
      properties.set(
        name,
        Types.property(
          resolveAnnotation(member, analyzer, typeParams) ?? Types.unknown,
          member.optional ?? false
        )
      );
    } else if (t.isTSMethodSignature(member)) {
      const name = propertyName(member.key, member.computed ?? false);
      if (name === null) continue;
      const method = Types.func(
        resolveParams(member.parameters, analyzer, typeParams),
        resolveReturnType(member.typeAnnotation, analyzer, typeParams)
      );
      properties.set(name, Types.property(method, member.optional ?? false));
    }
  }
  return properties;
}

/**
 * Declared type of an annotated node, if any
 */
export function resolveAnnotation(
  node: Annotated,
  analyzer: Analyzer,
  typeParams: TypeParams = NO_TYPE_PARAMS,
  name?: string
): Ty | null {
  const annotation = node.typeAnnotation;
  if (!annotation || !t.isTSTypeAnnotation(annotation)) return null;
  return resolveTypeAnnotation(annotation.typeAnnotation, analyzer, typeParams, name);
}

function resolveReturnType(
  annotation: t.TSTypeAnnotation | null | undefined,
  analyzer: Analyzer,
  typeParams: TypeParams
): Ty {
  if (!annotation) return Types.unknown;
  return resolveTypeAnnotation(annotation.typeAnnotation, analyzer, typeParams);
}

/**
 * Parameters of a function node or function type
 */
export function resolveParams(
  params: readonly t.Node[],
  analyzer: Analyzer,
  typeParams: TypeParams = NO_TYPE_PARAMS
): ParamTy[] {
  return params.map((param, index) => resolveParam(param, index, analyzer, typeParams));
}

function resolveParam(node: t.Node, index: number, analyzer: Analyzer, typeParams: TypeParams): ParamTy {
  if (t.isIdentifier(node)) {
    const optional = node.optional ?? false;
    const declared = resolveAnnotation(node, analyzer, typeParams) ?? Types.unknown;
    return Types.param(node.name, analyzer.getOptionalType(optional, declared), { optional });
  }
  if (t.isAssignmentPattern(node)) {
    if (!t.isIdentifier(node.left)) {
      return Types.param(`arg${index}`, Types.unknown, { optional: true });
    }
    const declared = resolveAnnotation(node.left, analyzer, typeParams) ?? Types.unknown;
    return Types.param(node.left.name, declared, { optional: true });
  }
  if (t.isRestElement(node)) {
    const name = t.isIdentifier(node.argument) ? node.argument.name : `arg${index}`;
    const declared = resolveAnnotation(node, analyzer, typeParams) ?? Types.object;
    return Types.param(name, declared, { rest: true });
  }
  if (t.isObjectPattern(node) || t.isArrayPattern(node)) {
    const declared = resolveAnnotation(node, analyzer, typeParams) ?? Types.unknown;
    return Types.param(`arg${index}`, declared);
  }
  return Types.param(`arg${index}`, Types.unknown);
}

/**
 * Function type of a function declaration or expression
 */
export function resolveFunctionType(node: t.Function | t.TSDeclareFunction, analyzer: Analyzer): Ty {
  const params = resolveParams(node.params, analyzer);
  const returnType =
    node.returnType && t.isTSTypeAnnotation(node.returnType)
      ? resolveTypeAnnotation(node.returnType.typeAnnotation, analyzer)
      : Types.unknown;
  return Types.func(params, returnType);
}

function typeParamsOf(declaration: t.TSTypeParameterDeclaration | null | undefined): Map<string, UnresolvedTy> {
  const params = new Map<string, UnresolvedTy>();
  for (const param of declaration?.params ?? []) {
    params.set(param.name, Types.unresolved(param.name));
  }
  return params;
}

/**
 * Register `interface Name<T> { ... }`
 */
export function declareInterface(node: t.TSInterfaceDeclaration, analyzer: Analyzer): Ty {
  const name = node.id.name;
  const typeParams = typeParamsOf(node.typeParameters);
  const properties = new Map<string, PropertyTy>();

  for (const heritage of node.extends ?? []) {
    if (!t.isIdentifier(heritage.expression)) continue;
    const base = analyzer.typeDeclarations.get(heritage.expression.name);
    if (base?.kind === 'interface') {
      for (const [key, prop] of base.properties) properties.set(key, prop);
    }
  }
  for (const [key, prop] of resolveMembers(node.body.body, analyzer, typeParams)) {
    properties.set(key, prop);
  }

  const iface = Types.interface(name, properties);
  const declared = typeParams.size > 0 ? Types.generic(name, [...typeParams.values()], iface) : iface;
  analyzer.typeDeclarations.set(name, declared);
  return declared;
}

/**
 * Register `type Name<T> = ...`
 */
export function declareTypeAlias(node: t.TSTypeAliasDeclaration, analyzer: Analyzer): Ty {
  const name = node.id.name;
  const typeParams = typeParamsOf(node.typeParameters);
  const body = resolveTypeAnnotation(node.typeAnnotation, analyzer, typeParams);
  const declared = typeParams.size > 0 ? Types.generic(name, [...typeParams.values()], body) : body;
  analyzer.typeDeclarations.set(name, declared);
  return declared;
}
