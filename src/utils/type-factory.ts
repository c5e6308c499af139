/**
 * Type factory functions
 *
 * Provides convenient ways to create type instances. Keyword types and
 * boolean literals are singletons; unique symbols and unresolved
 * placeholders get fresh ids.
 */

import type {
  KeywordTyOf,
  StringLiteralTy,
  NumericLiteralTy,
  BigIntLiteralTy,
  UniqueSymbolTy,
  BooleanLiteralTy,
  SymbolId,
  PropertyTy,
  ParamTy,
  RecordTy,
  FunctionTy,
  ConstructorTy,
  InterfaceTy,
  IntersectionTy,
  NamespaceTy,
  GenericTy,
  IntrinsicName,
  IntrinsicTy,
  InstanceTy,
  UnresolvedTy,
  Ty,
} from '../types/index.js';
import { InvariantError } from './errors.js';

let symbolIdCounter = 0;
let unresolvedIdCounter = 0;

const uniqueSymbols = new Map<SymbolId, UniqueSymbolTy>();

/**
 * Reset id counters and the symbol table (for testing)
 */
export function resetTypeIdCounters(): void {
  symbolIdCounter = 0;
  unresolvedIdCounter = 0;
  uniqueSymbols.clear();
}

// Singleton types (only need one instance)
const neverSingleton: KeywordTyOf<'never'> = { kind: 'never' };
const errorSingleton: KeywordTyOf<'error'> = { kind: 'error' };
const anySingleton: KeywordTyOf<'any'> = { kind: 'any' };
const unknownSingleton: KeywordTyOf<'unknown'> = { kind: 'unknown' };
const objectSingleton: KeywordTyOf<'object'> = { kind: 'object' };
const voidSingleton: KeywordTyOf<'void'> = { kind: 'void' };
const nullSingleton: KeywordTyOf<'null'> = { kind: 'null' };
const undefinedSingleton: KeywordTyOf<'undefined'> = { kind: 'undefined' };
const stringSingleton: KeywordTyOf<'string'> = { kind: 'string' };
const numberSingleton: KeywordTyOf<'number'> = { kind: 'number' };
const bigintSingleton: KeywordTyOf<'bigint'> = { kind: 'bigint' };
const symbolSingleton: KeywordTyOf<'symbol'> = { kind: 'symbol' };
const booleanSingleton: KeywordTyOf<'boolean'> = { kind: 'boolean' };

const trueSingleton: BooleanLiteralTy = { kind: 'boolean-literal', value: true };
const falseSingleton: BooleanLiteralTy = { kind: 'boolean-literal', value: false };

export const Types = {
  never: neverSingleton,
  error: errorSingleton,
  any: anySingleton,
  unknown: unknownSingleton,
  object: objectSingleton,
  void: voidSingleton,
  null: nullSingleton,
  undefined: undefinedSingleton,
  string: stringSingleton,
  number: numberSingleton,
  bigint: bigintSingleton,
  symbol: symbolSingleton,
  boolean: booleanSingleton,

  // Literal types
  stringLiteral(value: string): StringLiteralTy {
    return { kind: 'string-literal', value };
  },

  numberLiteral(value: number): NumericLiteralTy {
    return { kind: 'numeric-literal', value };
  },

  bigintLiteral(value: bigint): BigIntLiteralTy {
    return { kind: 'bigint-literal', value };
  },

  booleanLiteral(value: boolean): BooleanLiteralTy {
    return value ? trueSingleton : falseSingleton;
  },

  /**
   * Declare a new unique symbol
   */
  uniqueSymbol(description: string): UniqueSymbolTy {
    const symbol = ++symbolIdCounter;
    const ty: UniqueSymbolTy = { kind: 'unique-symbol', symbol, description };
    uniqueSymbols.set(symbol, ty);
    return ty;
  },

  symbolById(symbol: SymbolId): UniqueSymbolTy {
    const ty = uniqueSymbols.get(symbol);
    if (!ty) {
      throw new InvariantError(`Unknown unique symbol id ${symbol}`, { symbol });
    }
    return ty;
  },

  unresolved(name: string): UnresolvedTy {
    return { kind: 'unresolved', id: ++unresolvedIdCounter, name };
  },

  // Helpers for members
  property(type: Ty, optional = false): PropertyTy {
    return { type, optional };
  },

  param(name: string, type: Ty, options?: { optional?: boolean; rest?: boolean }): ParamTy {
    return {
      name,
      type,
      optional: options?.optional ?? false,
      rest: options?.rest ?? false,
    };
  },

  // Complex types
  record(properties: Record<string, Ty>, optional: readonly string[] = []): RecordTy {
    const map = new Map<string, PropertyTy>();
    for (const [name, type] of Object.entries(properties)) {
      map.set(name, { type, optional: optional.includes(name) });
    }
    return { kind: 'record', properties: map };
  },

  recordOf(properties: ReadonlyMap<string, PropertyTy>): RecordTy {
    return { kind: 'record', properties };
  },

  func(params: readonly ParamTy[], returnType: Ty): FunctionTy {
    return { kind: 'function', params, returnType };
  },

  ctor(name: string, params: readonly ParamTy[], instanceType: Ty): ConstructorTy {
    return { kind: 'constructor', name, params, instanceType };
  },

  interface(name: string, properties: ReadonlyMap<string, PropertyTy>): InterfaceTy {
    return { kind: 'interface', name, properties };
  },

  intersection(members: readonly Ty[]): IntersectionTy {
    return { kind: 'intersection', members };
  },

  namespace(name: string, exports: ReadonlyMap<string, Ty> = new Map()): NamespaceTy {
    return { kind: 'namespace', name, exports };
  },

  generic(name: string, params: readonly UnresolvedTy[], body: Ty): GenericTy {
    return { kind: 'generic', name, params, body };
  },

  intrinsic(name: IntrinsicName): IntrinsicTy {
    return { kind: 'intrinsic', name };
  },

  instance(generic: GenericTy, args: readonly Ty[]): InstanceTy {
    return { kind: 'instance', generic, args };
  },
} as const;

const INTRINSIC_NAMES: ReadonlySet<string> = new Set<IntrinsicName>([
  'Uppercase',
  'Lowercase',
  'Capitalize',
  'Uncapitalize',
  'NoInfer',
]);

export function isIntrinsicName(name: string): name is IntrinsicName {
  return INTRINSIC_NAMES.has(name);
}
