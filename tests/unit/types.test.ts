/**
 * Tests for type factory, structural keys and type utilities
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Analyzer } from '../../src/analysis/analyzer.js';
import {
  Types,
  resetTypeIdCounters,
  typeKey,
  typeEquals,
  isNullable,
  isNumberLike,
  isStringLike,
  removeNullable,
  removeUndefined,
  isPossiblyUndefined,
  InvariantError,
} from '../../src/utils/index.js';
import { formatType } from '../../src/output/formatter.js';
import type { PropertyTy } from '../../src/types/index.js';

describe('Type Factory', () => {
  beforeEach(() => {
    resetTypeIdCounters();
  });

  it('should share keyword and boolean singletons', () => {
    expect(Types.booleanLiteral(true)).toBe(Types.booleanLiteral(true));
    expect(Types.string.kind).toBe('string');
    expect(Types.never.kind).toBe('never');
  });

  it('should give unique symbols fresh ids', () => {
    const a = Types.uniqueSymbol('a');
    const b = Types.uniqueSymbol('a');
    expect(a.symbol).not.toBe(b.symbol);
    expect(Types.symbolById(b.symbol)).toBe(b);
  });

  it('should reject unknown symbol ids', () => {
    expect(() => Types.symbolById(99)).toThrow(InvariantError);
  });

  it('should mark optional record properties', () => {
    const record = Types.record({ a: Types.string, b: Types.number }, ['b']);
    expect(record.properties.get('a')).toEqual({ type: Types.string, optional: false });
    expect(record.properties.get('b')).toEqual({ type: Types.number, optional: true });
  });
});

describe('typeKey', () => {
  beforeEach(() => {
    resetTypeIdCounters();
  });

  it('should key literals by kind and value', () => {
    expect(typeKey(Types.stringLiteral('a'))).toBe('s:"a"');
    expect(typeKey(Types.numberLiteral(-0))).toBe('n:-0');
    expect(typeKey(Types.numberLiteral(0))).toBe('n:0');
    expect(typeKey(Types.bigintLiteral(7n))).toBe('b:7');
  });

  it('should ignore property order', () => {
    const ab = Types.record({ a: Types.string, b: Types.number });
    const ba = Types.record({ b: Types.number, a: Types.string });
    expect(typeKey(ab)).toBe('{"a":string;"b":number}');
    expect(typeEquals(ab, ba)).toBe(true);
  });

  it('should distinguish optional properties', () => {
    const required = Types.record({ a: Types.string });
    const optional = Types.record({ a: Types.string }, ['a']);
    expect(typeEquals(required, optional)).toBe(false);
  });

  it('should back-reference cyclic shapes', () => {
    const properties = new Map<string, PropertyTy>();
    const node = Types.recordOf(properties);
    properties.set('next', Types.property(node));
    expect(typeKey(node)).toBe('{"next":#1}');
  });

  it('should never equate distinct placeholders', () => {
    expect(typeEquals(Types.unresolved('T'), Types.unresolved('T'))).toBe(false);
  });
});

describe('Type Utilities', () => {
  let analyzer: Analyzer;

  beforeEach(() => {
    resetTypeIdCounters();
    analyzer = new Analyzer({ logLevel: 'silent' });
  });

  it('should classify members of unions', () => {
    const maybe = analyzer.intoUnion([Types.string, Types.undefined]);
    expect(isNullable(maybe)).toBe(true);
    expect(isStringLike(maybe)).toBe(false);
    expect(isStringLike(analyzer.intoUnion([Types.stringLiteral('a'), Types.string]))).toBe(true);
    expect(isNumberLike(analyzer.intoUnion([Types.numberLiteral(1), Types.boolean, Types.null]))).toBe(true);
  });

  it('should remove nullish members', () => {
    const maybe = analyzer.intoUnion([Types.string, Types.null, Types.undefined]);
    expect(formatType(removeNullable(maybe, analyzer))).toBe('string');
    expect(removeNullable(Types.null, analyzer)).toBe(Types.never);
    expect(removeNullable(Types.number, analyzer)).toBe(Types.number);
  });

  it('should remove only undefined members', () => {
    const maybe = analyzer.intoUnion([Types.string, Types.null, Types.undefined]);
    expect(isPossiblyUndefined(maybe)).toBe(true);
    expect(formatType(removeUndefined(maybe, analyzer))).toBe('string | null');
    expect(removeUndefined(Types.void, analyzer)).toBe(Types.never);
    expect(removeUndefined(Types.null, analyzer)).toBe(Types.null);
    expect(isPossiblyUndefined(Types.null)).toBe(false);
  });
});
