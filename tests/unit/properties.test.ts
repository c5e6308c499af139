/**
 * Tests for property resolution
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Analyzer } from '../../src/analysis/analyzer.js';
import { Types, resetTypeIdCounters } from '../../src/utils/type-factory.js';
import { formatType } from '../../src/output/formatter.js';
import type { PropertyKeyType } from '../../src/types/index.js';

const key = (value: string): PropertyKeyType => ({ kind: 'string', value });

describe('getProperty', () => {
  let analyzer: Analyzer;

  beforeEach(() => {
    resetTypeIdCounters();
    analyzer = new Analyzer({ logLevel: 'silent' });
  });

  describe('sentinels and nullish values', () => {
    it('should return sentinels unchanged', () => {
      expect(analyzer.getProperty(Types.any, key('a'))).toBe(Types.any);
      expect(analyzer.getProperty(Types.error, key('a'))).toBe(Types.error);
      expect(analyzer.getProperty(Types.unknown, key('a'))).toBe(Types.unknown);
      expect(analyzer.getProperty(Types.never, key('a'))).toBe(Types.never);
    });

    it('should return never for nullish values', () => {
      expect(analyzer.getProperty(Types.null, key('a'))).toBe(Types.never);
      expect(analyzer.getProperty(Types.undefined, key('a'))).toBe(Types.never);
    });
  });

  describe('strings', () => {
    it('should give the literal length of a string literal', () => {
      expect(analyzer.getProperty(Types.stringLiteral('hey'), key('length'))).toEqual(Types.numberLiteral(3));
      expect(analyzer.getProperty(Types.string, key('length'))).toBe(Types.number);
    });

    it('should index string literals', () => {
      expect(analyzer.getProperty(Types.stringLiteral('hey'), key('1'))).toEqual(Types.stringLiteral('e'));
      expect(analyzer.getProperty(Types.stringLiteral('hey'), key('5'))).toBe(Types.undefined);
    });

    it('should index general strings as possibly undefined', () => {
      expect(formatType(analyzer.getProperty(Types.string, key('0')))).toBe('string | undefined');
    });

    it('should not know other string members', () => {
      expect(analyzer.getProperty(Types.string, key('toUpperCase'))).toBe(Types.unknown);
    });
  });

  it('should describe symbols as possibly undefined strings', () => {
    const tag = Types.uniqueSymbol('tag');
    expect(formatType(analyzer.getProperty(tag, key('description')))).toBe('string | undefined');
  });

  describe('records and interfaces', () => {
    const record = Types.record({ a: Types.string, b: Types.numberLiteral(1) }, ['b']);

    it('should read declared properties', () => {
      expect(analyzer.getProperty(record, key('a'))).toBe(Types.string);
      expect(formatType(analyzer.getProperty(record, key('b')))).toBe('1 | undefined');
    });

    it('should read missing properties as undefined', () => {
      expect(analyzer.getProperty(record, key('c'))).toBe(Types.undefined);
      expect(analyzer.getProperty(record, { kind: 'symbol', symbol: 1 })).toBe(Types.undefined);
    });

    it('should join every property for unknown keys', () => {
      expect(formatType(analyzer.getProperty(record, { kind: 'any' }))).toBe('string | 1 | undefined');
    });

    it('should read interface members', () => {
      const point = Types.interface('Point', Types.record({ x: Types.number }).properties);
      expect(analyzer.getProperty(point, key('x'))).toBe(Types.number);
    });
  });

  describe('functions', () => {
    const fn = Types.func(
      [
        Types.param('a', Types.string),
        Types.param('b', Types.number, { optional: true }),
        Types.param('rest', Types.object, { rest: true }),
      ],
      Types.void
    );

    it('should count required parameters', () => {
      expect(analyzer.getProperty(fn, key('length'))).toEqual(Types.numberLiteral(1));
      expect(analyzer.getProperty(fn, key('name'))).toBe(Types.string);
      expect(analyzer.getProperty(fn, key('call'))).toBe(Types.unknown);
    });

    it('should expose the prototype of constructors', () => {
      const instance = Types.record({ id: Types.number });
      const ctor = Types.ctor('Thing', [], instance);
      expect(analyzer.getProperty(ctor, key('prototype'))).toBe(instance);
    });
  });

  it('should join defined answers of intersection members', () => {
    const both = Types.intersection([Types.record({ a: Types.string }), Types.record({ b: Types.number })]);
    expect(analyzer.getProperty(both, key('b'))).toBe(Types.number);
    expect(analyzer.getProperty(both, key('c'))).toBe(Types.undefined);
  });

  it('should read namespace exports', () => {
    const ns = Types.namespace('NS', new Map([['k', Types.numberLiteral(1)]]));
    expect(analyzer.getProperty(ns, key('k'))).toEqual(Types.numberLiteral(1));
    expect(analyzer.getProperty(ns, key('missing'))).toBe(Types.error);
  });

  it('should fail on uninstantiated generics', () => {
    const generic = Types.generic('Box', [Types.unresolved('T')], Types.string);
    expect(analyzer.getProperty(generic, key('a'))).toBe(Types.error);
    expect(analyzer.getProperty(Types.intrinsic('Uppercase'), key('a'))).toBe(Types.error);
  });

  it('should not know properties of unresolved placeholders', () => {
    expect(analyzer.getProperty(Types.unresolved('T'), key('a'))).toBe(Types.unknown);
  });
});
