/**
 * Tests for the union-consuming façade of the analyzer
 */

import { describe, it, expect, beforeEach } from 'vitest';
import * as t from '@babel/types';
import { Analyzer } from '../../src/analysis/analyzer.js';
import { Types, resetTypeIdCounters } from '../../src/utils/type-factory.js';
import { InvariantError } from '../../src/utils/errors.js';
import { formatType } from '../../src/output/formatter.js';

describe('Analyzer', () => {
  let analyzer: Analyzer;

  beforeEach(() => {
    resetTypeIdCounters();
    analyzer = new Analyzer({ logLevel: 'silent' });
  });

  describe('intoUnion', () => {
    it('should return undefined for an empty list', () => {
      expect(analyzer.intoUnion([])).toBe(Types.undefined);
    });

    it('should return a single member unchanged', () => {
      const record = Types.record({ a: Types.string });
      expect(analyzer.intoUnion([record])).toBe(record);
      expect(analyzer.arena.size).toBe(0);
    });

    it('should widen regardless of order', () => {
      const literalFirst = analyzer.intoUnion([Types.stringLiteral('x'), Types.string]);
      const widenedFirst = analyzer.intoUnion([Types.string, Types.stringLiteral('x')]);
      expect(formatType(literalFirst)).toBe('string');
      expect(formatType(widenedFirst)).toBe('string');
    });

    it('should round-trip members', () => {
      const members = [Types.stringLiteral('a'), Types.numberLiteral(1), Types.null, Types.booleanLiteral(true)];
      const result = analyzer.intoUnion(members);
      if (result.kind !== 'union') throw new Error(`expected a union, got ${result.kind}`);
      expect([...result.union.members()]).toEqual(members);
    });

    it('should reconstruct boolean', () => {
      const result = analyzer.intoUnion([Types.booleanLiteral(true), Types.booleanLiteral(false)]);
      expect(formatType(result)).toBe('boolean');
    });

    it('should escalate to error', () => {
      expect(analyzer.intoUnion([Types.string, Types.error])).toBe(Types.error);
    });
  });

  describe('getOptionalType', () => {
    it('should add undefined for optional bindings', () => {
      expect(formatType(analyzer.getOptionalType(true, Types.string))).toBe('string | undefined');
    });

    it('should leave required bindings alone', () => {
      expect(analyzer.getOptionalType(false, Types.string)).toBe(Types.string);
    });
  });

  describe('getUnionProperty', () => {
    it('should distribute over members', () => {
      const union = analyzer.intoUnion([Types.record({ a: Types.string }), Types.record({ a: Types.number })]);
      if (union.kind !== 'union') throw new Error(`expected a union, got ${union.kind}`);

      const prop = analyzer.getUnionProperty(union.union, { kind: 'string', value: 'a' });
      expect(formatType(prop)).toBe('string | number');
    });

    it('should include undefined for members lacking the property', () => {
      const union = analyzer.intoUnion([Types.record({ a: Types.string }), Types.record({ b: Types.number })]);
      if (union.kind !== 'union') throw new Error(`expected a union, got ${union.kind}`);

      const prop = analyzer.getUnionProperty(union.union, { kind: 'string', value: 'a' });
      expect(formatType(prop)).toBe('string | undefined');
    });
  });

  it('should print a union as a TSUnionType', () => {
    const union = analyzer.intoUnion([Types.undefined, Types.string]);
    if (union.kind !== 'union') throw new Error(`expected a union, got ${union.kind}`);

    const printed = analyzer.printUnionType(union.union);
    expect(t.isTSUnionType(printed)).toBe(true);
    expect(printed.types.map((node) => node.type)).toEqual(['TSStringKeyword', 'TSUndefinedKeyword']);
  });

  describe('scopes', () => {
    it('should pop the frame when the body throws', () => {
      expect(() =>
        analyzer.inScope('loop', () => {
          throw new Error('boom');
        })
      ).toThrow('boom');
      expect(analyzer.scopes.depth).toBe(0);
    });

    it('should hoist var to the root as undefined', () => {
      analyzer.pushScope();
      analyzer.declareVar('v');
      analyzer.assign('v', Types.numberLiteral(1));
      analyzer.popScope();

      expect(analyzer.scopes.root.declarations.has('v')).toBe(true);
      expect(analyzer.lookup('v')).toEqual(Types.numberLiteral(1));
    });
  });

  it('should refuse to build unions after dispose', () => {
    analyzer.dispose();
    expect(() => analyzer.intoUnion([Types.string, Types.number])).toThrow(InvariantError);
  });
});
