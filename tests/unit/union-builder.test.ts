/**
 * Tests for UnionTypeBuilder and the type arena
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { UnionTypeBuilder } from '../../src/union/builder.js';
import { TypeArena } from '../../src/union/arena.js';
import { UnionType } from '../../src/union/union-type.js';
import { Analyzer } from '../../src/analysis/analyzer.js';
import { Types, resetTypeIdCounters } from '../../src/utils/type-factory.js';
import { InvariantError } from '../../src/utils/errors.js';
import { formatType } from '../../src/output/formatter.js';

describe('UnionTypeBuilder', () => {
  let analyzer: Analyzer;

  beforeEach(() => {
    resetTypeIdCounters();
    analyzer = new Analyzer({ logLevel: 'silent' });
  });

  it('should build never when nothing was added', () => {
    const builder = new UnionTypeBuilder();
    expect(builder.kind).toBe('never');
    expect(builder.build(analyzer)).toBe(Types.never);
  });

  it('should treat never as the identity', () => {
    const builder = new UnionTypeBuilder();
    builder.add(analyzer, Types.never);
    builder.add(analyzer, Types.string);
    builder.add(analyzer, Types.never);

    const result = builder.build(analyzer);
    expect(result.kind).toBe('union');
    expect(formatType(result)).toBe('string');
  });

  describe('escalation', () => {
    it('should let error dominate later additions', () => {
      const builder = new UnionTypeBuilder();
      builder.addAll(analyzer, [Types.string, Types.error, Types.any, Types.number]);
      expect(builder.build(analyzer)).toBe(Types.error);
    });

    it('should keep the first of any and unknown', () => {
      const anyFirst = new UnionTypeBuilder();
      anyFirst.addAll(analyzer, [Types.any, Types.unknown]);
      expect(anyFirst.build(analyzer)).toBe(Types.any);

      const unknownFirst = new UnionTypeBuilder();
      unknownFirst.addAll(analyzer, [Types.unknown, Types.any]);
      expect(unknownFirst.build(analyzer)).toBe(Types.unknown);
    });

    it('should escalate non-union-representable kinds to error', () => {
      const generic = Types.generic('Box', [Types.unresolved('T')], Types.string);
      for (const ty of [generic, Types.intrinsic('Uppercase'), Types.namespace('NS')]) {
        const builder = new UnionTypeBuilder();
        builder.add(analyzer, Types.string);
        builder.add(analyzer, ty);
        expect(builder.kind).toBe('error');
      }
    });
  });

  it('should flatten nested unions', () => {
    const inner = analyzer.intoUnion([Types.stringLiteral('a'), Types.numberLiteral(1)]);
    const builder = new UnionTypeBuilder();
    builder.add(analyzer, inner);
    builder.add(analyzer, Types.null);

    const result = builder.build(analyzer);
    if (result.kind !== 'union') throw new Error(`expected a union, got ${result.kind}`);
    expect([...result.union.members()]).toEqual([Types.stringLiteral('a'), Types.numberLiteral(1), Types.null]);
  });

  it('should unwrap generic instances before adding', () => {
    const T = Types.unresolved('T');
    const box = Types.generic('Box', [T], Types.record({ value: T }));
    const builder = new UnionTypeBuilder();
    builder.add(analyzer, Types.instance(box, [Types.string]));

    expect(formatType(builder.build(analyzer))).toBe('{ value: string }');
  });

  it('should seal and register the built union', () => {
    const builder = new UnionTypeBuilder();
    builder.addAll(analyzer, [Types.string, Types.number]);
    const result = builder.build(analyzer);

    if (result.kind !== 'union') throw new Error(`expected a union, got ${result.kind}`);
    expect(result.union.sealed).toBe(true);
    expect(analyzer.arena.get(result.id)).toBe(result.union);
    expect(analyzer.arena.size).toBe(1);
  });
});

describe('TypeArena', () => {
  it('should hand out sequential handles', () => {
    const arena = new TypeArena();
    const first = arena.alloc(new UnionType());
    const second = arena.alloc(new UnionType());
    expect(first.id).toBe(0);
    expect(second.id).toBe(1);
  });

  it('should reject unknown handles', () => {
    const arena = new TypeArena();
    expect(() => arena.get(3)).toThrow(InvariantError);
  });

  it('should refuse allocation after dispose', () => {
    const arena = new TypeArena();
    arena.alloc(new UnionType());
    arena.dispose();

    expect(arena.isDisposed).toBe(true);
    expect(arena.size).toBe(0);
    expect(() => arena.alloc(new UnionType())).toThrow(InvariantError);
  });
});
