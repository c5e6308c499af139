/**
 * Tests for statement and expression evaluation through analyze()
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { analyze } from '../../src/analysis/index.js';
import { resetTypeIdCounters } from '../../src/utils/type-factory.js';
import { formatType } from '../../src/output/formatter.js';
import type { AnalysisResult } from '../../src/types/index.js';
import type { Logger } from '../../src/utils/logger.js';

function run(source: string): AnalysisResult {
  return analyze(source, { logLevel: 'silent' });
}

function typeOf(result: AnalysisResult, name: string): string {
  const ty = result.bindings.get(name);
  if (!ty) throw new Error(`no binding for ${name}`);
  return formatType(ty);
}

describe('analyze', () => {
  beforeEach(() => {
    resetTypeIdCounters();
  });

  describe('loops', () => {
    it('should join loop writes with the state before the loop', () => {
      const result = run(`
        declare let x: string;
        declare const c: boolean;
        while (c) {
          x = x.length;
        }
      `);
      expect(typeOf(result, 'x')).toBe('string | number');
    });

    it('should run a do-while body at least once', () => {
      const result = run(`
        let d = 1;
        do {
          d = 'x';
        } while (d);
      `);
      expect(typeOf(result, 'd')).toBe('"x"');
    });

    it('should scope for-loop bindings to the loop', () => {
      const result = run(`
        let n = 0;
        for (let i = 0; i < 3; i++) {
          n = 'done';
        }
      `);
      expect(typeOf(result, 'n')).toBe('"done" | 0');
      expect(result.bindings.has('i')).toBe(false);
    });
  });

  describe('branches and blocks', () => {
    it('should join both branches of an if', () => {
      const result = run(`
        declare const c: boolean;
        let y = 'a';
        if (c) {
          y = 'b';
        } else {
          y = 'c';
        }
      `);
      expect(typeOf(result, 'y')).toBe('"a" | "b" | "c"');
    });

    it('should hoist var out of blocks as possibly undefined', () => {
      const result = run(`
        declare const c: boolean;
        if (c) {
          var v = 1;
        }
      `);
      expect(typeOf(result, 'v')).toBe('1 | undefined');
    });

    it('should drop block-scoped bindings', () => {
      const result = run('{ let inner = 1; }');
      expect(result.bindings.has('inner')).toBe(false);
    });

    it('should carry writes out of a plain block', () => {
      const result = run(`
        let z = 1;
        { z = 2; }
      `);
      expect(typeOf(result, 'z')).toBe('2');
    });
  });

  describe('operators', () => {
    it('should fold literal arithmetic and concatenation', () => {
      const result = run(`
        const sum = 1 + 2;
        const cat = 'a' + 1;
        const product = 6 * 7;
        const neg = -5;
      `);
      expect(typeOf(result, 'sum')).toBe('3');
      expect(typeOf(result, 'cat')).toBe('"a1"');
      expect(typeOf(result, 'product')).toBe('42');
      expect(typeOf(result, 'neg')).toBe('-5');
    });

    it('should widen operations on general types', () => {
      const result = run(`
        declare const s: string;
        const joined = s + 1;
        const big = 10n * 2n;
        const cmp = 1 < 2;
        const kind = typeof s;
        const nothing = void 0;
      `);
      expect(typeOf(result, 'joined')).toBe('string');
      expect(typeOf(result, 'big')).toBe('bigint');
      expect(typeOf(result, 'cmp')).toBe('boolean');
      expect(typeOf(result, 'kind')).toBe('string');
      expect(typeOf(result, 'nothing')).toBe('undefined');
    });

    it('should join logical and conditional operands', () => {
      const result = run(`
        declare const c: boolean;
        const flag = c && 1;
        const pick = c ? 'yes' : 42;
      `);
      expect(typeOf(result, 'flag')).toBe('1 | boolean');
      expect(typeOf(result, 'pick')).toBe('"yes" | 42');
    });

    it('should apply compound assignment', () => {
      const result = run(`
        let acc = 'a';
        acc += 'b';
        let count = 1;
        count++;
      `);
      expect(typeOf(result, 'acc')).toBe('"ab"');
      expect(typeOf(result, 'count')).toBe('number');
    });

    it('should evaluate a compound assignment target once', () => {
      const result = run(`
        declare const o: { a: number };
        let k = 'a';
        o[k += 'x'] += 1;
        let j = 'b';
        o[j += 'y'] ??= 2;
      `);
      expect(typeOf(result, 'k')).toBe('"ax"');
      expect(typeOf(result, 'j')).toBe('"by"');
    });

    it('should treat logical assignment as conditional', () => {
      const result = run(`
        let q = undefined;
        q ??= 'z';
      `);
      expect(typeOf(result, 'q')).toBe('"z" | undefined');
    });
  });

  describe('members and calls', () => {
    it('should read interface members', () => {
      const result = run(`
        interface Point { x: number; label?: string }
        declare const p: Point;
        const px = p.x;
        const pl = p.label;
      `);
      expect(typeOf(result, 'p')).toBe('Point');
      expect(typeOf(result, 'px')).toBe('number');
      expect(typeOf(result, 'pl')).toBe('string | undefined');
    });

    it('should instantiate generic aliases', () => {
      const result = run(`
        type Box<T> = { value: T };
        declare const b: Box<string>;
        const v = b.value;
      `);
      expect(typeOf(result, 'b')).toBe('Box<string>');
      expect(typeOf(result, 'v')).toBe('string');
    });

    it('should add undefined for optional chaining', () => {
      const result = run(`
        declare const maybe: { n: number } | undefined;
        const m = maybe?.n;
      `);
      expect(typeOf(result, 'm')).toBe('number | undefined');
    });

    it('should carry undefined through the rest of an optional chain', () => {
      const result = run(`
        declare const a: { b: { c: string }; f: () => number } | undefined;
        const deep = a?.b.c;
        const called = a?.f();
        const wrapped = (a?.b)?.c;
      `);
      expect(typeOf(result, 'deep')).toBe('string | undefined');
      expect(typeOf(result, 'called')).toBe('number | undefined');
      expect(typeOf(result, 'wrapped')).toBe('string | undefined');
    });

    it('should strip nullish members with a non-null assertion', () => {
      const result = run(`
        declare const s: string | undefined;
        const nn = s!;
        const casted = s as unknown;
      `);
      expect(typeOf(result, 'nn')).toBe('string');
      expect(typeOf(result, 'casted')).toBe('unknown');
    });

    it('should build object literal records', () => {
      const result = run(`
        const o = { a: 1, 'b-c': 'x', m() { return 1; } };
        const o2 = { ...o, a: true };
      `);
      expect(typeOf(result, 'o')).toBe('{ a: 1; "b-c": "x"; m: () => unknown }');
      expect(typeOf(result, 'o2')).toBe('{ a: true; "b-c": "x"; m: () => unknown }');
    });

    it('should destructure with defaults', () => {
      const result = run(`
        const o = { a: 1 };
        const { a: da, zz = 5 } = o;
      `);
      expect(typeOf(result, 'da')).toBe('1');
      expect(typeOf(result, 'zz')).toBe('5');
    });

    it('should keep null when a destructuring default is present', () => {
      const result = run(`
        declare const o: { a: null; b: string | null; c?: string | null };
        const { a = 1, b = 1, c = 1 } = o;
      `);
      expect(typeOf(result, 'a')).toBe('null');
      expect(typeOf(result, 'b')).toBe('string | null');
      expect(typeOf(result, 'c')).toBe('string | 1 | null');
    });

    it('should distribute calls over unions', () => {
      const result = run(`
        declare const f: (() => string) | (() => number);
        const fr = f();
        const bad = (1)();
      `);
      expect(typeOf(result, 'fr')).toBe('string | number');
      expect(typeOf(result, 'bad')).toBe('never');
    });

    it('should construct instances', () => {
      const result = run(`
        declare const Ctor: new () => { k: string };
        const inst = new Ctor();
      `);
      expect(typeOf(result, 'inst')).toBe('{ k: string }');
    });

    it('should read unique symbol descriptions', () => {
      const result = run(`
        declare const tag: unique symbol;
        const d = tag.description;
      `);
      expect(typeOf(result, 'tag')).toBe('typeof tag');
      expect(typeOf(result, 'd')).toBe('string | undefined');
    });
  });

  describe('functions and namespaces', () => {
    it('should type functions from their annotations', () => {
      const result = run(`
        function greet(name: string, times?: number): string {
          return name;
        }
        const r = greet('a');
      `);
      expect(typeOf(result, 'greet')).toBe('(name: string, times?: number | undefined) => string');
      expect(typeOf(result, 'r')).toBe('string');
    });

    it('should hoist function declarations', () => {
      const result = run(`
        const early = later();
        function later(): number {
          return 1;
        }
      `);
      expect(typeOf(result, 'early')).toBe('number');
    });

    it('should bind namespaces to their exports', () => {
      const result = run(`
        namespace NS {
          export const k = 1;
        }
        const nk = NS.k;
        const missing = NS.nope;
      `);
      expect(typeOf(result, 'NS')).toBe('typeof NS');
      expect(typeOf(result, 'nk')).toBe('1');
      expect(typeOf(result, 'missing')).toBe('any /* error */');
    });
  });

  describe('result', () => {
    it('should record declaration annotations', () => {
      const result = run('const x = 1;');
      expect(result.annotations).toHaveLength(1);
      expect(result.annotations[0]).toMatchObject({
        name: 'x',
        kind: 'const',
        line: 1,
        column: 6,
        typeString: '1',
      });
    });

    it('should count allocated unions', () => {
      expect(run('const a = 1;').unionCount).toBe(0);
      expect(run('declare const c: boolean; const b = c ? 1 : 2;').unionCount).toBeGreaterThan(0);
    });

    it('should report parse errors through the logger', () => {
      const logger: Logger = {
        error: vi.fn(),
        warn: vi.fn(),
        info: vi.fn(),
        debug: vi.fn(),
        trace: vi.fn(),
      };
      const result = analyze('const = ;', { logger, filename: 'broken.ts' });

      expect(result.filename).toBe('broken.ts');
      expect(result.errors.length).toBeGreaterThan(0);
      expect(logger.warn).toHaveBeenCalledWith('parse error', expect.objectContaining({ filename: 'broken.ts' }));
    });
  });
});
