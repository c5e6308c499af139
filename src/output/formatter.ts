/**
 * Type Formatter - Converts types and analysis results to text
 *
 * Supports multiple output formats:
 * 1. Inline comments on the analyzed source
 * 2. JSON (machine-readable)
 * 3. DTS-like (TypeScript declaration style)
 * 4. Report (human-readable analysis report)
 */

import * as t from '@babel/types';
import type { Ty, ParamTy, PropertyTy, AnalysisResult, BindingAnnotation } from '../types/index.js';
import { unreachable } from '../utils/errors.js';

export interface FormatOptions {
  /** Maximum depth for nested types */
  maxDepth?: number;
}

const DEFAULT_FORMAT_OPTIONS: Required<FormatOptions> = {
  maxDepth: 8,
};

/**
 * Format a type as TypeScript-like source text
 */
export function formatType(ty: Ty, options: FormatOptions = {}): string {
  const opts = { ...DEFAULT_FORMAT_OPTIONS, ...options };
  return formatTypeInternal(ty, opts, 0);
}

function formatTypeInternal(ty: Ty, opts: Required<FormatOptions>, depth: number): string {
  if (depth > opts.maxDepth) {
    return '...';
  }
  const format = (inner: Ty): string => formatTypeInternal(inner, opts, depth + 1);

  switch (ty.kind) {
    case 'never':
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
      return ty.kind;
    case 'error':
      return 'any /* error */';

    case 'string-literal':
      return JSON.stringify(ty.value);
    case 'numeric-literal':
      if (!Number.isFinite(ty.value)) return 'number';
      return Object.is(ty.value, -0) ? '-0' : String(ty.value);
    case 'bigint-literal':
      return `${ty.value}n`;
    case 'unique-symbol':
      return `typeof ${ty.description}`;
    case 'boolean-literal':
      return String(ty.value);

    case 'union':
      return [...ty.union.members()].map((member) => wrapCompound(member, format(member))).join(' | ');

    case 'record':
      return formatProperties(ty.properties, format);

    case 'function':
      return `(${formatParams(ty.params, format)}) => ${format(ty.returnType)}`;

    case 'constructor':
      return `new (${formatParams(ty.params, format)}) => ${format(ty.instanceType)}`;

    case 'intersection':
      return ty.members.map((member) => wrapCompound(member, format(member))).join(' & ');

    case 'interface':
    case 'generic':
    case 'intrinsic':
    case 'unresolved':
      return ty.name;

    case 'namespace':
      return `typeof ${ty.name}`;

    case 'instance':
      return `${ty.generic.name}<${ty.args.map(format).join(', ')}>`;

    default:
      return unreachable(ty, 'Unhandled type kind in formatType');
  }
}

function wrapCompound(member: Ty, text: string): string {
  switch (member.kind) {
    case 'function':
    case 'constructor':
    case 'intersection':
    case 'union':
      return `(${text})`;
    default:
      return text;
  }
}

function formatKey(name: string): string {
  return t.isValidIdentifier(name, false) ? name : JSON.stringify(name);
}

function formatProperties(properties: ReadonlyMap<string, PropertyTy>, format: (ty: Ty) => string): string {
  if (properties.size === 0) return '{}';
  const parts = [...properties].map(
    ([name, prop]) => `${formatKey(name)}${prop.optional ? '?' : ''}: ${format(prop.type)}`
  );
  return `{ ${parts.join('; ')} }`;
}

function formatParams(params: readonly ParamTy[], format: (ty: Ty) => string): string {
  return params
    .map((param) => {
      const prefix = param.rest ? '...' : '';
      const optional = param.optional && !param.rest ? '?' : '';
      return `${prefix}${param.name}${optional}: ${format(param.type)}`;
    })
    .join(', ');
}

// ============================================================================
// Analysis results
// ============================================================================

/**
 * Format analysis result as inline comments on the source
 */
export function formatAsInlineComments(source: string, result: AnalysisResult): string {
  const byLine = new Map<number, BindingAnnotation[]>();
  for (const ann of result.annotations) {
    const existing = byLine.get(ann.line) ?? [];
    existing.push(ann);
    byLine.set(ann.line, existing);
  }

  return source
    .split('\n')
    .map((line, i) => {
      const anns = byLine.get(i + 1);
      if (!anns) return line;
      const comments = anns.map((a) => `/* ${a.name}: ${a.typeString} */`);
      return `${line} ${comments.join(' ')}`;
    })
    .join('\n');
}

/**
 * Format analysis result as JSON
 */
export function formatAsJSON(result: AnalysisResult, indent = 2): string {
  const serializable = {
    filename: result.filename,
    annotations: result.annotations.map((a) => ({
      line: a.line,
      column: a.column,
      kind: a.kind,
      name: a.name,
      type: a.typeString,
    })),
    bindings: Object.fromEntries([...result.bindings].map(([name, ty]) => [name, formatType(ty)])),
    errors: result.errors,
    unionCount: result.unionCount,
  };
  return JSON.stringify(serializable, null, indent);
}

/**
 * Format the final bindings as declarations (.d.ts style)
 */
export function formatAsDTS(result: AnalysisResult): string {
  const lines: string[] = [`// Type declarations for ${result.filename}`, ''];
  for (const [name, ty] of result.bindings) {
    lines.push(`declare let ${name}: ${formatType(ty)};`);
  }
  return lines.join('\n');
}

/**
 * Format analysis result as human-readable report
 */
export function formatAsReport(result: AnalysisResult): string {
  const rule = '─'.repeat(63);
  const lines: string[] = [];

  lines.push(rule);
  lines.push(`  Flow Analysis Report: ${result.filename}`);
  lines.push(rule);
  lines.push(`  Declarations: ${result.annotations.length}`);
  lines.push(`  Unions:       ${result.unionCount}`);
  lines.push(`  Errors:       ${result.errors.length}`);

  if (result.errors.length > 0) {
    lines.push('');
    lines.push('  Errors:');
    for (const err of result.errors) {
      lines.push(`    Line ${err.line}:${err.column} - ${err.message}`);
    }
  }

  lines.push('');
  lines.push('  Declared:');
  const sorted = [...result.annotations].sort((a, b) => a.line - b.line || a.column - b.column);
  for (const ann of sorted) {
    const location = `${ann.line}:${ann.column}`.padEnd(8);
    lines.push(`    ${location}${ann.kind.padEnd(10)}${ann.name.padEnd(16)}${ann.typeString}`);
  }

  lines.push('');
  lines.push('  Final bindings:');
  for (const [name, ty] of result.bindings) {
    lines.push(`    ${name.padEnd(16)}${formatType(ty)}`);
  }

  return lines.join('\n');
}
