/**
 * Source parser
 *
 * Uses @babel/parser to parse TypeScript (or plain JavaScript) source into an
 * AST. Parsing recovers from errors; they are reported next to the AST.
 */

import { parse as babelParse, type ParserOptions, type ParserPlugin } from '@babel/parser';
import * as t from '@babel/types';

export interface ParseOptions {
  /** Source filename (for error messages) */
  filename?: string;
  /** Enable JSX parsing */
  jsx?: boolean;
  /** Enable TypeScript syntax (default: true) */
  typescript?: boolean;
  /** Source type */
  sourceType?: 'script' | 'module' | 'unambiguous';
}

export interface ParseResult {
  /** The parsed AST */
  ast: t.File;
  /** Any parsing errors */
  errors: ParseError[];
}

export interface ParseError {
  message: string;
  line: number;
  column: number;
}

const BASE_PLUGINS: readonly ParserPlugin[] = ['explicitResourceManagement', 'throwExpressions'];

function pluginsFor(options: ParseOptions): ParserPlugin[] {
  const plugins = [...BASE_PLUGINS];
  if (options.typescript ?? true) {
    plugins.push('typescript');
  }
  if (options.jsx) {
    plugins.push('jsx');
  }
  return plugins;
}

/**
 * Parse source code into an AST
 */
export function parse(source: string, options: ParseOptions = {}): ParseResult {
  const parserOptions: ParserOptions = {
    sourceType: options.sourceType ?? 'unambiguous',
    sourceFilename: options.filename,
    errorRecovery: true,
    plugins: pluginsFor(options),
  };

  try {
    const ast = babelParse(source, parserOptions);
    const errors: ParseError[] = (ast.errors ?? []).map(toParseError);

    return { ast, errors };
  } catch (error) {
    // Unrecoverable syntax errors still throw with errorRecovery on
    if (error instanceof SyntaxError) {
      const emptyProgram = t.program([], [], 'script');
      return {
        ast: t.file(emptyProgram),
        errors: [toParseError(error)],
      };
    }
    throw error;
  }
}

function toParseError(error: object): ParseError {
  const message = 'message' in error && typeof error.message === 'string' ? error.message : String(error);
  return { message, ...errorLocation(error) };
}

function errorLocation(error: object): { line: number; column: number } {
  if ('loc' in error && typeof error.loc === 'object' && error.loc !== null) {
    const loc = error.loc;
    if ('line' in loc && 'column' in loc && typeof loc.line === 'number' && typeof loc.column === 'number') {
      return { line: loc.line, column: loc.column };
    }
  }
  return { line: 0, column: 0 };
}

/**
 * Parse a single expression
 */
export function parseExpression(source: string, options: ParseOptions = {}): t.Expression {
  const result = parse(`(${source})`, options);
  const stmt = result.ast.program.body[0];
  if (stmt && t.isExpressionStatement(stmt)) {
    return stmt.expression;
  }
  throw new Error('Failed to parse expression');
}
