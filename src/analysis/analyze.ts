/**
 * Analysis entry point
 */

import type { AnalysisResult } from '../types/index.js';
import type { AnalyzerOptions } from '../config.js';
import { parse } from '../parser/index.js';
import { Analyzer } from './analyzer.js';
import { execProgram } from './statements.js';

/**
 * Parse and analyze one source file
 *
 * The returned bindings are the state of the outermost frame when the
 * program ends. Unions in the result stay readable after the pass; the
 * arena only stops handing out new ones.
 */
export function analyze(source: string, options: AnalyzerOptions = {}): AnalysisResult {
  const analyzer = new Analyzer(options);
  const { filename, typescript, sourceType } = analyzer.options;

  try {
    const { ast, errors } = parse(source, { filename, typescript, sourceType });
    for (const error of errors) {
      analyzer.logger.warn('parse error', { filename, ...error });
    }

    execProgram(ast.program, analyzer);

    return {
      filename,
      bindings: new Map(analyzer.scopes.root.bindings),
      annotations: [...analyzer.annotations],
      errors,
      unionCount: analyzer.arena.size,
    };
  } finally {
    analyzer.dispose();
  }
}
