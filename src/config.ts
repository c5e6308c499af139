/**
 * Analyzer configuration
 */

import { createLogger, type Logger, type LogLevel } from './utils/logger.js';

export interface AnalyzerOptions {
  /** Source filename (for messages) */
  filename?: string;
  /** Threshold for the default console logger */
  logLevel?: LogLevel;
  /** Logger to use instead of the console logger */
  logger?: Logger;
  /** Parse TypeScript annotations */
  typescript?: boolean;
  /** Source type */
  sourceType?: 'script' | 'module' | 'unambiguous';
}

export interface ResolvedAnalyzerOptions {
  readonly filename: string;
  readonly logLevel: LogLevel;
  readonly logger: Logger;
  readonly typescript: boolean;
  readonly sourceType: 'script' | 'module' | 'unambiguous';
}

export const DEFAULT_ANALYZER_OPTIONS: Omit<ResolvedAnalyzerOptions, 'logger'> = {
  filename: 'input.ts',
  logLevel: 'warnings',
  typescript: true,
  sourceType: 'unambiguous',
};

export function resolveOptions(options: AnalyzerOptions = {}): ResolvedAnalyzerOptions {
  const logLevel = options.logLevel ?? DEFAULT_ANALYZER_OPTIONS.logLevel;
  return {
    filename: options.filename ?? DEFAULT_ANALYZER_OPTIONS.filename,
    logLevel,
    logger: options.logger ?? createLogger(logLevel),
    typescript: options.typescript ?? DEFAULT_ANALYZER_OPTIONS.typescript,
    sourceType: options.sourceType ?? DEFAULT_ANALYZER_OPTIONS.sourceType,
  };
}
