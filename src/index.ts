/**
 * Tyflow - flow-sensitive type analysis over union types
 */

export type * from './types/index.js';

export * from './utils/index.js';

export * from './union/index.js';

export * from './parser/index.js';

export * from './output/index.js';

export * from './analysis/index.js';

export { DEFAULT_ANALYZER_OPTIONS, resolveOptions } from './config.js';
export type { AnalyzerOptions, ResolvedAnalyzerOptions } from './config.js';
