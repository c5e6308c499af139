/**
 * Parser module exports
 */

export { parse, parseExpression } from './parser.js';
export type { ParseOptions, ParseResult, ParseError } from './parser.js';
