/**
 * Analysis module exports
 */

export { analyze } from './analyze.js';
export { Analyzer } from './analyzer.js';
export { ScopeStack, type JoinFn } from './scope.js';
export { execProgram, execStatement, execStatements, execWhileStatement } from './statements.js';
export { execExpression, binaryType } from './expressions.js';
export { getProperty } from './properties.js';
export { unwrapGenericInstance } from './generics.js';
export {
  resolveTypeAnnotation,
  resolveAnnotation,
  resolveFunctionType,
  declareInterface,
  declareTypeAlias,
  type TypeParams,
} from './annotations.js';
