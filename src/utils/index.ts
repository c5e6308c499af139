/**
 * Utils module exports
 */

export { Types, resetTypeIdCounters, isIntrinsicName } from './type-factory.js';
export { typeKey, typeEquals } from './type-key.js';
export {
  isTypeKind,
  getUnionMembers,
  everyMember,
  someMember,
  isNullable,
  isStringLike,
  isNumberLike,
  isBigIntLike,
  removeNullable,
  removeUndefined,
  isPossiblyUndefined,
} from './type-utils.js';
export { InvariantError, unreachable, type ErrorContext } from './errors.js';
export { ConsoleLogger, createLogger, isLogLevel, formatMessage, type Logger, type LogLevel } from './logger.js';
