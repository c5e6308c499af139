/**
 * Union algebra exports
 */

export { LiteralAble } from './literal-able.js';
export type { LiteralAbleState } from './literal-able.js';
export { UnionType } from './union-type.js';
export { UnionTypeBuilder } from './builder.js';
export type { UnionHost, UnionBuilderState } from './builder.js';
export { TypeArena } from './arena.js';
