export { PathQuery } from './path-query.js';
export type { PathNode, PathExpr } from './path-query.js';
export { TypeMatcher, globToRegExp } from './type-matcher.js';
export { convertValue, toTrait, normalizeTimestamp, formatEpochMillis } from './coerce.js';
