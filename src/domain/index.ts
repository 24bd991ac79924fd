export type { Event, Trait, TraitType } from './event.js';
export { TRAIT_TYPES, traitJsonReplacer } from './event.js';
export type { DocumentScalar, DocumentMapping, DocumentValue, Notification } from './document.js';
export { isMapping, isSequence } from './document.js';
export { RuleDefinitionError, PathSyntaxError, ConversionError } from './errors.js';
export type { DefinitionLocation } from './errors.js';
export { PathQuery, TypeMatcher, globToRegExp, convertValue, toTrait, normalizeTimestamp, formatEpochMillis } from './converter/index.js';
export type { PathNode, PathExpr } from './converter/index.js';
