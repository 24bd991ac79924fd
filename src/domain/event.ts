/**
 * Core domain types for the normalized event model.
 *
 * An event is what a notification becomes once a definition has matched
 * it: its type, when it was generated, and the typed traits pulled out of
 * the body. These types carry no framework dependencies.
 */

/** The closed set of trait value kinds. */
export const TRAIT_TYPES = ['text', 'int', 'float', 'datetime'] as const;

export type TraitType = (typeof TRAIT_TYPES)[number];

/**
 * A single named, typed fact extracted from a notification.
 *
 * `datetime` values are ISO-8601 strings normalized to UTC with
 * microsecond precision. `int` values outside the safe integer range are
 * carried as `bigint` so no digit is lost.
 */
export type Trait =
  | { readonly name: string; readonly dtype: 'text'; readonly value: string }
  | { readonly name: string; readonly dtype: 'int'; readonly value: number | bigint }
  | { readonly name: string; readonly dtype: 'float'; readonly value: number }
  | { readonly name: string; readonly dtype: 'datetime'; readonly value: string };

/**
 * Canonical Event entity.
 *
 * Trait names are unique within one event. Traits whose source field was
 * absent or null are left out rather than carried with an empty value.
 */
export interface Event {
  readonly event_type: string;
  readonly generated: string; // ISO-8601, UTC
  readonly traits: readonly Trait[];
}

/** `JSON.stringify` replacer writing big integers as decimal strings. */
export function traitJsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}
