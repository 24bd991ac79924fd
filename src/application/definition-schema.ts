import { z } from 'zod';
import { TRAIT_TYPES } from '../domain/index.js';

/** A field path, or an ordered list of fallback paths. */
const fieldsSchema = z.union([
  z.string(),
  z.array(z.string()).min(1, 'At least one field path is required'),
]);

/**
 * Zod schema for a single trait definition.
 *
 * - `type` defaults to "text".
 * - `fields` is required; a list is tried in order, first non-null wins.
 */
export const traitDefinitionSchema = z.object({
  type: z.enum(TRAIT_TYPES).optional().default('text'),
  fields: fieldsSchema,
});

export type TraitDefinition = z.infer<typeof traitDefinitionSchema>;

/** One pattern or an ordered list of patterns; `!` marks an exclusion. */
const eventTypeSchema = z.union([
  z.string().min(1),
  z.array(z.string().min(1)).min(1, 'At least one event type pattern is required'),
]);

/**
 * Zod schema for a single event definition.
 *
 * Both keys are required. Trait definitions are validated separately by
 * `TraitSpec.build` so errors can name the offending trait.
 */
export const eventDefinitionSchema = z.object({
  event_type: eventTypeSchema,
  traits: z.record(z.string(), z.unknown()),
});

export type EventDefinition = z.infer<typeof eventDefinitionSchema>;

/** The definitions file holds an ordered list of event definitions. */
export const eventDefinitionListSchema = z.array(z.unknown());

/**
 * True when the issue stems from an absent key. A union reports a missing
 * value as `invalid_union`, so its branches are inspected too.
 */
export function isMissingIssue(issue: z.ZodIssue): boolean {
  if (issue.code === 'invalid_type') return issue.received === 'undefined';
  if (issue.code === 'invalid_union') {
    return issue.unionErrors.every((error) => error.issues.every(isMissingIssue));
  }
  return false;
}

/**
 * Renders the first zod issue in the wording operators see in the logs.
 * Missing keys read as "Required field <key> not specified".
 */
export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (issue === undefined) return 'Invalid definition';

  const key = issue.path.join('.');
  if (isMissingIssue(issue)) {
    return `Required field ${key} not specified`;
  }
  return key === '' ? issue.message : `Invalid ${key}: ${issue.message}`;
}
