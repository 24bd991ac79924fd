import type { z } from 'zod';
import type { DocumentValue, Trait, TraitType } from '../domain/index.js';
import { PathQuery, RuleDefinitionError, toTrait } from '../domain/index.js';
import { traitDefinitionSchema, describeIssue, isMissingIssue } from './definition-schema.js';

function describeTraitIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (issue?.path[0] === 'fields' && isMissingIssue(issue)) {
    return "Required field in trait definition not specified: 'fields'";
  }
  if (issue?.path[0] === 'type' && issue.code === 'invalid_enum_value') {
    return `Invalid trait type '${String(issue.received)}'`;
  }
  return describeIssue(error);
}

/**
 * A named, typed field extractor.
 *
 * Resolves the first non-null value its path query finds in a notification
 * and coerces it to the declared type. Later alternatives are fallbacks for
 * absent values only: once a value is chosen a failed coercion is final.
 */
export class TraitSpec {
  private constructor(
    readonly name: string,
    readonly type: TraitType,
    readonly query: PathQuery,
  ) {}

  /**
   * @param ruleId Owning definition, reported in definition errors.
   * @throws RuleDefinitionError (or PathSyntaxError) on a malformed definition.
   */
  static build(name: string, definition: unknown, ruleId?: string): TraitSpec {
    const location = { rule: ruleId, trait: name };
    const parsed = traitDefinitionSchema.safeParse(definition);

    if (!parsed.success) {
      throw new RuleDefinitionError(describeTraitIssue(parsed.error), location, definition);
    }

    const query = PathQuery.compile(parsed.data.fields, location);
    return new TraitSpec(name, parsed.data.type, query);
  }

  /**
   * Extracts the trait, or `null` when no alternative resolves.
   *
   * @throws ConversionError when the chosen value does not coerce.
   */
  extract(notification: DocumentValue): Trait | null {
    const raw = this.query.first(notification);
    if (raw === undefined) return null;
    return toTrait(this.name, this.type, raw);
  }
}
