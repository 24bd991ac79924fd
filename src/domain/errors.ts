/**
 * Error taxonomy for the converter.
 *
 * Definition errors are raised while building the rule table and are fatal
 * at startup. Conversion errors are raised per notification and left for
 * the caller to handle.
 */

/** Identifies where in the declarative configuration an error was found. */
export interface DefinitionLocation {
  readonly rule?: string | undefined;
  readonly trait?: string | undefined;
}

function describeLocation(location: DefinitionLocation): string {
  const parts: string[] = [];
  if (location.rule !== undefined) parts.push(`rule ${location.rule}`);
  if (location.trait !== undefined) parts.push(`trait ${location.trait}`);
  return parts.length > 0 ? ` [${parts.join(', ')}]` : '';
}

/** Malformed event or trait definition. */
export class RuleDefinitionError extends Error {
  readonly rule: string | undefined;
  readonly trait: string | undefined;
  /** The offending configuration fragment, for diagnostics. */
  readonly definition: unknown;

  constructor(detail: string, location: DefinitionLocation = {}, definition?: unknown) {
    super(`${detail}${describeLocation(location)}`);
    this.name = 'RuleDefinitionError';
    this.rule = location.rule;
    this.trait = location.trait;
    this.definition = definition;
  }
}

/** A field path expression that could not be parsed. */
export class PathSyntaxError extends RuleDefinitionError {
  readonly expression: string;
  /** Character offset of the failure within `expression`. */
  readonly position: number;

  constructor(expression: string, position: number, reason: string, location: DefinitionLocation = {}) {
    super(
      `Parse error in path specification '${expression}' at position ${position}: ${reason}`,
      location,
      expression,
    );
    this.name = 'PathSyntaxError';
    this.expression = expression;
    this.position = position;
  }
}

/** A resolved raw value could not be coerced to its declared type. */
export class ConversionError extends Error {
  readonly field: string;
  readonly targetType: string;
  readonly value: unknown;

  constructor(field: string, targetType: string, value: unknown, reason?: string) {
    super(
      `Cannot convert ${JSON.stringify(value) ?? String(value)} to ${targetType} for ${field}`
        + (reason !== undefined ? `: ${reason}` : ''),
    );
    this.name = 'ConversionError';
    this.field = field;
    this.targetType = targetType;
    this.value = value;
  }
}
