import type { DocumentMapping, Event, Notification, Trait } from '../domain/index.js';
import {
  ConversionError,
  RuleDefinitionError,
  TypeMatcher,
  formatEpochMillis,
  normalizeTimestamp,
} from '../domain/index.js';
import type { TraitDefinition } from './definition-schema.js';
import { eventDefinitionSchema, describeIssue } from './definition-schema.js';
import { TraitSpec } from './trait-spec.js';

/**
 * Traits every event carries when the notification provides them.
 * A definition may override any of these by declaring a trait of the same name.
 */
export const DEFAULT_TRAITS: Readonly<Record<string, TraitDefinition>> = {
  message_id: { type: 'text', fields: 'message_id' },
  service: { type: 'text', fields: 'publisher_id' },
  request_id: { type: 'text', fields: '_context_request_id' },
  tenant_id: { type: 'text', fields: '_context_tenant' },
};

/** Envelope fields consulted, in order, for the event generation time. */
const WHEN_FIELDS = ['timestamp', '_context_timestamp'] as const;

/**
 * Resolves when the notification was generated.
 *
 * Uses `timestamp`, else `_context_timestamp`, else the clock. The chosen
 * value is normalized to UTC; a malformed one is a conversion error.
 */
export function extractWhen(body: DocumentMapping, nowFn: () => number = Date.now): string {
  for (const field of WHEN_FIELDS) {
    const value = body[field];
    if (value === undefined || value === null || value === '') continue;

    const normalized = typeof value === 'string' ? normalizeTimestamp(value) : null;
    if (normalized === null) {
      throw new ConversionError(field, 'datetime', value, 'expected an ISO-8601 timestamp');
    }
    return normalized;
  }

  return formatEpochMillis(nowFn());
}

export interface EventRuleOptions {
  /** Identity used in logs and definition errors. */
  id?: string | undefined;
  /** Clock used when a notification carries no timestamp. */
  nowFn?: (() => number) | undefined;
}

/**
 * A declarative binding from event-type patterns to trait extractors.
 */
export class EventRule {
  private constructor(
    readonly id: string,
    readonly matcher: TypeMatcher,
    readonly traits: ReadonlyMap<string, TraitSpec>,
    private readonly nowFn: () => number,
  ) {}

  /**
   * Builds a rule from its raw definition.
   *
   * Default traits are inserted first; declared traits replace a default of
   * the same name in place, or are appended.
   *
   * @throws RuleDefinitionError when `event_type` or `traits` is missing,
   *   or any trait definition is malformed.
   */
  static build(definition: unknown, options: EventRuleOptions = {}): EventRule {
    const parsed = eventDefinitionSchema.safeParse(definition);
    if (!parsed.success) {
      throw new RuleDefinitionError(describeIssue(parsed.error), { rule: options.id }, definition);
    }

    const matcher = TypeMatcher.build(parsed.data.event_type);
    const id = options.id ?? matcher.toString();

    const traits = new Map<string, TraitSpec>();
    for (const [name, traitDefinition] of Object.entries(DEFAULT_TRAITS)) {
      traits.set(name, TraitSpec.build(name, traitDefinition, id));
    }
    for (const [name, traitDefinition] of Object.entries(parsed.data.traits)) {
      traits.set(name, TraitSpec.build(name, traitDefinition, id));
    }

    return new EventRule(id, matcher, traits, options.nowFn ?? Date.now);
  }

  matches(eventType: string): boolean {
    return this.matcher.matches(eventType);
  }

  isCatchAll(): boolean {
    return this.matcher.isCatchAll();
  }

  /**
   * Converts a notification this rule matched.
   *
   * @throws ConversionError when a resolved value does not coerce.
   */
  toEvent(notification: Notification): Event {
    const generated = extractWhen(notification, this.nowFn);

    const traits: Trait[] = [];
    for (const spec of this.traits.values()) {
      const trait = spec.extract(notification);
      if (trait !== null) traits.push(trait);
    }

    return {
      event_type: notification.event_type,
      generated,
      traits,
    };
  }
}
