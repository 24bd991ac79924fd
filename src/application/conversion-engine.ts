import type { Event, Notification } from '../domain/index.js';
import { EventRule } from './event-rule.js';

/** Definition appended when unmatched notifications must still be captured. */
const CATCH_ALL_DEFINITION = { event_type: '*', traits: {} } as const;

export interface ConversionEngineOptions {
  /** Discard notifications no definition matches instead of synthesizing a catch-all. */
  dropUnmatched: boolean;
  /** Clock for notifications without a timestamp. */
  nowFn?: (() => number) | undefined;
}

/** Loggable summary of one rule in the effective table. */
export interface RuleSummary {
  id: string;
  include: readonly string[];
  exclude: readonly string[];
  traits: readonly string[];
}

/**
 * Converts notifications to events using an ordered rule table.
 *
 * A notification is handled by the FIRST rule whose patterns accept its
 * event type; later rules are never consulted, however specific. The table
 * is immutable once built, so `convert` is a pure function safe to call
 * from any number of concurrent consumers.
 */
export class ConversionEngine {
  private constructor(
    readonly rules: readonly EventRule[],
    readonly dropUnmatched: boolean,
  ) {}

  /**
   * Builds every definition in declaration order.
   *
   * Unless `dropUnmatched` is set, a catch-all rule carrying only the
   * default traits is appended when none of the definitions is one.
   *
   * @throws RuleDefinitionError on the first malformed definition.
   */
  static build(
    definitions: readonly unknown[],
    options: ConversionEngineOptions,
  ): ConversionEngine {
    const { nowFn } = options;
    const rules = definitions.map((definition, index) =>
      EventRule.build(definition, { id: `definition[${index}]`, nowFn }),
    );

    if (!options.dropUnmatched && !rules.some((rule) => rule.isCatchAll())) {
      rules.push(EventRule.build(CATCH_ALL_DEFINITION, { id: 'catch-all', nowFn }));
    }

    return new ConversionEngine(Object.freeze(rules), options.dropUnmatched);
  }

  /** First rule accepting `eventType`, if any. */
  selectRule(eventType: string): EventRule | undefined {
    return this.rules.find((rule) => rule.matches(eventType));
  }

  /**
   * Converts a notification, or returns `null` when no rule matches
   * (only possible with `dropUnmatched`, or an empty table).
   *
   * @throws ConversionError when a trait value does not coerce.
   */
  convert(notification: Notification): Event | null {
    const rule = this.selectRule(notification.event_type);
    return rule === undefined ? null : rule.toEvent(notification);
  }

  describe(): RuleSummary[] {
    return this.rules.map((rule) => ({
      id: rule.id,
      include: rule.matcher.includes,
      exclude: rule.matcher.excludes,
      traits: [...rule.traits.keys()],
    }));
  }
}
