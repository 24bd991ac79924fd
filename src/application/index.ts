export { traitDefinitionSchema, eventDefinitionSchema, eventDefinitionListSchema, describeIssue } from './definition-schema.js';
export type { TraitDefinition, EventDefinition } from './definition-schema.js';
export { documentValueSchema, notificationSchema, notificationBatchSchema } from './notification-schema.js';
export { TraitSpec } from './trait-spec.js';
export { EventRule, DEFAULT_TRAITS, extractWhen } from './event-rule.js';
export type { EventRuleOptions } from './event-rule.js';
export { ConversionEngine } from './conversion-engine.js';
export type { ConversionEngineOptions, RuleSummary } from './conversion-engine.js';
export { NotificationCollector } from './notification-collector.js';
export type { EventSink, RecordedEvent, CollectorOptions, CollectorOutcome } from './notification-collector.js';
