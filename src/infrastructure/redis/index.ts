export { default as redisPlugin } from './redis-plugin.js';
export type { RedisPluginOptions } from './redis-plugin.js';
export { enqueueNotification } from './notification-producer.js';
export { RedisEventPublisher } from './event-publisher.js';
export { quarantineNotification } from './dead-letter.js';
export type { QuarantinedNotification } from './dead-letter.js';
