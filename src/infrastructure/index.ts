export { redisPlugin, enqueueNotification, RedisEventPublisher, quarantineNotification } from './redis/index.js';
export type { RedisPluginOptions, QuarantinedNotification } from './redis/index.js';
export { converterPlugin } from './converter/index.js';
export type { ConverterPluginOptions } from './converter/index.js';
export { loadServiceConfig, resolveDefinitionsFile, loadEventDefinitions, setupEvents } from './config/index.js';
export type { ServiceConfig, StreamNames, LogLevel } from './config/index.js';
export { startConsumer, processEntry, GROUP_NAME } from './worker/index.js';
export type { ConsumerDeps } from './worker/index.js';
