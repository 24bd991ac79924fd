export { startConsumer, processEntry, GROUP_NAME } from './stream-consumer.js';
export type { ConsumerDeps } from './stream-consumer.js';
