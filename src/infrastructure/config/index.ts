export { loadServiceConfig } from './service-config.js';
export type { ServiceConfig, StreamNames, LogLevel } from './service-config.js';
export { resolveDefinitionsFile, loadEventDefinitions, setupEvents } from './definitions-loader.js';
