export { default as converterPlugin } from './converter-plugin.js';
export type { ConverterPluginOptions } from './converter-plugin.js';
