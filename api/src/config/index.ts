/**
 * Configuration Module
 * @module config
 */

export * from './schema.js';
export { loadConfig, mapEnvironment } from './loader.js';
