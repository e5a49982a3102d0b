/**
 * Logging Module
 * @module logging
 */

export {
  type LoggerConfig,
  type DomainLogMethods,
  type StructuredLogger,
  createLogger,
} from './logger.js';
