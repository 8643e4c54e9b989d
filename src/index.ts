/**
 * Idea → Business Blueprint
 *
 * A conversational guide that takes a vague business idea through
 * discovery and intent lock to a structured, execution-ready blueprint.
 *
 * @packageDocumentation
 */

export * from './config/index.js';
export * from './conversation/index.js';
export * from './gateway/index.js';
export * from './blueprint/index.js';
export * from './consistency/index.js';
export * from './telemetry/index.js';
export * from './session/index.js';
export { Logger, LOG_LEVELS, logger, silentLogger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
