/**
 * @fileoverview Public API exports for @minutely/logger
 * Structured logging and error handling for the collector and supervisor
 */

// Core logger creation
export { createLogger, createSilentLogger } from './createLogger.js';

// Global error handlers
export { attachGlobalHandlers, gracefulExit } from './errorHandler.js';

// Performance timing utilities
export { startTimer, measureAsync } from './perf-timer.js';

// Shared `logging` config section
export { loggingConfigSchema, loggingEnvMapping, loggerConfigFrom } from './config.js';
export type { LoggingConfig } from './config.js';

// Redaction helpers
export { redactValue, isSensitiveFieldName } from './formats.js';

// Type exports
export type { Logger, LoggerConfig, LogLevel } from './types.js';
export type { PerfTimer } from './perf-timer.js';
