/**
 * Observability: structured logging and non-blocking event delivery
 */
export { default as logger, debug, info, warn, error, flushLogs, sanitizeObject, safeStringify, installShutdownHandlers } from './logger.js';
export type { LogLevel } from './logger.js';
export { QueuedEventSink, createLoggingTransport } from './eventSink.js';
export type { EventSink, EventTransport, QueuedSinkOptions } from './eventSink.js';
