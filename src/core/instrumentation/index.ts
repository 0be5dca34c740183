/**
 * @fileoverview Central export for instrumentation (logging, tracing)
 * @module core/instrumentation
 */

export { createLogger, getLogger, withContext, logTiming, logError } from './logger';
export { getTracer, withTracing } from './tracing';
