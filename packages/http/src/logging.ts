/**
 * Request-scoped logging.
 *
 * Fastify logs through pino natively; the tracing plugin swaps each request's
 * logger for a child carrying the correlation and execution IDs.
 */

import type { TracingData } from './types.js';

/**
 * Anything that can produce a child logger (pino, or Fastify's base logger).
 */
export interface ChildLoggerFactory<L> {
	child(bindings: Record<string, unknown>): L;
}

/**
 * Create a child logger with tracing context.
 */
export function createRequestLogger<L extends ChildLoggerFactory<L>>(baseLogger: L, tracing: TracingData): L {
	return baseLogger.child({
		correlationId: tracing.correlationId,
		executionId: tracing.executionId,
		...(tracing.causationId ? { causationId: tracing.causationId } : {}),
	});
}
