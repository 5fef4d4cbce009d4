/**
 * Tracing Plugin
 *
 * Fastify plugin for distributed tracing. Extracts correlation and causation IDs
 * from request headers and propagates them to response headers.
 */

import { randomUUID } from 'node:crypto';
import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import type { TracingPluginOptions, TracingData } from '../types.js';
import { createRequestLogger } from '../logging.js';
import { headerValue } from './headers.js';

/** Default header names */
const DEFAULT_CORRELATION_ID_HEADER = 'x-correlation-id';
const DEFAULT_REQUEST_ID_HEADER = 'x-request-id';
const DEFAULT_CAUSATION_ID_HEADER = 'x-causation-id';

/**
 * Tracing plugin for Fastify.
 *
 * Extracts correlation ID from request headers (X-Correlation-ID or X-Request-ID),
 * generates one if not present, and adds it to response headers. The request
 * logger is replaced by a child bound to the tracing IDs.
 *
 * @example
 * ```typescript
 * const fastify = Fastify();
 * await fastify.register(tracingPlugin);
 *
 * fastify.get('/v1.1/:projectId/servers', (request) => {
 *     const { correlationId, executionId } = request.tracing;
 *     request.log.info({ correlationId, executionId }, 'Listing servers');
 *     return { servers: [] };
 * });
 * ```
 */
const tracingPluginAsync: FastifyPluginAsync<TracingPluginOptions> = async (fastify, opts) => {
	const {
		correlationIdHeader = DEFAULT_CORRELATION_ID_HEADER,
		requestIdHeader = DEFAULT_REQUEST_ID_HEADER,
		causationIdHeader = DEFAULT_CAUSATION_ID_HEADER,
		propagateToResponse = true,
	} = opts;

	fastify.decorateRequest('tracing', null, []);

	fastify.addHook('onRequest', async (request, reply) => {
		const correlationId =
			headerValue(request.headers, correlationIdHeader) ??
			headerValue(request.headers, requestIdHeader) ??
			`trace-${randomUUID()}`;

		const tracingData: TracingData = {
			correlationId,
			causationId: headerValue(request.headers, causationIdHeader) ?? null,
			executionId: `exec-${randomUUID()}`,
			startTime: Date.now(),
		};
		request.tracing = tracingData;
		request.log = createRequestLogger(request.log, tracingData);

		if (propagateToResponse) {
			reply.header(correlationIdHeader, correlationId);
		}
	});
};

export const tracingPlugin = fp(tracingPluginAsync, {
	name: '@computegate/tracing',
	fastify: '5.x',
});
