/**
 * @computegate/http
 *
 * HTTP layer utilities for the compute gateway using Fastify:
 * - Plugins for tracing, caller identity and raw (JSON or XML) bodies
 * - Result to HTTP response mapping
 * - TypeBox schema utilities
 * - Request-scoped pino loggers (Fastify's native logger)
 *
 * @example
 * ```typescript
 * import Fastify from 'fastify';
 * import {
 *     tracingPlugin,
 *     executionContextPlugin,
 *     rawBodyPlugin,
 *     errorHandlerPlugin,
 *     createStandardErrorHandlerOptions,
 *     sendResult,
 * } from '@computegate/http';
 *
 * const fastify = Fastify({ loggerInstance: logger });
 *
 * await fastify.register(tracingPlugin);
 * await fastify.register(executionContextPlugin);
 * await fastify.register(rawBodyPlugin);
 * await fastify.register(errorHandlerPlugin, createStandardErrorHandlerOptions());
 *
 * fastify.get('/v1.1/:projectId/servers/:id', async (request, reply) => {
 *     const result = await showServer.execute({ serverId: request.params.id }, request.executionContext);
 *     return sendResult(reply, result, { transform: (server) => ({ server }) });
 * });
 * ```
 */

// Types
export {
	type TracingData,
	type TracingPluginOptions,
	type ExecutionContextPluginOptions,
	type RawBodyPluginOptions,
	type ErrorResponse,
	type FastifyRequest,
	type FastifyReply,
	type Logger,
} from './types.js';

// Plugins
export {
	tracingPlugin,
	executionContextPlugin,
	rawBodyPlugin,
	isXmlRequest,
} from './plugins/index.js';

// Logging
export { createRequestLogger, type ChildLoggerFactory } from './logging.js';

// Response utilities
export {
	getErrorStatus,
	toErrorResponse,
	sendError,
	sendResult,
	matchResult,
	noContent,
	type SendResultOptions,
} from './response.js';

// Error handler
export {
	errorHandlerPlugin,
	createCommonErrorMappers,
	createStandardErrorHandlerOptions,
	type ErrorHandlerConfig,
	type ErrorMapper,
} from './error-handler.js';

// Schema utilities (TypeBox for native Fastify JSON Schema support)
export { ErrorResponseSchema, errorResponses, Type, type Static } from './openapi.js';
