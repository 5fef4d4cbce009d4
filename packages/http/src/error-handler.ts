/**
 * Error Handler
 *
 * Global error handler plugin for Fastify applications.
 * Catches exceptions and maps them to appropriate HTTP responses.
 */

import type { FastifyPluginAsync, FastifyError } from 'fastify';
import fp from 'fastify-plugin';
import type { ErrorResponse } from './types.js';

/**
 * Configuration for the error handler.
 */
export interface ErrorHandlerConfig {
	/** Whether to include stack traces in responses (default: false) */
	readonly includeStack?: boolean;
	/** Custom error mappers, tried in order before the generic handling */
	readonly mappers?: ErrorMapper[];
}

/**
 * Custom error mapper function.
 */
export interface ErrorMapper {
	/** Check if this mapper handles the error */
	canHandle: (error: Error) => boolean;
	/** Map the error to an HTTP response */
	toResponse: (error: Error) => { status: number; body: ErrorResponse };
}

/**
 * Create an error handler plugin for Fastify.
 *
 * Handles:
 * - Custom errors (via registered mappers)
 * - Fastify errors (statusCode property below 500)
 * - Unknown errors (returns 500 with a generic body; details go to the log)
 *
 * @example
 * ```typescript
 * const fastify = Fastify({ loggerInstance: logger });
 * await fastify.register(errorHandlerPlugin, createStandardErrorHandlerOptions());
 * ```
 */
const errorHandlerPluginAsync: FastifyPluginAsync<ErrorHandlerConfig> = async (fastify, opts) => {
	const { includeStack = false, mappers = [] } = opts;

	fastify.setErrorHandler((error: FastifyError, request, reply) => {
		const log = request.log;
		const tracing = request.tracing;

		for (const mapper of mappers) {
			if (mapper.canHandle(error)) {
				const { status, body } = mapper.toResponse(error);

				if (status >= 500) {
					log.error(
						{
							error: error.name,
							message: error.message,
							status,
							...(tracing ? { correlationId: tracing.correlationId } : {}),
						},
						'Mapped error',
					);
				}

				return reply.status(status).send(body);
			}
		}

		const statusCode = error.statusCode ?? 500;

		if (statusCode < 500) {
			const body: ErrorResponse = {
				code: `HTTP_${statusCode}`,
				message: error.message || 'An error occurred',
			};
			return reply.status(statusCode).send(body);
		}

		log.error(
			{
				error: error.name,
				message: error.message,
				stack: error.stack,
				...(tracing ? { correlationId: tracing.correlationId } : {}),
			},
			'Unhandled error',
		);

		const body: ErrorResponse = {
			code: 'INTERNAL_ERROR',
			message: 'An unexpected error occurred',
			...(includeStack && error.stack ? { details: { stack: error.stack } } : {}),
		};

		return reply.status(500).send(body);
	});
};

export const errorHandlerPlugin = fp(errorHandlerPluginAsync, {
	name: '@computegate/error-handler',
	fastify: '5.x',
});

function hasCode(error: Error, code: string): boolean {
	return 'code' in error && error.code === code;
}

/**
 * Create common error mappers.
 */
export function createCommonErrorMappers(): ErrorMapper[] {
	return [
		// TypeBox schema validation errors (from Fastify's AJV integration)
		{
			canHandle: (e) => hasCode(e, 'FST_ERR_VALIDATION'),
			toResponse: (e) => ({
				status: 400,
				body: {
					code: 'VALIDATION_ERROR',
					message: e.message || 'Request validation failed',
					...('validation' in e && Array.isArray(e.validation) ? { details: { errors: e.validation } } : {}),
				},
			}),
		},
		// Oversized bodies are rejected before any route runs
		{
			canHandle: (e) => hasCode(e, 'FST_ERR_CTP_BODY_TOO_LARGE'),
			toResponse: () => ({
				status: 413,
				body: {
					code: 'BODY_TOO_LARGE',
					message: 'Request body is too large',
				},
			}),
		},
	];
}

/**
 * Create the standard error handler plugin options with common mappers.
 */
export function createStandardErrorHandlerOptions(): ErrorHandlerConfig {
	return {
		mappers: createCommonErrorMappers(),
	};
}
