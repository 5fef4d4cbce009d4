/**
 * Response Utilities
 *
 * Utilities for mapping Result types to HTTP responses and
 * handling errors consistently with Fastify.
 */

import type { FastifyReply } from 'fastify';
import { Result, UseCaseError } from '@computegate/domain-core';
import type { ErrorResponse } from './types.js';

/**
 * Get HTTP status code for a use case error.
 */
export function getErrorStatus(error: UseCaseError): number {
	return UseCaseError.httpStatus(error);
}

/**
 * Convert a use case error to an error response.
 */
export function toErrorResponse(error: UseCaseError): ErrorResponse {
	const hasDetails = Object.keys(error.details).length > 0;
	return {
		message: error.message,
		code: error.code,
		...(hasDetails ? { details: error.details } : {}),
	};
}

/**
 * Send a use case error with its mapped status.
 * Too-large errors carry their retry hint in a Retry-After header.
 */
export function sendError(reply: FastifyReply, error: UseCaseError): FastifyReply {
	if (error.type === 'too_large') {
		reply.header('retry-after', String(error.retryAfter));
	}
	return reply.status(getErrorStatus(error)).send(toErrorResponse(error));
}

/**
 * Options for sending a result as HTTP response.
 */
export interface SendResultOptions<T, R> {
	/** Status code for success (default: 200) */
	successStatus?: number;
	/** Transform success value before sending */
	transform?: (value: T) => R;
}

/**
 * Send a Result as an HTTP response.
 *
 * On success, sends the value (optionally transformed) with the success status.
 * On failure, maps the error to an appropriate HTTP status and error response.
 *
 * @example
 * ```typescript
 * fastify.put('/v1.1/:projectId/servers/:id', async (request, reply) => {
 *     const result = await updateServer.execute(input, request.executionContext);
 *     return sendResult(reply, result, { transform: (server) => ({ server }) });
 * });
 * ```
 */
export function sendResult<T, R = T>(
	reply: FastifyReply,
	result: Result<T>,
	options: SendResultOptions<T, R> = {},
): FastifyReply {
	const { successStatus = 200, transform } = options;

	if (Result.isSuccess(result)) {
		const value = transform ? transform(result.value) : result.value;
		return reply.status(successStatus).send(value);
	}

	return sendError(reply, result.error);
}

/**
 * Match on a Result and return appropriate HTTP responses.
 *
 * More flexible than sendResult: the success handler decides status,
 * headers and body.
 *
 * @example
 * ```typescript
 * return matchResult(reply, result, (outcome) =>
 *     outcome.location
 *         ? reply.status(202).header('location', outcome.location).send()
 *         : reply.status(outcome.status).send(outcome.body),
 * );
 * ```
 */
export function matchResult<T>(
	reply: FastifyReply,
	result: Result<T>,
	onSuccess: (value: T, reply: FastifyReply) => FastifyReply,
	onFailure?: (error: UseCaseError, reply: FastifyReply) => FastifyReply,
): FastifyReply {
	if (Result.isSuccess(result)) {
		return onSuccess(result.value, reply);
	}

	if (onFailure) {
		return onFailure(result.error, reply);
	}

	return sendError(reply, result.error);
}

/**
 * Create a no content (204) response.
 */
export function noContent(reply: FastifyReply): FastifyReply {
	return reply.status(204).send();
}
