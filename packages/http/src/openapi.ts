/**
 * Schema Integration
 *
 * TypeBox schemas shared by route definitions. TypeBox generates JSON Schema
 * directly, which Fastify compiles with AJV for params and response shapes.
 */

import { Type, type Static } from '@sinclair/typebox';

/**
 * Standard error response schema.
 */
export const ErrorResponseSchema = Type.Object({
	message: Type.String({ description: 'Human-readable error message' }),
	code: Type.String({ description: 'Machine-readable error code' }),
	details: Type.Optional(Type.Record(Type.String(), Type.Unknown(), { description: 'Additional error details' })),
});

/**
 * Response schemas for the error statuses a route can produce.
 *
 * @example
 * ```typescript
 * fastify.delete('/servers/:id', {
 *     schema: { params: ServerParams, response: errorResponses(404) },
 * }, handler);
 * ```
 */
export function errorResponses(...statuses: number[]): Record<number, typeof ErrorResponseSchema> {
	const responses: Record<number, typeof ErrorResponseSchema> = {};
	for (const status of statuses) {
		responses[status] = ErrorResponseSchema;
	}
	return responses;
}

// Re-export TypeBox for convenience
export { Type, type Static };
