/**
 * Use Case Error Types
 *
 * Sealed error hierarchy for use case failures. Errors are categorized by type
 * to enable consistent HTTP status mapping and client-side handling.
 *
 * HTTP Status Mapping:
 * - ValidationError → 400 Bad Request
 * - NotFoundError → 404 Not Found
 * - BusinessRuleViolation → 409 Conflict
 * - TooLargeError → 413 Request Entity Too Large
 * - UnprocessableError → 422 Unprocessable Entity
 */

/**
 * Base interface for all use case errors.
 */
export interface UseCaseErrorBase {
	readonly type: string;
	readonly code: string;
	readonly message: string;
	readonly details: Record<string, unknown>;
}

/**
 * Input validation failed (missing required fields, invalid format, etc.)
 * Maps to HTTP 400 Bad Request.
 */
export interface ValidationError extends UseCaseErrorBase {
	readonly type: 'validation';
}

/**
 * Entity not found.
 * Maps to HTTP 404 Not Found.
 */
export interface NotFoundError extends UseCaseErrorBase {
	readonly type: 'not_found';
}

/**
 * Business rule violation (entity in wrong state, busy, etc.)
 * Maps to HTTP 409 Conflict.
 */
export interface BusinessRuleViolation extends UseCaseErrorBase {
	readonly type: 'business_rule';
}

/**
 * A limit owned by a downstream service was exceeded.
 * Maps to HTTP 413, with `retryAfter` (seconds) in the details.
 */
export interface TooLargeError extends UseCaseErrorBase {
	readonly type: 'too_large';
	readonly retryAfter: number;
}

/**
 * The request was understood but cannot be acted on as sent.
 * Maps to HTTP 422 Unprocessable Entity.
 */
export interface UnprocessableError extends UseCaseErrorBase {
	readonly type: 'unprocessable';
}

/**
 * Union type for all use case errors.
 */
export type UseCaseError =
	| ValidationError
	| NotFoundError
	| BusinessRuleViolation
	| TooLargeError
	| UnprocessableError;

export type UseCaseErrorType = UseCaseError['type'];

/**
 * Factory functions for creating errors.
 */
export const UseCaseError = {
	/**
	 * Create a validation error.
	 *
	 * @example
	 * ```typescript
	 * UseCaseError.validation('INVALID_ADMIN_PASS', 'Invalid adminPass')
	 * ```
	 */
	validation(code: string, message: string, details: Record<string, unknown> = {}): ValidationError {
		return { type: 'validation', code, message, details };
	},

	/**
	 * Create a not found error.
	 *
	 * @example
	 * ```typescript
	 * UseCaseError.notFound('SERVER_NOT_FOUND', 'Instance could not be found', { id: serverId })
	 * ```
	 */
	notFound(code: string, message: string, details: Record<string, unknown> = {}): NotFoundError {
		return { type: 'not_found', code, message, details };
	},

	/**
	 * Create a business rule violation error.
	 *
	 * @example
	 * ```typescript
	 * UseCaseError.businessRule('INSTANCE_BUSY', 'Server is currently creating an image. Please wait.')
	 * ```
	 */
	businessRule(code: string, message: string, details: Record<string, unknown> = {}): BusinessRuleViolation {
		return { type: 'business_rule', code, message, details };
	},

	/**
	 * Create a too-large error. `retryAfter` is surfaced as the Retry-After header.
	 */
	tooLarge(code: string, message: string, retryAfter = 0, details: Record<string, unknown> = {}): TooLargeError {
		return { type: 'too_large', code, message, retryAfter, details };
	},

	/**
	 * Create an unprocessable error.
	 */
	unprocessable(code: string, message: string, details: Record<string, unknown> = {}): UnprocessableError {
		return { type: 'unprocessable', code, message, details };
	},

	/**
	 * Get the HTTP status code for an error.
	 */
	httpStatus(error: UseCaseError): number {
		switch (error.type) {
			case 'validation':
				return 400;
			case 'not_found':
				return 404;
			case 'business_rule':
				return 409;
			case 'too_large':
				return 413;
			case 'unprocessable':
				return 422;
		}
	},

	/**
	 * Check if an unknown value is a UseCaseError.
	 */
	isUseCaseError(value: unknown): value is UseCaseError {
		if (typeof value !== 'object' || value === null) return false;
		return (
			'type' in value &&
			typeof value.type === 'string' &&
			'code' in value &&
			typeof value.code === 'string' &&
			'message' in value &&
			typeof value.message === 'string' &&
			'details' in value &&
			typeof value.details === 'object'
		);
	},
};
