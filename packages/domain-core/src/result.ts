/**
 * Result Type for Use Case Execution
 *
 * This is a discriminated union with two variants:
 * - Success<T> - contains the successful result value
 * - Failure<T> - contains the error details
 *
 * Usage in use cases:
 * ```typescript
 * if (!isValid) {
 *     return Result.failure(UseCaseError.validation('INVALID', 'Invalid input'));
 * }
 * return Result.success(instance);
 * ```
 *
 * Usage in API layer:
 * ```typescript
 * if (Result.isSuccess(result)) {
 *     return reply.status(202).send(result.value);
 * }
 * return reply.status(UseCaseError.httpStatus(result.error)).send(result.error);
 * ```
 */

import type { UseCaseError } from './errors.js';

/**
 * Successful result containing the value.
 */
export interface Success<T> {
	readonly _tag: 'success';
	readonly value: T;
}

/**
 * Failed result containing the error.
 */
export interface Failure<T> {
	readonly _tag: 'failure';
	readonly error: UseCaseError;
}

/**
 * Result type - either Success or Failure.
 */
export type Result<T> = Success<T> | Failure<T>;

/**
 * Type guard to check if a result is a success.
 */
export function isSuccess<T>(result: Result<T>): result is Success<T> {
	return result._tag === 'success';
}

/**
 * Type guard to check if a result is a failure.
 */
export function isFailure<T>(result: Result<T>): result is Failure<T> {
	return result._tag === 'failure';
}

/**
 * Result factory functions.
 */
export const Result = {
	/**
	 * Create a successful result.
	 */
	success<T>(value: T): Success<T> {
		return { _tag: 'success', value };
	},

	/**
	 * Create a failed result.
	 *
	 * @param error - The use case error
	 */
	failure<T>(error: UseCaseError): Failure<T> {
		return { _tag: 'failure', error };
	},

	isSuccess,

	isFailure,

	/**
	 * Map a successful result to a new value.
	 */
	map<T, U>(result: Result<T>, fn: (value: T) => U): Result<U> {
		if (isSuccess(result)) {
			return { _tag: 'success', value: fn(result.value) };
		}
		return { _tag: 'failure', error: result.error };
	},

	/**
	 * Chain a result-producing step onto a successful result.
	 * The first failure short-circuits the chain.
	 */
	andThen<T, U>(result: Result<T>, fn: (value: T) => Result<U>): Result<U> {
		if (isSuccess(result)) {
			return fn(result.value);
		}
		return { _tag: 'failure', error: result.error };
	},

	/**
	 * Match on a result, handling both success and failure cases.
	 */
	match<T, U>(result: Result<T>, onSuccess: (value: T) => U, onFailure: (error: UseCaseError) => U): U {
		if (isSuccess(result)) {
			return onSuccess(result.value);
		}
		return onFailure(result.error);
	},

	/**
	 * Get the value from a success result, or throw an error.
	 *
	 * @throws Error if the result is a failure
	 */
	unwrap<T>(result: Result<T>): T {
		if (isSuccess(result)) {
			return result.value;
		}
		throw new Error(`Cannot unwrap failure result: ${result.error.code} - ${result.error.message}`);
	},

	/**
	 * Get the value from a success result, or return a default.
	 */
	unwrapOr<T>(result: Result<T>, defaultValue: T): T {
		if (isSuccess(result)) {
			return result.value;
		}
		return defaultValue;
	},
};
