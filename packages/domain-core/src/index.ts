/**
 * @computegate/domain-core
 *
 * Core infrastructure shared by the compute gateway:
 * - Result type
 * - Use case error types with HTTP status mapping
 * - Execution context carrying tracing IDs and caller identity
 *
 * @example
 * ```typescript
 * import { Result, UseCaseError, ExecutionContext } from '@computegate/domain-core';
 *
 * const ctx = ExecutionContext.create({ principalId: 'user-1', projectId: 'proj-1', isAdmin: false });
 *
 * if (!isValid(input)) {
 *     return Result.failure(UseCaseError.validation('INVALID', 'Invalid input'));
 * }
 * return Result.success(value);
 * ```
 */

// Error types
export {
	UseCaseError,
	type UseCaseErrorBase,
	type UseCaseErrorType,
	type ValidationError,
	type NotFoundError,
	type BusinessRuleViolation,
	type TooLargeError,
	type UnprocessableError,
} from './errors.js';

// Result type
export { Result, isSuccess, isFailure, type Success, type Failure } from './result.js';

// Execution context
export { ExecutionContext, type CallerIdentity } from './execution-context.js';
