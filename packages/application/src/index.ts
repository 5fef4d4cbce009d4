/**
 * @computegate/application
 *
 * Application layer patterns for the compute gateway:
 * - Command types for validated write inputs
 * - UseCase interfaces for business operations
 * - Validation and coercion utilities for loosely typed request data
 *
 * @example
 * ```typescript
 * import { UseCase, validateString, Result, UseCaseError } from '@computegate/application';
 *
 * const resize: UseCase<ResizeInput, void> = {
 *     async execute(input, context) {
 *         const flavor = validateString(input.flavorRef, 'flavorRef', 'INVALID_FLAVOR_REF', 'Invalid flavorRef');
 *         if (Result.isFailure(flavor)) return flavor;
 *         // ...
 *     },
 * };
 * ```
 */

// Command types
export type { Command } from './command.js';

// UseCase types
export type { UseCase } from './use-case.js';

// Validation utilities
export {
	validateString,
	validateOneOf,
	validateBase64,
	isUuidLike,
	isValidIpv4,
	parseInteger,
	parseBoolean,
} from './validation.js';

// Re-export core types for convenience
export {
	Result,
	UseCaseError,
	ExecutionContext,
	type CallerIdentity,
	type Success,
	type Failure,
} from '@computegate/domain-core';
