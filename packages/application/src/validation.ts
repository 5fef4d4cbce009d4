/**
 * Validation Utilities
 *
 * Helper functions for common validation patterns in use cases.
 * All validation functions return Result types for consistent error handling.
 *
 * @example
 * ```typescript
 * const passResult = validateString(body['adminPass'], 'adminPass', 'INVALID_ADMIN_PASS', 'Invalid adminPass');
 * if (Result.isFailure(passResult)) return passResult;
 *
 * const filesResult = validateBase64(contents, 'contents', 'BAD_PERSONALITY', 'Personality content could not be decoded');
 * if (Result.isFailure(filesResult)) return filesResult;
 * ```
 */

import { Result, UseCaseError } from '@computegate/domain-core';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;
const UUID_HEX_PATTERN = /^[0-9a-fA-F]{32}$/;
const IPV4_OCTET_PATTERN = /^\d{1,3}$/;

/**
 * Validate that a value is a non-empty string.
 */
export function validateString(
	value: unknown,
	fieldName: string,
	errorCode: string,
	errorMessage: string,
): Result<string> {
	if (typeof value !== 'string' || value === '') {
		return Result.failure(UseCaseError.validation(errorCode, errorMessage, { field: fieldName }));
	}
	return Result.success(value);
}

/**
 * Validate that a value is one of the allowed values.
 */
export function validateOneOf<T>(
	value: unknown,
	allowedValues: readonly T[],
	fieldName: string,
	errorCode: string,
	errorMessage?: string,
): Result<T> {
	const match = allowedValues.find((allowed) => allowed === value);
	if (match === undefined) {
		return Result.failure(
			UseCaseError.validation(errorCode, errorMessage ?? `${fieldName} must be one of: ${allowedValues.join(', ')}`, {
				field: fieldName,
				value,
				allowedValues,
			}),
		);
	}

	return Result.success(match);
}

/**
 * Decode strict base64 (standard alphabet, padded). Whitespace such as the
 * line breaks of an XML text node is ignored.
 */
export function validateBase64(
	value: unknown,
	fieldName: string,
	errorCode: string,
	errorMessage: string,
): Result<Buffer> {
	if (typeof value !== 'string') {
		return Result.failure(UseCaseError.validation(errorCode, errorMessage, { field: fieldName }));
	}

	const compact = value.replace(/\s+/g, '');
	if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
		return Result.failure(UseCaseError.validation(errorCode, errorMessage, { field: fieldName }));
	}

	return Result.success(Buffer.from(compact, 'base64'));
}

/**
 * Check whether a value looks like a UUID: 32 hex digits once hyphens,
 * surrounding braces and a `urn:uuid:` prefix are removed.
 */
export function isUuidLike(value: unknown): value is string {
	if (typeof value !== 'string') return false;
	const hex = value
		.replaceAll('urn:', '')
		.replaceAll('uuid:', '')
		.replace(/^[{}]+|[{}]+$/g, '')
		.replaceAll('-', '');
	return UUID_HEX_PATTERN.test(hex);
}

/**
 * Check whether a value is a dotted-quad IPv4 address (four decimal octets, 0-255).
 */
export function isValidIpv4(value: unknown): value is string {
	if (typeof value !== 'string') return false;
	const parts = value.split('.');
	if (parts.length !== 4) return false;
	return parts.every((part) => IPV4_OCTET_PATTERN.test(part) && Number.parseInt(part, 10) <= 255);
}

/**
 * Parse an integer given either as a number or as a decimal string.
 * Returns null when the value is not an integer.
 */
export function parseInteger(value: unknown): number | null {
	if (typeof value === 'number') {
		return Number.isInteger(value) ? value : null;
	}
	if (typeof value === 'string' && INTEGER_PATTERN.test(value)) {
		return Number.parseInt(value, 10);
	}
	return null;
}

/**
 * Interpret a loosely typed flag. Integers (or integer strings) are true when
 * non-zero; other strings are true only when they read "true" in any case.
 */
export function parseBoolean(value: unknown): boolean {
	if (typeof value === 'boolean') return value;
	if (typeof value === 'number') return value !== 0;
	if (typeof value !== 'string' || value === '') return false;

	const asInteger = parseInteger(value);
	if (asInteger !== null) return asInteger !== 0;

	return value.toLowerCase() === 'true';
}
