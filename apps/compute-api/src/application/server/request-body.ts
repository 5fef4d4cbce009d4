/**
 * Canonical request body: the mapping both wire encodings decode to.
 */
export type RequestBody = Record<string, unknown>;

/**
 * Whether a value is a mapping (a plain object, not an array).
 */
export function isMapping(value: unknown): value is RequestBody {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Whether a value is a mapping of string keys to string values.
 */
export function isStringMap(value: unknown): value is Record<string, string> {
	return isMapping(value) && Object.values(value).every((entry) => typeof entry === 'string');
}

/**
 * Truthiness for loosely typed request fields: null, undefined,
 * false, 0, '' and empty collections are falsy.
 */
export function isPresent(value: unknown): boolean {
	if (value === null || value === undefined || value === false || value === 0 || value === '') {
		return false;
	}
	if (Array.isArray(value)) {
		return value.length > 0;
	}
	if (isMapping(value)) {
		return Object.keys(value).length > 0;
	}
	return true;
}
