/**
 * Search Options
 *
 * Turns list query parameters into the filters passed to `getAll`.
 */

import { Result, UseCaseError, parseBoolean, type ExecutionContext } from '@computegate/application';
import type { LogWriter } from '@computegate/logging';
import { vmStateFromStatus, type SearchOptions } from '../../../domain/index.js';

/** Filters any caller may use */
export const PUBLIC_SEARCH_OPTIONS: readonly string[] = [
	'reservation_id',
	'name',
	'local_zone_only',
	'status',
	'image',
	'flavor',
	'changes-since',
];

const ISO_8601 = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;
const HAS_ZONE = /(Z|[+-]\d{2}:?\d{2})$/;

export interface SearchOptionsConfig {
	readonly allowAdminApi: boolean;
	readonly logger?: LogWriter | undefined;
}

/**
 * Parse an ISO-8601 timestamp. A timestamp without a zone is read as UTC.
 * Returns null when the value is not a valid timestamp.
 */
export function parseIsoTime(value: string): Date | null {
	if (!ISO_8601.test(value)) {
		return null;
	}
	const parsed = new Date(HAS_ZONE.test(value) ? value : `${value}Z`);
	return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Flatten query parameters to one string per key; the last of a repeated
 * parameter wins.
 */
export function flattenQuery(query: unknown): Record<string, string> {
	const flat: Record<string, string> = {};
	if (typeof query !== 'object' || query === null) {
		return flat;
	}
	for (const [key, value] of Object.entries(query)) {
		const last: unknown = Array.isArray(value) ? value[value.length - 1] : value;
		if (typeof last === 'string') {
			flat[key] = last;
		}
	}
	return flat;
}

/**
 * Remove the filters an unprivileged caller may not use. Privileged means
 * an admin caller while the admin API is enabled.
 */
export function removeInvalidOptions(
	options: Record<string, string>,
	context: ExecutionContext,
	config: SearchOptionsConfig,
): Record<string, string> {
	if (config.allowAdminApi && context.isAdmin) {
		return { ...options };
	}

	const kept: Record<string, string> = {};
	const removed: string[] = [];
	for (const [key, value] of Object.entries(options)) {
		if (PUBLIC_SEARCH_OPTIONS.includes(key)) {
			kept[key] = value;
		} else {
			removed.push(key);
		}
	}

	if (removed.length > 0) {
		config.logger?.debug(
			{ removed, correlationId: context.correlationId },
			`Removing options '${removed.join(', ')}' from query`,
		);
	}
	return kept;
}

/**
 * Build the `getAll` filters for a list request.
 */
export function buildSearchOptions(
	query: unknown,
	context: ExecutionContext,
	config: SearchOptionsConfig,
): Result<SearchOptions> {
	const options: Record<string, string | boolean | Date> = removeInvalidOptions(flattenQuery(query), context, config);

	options['local_zone_only'] = parseBoolean(options['local_zone_only'] ?? false);

	const status = options['status'];
	if (typeof status === 'string') {
		const vmState = vmStateFromStatus(status);
		if (vmState === null) {
			return Result.failure(
				UseCaseError.validation('INVALID_SERVER_STATUS', `Invalid server status: ${status}`, { status }),
			);
		}
		options['vm_state'] = vmState;
	}

	const changesSince = options['changes-since'];
	if (typeof changesSince === 'string') {
		const parsed = parseIsoTime(changesSince);
		if (parsed === null) {
			return Result.failure(UseCaseError.validation('INVALID_CHANGES_SINCE', 'Invalid changes-since value'));
		}
		options['changes-since'] = parsed;
	}

	const deleted = options['deleted'];
	if (deleted !== undefined) {
		options['deleted'] = parseBoolean(deleted);
	} else if (changesSince === undefined) {
		// Deleted instances are listed only when asking for recent changes
		options['deleted'] = false;
	}

	return Result.success(options);
}
