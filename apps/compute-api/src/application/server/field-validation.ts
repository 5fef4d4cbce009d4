/**
 * Field Validation
 *
 * Per-field checks shared by the create, update and rebuild paths. Each
 * check returns the cleaned value or the single rejection the client sees.
 */

import {
	Result,
	UseCaseError,
	isUuidLike,
	isValidIpv4,
	parseInteger,
	validateBase64,
	validateString,
} from '@computegate/application';
import type { InjectedFile, PasswordPolicy, RequestedNetwork } from '../../domain/index.js';
import { isMapping, isStringMap } from './request-body.js';

const DEFAULT_SECURITY_GROUP = 'default';

function badRequest<T>(code: string, message: string, details: Record<string, unknown> = {}): Result<T> {
	return Result.failure(UseCaseError.validation(code, message, details));
}

/**
 * The last path segment of a reference, ignoring any query or fragment.
 */
export function lastPathSegment(ref: string): string {
	const path = ref.split(/[?#]/)[0] ?? '';
	const segments = path.split('/');
	return segments[segments.length - 1] ?? '';
}

/**
 * Admin password for a new or rebuilt instance. Absent (or null) means the
 * policy generates one.
 */
export function adminPasswordFrom(value: unknown, policy: PasswordPolicy): Result<string> {
	if (value === undefined || value === null) {
		return Result.success(policy.generate());
	}
	return validateString(value, 'adminPass', 'INVALID_ADMIN_PASS', 'Invalid adminPass');
}

/**
 * Server display name, trimmed.
 */
export function serverNameFrom(value: unknown): Result<string> {
	if (value === undefined) {
		return badRequest('SERVER_NAME_NOT_DEFINED', 'Server name is not defined');
	}
	if (typeof value !== 'string') {
		return badRequest('SERVER_NAME_NOT_STRING', 'Server name is not a string or unicode');
	}
	const name = value.trim();
	if (name === '') {
		return badRequest('SERVER_NAME_EMPTY', 'Server name is an empty string');
	}
	return Result.success(name);
}

/**
 * Image reference. A reference under this service's own base URL is
 * reduced to the image id.
 */
export function imageRefFrom(value: unknown, baseUrl: string): Result<string> {
	const ref = typeof value === 'number' ? String(value) : value;
	if (typeof ref !== 'string' || ref === '') {
		return badRequest('IMAGE_REF_REQUIRED', 'Missing imageRef attribute');
	}
	if (ref.startsWith(baseUrl)) {
		return Result.success(lastPathSegment(ref));
	}
	return Result.success(ref);
}

/**
 * Flavor id from a flavor reference: a bare id or a URL ending in one.
 */
export function flavorIdFrom(value: unknown): Result<string> {
	if (value === undefined) {
		return badRequest('FLAVOR_REF_REQUIRED', 'Missing flavorRef attribute');
	}
	const ref = typeof value === 'number' ? String(value) : value;
	const flavorId = typeof ref === 'string' ? lastPathSegment(ref) : '';
	if (flavorId === '') {
		return badRequest('INVALID_FLAVOR_REF', 'Invalid flavorRef provided.');
	}
	return Result.success(flavorId);
}

/**
 * Files to inject from a personality list of `{path, contents}` entries,
 * contents base64-encoded.
 */
export function injectedFilesFrom(personality: unknown): Result<InjectedFile[]> {
	if (!Array.isArray(personality)) {
		return badRequest('BAD_PERSONALITY', 'Bad personality format');
	}

	const files: InjectedFile[] = [];
	for (const item of personality) {
		if (!isMapping(item)) {
			return badRequest('BAD_PERSONALITY', 'Bad personality format');
		}
		for (const key of ['path', 'contents']) {
			if (!(key in item)) {
				return badRequest('BAD_PERSONALITY', `Bad personality format: missing ${key}`, { missing: key });
			}
		}
		const path = item['path'];
		if (typeof path !== 'string') {
			return badRequest('BAD_PERSONALITY', 'Bad personality format');
		}

		const contents = validateBase64(
			item['contents'],
			'personality.contents',
			'BAD_PERSONALITY_CONTENTS',
			`Personality content for ${path} cannot be decoded`,
		);
		if (Result.isFailure(contents)) {
			return contents;
		}
		files.push({ path, contents: contents.value });
	}
	return Result.success(files);
}

/**
 * Security group names. Entries with an empty name are skipped, duplicates
 * are dropped keeping the first occurrence, and an empty result means the
 * default group. Blank names are left for the orchestrator to reject.
 */
export function securityGroupsFrom(value: unknown): Result<string[]> {
	if (value === undefined || value === null) {
		return Result.success([DEFAULT_SECURITY_GROUP]);
	}
	if (!Array.isArray(value)) {
		return badRequest('BAD_SECURITY_GROUPS', 'Bad security_groups format');
	}

	const names = new Set<string>();
	for (const group of value) {
		if (!isMapping(group)) {
			return badRequest('BAD_SECURITY_GROUPS', 'Bad security_groups format');
		}
		const name = group['name'];
		if (name === undefined || name === null || name === '') {
			continue;
		}
		if (typeof name !== 'string') {
			return badRequest('BAD_SECURITY_GROUPS', 'Bad security_groups format');
		}
		names.add(name);
	}

	return Result.success(names.size > 0 ? [...names] : [DEFAULT_SECURITY_GROUP]);
}

/**
 * Requested networks. Each entry names a network by UUID and may pin a
 * fixed IPv4 address; a network may be requested only once.
 */
export function requestedNetworksFrom(value: unknown): Result<RequestedNetwork[]> {
	if (!Array.isArray(value)) {
		return badRequest('BAD_NETWORKS', 'Bad networks format');
	}

	const networks: RequestedNetwork[] = [];
	for (const network of value) {
		if (!isMapping(network)) {
			return badRequest('BAD_NETWORKS', 'Bad networks format');
		}
		if (!('uuid' in network)) {
			return badRequest('BAD_NETWORKS', 'Bad network format: missing uuid', { missing: 'uuid' });
		}

		const networkId = network['uuid'];
		if (!isUuidLike(networkId)) {
			return badRequest(
				'BAD_NETWORKS',
				`Bad networks format: network uuid is not in proper format (${String(networkId)})`,
			);
		}

		const fixedIp = network['fixed_ip'];
		if (fixedIp !== undefined && fixedIp !== null && !isValidIpv4(fixedIp)) {
			return badRequest('INVALID_FIXED_IP', `Invalid fixed IP address (${String(fixedIp)})`);
		}

		if (networks.some((requested) => requested.networkId === networkId)) {
			return badRequest('DUPLICATE_NETWORKS', `Duplicate networks (${networkId}) are not allowed`);
		}

		networks.push(typeof fixedIp === 'string' ? { networkId, fixedIp } : { networkId });
	}
	return Result.success(networks);
}

/**
 * Check that user data, when given, is base64-encoded.
 */
export function userDataFrom(value: unknown): Result<string | undefined> {
	if (value === undefined || value === null || value === '') {
		return Result.success(undefined);
	}
	const decoded = validateBase64(value, 'user_data', 'BAD_USER_DATA', 'Userdata content cannot be decoded');
	if (Result.isFailure(decoded)) {
		return decoded;
	}
	return Result.success(String(value));
}

/**
 * An instance count. Any falsy value (absent, null, empty, zero) means the
 * fallback.
 */
export function countFrom(value: unknown, fallback: number, field: 'min_count' | 'max_count'): Result<number> {
	if (value === undefined || value === null || value === '' || value === 0 || value === false) {
		return Result.success(fallback);
	}
	const count = parseInteger(value);
	if (count === null || count < 1) {
		return badRequest('INVALID_COUNT', `Invalid ${field} value`, { field });
	}
	return Result.success(count);
}

/**
 * Metadata mapping of string keys to string values. Absent means empty.
 */
export function metadataFrom(value: unknown, message: string): Result<Record<string, string>> {
	if (value === undefined || value === null) {
		return Result.success({});
	}
	if (!isStringMap(value)) {
		return badRequest('INVALID_METADATA', message);
	}
	return Result.success({ ...value });
}

/**
 * An optional string field. Absent or null means not given.
 */
export function optionalStringFrom(value: unknown, field: string): Result<string | undefined> {
	if (value === undefined || value === null) {
		return Result.success(undefined);
	}
	if (typeof value !== 'string') {
		return badRequest('INVALID_FIELD', `Invalid ${field}`, { field });
	}
	return Result.success(value);
}
