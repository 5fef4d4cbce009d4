/**
 * Create request validation.
 *
 * Checks run in a fixed order and the first violation is the one reported.
 */

import { Result, UseCaseError, parseBoolean, type ExecutionContext } from '@computegate/application';
import type { PasswordPolicy, RequestedNetwork } from '../../../domain/index.js';
import {
	adminPasswordFrom,
	countFrom,
	flavorIdFrom,
	imageRefFrom,
	injectedFilesFrom,
	metadataFrom,
	optionalStringFrom,
	requestedNetworksFrom,
	securityGroupsFrom,
	serverNameFrom,
	userDataFrom,
} from '../field-validation.js';
import { isMapping, isPresent, type RequestBody } from '../request-body.js';
import type { CreateServerCommand } from './command.js';

/**
 * Derives a block device mapping from the server entity. Returning
 * undefined leaves the mapping unset.
 */
export type BlockDeviceMappingHook = (server: RequestBody) => unknown;

export interface CreateServerParseOptions {
	readonly baseUrl: string;
	readonly passwordPolicy: PasswordPolicy;
	readonly blockDeviceMapping?: BlockDeviceMappingHook | undefined;
}

const OPTIONAL_STRING_FIELDS = [
	['key_name', 'keyName'],
	['availability_zone', 'availabilityZone'],
	['accessIPv4', 'accessIpV4'],
	['accessIPv6', 'accessIpV6'],
] as const;

/**
 * Validate a create body into a CreateServerCommand.
 */
export function parseCreateServerCommand(
	body: RequestBody,
	context: ExecutionContext,
	options: CreateServerParseOptions,
): Result<CreateServerCommand> {
	if (Object.keys(body).length === 0 || !('server' in body)) {
		return Result.failure(UseCaseError.unprocessable('UNPROCESSABLE_ENTITY', 'Unable to process the contained instructions'));
	}

	const server = body['server'];
	if (!isMapping(server)) {
		return Result.failure(UseCaseError.validation('MALFORMED_SERVER_ENTITY', 'Malformed server entity'));
	}

	const adminPassword = adminPasswordFrom(server['adminPass'], options.passwordPolicy);
	if (Result.isFailure(adminPassword)) return adminPassword;

	const name = serverNameFrom(server['name']);
	if (Result.isFailure(name)) return name;

	const imageRef = imageRefFrom(server['imageRef'], options.baseUrl);
	if (Result.isFailure(imageRef)) return imageRef;

	let injectedFiles: CreateServerCommand['injectedFiles'] = [];
	if (isPresent(server['personality'])) {
		const files = injectedFilesFrom(server['personality']);
		if (Result.isFailure(files)) return files;
		injectedFiles = files.value;
	}

	const securityGroups = securityGroupsFrom(server['security_groups']);
	if (Result.isFailure(securityGroups)) return securityGroups;

	let requestedNetworks: RequestedNetwork[] | null = null;
	if (server['networks'] !== undefined && server['networks'] !== null) {
		const networks = requestedNetworksFrom(server['networks']);
		if (Result.isFailure(networks)) return networks;
		requestedNetworks = networks.value;
	}

	const flavorId = flavorIdFrom(server['flavorRef']);
	if (Result.isFailure(flavorId)) return flavorId;

	const userData = userDataFrom(server['user_data']);
	if (Result.isFailure(userData)) return userData;

	const blockDeviceMapping = options.blockDeviceMapping?.(server);

	// Only admins may choose their own reservation id
	const requestedReservation = server['reservation_id'];
	const reservationId =
		context.isAdmin && typeof requestedReservation === 'string' && requestedReservation !== ''
			? requestedReservation
			: null;

	const returnReservationId = parseBoolean(server['return_reservation_id']);

	const minCount = countFrom(server['min_count'], 1, 'min_count');
	if (Result.isFailure(minCount)) return minCount;
	const maxCount = countFrom(server['max_count'], minCount.value, 'max_count');
	if (Result.isFailure(maxCount)) return maxCount;

	const metadata = metadataFrom(server['metadata'], 'Unable to parse metadata key/value pairs.');
	if (Result.isFailure(metadata)) return metadata;

	const optionalStrings: Partial<Record<(typeof OPTIONAL_STRING_FIELDS)[number][1], string>> = {};
	for (const [field, property] of OPTIONAL_STRING_FIELDS) {
		const value = optionalStringFrom(server[field], field);
		if (Result.isFailure(value)) return value;
		if (value.value !== undefined) {
			optionalStrings[property] = value.value;
		}
	}

	const autoDiskConfig = server['auto_disk_config'];

	return Result.success({
		_type: 'CreateServer',
		displayName: name.value,
		displayDescription: name.value,
		imageRef: imageRef.value,
		flavorId: flavorId.value,
		adminPassword: adminPassword.value,
		metadata: metadata.value,
		injectedFiles,
		securityGroups: securityGroups.value,
		requestedNetworks,
		reservationId,
		returnReservationId,
		// A lower bound above the upper bound is lowered, never rejected
		minCount: Math.min(minCount.value, maxCount.value),
		maxCount: maxCount.value,
		...optionalStrings,
		...(userData.value !== undefined ? { userData: userData.value } : {}),
		...(blockDeviceMapping !== undefined ? { blockDeviceMapping } : {}),
		...(autoDiskConfig !== undefined && autoDiskConfig !== null
			? { autoDiskConfig: parseBoolean(autoDiskConfig) }
			: {}),
		...('config_drive' in server ? { configDrive: server['config_drive'] } : {}),
	});
}
