/**
 * Action Requests
 *
 * The named actions a client can take on an existing instance. The first
 * key of the action body picks the action; everything the action needs is
 * validated here, before any orchestration call.
 */

import { Result, UseCaseError, parseInteger, validateOneOf, validateString } from '@computegate/application';
import type { InjectedFile, PasswordPolicy, RebootType } from '../../../domain/index.js';
import {
	adminPasswordFrom,
	injectedFilesFrom,
	lastPathSegment,
	metadataFrom,
	serverNameFrom,
} from '../field-validation.js';
import { isMapping, isPresent, type RequestBody } from '../request-body.js';

export const BASE_ACTIONS = [
	'changePassword',
	'reboot',
	'resize',
	'confirmResize',
	'revertResize',
	'rebuild',
	'createImage',
] as const;

/** Actions available only while the admin API is enabled */
export const ADMIN_ACTIONS = ['createBackup'] as const;

const REBOOT_TYPES: readonly RebootType[] = ['HARD', 'SOFT'];

export type ActionName = (typeof BASE_ACTIONS)[number] | (typeof ADMIN_ACTIONS)[number];

export type ActionRequest =
	| { readonly action: 'changePassword'; readonly adminPass: string }
	| { readonly action: 'reboot'; readonly rebootType: RebootType }
	| { readonly action: 'resize'; readonly flavorId: string }
	| { readonly action: 'confirmResize' }
	| { readonly action: 'revertResize' }
	| {
			readonly action: 'rebuild';
			readonly imageRef: string;
			readonly name?: string;
			readonly metadata?: Readonly<Record<string, string>>;
			readonly injectedFiles: readonly InjectedFile[];
			readonly adminPass: string;
	  }
	| { readonly action: 'createImage'; readonly name: string; readonly metadata: Readonly<Record<string, string>> }
	| {
			readonly action: 'createBackup';
			readonly name: string;
			readonly backupType: string;
			readonly rotation: number;
			readonly metadata: Readonly<Record<string, string>>;
	  };

export interface ActionRequestOptions {
	readonly allowAdminApi: boolean;
	readonly allowInstanceSnapshots: boolean;
	readonly passwordPolicy: PasswordPolicy;
}

function badRequest<T>(code: string, message: string): Result<T> {
	return Result.failure(UseCaseError.validation(code, message));
}

/**
 * Action names enabled under the given options.
 */
export function availableActions(options: Pick<ActionRequestOptions, 'allowAdminApi'>): readonly ActionName[] {
	return options.allowAdminApi ? [...BASE_ACTIONS, ...ADMIN_ACTIONS] : BASE_ACTIONS;
}

function isActionName(key: string, actions: readonly ActionName[]): key is ActionName {
	return actions.some((action) => action === key);
}

/**
 * Resolve and validate the action a body asks for.
 */
export function parseActionRequest(body: RequestBody, options: ActionRequestOptions): Result<ActionRequest> {
	const key = Object.keys(body)[0];
	if (key === undefined) {
		return badRequest('INVALID_REQUEST_BODY', 'Invalid request body');
	}

	const actions = availableActions(options);
	if (!isActionName(key, actions)) {
		return badRequest('UNKNOWN_ACTION', `There is no such server action: ${key}`);
	}

	const entity = body[key];
	switch (key) {
		case 'changePassword':
			return parseChangePassword(entity);
		case 'reboot':
			return parseReboot(entity);
		case 'resize':
			return parseResize(entity);
		case 'confirmResize':
			return Result.success({ action: 'confirmResize' });
		case 'revertResize':
			return Result.success({ action: 'revertResize' });
		case 'rebuild':
			return parseRebuild(entity, options.passwordPolicy);
		case 'createImage':
			if (!options.allowInstanceSnapshots) {
				return badRequest('SNAPSHOTS_DISABLED', 'Instance snapshots are not permitted at this time.');
			}
			return parseCreateImage(entity);
		case 'createBackup':
			return parseCreateBackup(entity);
	}
}

function parseChangePassword(entity: unknown): Result<ActionRequest> {
	if (!isMapping(entity) || !('adminPass' in entity)) {
		return badRequest('ADMIN_PASS_REQUIRED', 'No adminPass was specified');
	}
	const password = validateString(entity['adminPass'], 'adminPass', 'INVALID_ADMIN_PASS', 'Invalid adminPass');
	if (Result.isFailure(password)) return password;
	return Result.success({ action: 'changePassword', adminPass: password.value });
}

function parseReboot(entity: unknown): Result<ActionRequest> {
	if (!isMapping(entity) || !('type' in entity)) {
		return badRequest('REBOOT_TYPE_REQUIRED', "Missing argument 'type' for reboot");
	}
	const type = entity['type'];
	const rebootType = validateOneOf(
		typeof type === 'string' ? type.toUpperCase() : type,
		REBOOT_TYPES,
		'type',
		'INVALID_REBOOT_TYPE',
		"Argument 'type' for reboot is not HARD or SOFT",
	);
	if (Result.isFailure(rebootType)) return rebootType;
	return Result.success({ action: 'reboot', rebootType: rebootType.value });
}

function parseResize(entity: unknown): Result<ActionRequest> {
	if (!isMapping(entity) || !('flavorRef' in entity)) {
		return badRequest('FLAVOR_REF_REQUIRED', "Resize requests require 'flavorRef' attribute.");
	}
	const ref = entity['flavorRef'];
	const flavorId = typeof ref === 'string' || typeof ref === 'number' ? lastPathSegment(String(ref)) : '';
	if (flavorId === '' || ref === 0) {
		return badRequest('INVALID_FLAVOR_REF', "Resize request has invalid 'flavorRef' attribute.");
	}
	return Result.success({ action: 'resize', flavorId });
}

function parseRebuild(entity: unknown, passwordPolicy: PasswordPolicy): Result<ActionRequest> {
	const imageRef = isMapping(entity) ? entity['imageRef'] : undefined;
	if (!isMapping(entity) || (typeof imageRef !== 'string' && typeof imageRef !== 'number')) {
		return badRequest('IMAGE_REF_REQUIRED', 'Could not parse imageRef from request.');
	}

	let name: string | undefined;
	if (entity['name'] !== undefined && entity['name'] !== null) {
		const validated = serverNameFrom(entity['name']);
		if (Result.isFailure(validated)) return validated;
		name = validated.value;
	}

	let metadata: Record<string, string> | undefined;
	if (isPresent(entity['metadata'])) {
		const validated = metadataFrom(entity['metadata'], 'Unable to parse metadata key/value pairs.');
		if (Result.isFailure(validated)) return validated;
		metadata = validated.value;
	}

	let injectedFiles: InjectedFile[] = [];
	if (isPresent(entity['personality'])) {
		const files = injectedFilesFrom(entity['personality']);
		if (Result.isFailure(files)) return files;
		injectedFiles = files.value;
	}

	const adminPass = adminPasswordFrom(entity['adminPass'], passwordPolicy);
	if (Result.isFailure(adminPass)) return adminPass;

	return Result.success({
		action: 'rebuild',
		imageRef: String(imageRef),
		...(name !== undefined ? { name } : {}),
		...(metadata !== undefined ? { metadata } : {}),
		injectedFiles,
		adminPass: adminPass.value,
	});
}

function parseCreateImage(entity: unknown): Result<ActionRequest> {
	if (!isMapping(entity)) {
		return badRequest('MALFORMED_CREATE_IMAGE', 'Malformed createImage entity');
	}
	if (!('name' in entity)) {
		return badRequest('CREATE_IMAGE_NAME_REQUIRED', 'createImage entity requires name attribute');
	}
	const name = entity['name'];
	if (typeof name !== 'string') {
		return badRequest('MALFORMED_CREATE_IMAGE', 'Malformed createImage entity');
	}

	const metadata = metadataFrom(entity['metadata'], 'Invalid metadata');
	if (Result.isFailure(metadata)) return metadata;

	return Result.success({ action: 'createImage', name, metadata: metadata.value });
}

function parseCreateBackup(entity: unknown): Result<ActionRequest> {
	if (!isMapping(entity)) {
		return badRequest('MALFORMED_CREATE_BACKUP', 'Malformed createBackup entity');
	}
	for (const key of ['name', 'backup_type', 'rotation']) {
		if (!(key in entity)) {
			return badRequest('CREATE_BACKUP_ATTRIBUTE_REQUIRED', `createBackup entity requires ${key} attribute`);
		}
	}

	const name = entity['name'];
	const backupType = entity['backup_type'];
	if (typeof name !== 'string' || typeof backupType !== 'string') {
		return badRequest('MALFORMED_CREATE_BACKUP', 'Malformed createBackup entity');
	}

	const rotation = parseInteger(entity['rotation']);
	if (rotation === null) {
		return badRequest('INVALID_ROTATION', "createBackup attribute 'rotation' must be an integer");
	}

	const metadata = metadataFrom(entity['metadata'], 'Invalid metadata');
	if (Result.isFailure(metadata)) return metadata;

	return Result.success({ action: 'createBackup', name, backupType, rotation, metadata: metadata.value });
}
