/**
 * Update Server Use Case
 */

import type { UseCase } from '@computegate/application';
import { Result, UseCaseError, parseBoolean, type ExecutionContext } from '@computegate/application';
import type { ComputeOrchestrator, InstanceRecord } from '../../../domain/index.js';
import { classifyComputeError } from '../error-classifier.js';
import { serverNameFrom } from '../field-validation.js';
import { lookupInstance } from '../lookup.js';
import { isMapping, type RequestBody } from '../request-body.js';
import type { UpdateServerCommand } from './command.js';

export interface UpdateServerInput {
	readonly serverId: string;
	readonly body: RequestBody;
}

export interface UpdateServerUseCaseDeps {
	readonly orchestrator: ComputeOrchestrator;
}

/**
 * Validate an update body into a sparse patch. Fields not in the body are
 * left out of the patch.
 */
export function parseUpdateServerCommand(serverId: string, body: RequestBody): Result<UpdateServerCommand> {
	if (Object.keys(body).length === 0 || !('server' in body)) {
		return Result.failure(UseCaseError.unprocessable('UNPROCESSABLE_ENTITY', 'Unable to process the contained instructions'));
	}

	const server = body['server'];
	if (!isMapping(server)) {
		return Result.failure(UseCaseError.validation('MALFORMED_SERVER_ENTITY', 'Malformed server entity'));
	}

	let displayName: string | undefined;
	if ('name' in server) {
		const name = serverNameFrom(server['name']);
		if (Result.isFailure(name)) return name;
		displayName = name.value;
	}

	const addresses: { accessIpV4?: string; accessIpV6?: string } = {};
	for (const [field, property] of [
		['accessIPv4', 'accessIpV4'],
		['accessIPv6', 'accessIpV6'],
	] as const) {
		if (!(field in server)) continue;
		const value = server[field];
		if (typeof value !== 'string') {
			return Result.failure(UseCaseError.validation('INVALID_FIELD', `Invalid ${field}`, { field }));
		}
		addresses[property] = value.trim();
	}

	return Result.success({
		_type: 'UpdateServer',
		serverId,
		...(displayName !== undefined ? { displayName } : {}),
		...addresses,
		...('auto_disk_config' in server ? { autoDiskConfig: parseBoolean(server['auto_disk_config']) } : {}),
	});
}

export function createUpdateServerUseCase(deps: UpdateServerUseCaseDeps): UseCase<UpdateServerInput, InstanceRecord> {
	const { orchestrator } = deps;

	return {
		async execute(input: UpdateServerInput, context: ExecutionContext): Promise<Result<InstanceRecord>> {
			const parsed = parseUpdateServerCommand(input.serverId, input.body);
			if (Result.isFailure(parsed)) {
				return parsed;
			}
			const { serverId, ...patch } = parsed.value;

			try {
				await orchestrator.update(context, serverId, patch);
			} catch (error) {
				return Result.failure(classifyComputeError('update', error, { instanceId: serverId }));
			}

			return lookupInstance(orchestrator, context, serverId);
		},
	};
}
