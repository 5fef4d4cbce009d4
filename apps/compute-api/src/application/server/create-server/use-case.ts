/**
 * Create Server Use Case
 */

import type { UseCase } from '@computegate/application';
import { Result, type ExecutionContext } from '@computegate/application';
import type { ComputeOrchestrator, InstanceRecord, PasswordPolicy } from '../../../domain/index.js';
import { classifyComputeError } from '../error-classifier.js';
import type { RequestBody } from '../request-body.js';
import { parseCreateServerCommand, type BlockDeviceMappingHook } from './parse-command.js';

export interface CreateServerInput {
	readonly body: RequestBody;
	/** Base URL of this service, used to recognize its own image links */
	readonly baseUrl: string;
}

export type CreateServerOutput =
	| { readonly kind: 'reservation'; readonly reservationId: string }
	| { readonly kind: 'server'; readonly instance: InstanceRecord; readonly adminPass: string };

export interface CreateServerUseCaseDeps {
	readonly orchestrator: ComputeOrchestrator;
	readonly passwordPolicy: PasswordPolicy;
	/** Specializations derive a block device mapping from the request */
	readonly blockDeviceMapping?: BlockDeviceMappingHook | undefined;
}

export function createCreateServerUseCase(
	deps: CreateServerUseCaseDeps,
): UseCase<CreateServerInput, CreateServerOutput> {
	const { orchestrator, passwordPolicy, blockDeviceMapping } = deps;

	return {
		async execute(input: CreateServerInput, context: ExecutionContext): Promise<Result<CreateServerOutput>> {
			const parsed = parseCreateServerCommand(input.body, context, {
				baseUrl: input.baseUrl,
				passwordPolicy,
				blockDeviceMapping,
			});
			if (Result.isFailure(parsed)) {
				return parsed;
			}
			const command = parsed.value;

			let created: { instances: InstanceRecord[]; reservationId: string };
			try {
				created = await orchestrator.create(context, command.flavorId, command.imageRef, command);
			} catch (error) {
				return Result.failure(classifyComputeError('create', error));
			}

			if (command.returnReservationId) {
				return Result.success<CreateServerOutput>({ kind: 'reservation', reservationId: created.reservationId });
			}

			const instance = created.instances[0];
			if (!instance) {
				throw new Error(`Orchestrator created no instances for reservation ${created.reservationId}`);
			}
			return Result.success<CreateServerOutput>({ kind: 'server', instance, adminPass: command.adminPassword });
		},
	};
}
