/**
 * Server Action Use Case
 *
 * Runs one named action against an existing instance. Image actions check
 * the image metadata quota before the instance is looked up.
 */

import type { UseCase } from '@computegate/application';
import { Result, type ExecutionContext } from '@computegate/application';
import type { LogWriter } from '@computegate/logging';
import type { ComputeOrchestrator, InstanceRecord, PasswordPolicy } from '../../../domain/index.js';
import { classifyComputeError } from '../error-classifier.js';
import { lookupInstance } from '../lookup.js';
import type { RequestBody } from '../request-body.js';
import { parseActionRequest, type ActionRequest } from './action-request.js';

export interface ServerActionInput {
	readonly serverId: string;
	readonly body: RequestBody;
	/** Base URL of this service, used for image links */
	readonly baseUrl: string;
}

export type ActionOutcome =
	| { readonly kind: 'accepted' }
	| { readonly kind: 'no_content' }
	| { readonly kind: 'image'; readonly location: string }
	| { readonly kind: 'rebuilt'; readonly instance: InstanceRecord; readonly adminPass: string };

export interface ServerActionUseCaseDeps {
	readonly orchestrator: ComputeOrchestrator;
	readonly passwordPolicy: PasswordPolicy;
	readonly allowAdminApi: boolean;
	readonly allowInstanceSnapshots: boolean;
	readonly logger?: LogWriter | undefined;
}

type ImageActionRequest = Extract<ActionRequest, { action: 'createImage' | 'createBackup' }>;

export function createServerActionUseCase(deps: ServerActionUseCaseDeps): UseCase<ServerActionInput, ActionOutcome> {
	const { orchestrator, passwordPolicy, allowAdminApi, allowInstanceSnapshots, logger } = deps;

	async function runImageAction(
		request: ImageActionRequest,
		input: ServerActionInput,
		context: ExecutionContext,
	): Promise<Result<ActionOutcome>> {
		const subject = { instanceId: input.serverId };

		// Keep a link back to the server in the image properties
		const properties: Record<string, string> = {
			instance_ref: `${input.baseUrl}/servers/${input.serverId}`,
			...request.metadata,
		};

		try {
			await orchestrator.checkImageMetadataQuota(context, request.metadata);
		} catch (error) {
			return Result.failure(classifyComputeError('imageMetadataQuota', error, subject));
		}

		const instance = await lookupInstance(orchestrator, context, input.serverId);
		if (Result.isFailure(instance)) {
			return instance;
		}

		let imageId: string;
		try {
			const image =
				request.action === 'createImage'
					? await orchestrator.snapshot(context, instance.value, request.name, properties)
					: await orchestrator.backup(
							context,
							instance.value,
							request.name,
							request.backupType,
							request.rotation,
							properties,
						);
			imageId = image.id;
		} catch (error) {
			return Result.failure(classifyComputeError(request.action, error, subject));
		}

		// Snapshots live under the project; backups do not
		const location =
			request.action === 'createImage'
				? `${input.baseUrl}/${context.projectId}/images/${imageId}`
				: `${input.baseUrl}/images/${imageId}`;
		return Result.success({ kind: 'image', location });
	}

	async function runRebuild(
		request: Extract<ActionRequest, { action: 'rebuild' }>,
		instance: InstanceRecord,
		context: ExecutionContext,
	): Promise<Result<ActionOutcome>> {
		try {
			await orchestrator.rebuild(context, instance, request.imageRef, request.adminPass, {
				...(request.name !== undefined ? { name: request.name } : {}),
				...(request.metadata !== undefined ? { metadata: request.metadata } : {}),
				filesToInject: request.injectedFiles,
			});
		} catch (error) {
			return Result.failure(classifyComputeError('rebuild', error, { instanceId: instance.id }));
		}

		const rebuilt = await lookupInstance(orchestrator, context, instance.id);
		if (Result.isFailure(rebuilt)) {
			return rebuilt;
		}
		return Result.success({ kind: 'rebuilt', instance: rebuilt.value, adminPass: request.adminPass });
	}

	async function runInstanceAction(
		request: Exclude<ActionRequest, ImageActionRequest>,
		input: ServerActionInput,
		context: ExecutionContext,
	): Promise<Result<ActionOutcome>> {
		const found = await lookupInstance(orchestrator, context, input.serverId);
		if (Result.isFailure(found)) {
			return found;
		}
		const instance = found.value;

		if (request.action === 'rebuild') {
			return runRebuild(request, instance, context);
		}

		try {
			switch (request.action) {
				case 'changePassword':
					await orchestrator.setAdminPassword(context, instance, request.adminPass);
					return Result.success({ kind: 'accepted' });
				case 'reboot':
					await orchestrator.reboot(context, instance, request.rebootType);
					return Result.success({ kind: 'accepted' });
				case 'resize':
					await orchestrator.resize(context, instance, request.flavorId);
					return Result.success({ kind: 'accepted' });
				case 'confirmResize':
					await orchestrator.confirmResize(context, instance);
					return Result.success({ kind: 'no_content' });
				case 'revertResize':
					await orchestrator.revertResize(context, instance);
					return Result.success({ kind: 'accepted' });
			}
		} catch (error) {
			return Result.failure(classifyComputeError(request.action, error, { instanceId: input.serverId }, logger));
		}
	}

	return {
		async execute(input: ServerActionInput, context: ExecutionContext): Promise<Result<ActionOutcome>> {
			const parsed = parseActionRequest(input.body, { allowAdminApi, allowInstanceSnapshots, passwordPolicy });
			if (Result.isFailure(parsed)) {
				return parsed;
			}

			const request = parsed.value;
			if (request.action === 'createImage' || request.action === 'createBackup') {
				return runImageAction(request, input, context);
			}
			return runInstanceAction(request, input, context);
		},
	};
}
