/**
 * List Server Actions Use Case
 */

import type { UseCase } from '@computegate/application';
import { Result, type ExecutionContext } from '@computegate/application';
import type { ComputeOrchestrator, InstanceActionRecord } from '../../../domain/index.js';
import { classifyComputeError } from '../error-classifier.js';
import { lookupInstance } from '../lookup.js';

export interface ListServerActionsInput {
	readonly serverId: string;
}

export interface ListServerActionsUseCaseDeps {
	readonly orchestrator: ComputeOrchestrator;
}

export function createListServerActionsUseCase(
	deps: ListServerActionsUseCaseDeps,
): UseCase<ListServerActionsInput, InstanceActionRecord[]> {
	const { orchestrator } = deps;

	return {
		async execute(input: ListServerActionsInput, context: ExecutionContext): Promise<Result<InstanceActionRecord[]>> {
			const instance = await lookupInstance(orchestrator, context, input.serverId);
			if (Result.isFailure(instance)) {
				return instance;
			}

			try {
				return Result.success(await orchestrator.getActions(context, instance.value));
			} catch (error) {
				return Result.failure(classifyComputeError('actions', error, { instanceId: input.serverId }));
			}
		},
	};
}
