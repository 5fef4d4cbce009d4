/**
 * Delete Server Use Case
 *
 * Deletes outright, or soft-deletes when deleted instances are kept for a
 * reclaim interval.
 */

import type { UseCase } from '@computegate/application';
import { Result, type ExecutionContext } from '@computegate/application';
import type { ComputeOrchestrator } from '../../../domain/index.js';
import { classifyComputeError } from '../error-classifier.js';
import { lookupInstance } from '../lookup.js';

export interface DeleteServerInput {
	readonly serverId: string;
}

export interface DeleteServerUseCaseDeps {
	readonly orchestrator: ComputeOrchestrator;
	/** Seconds a deleted instance stays reclaimable; 0 deletes immediately */
	readonly reclaimInstanceInterval: number;
}

export function createDeleteServerUseCase(deps: DeleteServerUseCaseDeps): UseCase<DeleteServerInput, void> {
	const { orchestrator, reclaimInstanceInterval } = deps;

	return {
		async execute(input: DeleteServerInput, context: ExecutionContext): Promise<Result<void>> {
			const instance = await lookupInstance(orchestrator, context, input.serverId, 'delete');
			if (Result.isFailure(instance)) {
				return instance;
			}

			try {
				if (reclaimInstanceInterval > 0) {
					await orchestrator.softDelete(context, instance.value);
				} else {
					await orchestrator.delete(context, instance.value);
				}
			} catch (error) {
				return Result.failure(classifyComputeError('delete', error, { instanceId: input.serverId }));
			}

			return Result.success(undefined);
		},
	};
}
