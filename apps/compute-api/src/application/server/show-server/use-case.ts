/**
 * Show Server Use Case
 */

import type { UseCase } from '@computegate/application';
import type { Result, ExecutionContext } from '@computegate/application';
import type { ComputeOrchestrator, InstanceRecord } from '../../../domain/index.js';
import { lookupInstance } from '../lookup.js';

export interface ShowServerInput {
	readonly serverId: string;
}

export interface ShowServerUseCaseDeps {
	readonly orchestrator: ComputeOrchestrator;
}

export function createShowServerUseCase(deps: ShowServerUseCaseDeps): UseCase<ShowServerInput, InstanceRecord> {
	const { orchestrator } = deps;

	return {
		async execute(input: ShowServerInput, context: ExecutionContext): Promise<Result<InstanceRecord>> {
			return lookupInstance(orchestrator, context, input.serverId, 'show');
		},
	};
}
