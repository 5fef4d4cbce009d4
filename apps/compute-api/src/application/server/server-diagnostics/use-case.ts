/**
 * Server Diagnostics Use Case
 *
 * Hypervisor figures for an instance, as the orchestration service reports
 * them.
 */

import type { UseCase } from '@computegate/application';
import { Result, type ExecutionContext } from '@computegate/application';
import type { ComputeOrchestrator, InstanceDiagnostics } from '../../../domain/index.js';
import { classifyComputeError } from '../error-classifier.js';
import { lookupInstance } from '../lookup.js';

export interface ServerDiagnosticsInput {
	readonly serverId: string;
}

export interface ServerDiagnosticsUseCaseDeps {
	readonly orchestrator: ComputeOrchestrator;
}

export function createServerDiagnosticsUseCase(
	deps: ServerDiagnosticsUseCaseDeps,
): UseCase<ServerDiagnosticsInput, InstanceDiagnostics> {
	const { orchestrator } = deps;

	return {
		async execute(input: ServerDiagnosticsInput, context: ExecutionContext): Promise<Result<InstanceDiagnostics>> {
			const instance = await lookupInstance(orchestrator, context, input.serverId);
			if (Result.isFailure(instance)) {
				return instance;
			}

			try {
				return Result.success(await orchestrator.getDiagnostics(context, instance.value));
			} catch (error) {
				return Result.failure(classifyComputeError('diagnostics', error, { instanceId: input.serverId }));
			}
		},
	};
}
