import { Result, type ExecutionContext } from '@computegate/application';
import type { ComputeOrchestrator, InstanceRecord } from '../../domain/index.js';
import { classifyComputeError, type ComputeOperation } from './error-classifier.js';

/**
 * Fetch the target instance of a request, mapping not-found to 404.
 */
export async function lookupInstance(
	orchestrator: ComputeOrchestrator,
	context: ExecutionContext,
	instanceId: string,
	operation: ComputeOperation = 'lookup',
): Promise<Result<InstanceRecord>> {
	try {
		return Result.success(await orchestrator.routingGet(context, instanceId));
	} catch (error) {
		return Result.failure(classifyComputeError(operation, error, { instanceId }));
	}
}
