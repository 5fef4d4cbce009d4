/**
 * List Servers Use Case
 */

import type { UseCase } from '@computegate/application';
import { Result, type ExecutionContext } from '@computegate/application';
import type { LogWriter } from '@computegate/logging';
import type { ComputeOrchestrator, InstanceRecord } from '../../../domain/index.js';
import { classifyComputeError } from '../error-classifier.js';
import { buildSearchOptions } from './search-options.js';

export interface ListServersInput {
	/** Raw query parameters */
	readonly query: unknown;
}

export interface ListServersUseCaseDeps {
	readonly orchestrator: ComputeOrchestrator;
	readonly allowAdminApi: boolean;
	readonly logger?: LogWriter | undefined;
}

export function createListServersUseCase(deps: ListServersUseCaseDeps): UseCase<ListServersInput, InstanceRecord[]> {
	const { orchestrator, allowAdminApi, logger } = deps;

	return {
		async execute(input: ListServersInput, context: ExecutionContext): Promise<Result<InstanceRecord[]>> {
			const searchOptions = buildSearchOptions(input.query, context, { allowAdminApi, logger });
			if (Result.isFailure(searchOptions)) {
				return searchOptions;
			}

			try {
				return Result.success(await orchestrator.getAll(context, searchOptions.value));
			} catch (error) {
				return Result.failure(classifyComputeError('list', error));
			}
		},
	};
}
