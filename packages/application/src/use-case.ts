/**
 * UseCase Interface
 *
 * UseCases encapsulate a single business operation. Each use case:
 * - Takes an input (normalized request data or a command) and an execution context
 * - Performs validation and business rule checks
 * - Makes at most one state-changing call to a collaborator
 * - Returns a Result with the operation's output on success
 *
 * @example
 * ```typescript
 * const deleteServer: UseCase<DeleteServerCommand, void> = {
 *     async execute(command, context) {
 *         const instance = await lookup(command.serverId, context);
 *         if (Result.isFailure(instance)) return instance;
 *         await orchestrator.delete(context, instance.value);
 *         return Result.success(undefined);
 *     },
 * };
 * ```
 */

import type { Result, ExecutionContext } from '@computegate/domain-core';

/**
 * UseCase interface.
 *
 * @typeParam TInput - The input type
 * @typeParam TOutput - The value carried by a successful result
 */
export interface UseCase<TInput, TOutput> {
	/**
	 * Execute the use case.
	 *
	 * @param input - The input data for the operation
	 * @param context - Execution context with tracing and caller identity
	 * @returns Result containing the output on success, or an error on failure
	 */
	execute(input: TInput, context: ExecutionContext): Promise<Result<TOutput>>;
}

