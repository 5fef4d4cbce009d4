/**
 * Execution Context
 *
 * Context for a use case execution. Carries tracing IDs and the identity of the
 * caller through a single request. The caller identity is produced by an
 * upstream authenticator; this layer only consumes it.
 *
 * The execution context enables:
 * - Distributed tracing via correlationId
 * - Causal chain tracking via causationId
 * - Tenant scoping via projectId
 * - Privileged behaviour via isAdmin
 */

import { randomUUID } from 'node:crypto';

/**
 * Authenticated caller identity.
 */
export interface CallerIdentity {
	/** ID of the principal performing the action */
	readonly principalId: string;
	/** Project (tenant) the request is scoped to */
	readonly projectId: string;
	/** Whether the caller holds the admin role */
	readonly isAdmin: boolean;
}

/**
 * Execution context data.
 */
export interface ExecutionContext extends CallerIdentity {
	/** Unique ID for this execution (generated) */
	readonly executionId: string;
	/** ID for distributed tracing (usually from original request) */
	readonly correlationId: string;
	/** ID of the upstream execution that caused this one (if any) */
	readonly causationId: string | null;
	/** When the execution was initiated */
	readonly initiatedAt: Date;
}

function generateExecutionId(): string {
	return `exec-${randomUUID()}`;
}

/**
 * ExecutionContext factory functions.
 */
export const ExecutionContext = {
	/**
	 * Create a new execution context for a fresh request.
	 * The correlation ID starts out as the execution ID.
	 */
	create(identity: CallerIdentity): ExecutionContext {
		const execId = generateExecutionId();
		return {
			...identity,
			executionId: execId,
			correlationId: execId,
			causationId: null,
			initiatedAt: new Date(),
		};
	},

	/**
	 * Create an execution context from tracing data.
	 *
	 * This is the preferred method when running within an HTTP request
	 * where tracing data has been populated from headers by a plugin.
	 */
	fromTracingContext(
		tracingContext: { correlationId: string | null; causationId: string | null },
		identity: CallerIdentity,
	): ExecutionContext {
		const execId = generateExecutionId();
		return {
			...identity,
			executionId: execId,
			correlationId: tracingContext.correlationId ?? execId,
			causationId: tracingContext.causationId,
			initiatedAt: new Date(),
		};
	},

	/**
	 * Create a new execution context with a specific correlation ID.
	 */
	withCorrelation(identity: CallerIdentity, correlationId: string): ExecutionContext {
		return {
			...identity,
			executionId: generateExecutionId(),
			correlationId,
			causationId: null,
			initiatedAt: new Date(),
		};
	},
};
