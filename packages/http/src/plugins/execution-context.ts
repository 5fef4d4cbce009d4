/**
 * Execution Context Plugin
 *
 * Creates an ExecutionContext for use case execution by combining the
 * tracing data with the caller identity an upstream authenticator put in
 * the request headers. Register after the tracing plugin.
 */

import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { ExecutionContext, type CallerIdentity } from '@computegate/domain-core';
import type { ExecutionContextPluginOptions } from '../types.js';
import { headerValue } from './headers.js';

const ANONYMOUS_PRINCIPAL = 'anonymous';

function routeProjectId(request: FastifyRequest): string | undefined {
	const params = request.params;
	if (typeof params === 'object' && params !== null && 'projectId' in params && typeof params.projectId === 'string') {
		return params.projectId;
	}
	return undefined;
}

/**
 * Execution context plugin for Fastify.
 *
 * The project falls back to the `:projectId` route parameter when the
 * identity header is absent.
 *
 * @example
 * ```typescript
 * await fastify.register(tracingPlugin);
 * await fastify.register(executionContextPlugin, { adminRole: 'admin' });
 *
 * fastify.post('/v1.1/:projectId/servers', async (request, reply) => {
 *     const ctx = request.executionContext;
 *     const result = await createServer.execute(input, ctx);
 *     // ...
 * });
 * ```
 */
const executionContextPluginAsync: FastifyPluginAsync<ExecutionContextPluginOptions> = async (fastify, opts) => {
	const {
		userIdHeader = 'x-user-id',
		projectIdHeader = 'x-project-id',
		rolesHeader = 'x-roles',
		adminRole = 'admin',
	} = opts;

	fastify.decorateRequest('executionContext', null, []);

	fastify.addHook('onRequest', async (request) => {
		const tracing = request.tracing;

		if (!tracing) {
			throw new Error('Tracing context not available. Register tracingPlugin before executionContextPlugin.');
		}

		const roles = (headerValue(request.headers, rolesHeader) ?? '')
			.split(',')
			.map((role) => role.trim().toLowerCase())
			.filter((role) => role !== '');

		const identity: CallerIdentity = {
			principalId: headerValue(request.headers, userIdHeader) ?? ANONYMOUS_PRINCIPAL,
			projectId: headerValue(request.headers, projectIdHeader) ?? routeProjectId(request) ?? '',
			isAdmin: roles.includes(adminRole.toLowerCase()),
		};

		request.executionContext = ExecutionContext.fromTracingContext(
			{
				correlationId: tracing.correlationId,
				causationId: tracing.causationId,
			},
			identity,
		);
	});
};

export const executionContextPlugin = fp(executionContextPluginAsync, {
	name: '@computegate/execution-context',
	fastify: '5.x',
	dependencies: ['@computegate/tracing'],
});
