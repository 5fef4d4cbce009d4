/**
 * Compute API application
 *
 * Builds the Fastify instance: plugins, use cases and routes. The
 * orchestrator defaults to the in-memory one; production deployments pass
 * their own.
 */

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import {
	tracingPlugin,
	executionContextPlugin,
	rawBodyPlugin,
	errorHandlerPlugin,
	createStandardErrorHandlerOptions,
} from '@computegate/http';
import type { ComputeOrchestrator, PasswordPolicy } from './domain/index.js';
import {
	createCreateServerUseCase,
	createDeleteServerUseCase,
	createListServerActionsUseCase,
	createListServersUseCase,
	createServerActionUseCase,
	createServerDiagnosticsUseCase,
	createShowServerUseCase,
	createUpdateServerUseCase,
	type BlockDeviceMappingHook,
} from './application/index.js';
import { createInMemoryOrchestrator, createPasswordPolicy } from './infrastructure/index.js';
import { registerServerRoutes } from './api/index.js';

/**
 * Service settings, usually taken from the environment.
 */
export interface ComputeApiConfig {
	readonly allowAdminApi: boolean;
	readonly allowInstanceSnapshots: boolean;
	readonly reclaimInstanceInterval: number;
	readonly passwordLength: number;
	readonly publicBaseUrl?: string | undefined;
}

export interface CreateAppOptions {
	readonly config: ComputeApiConfig;
	readonly orchestrator?: ComputeOrchestrator;
	readonly passwordPolicy?: PasswordPolicy;
	readonly blockDeviceMapping?: BlockDeviceMappingHook;
}

export const API_PREFIX = '/v1.1/:projectId';

/**
 * Create the Fastify application with all plugins and routes.
 */
export async function createApp(logger: FastifyBaseLogger, options: CreateAppOptions): Promise<FastifyInstance> {
	const { config } = options;
	const orchestrator = options.orchestrator ?? createInMemoryOrchestrator();
	const passwordPolicy = options.passwordPolicy ?? createPasswordPolicy({ length: config.passwordLength });

	const app = Fastify({ loggerInstance: logger });

	// OpenAPI / Swagger
	await app.register(swagger, {
		openapi: {
			openapi: '3.1.0',
			info: {
				title: 'Compute Gateway API',
				version: '1.1.0',
				description: 'Create, inspect, update, delete and act on compute instances.',
			},
			servers: [{ url: '/' }],
		},
	});

	await app.register(swaggerUi, {
		routePrefix: '/docs',
		uiConfig: {
			docExpansion: 'list',
			deepLinking: true,
		},
	});

	await app.register(tracingPlugin);
	await app.register(executionContextPlugin);
	await app.register(rawBodyPlugin);
	await app.register(errorHandlerPlugin, createStandardErrorHandlerOptions());

	await app.register(
		async (servers) => {
			await registerServerRoutes(servers, {
				createServerUseCase: createCreateServerUseCase({
					orchestrator,
					passwordPolicy,
					blockDeviceMapping: options.blockDeviceMapping,
				}),
				updateServerUseCase: createUpdateServerUseCase({ orchestrator }),
				deleteServerUseCase: createDeleteServerUseCase({
					orchestrator,
					reclaimInstanceInterval: config.reclaimInstanceInterval,
				}),
				showServerUseCase: createShowServerUseCase({ orchestrator }),
				listServersUseCase: createListServersUseCase({
					orchestrator,
					allowAdminApi: config.allowAdminApi,
					logger,
				}),
				serverActionUseCase: createServerActionUseCase({
					orchestrator,
					passwordPolicy,
					allowAdminApi: config.allowAdminApi,
					allowInstanceSnapshots: config.allowInstanceSnapshots,
					logger,
				}),
				serverDiagnosticsUseCase: config.allowAdminApi ? createServerDiagnosticsUseCase({ orchestrator }) : undefined,
				listServerActionsUseCase: config.allowAdminApi ? createListServerActionsUseCase({ orchestrator }) : undefined,
				publicBaseUrl: config.publicBaseUrl,
			});
		},
		{ prefix: API_PREFIX },
	);

	return app;
}
