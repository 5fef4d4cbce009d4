import { createLogger, setDefaultLogger } from '@computegate/logging';
import type { FastifyInstance } from 'fastify';
import { getEnv } from './env.js';
import { createApp, type CreateAppOptions } from './app.js';

/**
 * Options for starting the service in process.
 */
export interface ComputeApiStartOptions {
	port?: number;
	host?: string;
	logLevel?: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
	orchestrator?: CreateAppOptions['orchestrator'];
}

/**
 * Start the compute API.
 *
 * @returns The listening Fastify instance
 */
export async function startComputeApi(options?: ComputeApiStartOptions): Promise<FastifyInstance> {
	const env = getEnv();

	const port = options?.port ?? env.PORT;
	const host = options?.host ?? env.HOST;

	const logger = createLogger({
		level: options?.logLevel ?? env.LOG_LEVEL,
		serviceName: 'compute-api',
		pretty: env.LOG_PRETTY || env.NODE_ENV === 'development',
	});
	setDefaultLogger(logger);

	const app = await createApp(logger, {
		config: {
			allowAdminApi: env.ALLOW_ADMIN_API,
			allowInstanceSnapshots: env.ALLOW_INSTANCE_SNAPSHOTS,
			reclaimInstanceInterval: env.RECLAIM_INSTANCE_INTERVAL,
			passwordLength: env.PASSWORD_LENGTH,
			publicBaseUrl: env.PUBLIC_BASE_URL,
		},
		...(options?.orchestrator ? { orchestrator: options.orchestrator } : {}),
	});

	await app.listen({ port, host });

	logger.info(
		{
			host,
			port,
			env: env.NODE_ENV,
			adminApi: env.ALLOW_ADMIN_API,
		},
		'Compute API started',
	);

	return app;
}

export { createApp, API_PREFIX, type ComputeApiConfig, type CreateAppOptions } from './app.js';

// Run when executed as main module
const isMainModule =
	typeof process !== 'undefined' &&
	process.argv[1] !== undefined &&
	(process.argv[1].endsWith('/index.ts') || process.argv[1].endsWith('/index.js'));

if (isMainModule) {
	const server = await startComputeApi();

	// Graceful shutdown
	let shuttingDown = false;
	const shutdown = async (signal: string) => {
		if (shuttingDown) return;
		shuttingDown = true;

		server.log.info({ signal }, 'Shutdown signal received');

		// Safety timeout so shutdown doesn't hang forever
		const forceShutdown = setTimeout(() => {
			server.log.error('Forced shutdown after timeout');
			process.exit(1);
		}, 15_000);
		forceShutdown.unref();

		await server.close();

		server.log.info('Graceful shutdown complete');
		process.exit(0);
	};

	process.on('SIGINT', () => void shutdown('SIGINT'));
	process.on('SIGTERM', () => void shutdown('SIGTERM'));
}
