import { parseEnv, z, CommonEnvSchemas } from '@computegate/config';

/**
 * Compute API environment configuration
 */
export const envSchema = z.object({
	// Server
	PORT: CommonEnvSchemas.port.prefault('8774'),
	HOST: z.string().default('0.0.0.0'),
	NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

	// Logging
	LOG_LEVEL: CommonEnvSchemas.logLevel,
	LOG_PRETTY: CommonEnvSchemas.boolean,

	// Capabilities
	ALLOW_ADMIN_API: CommonEnvSchemas.boolean,
	ALLOW_INSTANCE_SNAPSHOTS: CommonEnvSchemas.booleanDefaultTrue,

	/** Seconds a deleted instance stays reclaimable; 0 deletes immediately */
	RECLAIM_INSTANCE_INTERVAL: CommonEnvSchemas.nonNegativeInt.prefault('0'),
	/** Length of generated admin passwords */
	PASSWORD_LENGTH: CommonEnvSchemas.positiveInt.prefault('12'),

	/** Public base URL including the version, e.g. https://compute.example.com/v1.1 */
	PUBLIC_BASE_URL: CommonEnvSchemas.optionalUrl,
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | undefined;

/**
 * Parse the environment once and cache it.
 */
export function getEnv(): Env {
	cachedEnv ??= parseEnv(envSchema);
	return cachedEnv;
}
