import 'dotenv/config';
import { z } from 'zod/v4';

export { z } from 'zod/v4';

/**
 * Parse environment variables with Zod schema validation.
 * Throws a descriptive error if validation fails.
 */
export function parseEnv<T extends z.ZodRawShape>(
	schema: z.ZodObject<T>,
	env: Record<string, string | undefined> = process.env,
): z.infer<z.ZodObject<T>> {
	const result = schema.safeParse(env);

	if (!result.success) {
		const errors = result.error.issues.map((issue) => {
			const key = issue.path.map(String).join('.') || '(root)';
			return `  ${key}: ${issue.message}`;
		});

		throw new Error(`Environment validation failed:\n${errors.join('\n')}`);
	}

	return result.data;
}

/**
 * Common environment variable schemas for reuse.
 *
 * Note: In zod v4, .default() on a transformed schema expects the OUTPUT type.
 * Use .prefault() to provide an INPUT default (applied before parsing).
 */
export const CommonEnvSchemas = {
	/** Log level enum */
	logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

	/** Port number */
	port: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().min(1).max(65535))
		.prefault('3000'),

	/** Boolean from string; defaults to false */
	boolean: z
		.string()
		.transform((v) => v === 'true' || v === '1')
		.prefault('false'),

	/** Boolean from string; defaults to true */
	booleanDefaultTrue: z
		.string()
		.transform((v) => v === 'true' || v === '1')
		.prefault('true'),

	/** Non-negative integer from string */
	nonNegativeInt: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().min(0)),

	/** Positive integer from string */
	positiveInt: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().positive()),

	/** Optional URL */
	optionalUrl: z.url().optional(),
};

/**
 * Type helper to extract config type from schema
 */
export type ConfigType<T extends z.ZodObject<z.ZodRawShape>> = z.infer<T>;
