import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

/**
 * The logging methods application code writes through. Satisfied by a pino
 * logger and by Fastify's request and instance loggers.
 */
export type LogWriter = Pick<Logger, 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'>;

/**
 * Log levels supported by the logger
 */
export const LogLevel = {
	TRACE: 'trace',
	DEBUG: 'debug',
	INFO: 'info',
	WARN: 'warn',
	ERROR: 'error',
	FATAL: 'fatal',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Logger configuration options
 */
export interface LoggerConfig {
	/** Log level */
	level: LogLevel;
	/** Service name for structured logs */
	serviceName: string;
	/** Whether to use pretty printing (dev only) */
	pretty?: boolean;
	/** Additional base context */
	base?: Record<string, unknown>;
}

/**
 * Build pino options for a service logger.
 */
export function createLoggerOptions(config: LoggerConfig): LoggerOptions {
	const options: LoggerOptions = {
		level: config.level,
		base: {
			service: config.serviceName,
			...config.base,
		},
		timestamp: pino.stdTimeFunctions.isoTime,
		formatters: {
			level: (label) => ({ level: label }),
		},
		redact: {
			paths: ['req.headers.authorization', 'adminPass', '*.adminPass'],
			censor: '[redacted]',
		},
	};

	// Use pino-pretty for development
	if (config.pretty) {
		return {
			...options,
			transport: {
				target: 'pino-pretty',
				options: {
					colorize: true,
					translateTime: 'SYS:standard',
					ignore: 'pid,hostname',
				},
			},
		};
	}

	return options;
}

/**
 * Create a configured Pino logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
	return pino(createLoggerOptions(config));
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
	return parent.child(bindings);
}

/**
 * Default logger instance (can be replaced)
 */
let defaultLogger: Logger = pino({ level: 'info' });

/**
 * Set the default logger instance
 */
export function setDefaultLogger(logger: Logger): void {
	defaultLogger = logger;
}

/**
 * Get the default logger instance
 */
export function getLogger(): Logger {
	return defaultLogger;
}
