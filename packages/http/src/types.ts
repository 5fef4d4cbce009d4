/**
 * HTTP Layer Types
 *
 * Type definitions for the HTTP layer including Fastify request decorators
 * and common interfaces.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { ExecutionContext } from '@computegate/domain-core';
import type { Logger } from 'pino';

/**
 * Tracing data stored in request context.
 */
export interface TracingData {
	/** Correlation ID for distributed tracing (from header or generated) */
	readonly correlationId: string;
	/** Causation ID linking to the upstream execution (from header, may be null) */
	readonly causationId: string | null;
	/** Unique execution ID for this request */
	readonly executionId: string;
	/** Request start time */
	readonly startTime: number;
}

/**
 * Configuration for the tracing plugin.
 */
export interface TracingPluginOptions {
	/** Header name for correlation ID (default: x-correlation-id) */
	readonly correlationIdHeader?: string;
	/** Alternative header name for correlation ID (default: x-request-id) */
	readonly requestIdHeader?: string;
	/** Header name for causation ID (default: x-causation-id) */
	readonly causationIdHeader?: string;
	/** Whether to add correlation ID to response headers (default: true) */
	readonly propagateToResponse?: boolean;
}

/**
 * Configuration for the execution context plugin.
 *
 * The identity headers are set by an authenticating proxy in front of the
 * service; their values are trusted as given.
 */
export interface ExecutionContextPluginOptions {
	/** Header carrying the principal ID (default: x-user-id) */
	readonly userIdHeader?: string;
	/** Header carrying the project ID (default: x-project-id) */
	readonly projectIdHeader?: string;
	/** Header carrying a comma-separated role list (default: x-roles) */
	readonly rolesHeader?: string;
	/** Role that marks the caller as an administrator (default: admin) */
	readonly adminRole?: string;
}

/**
 * Configuration for the raw body plugin.
 */
export interface RawBodyPluginOptions {
	/** Media types whose bodies are handed to routes as raw strings */
	readonly contentTypes?: string[];
}

/**
 * Standard error response format.
 */
export interface ErrorResponse {
	/** Human-readable error message */
	readonly message: string;
	/** Machine-readable error code */
	readonly code: string;
	/** Additional error details */
	readonly details?: Record<string, unknown>;
}

/**
 * Fastify request augmentation.
 */
declare module 'fastify' {
	interface FastifyRequest {
		/** Tracing context for distributed tracing */
		tracing: TracingData;
		/** Execution context for use case calls */
		executionContext: ExecutionContext;
	}
}

export type { FastifyRequest, FastifyReply, Logger };
