/**
 * Compute Errors
 *
 * Failures raised by the orchestration service. Each carries a kind the
 * error classifier maps to a client-visible outcome per operation.
 */

export const ComputeErrorKind = {
	/** Generic lookup failure */
	NOT_FOUND: 'not_found',
	INSTANCE_NOT_FOUND: 'instance_not_found',
	FLAVOR_NOT_FOUND: 'flavor_not_found',
	IMAGE_NOT_FOUND: 'image_not_found',
	KEYPAIR_NOT_FOUND: 'keypair_not_found',
	SECURITY_GROUP_NOT_FOUND: 'security_group_not_found',
	MIGRATION_NOT_FOUND: 'migration_not_found',
	/** A quota was exceeded; `quotaCode` names which */
	QUOTA_EXCEEDED: 'quota_exceeded',
	INSTANCE_TYPE_MEMORY_TOO_SMALL: 'instance_type_memory_too_small',
	INSTANCE_TYPE_DISK_TOO_SMALL: 'instance_type_disk_too_small',
	CANNOT_RESIZE_TO_SAME_SIZE: 'cannot_resize_to_same_size',
	CANNOT_RESIZE_TO_SMALLER_SIZE: 'cannot_resize_to_smaller_size',
	REBUILD_REQUIRES_ACTIVE_INSTANCE: 'rebuild_requires_active_instance',
	INSTANCE_BUSY: 'instance_busy',
	/** Input rejected by the orchestration service */
	INVALID: 'invalid',
	/** Failure relayed from a remote worker; `remoteType` names its type */
	REMOTE: 'remote',
} as const;

export type ComputeErrorKind = (typeof ComputeErrorKind)[keyof typeof ComputeErrorKind];

/**
 * Quota codes the orchestration service reports.
 */
export const QuotaCode = {
	ONSET_FILE_LIMIT_EXCEEDED: 'OnsetFileLimitExceeded',
	ONSET_FILE_PATH_LIMIT_EXCEEDED: 'OnsetFilePathLimitExceeded',
	ONSET_FILE_CONTENT_LIMIT_EXCEEDED: 'OnsetFileContentLimitExceeded',
	INSTANCE_LIMIT_EXCEEDED: 'InstanceLimitExceeded',
	METADATA_LIMIT_EXCEEDED: 'MetadataLimitExceeded',
} as const;

const NOT_FOUND_KINDS: ReadonlySet<ComputeErrorKind> = new Set([
	ComputeErrorKind.NOT_FOUND,
	ComputeErrorKind.INSTANCE_NOT_FOUND,
	ComputeErrorKind.FLAVOR_NOT_FOUND,
	ComputeErrorKind.IMAGE_NOT_FOUND,
	ComputeErrorKind.KEYPAIR_NOT_FOUND,
	ComputeErrorKind.SECURITY_GROUP_NOT_FOUND,
	ComputeErrorKind.MIGRATION_NOT_FOUND,
]);

/**
 * Error thrown by a ComputeOrchestrator.
 */
export class ComputeError extends Error {
	constructor(
		message: string,
		public readonly kind: ComputeErrorKind,
		public readonly quotaCode?: string,
		public readonly remoteType?: string,
	) {
		super(message);
		this.name = 'ComputeError';
	}

	/** Whether this is a lookup failure of any entity. */
	get isNotFound(): boolean {
		return NOT_FOUND_KINDS.has(this.kind);
	}

	static notFound(kind: ComputeErrorKind, message: string): ComputeError {
		return new ComputeError(message, kind);
	}

	static quota(quotaCode: string, message: string): ComputeError {
		return new ComputeError(message, ComputeErrorKind.QUOTA_EXCEEDED, quotaCode);
	}

	/**
	 * A failure relayed from a remote worker. The message is the remote
	 * exception's value.
	 */
	static remote(remoteType: string, value: string): ComputeError {
		return new ComputeError(value, ComputeErrorKind.REMOTE, undefined, remoteType);
	}
}

export function isComputeError(error: unknown): error is ComputeError {
	return error instanceof ComputeError;
}
