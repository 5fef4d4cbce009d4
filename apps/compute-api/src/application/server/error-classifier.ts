/**
 * Error Classifier
 *
 * Maps failures raised by the orchestration service to client-visible
 * outcomes. The mapping depends on the operation attempted; a failure that
 * has no outcome for its operation is rethrown unchanged and reaches the
 * global error handler.
 */

import { UseCaseError } from '@computegate/application';
import type { LogWriter } from '@computegate/logging';
import { ComputeErrorKind, QuotaCode, isComputeError, type ComputeError } from '../../domain/index.js';

export type ComputeOperation =
	| 'lookup'
	| 'show'
	| 'list'
	| 'create'
	| 'update'
	| 'delete'
	| 'changePassword'
	| 'reboot'
	| 'resize'
	| 'confirmResize'
	| 'revertResize'
	| 'rebuild'
	| 'createImage'
	| 'createBackup'
	| 'imageMetadataQuota'
	| 'diagnostics'
	| 'actions';

/**
 * What the failing call was acting on.
 */
export interface ClassificationSubject {
	readonly instanceId?: string;
}

const RESOURCE_NOT_FOUND = 'The resource could not be found.';
const UNPROCESSABLE = 'Unable to process the contained instructions';
const BAD_REQUEST = 'The server could not comply with the request since it is either malformed or otherwise incorrect.';

const QUOTA_MESSAGES: Readonly<Record<string, string>> = {
	[QuotaCode.ONSET_FILE_LIMIT_EXCEEDED]: 'Personality file limit exceeded',
	[QuotaCode.ONSET_FILE_PATH_LIMIT_EXCEEDED]: 'Personality file path too long',
	[QuotaCode.ONSET_FILE_CONTENT_LIMIT_EXCEEDED]: 'Personality file content too long',
	[QuotaCode.INSTANCE_LIMIT_EXCEEDED]: 'Instance quotas have been exceeded',
	[QuotaCode.METADATA_LIMIT_EXCEEDED]: 'Metadata limit exceeded',
};

/**
 * Classify a thrown value.
 *
 * @returns the outcome for the client
 * @throws the original value when it has no outcome for this operation
 */
export function classifyComputeError(
	operation: ComputeOperation,
	error: unknown,
	subject: ClassificationSubject = {},
	logger?: LogWriter,
): UseCaseError {
	if (!isComputeError(error)) {
		throw error;
	}

	const outcome = outcomeFor(operation, error, subject);
	if (outcome === undefined) {
		throw error;
	}

	if (logger && (operation === 'reboot' || operation === 'confirmResize' || operation === 'revertResize')) {
		logger.error({ err: error, operation, instanceId: subject.instanceId }, `Error in ${operation}`);
	}

	return outcome;
}

function outcomeFor(
	operation: ComputeOperation,
	error: ComputeError,
	subject: ClassificationSubject,
): UseCaseError | undefined {
	const details = subject.instanceId ? { instanceId: subject.instanceId } : {};

	switch (operation) {
		case 'lookup':
		case 'show':
		case 'update':
		case 'delete':
		case 'diagnostics':
		case 'actions':
			return error.isNotFound ? UseCaseError.notFound('SERVER_NOT_FOUND', RESOURCE_NOT_FOUND, details) : undefined;

		case 'list':
			if (error.kind === ComputeErrorKind.INVALID) {
				return UseCaseError.validation('INVALID_SEARCH', error.message);
			}
			return error.isNotFound ? UseCaseError.notFound('NOT_FOUND', RESOURCE_NOT_FOUND) : undefined;

		case 'create':
			return createOutcome(error);

		case 'resize':
			switch (error.kind) {
				case ComputeErrorKind.FLAVOR_NOT_FOUND:
					return UseCaseError.validation('FLAVOR_NOT_FOUND', 'Unable to locate requested flavor.');
				case ComputeErrorKind.CANNOT_RESIZE_TO_SAME_SIZE:
					return UseCaseError.validation('RESIZE_SAME_SIZE', 'Resize requires a change in size.');
				case ComputeErrorKind.CANNOT_RESIZE_TO_SMALLER_SIZE:
					return UseCaseError.validation('RESIZE_SMALLER_SIZE', 'Resizing to a smaller size is not supported.');
				default:
					return undefined;
			}

		case 'confirmResize':
		case 'revertResize':
			if (error.kind === ComputeErrorKind.MIGRATION_NOT_FOUND) {
				return UseCaseError.validation('NOT_RESIZED', 'Instance has not been resized.', details);
			}
			return UseCaseError.validation('RESIZE_FAILED', BAD_REQUEST, details);

		case 'reboot':
			return UseCaseError.unprocessable('REBOOT_FAILED', UNPROCESSABLE, details);

		case 'rebuild':
			if (error.kind === ComputeErrorKind.QUOTA_EXCEEDED) {
				return quotaOutcome(error);
			}
			if (error.kind === ComputeErrorKind.REBUILD_REQUIRES_ACTIVE_INSTANCE) {
				return UseCaseError.businessRule(
					'INSTANCE_NOT_ACTIVE',
					`Instance ${subject.instanceId ?? ''} must be active to rebuild.`,
					details,
				);
			}
			if (error.kind === ComputeErrorKind.INSTANCE_NOT_FOUND) {
				return UseCaseError.notFound(
					'SERVER_NOT_FOUND',
					`Instance ${subject.instanceId ?? ''} could not be found`,
					details,
				);
			}
			return undefined;

		case 'createImage':
			if (error.kind === ComputeErrorKind.INSTANCE_BUSY) {
				return UseCaseError.businessRule('INSTANCE_BUSY', 'Server is currently creating an image. Please wait.', details);
			}
			return error.kind === ComputeErrorKind.QUOTA_EXCEEDED ? quotaOutcome(error) : undefined;

		case 'createBackup':
			return error.kind === ComputeErrorKind.QUOTA_EXCEEDED ? quotaOutcome(error) : undefined;

		case 'imageMetadataQuota':
			return error.quotaCode === QuotaCode.METADATA_LIMIT_EXCEEDED
				? UseCaseError.tooLarge('METADATA_LIMIT_EXCEEDED', 'Image metadata limit exceeded', 0)
				: undefined;

		case 'changePassword':
			return undefined;
	}
}

function createOutcome(error: ComputeError): UseCaseError | undefined {
	switch (error.kind) {
		case ComputeErrorKind.QUOTA_EXCEEDED:
			return quotaOutcome(error);
		case ComputeErrorKind.INSTANCE_TYPE_MEMORY_TOO_SMALL:
		case ComputeErrorKind.INSTANCE_TYPE_DISK_TOO_SMALL:
			return UseCaseError.validation('INSTANCE_TYPE_TOO_SMALL', error.message);
		case ComputeErrorKind.IMAGE_NOT_FOUND:
			return UseCaseError.validation('IMAGE_NOT_FOUND', 'Can not find requested image');
		case ComputeErrorKind.FLAVOR_NOT_FOUND:
			return UseCaseError.validation('INVALID_FLAVOR_REF', 'Invalid flavorRef provided.');
		case ComputeErrorKind.KEYPAIR_NOT_FOUND:
			return UseCaseError.validation('INVALID_KEY_NAME', 'Invalid key_name provided.');
		case ComputeErrorKind.SECURITY_GROUP_NOT_FOUND:
			return UseCaseError.validation('SECURITY_GROUP_NOT_FOUND', error.message);
		case ComputeErrorKind.REMOTE:
			return UseCaseError.validation('REMOTE_ERROR', `${error.remoteType ?? 'RemoteError'}: ${error.message}`);
		default:
			return undefined;
	}
}

/**
 * 413 for a known quota code; other codes have no outcome.
 */
function quotaOutcome(error: ComputeError): UseCaseError | undefined {
	const message = error.quotaCode ? QUOTA_MESSAGES[error.quotaCode] : undefined;
	return message ? UseCaseError.tooLarge('QUOTA_EXCEEDED', message, 0, { quotaCode: error.quotaCode }) : undefined;
}
