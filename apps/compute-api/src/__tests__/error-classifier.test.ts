import { describe, expect, it } from 'vitest';
import { classifyComputeError } from '../application/index.js';
import { ComputeError, ComputeErrorKind, QuotaCode } from '../domain/index.js';
import { makeLogger } from './fixtures.js';

describe('classifyComputeError', () => {
	it('rethrows values that are not compute errors', () => {
		const failure = new TypeError('boom');
		expect(() => classifyComputeError('show', failure)).toThrow(failure);
	});

	it('maps a missing instance to 404 on lookups', () => {
		const error = ComputeError.notFound(ComputeErrorKind.INSTANCE_NOT_FOUND, 'Instance srv-1 could not be found');

		expect(classifyComputeError('show', error, { instanceId: 'srv-1' })).toEqual({
			type: 'not_found',
			code: 'SERVER_NOT_FOUND',
			message: 'The resource could not be found.',
			details: { instanceId: 'srv-1' },
		});
		expect(classifyComputeError('actions', error, { instanceId: 'srv-1' }).code).toBe('SERVER_NOT_FOUND');
	});

	it('rethrows failures with no outcome for the operation', () => {
		const error = new ComputeError('orchestrator unavailable', ComputeErrorKind.INVALID);
		expect(() => classifyComputeError('delete', error)).toThrow(error);
		expect(() => classifyComputeError('changePassword', error)).toThrow(error);
	});

	it('reports an invalid search as a bad request', () => {
		const error = new ComputeError('Unsupported filter', ComputeErrorKind.INVALID);
		expect(classifyComputeError('list', error)).toMatchObject({ type: 'validation', message: 'Unsupported filter' });
	});

	describe('create', () => {
		it('maps file and instance quotas to 413', () => {
			const error = ComputeError.quota(QuotaCode.ONSET_FILE_LIMIT_EXCEEDED, 'too many files');

			expect(classifyComputeError('create', error)).toEqual({
				type: 'too_large',
				code: 'QUOTA_EXCEEDED',
				message: 'Personality file limit exceeded',
				retryAfter: 0,
				details: { quotaCode: QuotaCode.ONSET_FILE_LIMIT_EXCEEDED },
			});
			expect(
				classifyComputeError('create', ComputeError.quota(QuotaCode.INSTANCE_LIMIT_EXCEEDED, 'quota')).message,
			).toBe('Instance quotas have been exceeded');
		});

		it('maps the metadata quota to 413', () => {
			const error = ComputeError.quota(QuotaCode.METADATA_LIMIT_EXCEEDED, 'metadata');

			expect(classifyComputeError('create', error)).toEqual({
				type: 'too_large',
				code: 'QUOTA_EXCEEDED',
				message: 'Metadata limit exceeded',
				retryAfter: 0,
				details: { quotaCode: QuotaCode.METADATA_LIMIT_EXCEEDED },
			});
		});

		it('rethrows an unmapped quota code', () => {
			const error = ComputeError.quota('CoresLimitExceeded', 'cores');
			expect(() => classifyComputeError('create', error)).toThrow(error);
		});

		const lookupFailures: Array<[ComputeErrorKind, string]> = [
			[ComputeErrorKind.IMAGE_NOT_FOUND, 'Can not find requested image'],
			[ComputeErrorKind.FLAVOR_NOT_FOUND, 'Invalid flavorRef provided.'],
			[ComputeErrorKind.KEYPAIR_NOT_FOUND, 'Invalid key_name provided.'],
		];

		it.each(lookupFailures)('maps %s to a bad request', (kind, message) => {
			const outcome = classifyComputeError('create', new ComputeError('missing', kind));
			expect(outcome).toMatchObject({ type: 'validation', message });
		});

		it('passes through the message of a size or security group failure', () => {
			const tooSmall = new ComputeError(
				"Instance type's memory is too small for requested image.",
				ComputeErrorKind.INSTANCE_TYPE_MEMORY_TOO_SMALL,
			);
			expect(classifyComputeError('create', tooSmall).message).toBe(
				"Instance type's memory is too small for requested image.",
			);
		});

		it('prefixes a remote failure with its type', () => {
			expect(classifyComputeError('create', ComputeError.remote('InvalidInput', 'bad zone')).message).toBe(
				'InvalidInput: bad zone',
			);
		});
	});

	describe('actions', () => {
		it('maps resize size failures to bad requests', () => {
			expect(
				classifyComputeError('resize', new ComputeError('same', ComputeErrorKind.CANNOT_RESIZE_TO_SAME_SIZE)).message,
			).toBe('Resize requires a change in size.');
			expect(
				classifyComputeError('resize', new ComputeError('smaller', ComputeErrorKind.CANNOT_RESIZE_TO_SMALLER_SIZE)).message,
			).toBe('Resizing to a smaller size is not supported.');
		});

		it('reports confirming an unresized instance and logs it', () => {
			const logger = makeLogger();
			const error = ComputeError.notFound(ComputeErrorKind.MIGRATION_NOT_FOUND, 'no migration');

			const outcome = classifyComputeError('confirmResize', error, { instanceId: 'srv-1' }, logger);

			expect(outcome).toMatchObject({ type: 'validation', message: 'Instance has not been resized.' });
			expect(logger.error).toHaveBeenCalledWith(
				{ err: error, operation: 'confirmResize', instanceId: 'srv-1' },
				'Error in confirmResize',
			);
		});

		it('maps any reboot failure to 422', () => {
			expect(classifyComputeError('reboot', new ComputeError('x', ComputeErrorKind.INVALID))).toMatchObject({
				type: 'unprocessable',
				code: 'REBOOT_FAILED',
			});
		});

		it('names the instance when a rebuild needs it active', () => {
			const error = new ComputeError('not active', ComputeErrorKind.REBUILD_REQUIRES_ACTIVE_INSTANCE);

			expect(classifyComputeError('rebuild', error, { instanceId: 'srv-1' })).toMatchObject({
				type: 'business_rule',
				message: 'Instance srv-1 must be active to rebuild.',
			});
		});

		it.each([
			[QuotaCode.ONSET_FILE_LIMIT_EXCEEDED, 'Personality file limit exceeded'],
			[QuotaCode.ONSET_FILE_PATH_LIMIT_EXCEEDED, 'Personality file path too long'],
			[QuotaCode.ONSET_FILE_CONTENT_LIMIT_EXCEEDED, 'Personality file content too long'],
			[QuotaCode.METADATA_LIMIT_EXCEEDED, 'Metadata limit exceeded'],
		])('maps the %s quota to 413 on rebuild', (quotaCode, message) => {
			expect(classifyComputeError('rebuild', ComputeError.quota(quotaCode, 'quota'), { instanceId: 'srv-1' })).toEqual({
				type: 'too_large',
				code: 'QUOTA_EXCEEDED',
				message,
				retryAfter: 0,
				details: { quotaCode },
			});
		});

		it('maps a quota exceeded while storing a backup to 413', () => {
			const error = ComputeError.quota(QuotaCode.METADATA_LIMIT_EXCEEDED, 'metadata');

			expect(classifyComputeError('createBackup', error)).toMatchObject({ type: 'too_large', retryAfter: 0 });
		});

		it('maps a busy instance to 409 on snapshot', () => {
			expect(classifyComputeError('createImage', new ComputeError('busy', ComputeErrorKind.INSTANCE_BUSY))).toMatchObject({
				type: 'business_rule',
				message: 'Server is currently creating an image. Please wait.',
			});
		});

		it('maps the image metadata quota to 413', () => {
			const error = ComputeError.quota(QuotaCode.METADATA_LIMIT_EXCEEDED, 'metadata');

			expect(classifyComputeError('imageMetadataQuota', error)).toMatchObject({
				type: 'too_large',
				message: 'Image metadata limit exceeded',
				retryAfter: 0,
			});
		});
	});
});
