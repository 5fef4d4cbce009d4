import { describe, it, expect, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { Result, UseCaseError } from '@computegate/domain-core';
import {
	getErrorStatus,
	toErrorResponse,
	sendResult,
	matchResult,
	noContent,
} from '../response.js';

describe('Response Utilities', () => {
	let app: FastifyInstance | undefined;

	afterEach(async () => {
		await app?.close();
		app = undefined;
	});

	describe('getErrorStatus', () => {
		it('should map every error type', () => {
			expect(getErrorStatus(UseCaseError.validation('CODE', 'message'))).toBe(400);
			expect(getErrorStatus(UseCaseError.notFound('CODE', 'message'))).toBe(404);
			expect(getErrorStatus(UseCaseError.businessRule('CODE', 'message'))).toBe(409);
			expect(getErrorStatus(UseCaseError.tooLarge('CODE', 'message'))).toBe(413);
			expect(getErrorStatus(UseCaseError.unprocessable('CODE', 'message'))).toBe(422);
		});
	});

	describe('toErrorResponse', () => {
		it('should create error response with details', () => {
			const error = UseCaseError.validation('INVALID_FIXED_IP', 'Invalid fixed IP address (10.0.0)', {
				field: 'fixed_ip',
			});
			const response = toErrorResponse(error);

			expect(response.code).toBe('INVALID_FIXED_IP');
			expect(response.message).toBe('Invalid fixed IP address (10.0.0)');
			expect(response.details).toEqual({ field: 'fixed_ip' });
		});

		it('should omit empty details', () => {
			const response = toErrorResponse(UseCaseError.validation('CODE', 'message'));

			expect(response.details).toBeUndefined();
		});
	});

	describe('sendResult', () => {
		it('should send success with default status', async () => {
			app = Fastify();
			app.get('/test', async (_request, reply) => {
				const result: Result<{ id: string }> = Result.success({ id: '123' });
				return sendResult(reply, result);
			});

			const res = await app.inject({ method: 'GET', url: '/test' });
			expect(res.statusCode).toBe(200);
			expect(res.json()).toEqual({ id: '123' });
		});

		it('should send success with custom status and transform', async () => {
			app = Fastify();
			app.get('/test', async (_request, reply) => {
				const result: Result<{ id: string; name: string }> = Result.success({ id: '789', name: 'web-1' });
				return sendResult(reply, result, {
					successStatus: 202,
					transform: (server) => ({ server: { id: server.id } }),
				});
			});

			const res = await app.inject({ method: 'GET', url: '/test' });
			expect(res.statusCode).toBe(202);
			expect(res.json()).toEqual({ server: { id: '789' } });
		});

		it('should send failure with appropriate status', async () => {
			app = Fastify();
			app.get('/test', async (_request, reply) => {
				const result = Result.failure(UseCaseError.notFound('SERVER_NOT_FOUND', 'Instance could not be found'));
				return sendResult(reply, result);
			});

			const res = await app.inject({ method: 'GET', url: '/test' });
			expect(res.statusCode).toBe(404);
			expect(res.json()).toEqual({ code: 'SERVER_NOT_FOUND', message: 'Instance could not be found' });
		});

		it('should set Retry-After for too-large failures', async () => {
			app = Fastify();
			app.get('/test', async (_request, reply) => {
				const result = Result.failure(UseCaseError.tooLarge('QUOTA_EXCEEDED', 'Instance quotas have been exceeded', 0));
				return sendResult(reply, result);
			});

			const res = await app.inject({ method: 'GET', url: '/test' });
			expect(res.statusCode).toBe(413);
			expect(res.headers['retry-after']).toBe('0');
		});
	});

	describe('matchResult', () => {
		it('should call onSuccess for success result', async () => {
			app = Fastify();
			app.get('/test', async (_request, reply) => {
				const result: Result<string> = Result.success('https://images.test/p1/images/img-1');
				return matchResult(reply, result, (location) => reply.status(202).header('location', location).send());
			});

			const res = await app.inject({ method: 'GET', url: '/test' });
			expect(res.statusCode).toBe(202);
			expect(res.headers['location']).toBe('https://images.test/p1/images/img-1');
		});

		it('should call onFailure for failure result', async () => {
			app = Fastify();
			app.get('/test', async (_request, reply) => {
				const result = Result.failure(UseCaseError.validation('ERR', 'error'));
				return matchResult(
					reply,
					result,
					() => reply.send({ ok: true }),
					(error) => reply.status(400).send({ custom: error.code }),
				);
			});

			const res = await app.inject({ method: 'GET', url: '/test' });
			expect(res.statusCode).toBe(400);
			expect(res.json()).toEqual({ custom: 'ERR' });
		});

		it('should fall back to the mapped error response', async () => {
			app = Fastify();
			app.get('/test', async (_request, reply) => {
				const result = Result.failure(UseCaseError.unprocessable('REBOOT_FAILED', 'Cannot reboot'));
				return matchResult(reply, result, () => reply.send({ ok: true }));
			});

			const res = await app.inject({ method: 'GET', url: '/test' });
			expect(res.statusCode).toBe(422);
			expect(res.json().code).toBe('REBOOT_FAILED');
		});
	});

	describe('Response helpers', () => {
		it('noContent should return 204 with an empty body', async () => {
			app = Fastify();
			app.get('/test', async (_request, reply) => noContent(reply));

			const res = await app.inject({ method: 'GET', url: '/test' });
			expect(res.statusCode).toBe(204);
			expect(res.body).toBe('');
		});
	});
});
