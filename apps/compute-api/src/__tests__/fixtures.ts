import { vi } from 'vitest';
import type { LogWriter } from '@computegate/logging';
import { ExecutionContext, Result, type UseCaseError } from '@computegate/application';
import type { PasswordPolicy } from '../domain/index.js';

export const BASE_URL = 'http://localhost/v1.1';
export const NETWORK_A = '3f2504e0-4f89-11d3-9a0c-0305e82c3301';
export const NETWORK_B = '6ba7b810-9dad-11d1-80b4-00c04fd430c8';

export const fixedPasswordPolicy: PasswordPolicy = {
	generate: () => 'generated-pass',
};

export function userContext(projectId = 'project-1'): ExecutionContext {
	return ExecutionContext.create({ principalId: 'user-1', projectId, isAdmin: false });
}

export function adminContext(projectId = 'project-1'): ExecutionContext {
	return ExecutionContext.create({ principalId: 'admin-1', projectId, isAdmin: true });
}

export function failureOf<T>(result: Result<T>): UseCaseError {
	if (Result.isSuccess(result)) {
		throw new Error(`Expected a failure, got ${JSON.stringify(result.value)}`);
	}
	return result.error;
}

export function valueOf<T>(result: Result<T>): T {
	return Result.unwrap(result);
}

export function makeLogger(): LogWriter {
	return {
		trace: vi.fn(),
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		fatal: vi.fn(),
	};
}
