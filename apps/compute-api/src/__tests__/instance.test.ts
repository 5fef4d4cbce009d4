import { describe, expect, it } from 'vitest';
import { TaskState, VmState, statusFromState, vmStateFromStatus } from '../domain/index.js';
import { createPasswordPolicy } from '../infrastructure/index.js';

describe('instance status', () => {
	it('reports the lifecycle state of an idle instance', () => {
		expect(statusFromState(VmState.ACTIVE, null)).toBe('ACTIVE');
		expect(statusFromState(VmState.BUILDING, null)).toBe('BUILD');
		expect(statusFromState(VmState.SOFT_DELETE, null)).toBe('DELETED');
	});

	it('refines an active status by its task', () => {
		expect(statusFromState(VmState.ACTIVE, TaskState.HARD_REBOOTING)).toBe('HARD_REBOOT');
		expect(statusFromState(VmState.ACTIVE, TaskState.RESIZE_VERIFY)).toBe('VERIFY_RESIZE');
		expect(statusFromState(VmState.ACTIVE, TaskState.IMAGE_SNAPSHOT)).toBe('ACTIVE');
	});

	it('ignores tasks on inactive instances', () => {
		expect(statusFromState(VmState.STOPPED, TaskState.REBOOTING)).toBe('STOPPED');
	});

	it('maps a status filter back to a state', () => {
		expect(vmStateFromStatus('build')).toBe(VmState.BUILDING);
		expect(vmStateFromStatus('RESCUE')).toBe(VmState.RESCUED);
		expect(vmStateFromStatus('SLEEPING')).toBeNull();
	});
});

describe('createPasswordPolicy', () => {
	it('generates passwords of the configured length from unambiguous symbols', () => {
		const password = createPasswordPolicy({ length: 16 }).generate();

		expect(password).toHaveLength(16);
		expect(password).toMatch(/^[2-9A-HJ-NP-Za-km-z]+$/);
	});
});
