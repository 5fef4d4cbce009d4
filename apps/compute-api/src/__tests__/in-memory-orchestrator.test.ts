import { beforeEach, describe, expect, it } from 'vitest';
import { ComputeErrorKind, QuotaCode, VmState, type InstanceCreateFields, type InstanceRecord } from '../domain/index.js';
import { createInMemoryOrchestrator, type InMemoryOrchestrator } from '../infrastructure/index.js';
import { adminContext, userContext } from './fixtures.js';

function fields(overrides: Partial<InstanceCreateFields> = {}): InstanceCreateFields {
	return {
		displayName: 'web-1',
		displayDescription: 'web-1',
		metadata: {},
		injectedFiles: [],
		adminPassword: 'test-secret',
		reservationId: null,
		minCount: 1,
		maxCount: 1,
		requestedNetworks: null,
		securityGroups: ['default'],
		...overrides,
	};
}

describe('createInMemoryOrchestrator', () => {
	let orchestrator: InMemoryOrchestrator;

	beforeEach(() => {
		orchestrator = createInMemoryOrchestrator({ keypairs: ['deploy'], securityGroups: ['default', 'web'] });
	});

	async function createOne(overrides: Partial<InstanceCreateFields> = {}, flavorId = '2'): Promise<InstanceRecord> {
		const { instances } = await orchestrator.create(userContext(), flavorId, 'cirros-0.3', fields(overrides));
		const [instance] = instances;
		if (!instance) throw new Error('no instance created');
		return instance;
	}

	describe('create', () => {
		it('creates active instances under one reservation', async () => {
			const { instances, reservationId } = await orchestrator.create(
				userContext(),
				'2',
				'cirros-0.3',
				fields({ maxCount: 2 }),
			);

			expect(instances).toHaveLength(2);
			expect(reservationId).toMatch(/^r-[0-9a-f]{8}$/);
			expect(instances.every((instance) => instance.reservationId === reservationId)).toBe(true);
			expect(instances[0]).toMatchObject({ vmState: VmState.ACTIVE, progress: 100, projectId: 'project-1' });
		});

		it('keeps a supplied reservation id', async () => {
			const { reservationId } = await orchestrator.create(
				userContext(),
				'2',
				'cirros-0.3',
				fields({ reservationId: 'r-custom' }),
			);
			expect(reservationId).toBe('r-custom');
		});

		it('rejects a flavor with too little memory for the image', async () => {
			await expect(orchestrator.create(userContext(), '1', 'ubuntu-11.10', fields())).rejects.toMatchObject({
				kind: ComputeErrorKind.INSTANCE_TYPE_MEMORY_TOO_SMALL,
				message: "Instance type's memory is too small for requested image.",
			});
		});

		it('rejects unknown flavors, images and keypairs', async () => {
			await expect(orchestrator.create(userContext(), '99', 'cirros-0.3', fields())).rejects.toMatchObject({
				kind: ComputeErrorKind.FLAVOR_NOT_FOUND,
			});
			await expect(orchestrator.create(userContext(), '2', 'missing', fields())).rejects.toMatchObject({
				kind: ComputeErrorKind.IMAGE_NOT_FOUND,
			});
			await expect(
				orchestrator.create(userContext(), '2', 'cirros-0.3', fields({ keyName: 'other' })),
			).rejects.toMatchObject({ kind: ComputeErrorKind.KEYPAIR_NOT_FOUND });
		});

		it('names the missing security group and project', async () => {
			await expect(
				orchestrator.create(userContext(), '2', 'cirros-0.3', fields({ securityGroups: ['db'] })),
			).rejects.toMatchObject({
				kind: ComputeErrorKind.SECURITY_GROUP_NOT_FOUND,
				message: 'Security group db not found for project project-1.',
			});
		});

		it('enforces the instance and file quotas', async () => {
			const limited = createInMemoryOrchestrator({ quotas: { instances: 2, injectedFiles: 1 } });

			await expect(limited.create(userContext(), '2', 'cirros-0.3', fields({ maxCount: 3 }))).rejects.toMatchObject({
				kind: ComputeErrorKind.QUOTA_EXCEEDED,
				quotaCode: QuotaCode.INSTANCE_LIMIT_EXCEEDED,
			});

			const file = { path: '/etc/motd', contents: Buffer.from('hello') };
			await expect(
				limited.create(userContext(), '2', 'cirros-0.3', fields({ injectedFiles: [file, file] })),
			).rejects.toMatchObject({ quotaCode: QuotaCode.ONSET_FILE_LIMIT_EXCEEDED });
		});
	});

	describe('lookup', () => {
		it('hides instances of other projects from non-admins', async () => {
			const instance = await createOne();

			await expect(orchestrator.routingGet(userContext('project-2'), instance.id)).rejects.toMatchObject({
				kind: ComputeErrorKind.INSTANCE_NOT_FOUND,
			});
			await expect(orchestrator.routingGet(adminContext('project-2'), instance.id)).resolves.toMatchObject({
				id: instance.id,
			});
		});

		it('hides deleted instances', async () => {
			const instance = await createOne();
			await orchestrator.delete(userContext(), instance);

			expect(orchestrator.getInstance(instance.id)?.vmState).toBe(VmState.DELETED);
			await expect(orchestrator.routingGet(userContext(), instance.id)).rejects.toMatchObject({
				kind: ComputeErrorKind.INSTANCE_NOT_FOUND,
			});
		});

		it('filters by name, state and image', async () => {
			const web = await createOne({ displayName: 'web-1' });
			await createOne({ displayName: 'db-1' });
			orchestrator.setState(web.id, VmState.STOPPED);

			const byName = await orchestrator.getAll(userContext(), { name: 'web' });
			const stopped = await orchestrator.getAll(userContext(), { vm_state: VmState.STOPPED });
			const byImage = await orchestrator.getAll(userContext(), { image: 'http://localhost/v1.1/p/images/cirros-0.3' });

			expect(byName.map((instance) => instance.id)).toEqual([web.id]);
			expect(stopped.map((instance) => instance.id)).toEqual([web.id]);
			expect(byImage).toHaveLength(2);
		});
	});

	describe('resize', () => {
		it('records a migration that can be reverted', async () => {
			const instance = await createOne();

			await orchestrator.resize(userContext(), instance, '3');
			expect(orchestrator.getInstance(instance.id)).toMatchObject({ flavorId: '3', taskState: 'resize_verify' });

			await orchestrator.revertResize(userContext(), instance);
			expect(orchestrator.getInstance(instance.id)).toMatchObject({ flavorId: '2', taskState: null });
		});

		it('refuses the same or a smaller size', async () => {
			const instance = await createOne({}, '3');

			await expect(orchestrator.resize(userContext(), instance, '3')).rejects.toMatchObject({
				kind: ComputeErrorKind.CANNOT_RESIZE_TO_SAME_SIZE,
			});
			await expect(orchestrator.resize(userContext(), instance, '2')).rejects.toMatchObject({
				kind: ComputeErrorKind.CANNOT_RESIZE_TO_SMALLER_SIZE,
			});
		});

		it('cannot confirm without a migration', async () => {
			const instance = await createOne();

			await expect(orchestrator.confirmResize(userContext(), instance)).rejects.toMatchObject({
				kind: ComputeErrorKind.MIGRATION_NOT_FOUND,
			});
		});
	});

	describe('images', () => {
		it('keeps only the newest backups of a type', async () => {
			const instance = await createOne();

			const first = await orchestrator.backup(userContext(), instance, 'b1', 'daily', 2, {});
			await orchestrator.backup(userContext(), instance, 'b2', 'daily', 2, {});
			await orchestrator.backup(userContext(), instance, 'b3', 'daily', 2, {});
			await orchestrator.backup(userContext(), instance, 'w1', 'weekly', 2, {});

			const names = orchestrator.listImages().map((image) => image.name);
			expect(names).toEqual(['b2', 'b3', 'w1']);
			expect(orchestrator.listImages().some((image) => image.id === first.id)).toBe(false);
		});

		it('refuses a snapshot while another image is being taken', async () => {
			const instance = await createOne();
			orchestrator.setState(instance.id, VmState.ACTIVE, 'image_snapshot');

			await expect(orchestrator.snapshot(userContext(), instance, 'snap', {})).rejects.toMatchObject({
				kind: ComputeErrorKind.INSTANCE_BUSY,
			});
		});

		it('checks the image metadata quota', async () => {
			const limited = createInMemoryOrchestrator({ quotas: { metadataItems: 1 } });

			await expect(limited.checkImageMetadataQuota(userContext(), { a: '1', b: '2' })).rejects.toMatchObject({
				quotaCode: QuotaCode.METADATA_LIMIT_EXCEEDED,
			});
		});
	});

	it('rebuilds only active instances', async () => {
		const instance = await createOne();
		orchestrator.setState(instance.id, VmState.STOPPED);

		await expect(
			orchestrator.rebuild(userContext(), instance, 'ubuntu-11.10', 'test-secret', { filesToInject: [] }),
		).rejects.toMatchObject({ kind: ComputeErrorKind.REBUILD_REQUIRES_ACTIVE_INSTANCE });
	});

	describe('diagnostics and action log', () => {
		let clock: Date;
		let timed: InMemoryOrchestrator;

		beforeEach(() => {
			clock = new Date('2026-03-01T10:00:00.000Z');
			timed = createInMemoryOrchestrator({ now: () => clock });
		});

		async function createTimed(): Promise<InstanceRecord> {
			const { instances } = await timed.create(userContext(), '3', 'cirros-0.3', fields());
			const [instance] = instances;
			if (!instance) throw new Error('no instance created');
			return instance;
		}

		it('reports memory, disk and uptime', async () => {
			const instance = await createTimed();
			clock = new Date('2026-03-01T10:01:30.000Z');

			expect(await timed.getDiagnostics(userContext(), instance)).toEqual({
				vm_state: VmState.ACTIVE,
				memory: 4096 * 1024,
				disk_gb: 40,
				uptime: 90,
			});
		});

		it('logs each action with its time', async () => {
			const instance = await createTimed();
			await timed.setAdminPassword(userContext(), instance, 'test-secret');
			clock = new Date('2026-03-01T11:00:00.000Z');
			await timed.snapshot(userContext(), instance, 'snap', {});

			expect(await timed.getActions(userContext(), instance)).toEqual([
				{ action: 'set_admin_password', error: null, createdAt: new Date('2026-03-01T10:00:00.000Z') },
				{ action: 'snapshot', error: null, createdAt: new Date('2026-03-01T11:00:00.000Z') },
			]);
		});

		it('hides the log of another project', async () => {
			const instance = await createTimed();

			await expect(timed.getActions(userContext('project-2'), instance)).rejects.toMatchObject({
				kind: ComputeErrorKind.INSTANCE_NOT_FOUND,
			});
		});
	});
});
