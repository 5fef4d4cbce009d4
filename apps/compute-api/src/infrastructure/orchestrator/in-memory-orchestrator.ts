/**
 * In-Memory Orchestrator
 *
 * A ComputeOrchestrator that keeps instances, images, quotas and an action
 * log in process. The service runs against it for local development, and
 * tests use it as a stand-in for the real orchestration service. Boots and
 * reboots complete immediately.
 */

import { randomUUID } from 'node:crypto';
import type { ExecutionContext } from '@computegate/domain-core';
import {
	ComputeError,
	ComputeErrorKind,
	QuotaCode,
	TaskState,
	VmState,
	type ComputeOrchestrator,
	type CreatedImage,
	type InjectedFile,
	type InstanceActionRecord,
	type InstanceCreateFields,
	type InstancePatch,
	type InstanceRecord,
	type RebootType,
	type RebuildOptions,
	type SearchOptions,
} from '../../domain/index.js';

export interface FlavorSpec {
	readonly id: string;
	readonly name: string;
	readonly memoryMb: number;
	readonly diskGb: number;
}

export interface ImageSpec {
	readonly id: string;
	readonly name: string;
	readonly minRamMb: number;
	readonly minDiskGb: number;
}

export interface StoredImage {
	readonly id: string;
	readonly name: string;
	readonly instanceId: string;
	/** 'snapshot' or the backup type */
	readonly imageType: string;
	readonly properties: Readonly<Record<string, string>>;
	readonly createdAt: Date;
}

export interface QuotaLimits {
	readonly instances: number;
	readonly metadataItems: number;
	readonly injectedFiles: number;
	readonly injectedFilePathBytes: number;
	readonly injectedFileContentBytes: number;
}

export interface InMemoryOrchestratorOptions {
	readonly flavors?: readonly FlavorSpec[];
	readonly images?: readonly ImageSpec[];
	readonly keypairs?: readonly string[];
	readonly securityGroups?: readonly string[];
	readonly quotas?: Partial<QuotaLimits>;
	readonly now?: () => Date;
}

/**
 * ComputeOrchestrator plus inspection helpers for tests and local tooling.
 */
export interface InMemoryOrchestrator extends ComputeOrchestrator {
	/** Current record of an instance, deleted ones included. */
	getInstance(instanceId: string): InstanceRecord | undefined;
	/** Images created by snapshot and backup, oldest first. */
	listImages(): StoredImage[];
	/** Last admin password set on an instance. */
	getAdminPassword(instanceId: string): string | undefined;
	/** Force an instance into a state, e.g. to exercise state checks. */
	setState(instanceId: string, vmState: InstanceRecord['vmState'], taskState?: InstanceRecord['taskState']): void;
}

export const DEFAULT_FLAVORS: readonly FlavorSpec[] = [
	{ id: '1', name: 'm1.tiny', memoryMb: 512, diskGb: 0 },
	{ id: '2', name: 'm1.small', memoryMb: 2048, diskGb: 20 },
	{ id: '3', name: 'm1.medium', memoryMb: 4096, diskGb: 40 },
	{ id: '4', name: 'm1.large', memoryMb: 8192, diskGb: 80 },
	{ id: '5', name: 'm1.xlarge', memoryMb: 16384, diskGb: 160 },
];

export const DEFAULT_IMAGES: readonly ImageSpec[] = [
	{ id: 'cirros-0.3', name: 'cirros', minRamMb: 0, minDiskGb: 0 },
	{ id: 'ubuntu-11.10', name: 'ubuntu', minRamMb: 1024, minDiskGb: 10 },
];

const DEFAULT_QUOTAS: QuotaLimits = {
	instances: 10,
	metadataItems: 128,
	injectedFiles: 5,
	injectedFilePathBytes: 255,
	injectedFileContentBytes: 10 * 1024,
};

interface Migration {
	readonly oldFlavorId: string;
	readonly newFlavorId: string;
}

/**
 * Create an in-memory orchestrator seeded with a flavor and image catalog.
 */
export function createInMemoryOrchestrator(options: InMemoryOrchestratorOptions = {}): InMemoryOrchestrator {
	const flavors = new Map((options.flavors ?? DEFAULT_FLAVORS).map((flavor) => [flavor.id, flavor]));
	const catalog = new Map((options.images ?? DEFAULT_IMAGES).map((image) => [image.id, image]));
	const keypairs = new Set(options.keypairs ?? []);
	const securityGroups = new Set(options.securityGroups ?? ['default']);
	const quotas: QuotaLimits = { ...DEFAULT_QUOTAS, ...options.quotas };
	const now = options.now ?? (() => new Date());

	const instances = new Map<string, InstanceRecord>();
	const migrations = new Map<string, Migration>();
	const passwords = new Map<string, string>();
	const images: StoredImage[] = [];
	const actionLog = new Map<string, InstanceActionRecord[]>();

	function requireFlavor(flavorId: string): FlavorSpec {
		const flavor = flavors.get(flavorId);
		if (!flavor) {
			throw ComputeError.notFound(ComputeErrorKind.FLAVOR_NOT_FOUND, `Flavor ${flavorId} could not be found.`);
		}
		return flavor;
	}

	function requireImage(imageRef: string): ImageSpec {
		const image = catalog.get(imageRef);
		if (!image) {
			throw ComputeError.notFound(ComputeErrorKind.IMAGE_NOT_FOUND, `Image ${imageRef} could not be found.`);
		}
		return image;
	}

	function requireInstance(ctx: ExecutionContext, instanceId: string): InstanceRecord {
		const instance = instances.get(instanceId);
		if (!instance || instance.deleted || (!ctx.isAdmin && instance.projectId !== ctx.projectId)) {
			throw ComputeError.notFound(
				ComputeErrorKind.INSTANCE_NOT_FOUND,
				`Instance ${instanceId} could not be found.`,
			);
		}
		return instance;
	}

	function save(instance: InstanceRecord, changes: Partial<InstanceRecord>): InstanceRecord {
		const updated: InstanceRecord = { ...instance, ...changes, updatedAt: now() };
		instances.set(updated.id, updated);
		return updated;
	}

	function record(instanceId: string, action: string, error: string | null = null): void {
		const entries = actionLog.get(instanceId) ?? [];
		entries.push({ action, error, createdAt: now() });
		actionLog.set(instanceId, entries);
	}

	function checkMetadataQuota(metadata: Readonly<Record<string, string>>): void {
		if (Object.keys(metadata).length > quotas.metadataItems) {
			throw ComputeError.quota(QuotaCode.METADATA_LIMIT_EXCEEDED, 'Quota exceeded: metadata items');
		}
	}

	function checkInjectedFileQuotas(files: readonly InjectedFile[]): void {
		if (files.length > quotas.injectedFiles) {
			throw ComputeError.quota(QuotaCode.ONSET_FILE_LIMIT_EXCEEDED, 'Quota exceeded: injected files');
		}
		for (const file of files) {
			if (Buffer.byteLength(file.path, 'utf8') > quotas.injectedFilePathBytes) {
				throw ComputeError.quota(QuotaCode.ONSET_FILE_PATH_LIMIT_EXCEEDED, 'Quota exceeded: injected file path');
			}
			if (file.contents.length > quotas.injectedFileContentBytes) {
				throw ComputeError.quota(
					QuotaCode.ONSET_FILE_CONTENT_LIMIT_EXCEEDED,
					'Quota exceeded: injected file content',
				);
			}
		}
	}

	function activeCount(projectId: string): number {
		let count = 0;
		for (const instance of instances.values()) {
			if (instance.projectId === projectId && !instance.deleted) {
				count++;
			}
		}
		return count;
	}

	function storeImage(instance: InstanceRecord, name: string, imageType: string, properties: Readonly<Record<string, string>>): StoredImage {
		const image: StoredImage = {
			id: randomUUID(),
			name,
			instanceId: instance.id,
			imageType,
			properties: { ...properties },
			createdAt: now(),
		};
		images.push(image);
		return image;
	}

	function matches(instance: InstanceRecord, searchOptions: SearchOptions): boolean {
		for (const [filter, value] of Object.entries(searchOptions)) {
			switch (filter) {
				case 'deleted':
					if (instance.deleted !== value) return false;
					break;
				case 'vm_state':
					if (instance.vmState !== value) return false;
					break;
				case 'name':
					if (typeof value === 'string' && !new RegExp(escapeRegExp(value)).test(instance.name)) return false;
					break;
				case 'reservation_id':
					if (instance.reservationId !== value) return false;
					break;
				case 'image':
					if (typeof value === 'string' && lastSegment(value) !== instance.imageRef) return false;
					break;
				case 'flavor':
					if (typeof value === 'string' && lastSegment(value) !== instance.flavorId) return false;
					break;
				case 'changes-since':
					if (value instanceof Date && instance.updatedAt < value) return false;
					break;
				case 'project_id':
					if (instance.projectId !== value) return false;
					break;
				default:
					// zone and unknown admin filters match everything
					break;
			}
		}
		return true;
	}

	return {
		async create(ctx, flavorId, imageRef, fields: InstanceCreateFields) {
			const flavor = requireFlavor(flavorId);
			const image = requireImage(imageRef);

			if (image.minRamMb > flavor.memoryMb) {
				throw new ComputeError(
					"Instance type's memory is too small for requested image.",
					ComputeErrorKind.INSTANCE_TYPE_MEMORY_TOO_SMALL,
				);
			}
			if (image.minDiskGb > flavor.diskGb && flavor.diskGb !== 0) {
				throw new ComputeError(
					"Instance type's disk is too small for requested image.",
					ComputeErrorKind.INSTANCE_TYPE_DISK_TOO_SMALL,
				);
			}

			if (fields.keyName !== undefined && !keypairs.has(fields.keyName)) {
				throw ComputeError.notFound(
					ComputeErrorKind.KEYPAIR_NOT_FOUND,
					`Keypair ${fields.keyName} not found for user ${ctx.principalId}`,
				);
			}
			for (const group of fields.securityGroups) {
				if (!securityGroups.has(group)) {
					throw ComputeError.notFound(
						ComputeErrorKind.SECURITY_GROUP_NOT_FOUND,
						`Security group ${group} not found for project ${ctx.projectId}.`,
					);
				}
			}

			checkMetadataQuota(fields.metadata);
			checkInjectedFileQuotas(fields.injectedFiles);

			if (activeCount(ctx.projectId) + fields.maxCount > quotas.instances) {
				throw ComputeError.quota(QuotaCode.INSTANCE_LIMIT_EXCEEDED, 'Quota exceeded: instances');
			}

			const reservationId = fields.reservationId ?? `r-${randomUUID().slice(0, 8)}`;
			const created: InstanceRecord[] = [];
			for (let i = 0; i < fields.maxCount; i++) {
				const timestamp = now();
				const instance: InstanceRecord = {
					id: randomUUID(),
					name: fields.displayName,
					userId: ctx.principalId,
					projectId: ctx.projectId,
					imageRef,
					flavorId,
					vmState: VmState.ACTIVE,
					taskState: null,
					hostId: '',
					progress: 100,
					accessIpV4: fields.accessIpV4 ?? null,
					accessIpV6: fields.accessIpV6 ?? null,
					keyName: fields.keyName ?? null,
					metadata: { ...fields.metadata },
					securityGroups: [...fields.securityGroups],
					addresses: {},
					reservationId,
					autoDiskConfig: fields.autoDiskConfig ?? false,
					createdAt: timestamp,
					updatedAt: timestamp,
					deleted: false,
				};
				instances.set(instance.id, instance);
				passwords.set(instance.id, fields.adminPassword);
				created.push(instance);
			}

			return { instances: created, reservationId };
		},

		async update(ctx, instanceId, patch: InstancePatch) {
			const instance = requireInstance(ctx, instanceId);
			save(instance, {
				...(patch.displayName !== undefined ? { name: patch.displayName } : {}),
				...(patch.accessIpV4 !== undefined ? { accessIpV4: patch.accessIpV4 } : {}),
				...(patch.accessIpV6 !== undefined ? { accessIpV6: patch.accessIpV6 } : {}),
				...(patch.autoDiskConfig !== undefined ? { autoDiskConfig: patch.autoDiskConfig } : {}),
			});
		},

		async delete(ctx, instance) {
			save(requireInstance(ctx, instance.id), { vmState: VmState.DELETED, taskState: null, deleted: true });
		},

		async softDelete(ctx, instance) {
			save(requireInstance(ctx, instance.id), { vmState: VmState.SOFT_DELETE, taskState: null });
		},

		async reboot(ctx, instance, _rebootType: RebootType) {
			const current = requireInstance(ctx, instance.id);
			if (current.vmState !== VmState.ACTIVE) {
				const message = `Instance ${instance.id} is not running`;
				record(current.id, 'reboot', message);
				throw new ComputeError(message, ComputeErrorKind.INVALID);
			}
			record(current.id, 'reboot');
			save(current, { taskState: null });
		},

		async resize(ctx, instance, flavorId) {
			const current = requireInstance(ctx, instance.id);
			const oldFlavor = requireFlavor(current.flavorId);
			const newFlavor = requireFlavor(flavorId);

			if (oldFlavor.memoryMb === newFlavor.memoryMb && oldFlavor.diskGb === newFlavor.diskGb) {
				throw new ComputeError(
					'When resizing, instances must change size!',
					ComputeErrorKind.CANNOT_RESIZE_TO_SAME_SIZE,
				);
			}
			if (newFlavor.memoryMb < oldFlavor.memoryMb) {
				throw new ComputeError(
					'Resizing to a smaller size is not supported.',
					ComputeErrorKind.CANNOT_RESIZE_TO_SMALLER_SIZE,
				);
			}

			migrations.set(current.id, { oldFlavorId: oldFlavor.id, newFlavorId: newFlavor.id });
			record(current.id, 'resize');
			save(current, { flavorId: newFlavor.id, taskState: TaskState.RESIZE_VERIFY });
		},

		async confirmResize(ctx, instance) {
			const current = requireInstance(ctx, instance.id);
			if (!migrations.delete(current.id)) {
				throw ComputeError.notFound(
					ComputeErrorKind.MIGRATION_NOT_FOUND,
					`Migration not found for instance ${current.id} with status finished`,
				);
			}
			record(current.id, 'confirm_resize');
			save(current, { taskState: null });
		},

		async revertResize(ctx, instance) {
			const current = requireInstance(ctx, instance.id);
			const migration = migrations.get(current.id);
			if (!migration) {
				throw ComputeError.notFound(
					ComputeErrorKind.MIGRATION_NOT_FOUND,
					`Migration not found for instance ${current.id} with status finished`,
				);
			}
			migrations.delete(current.id);
			record(current.id, 'revert_resize');
			save(current, { flavorId: migration.oldFlavorId, taskState: null });
		},

		async rebuild(ctx, instance, imageRef, adminPassword, rebuildOptions: RebuildOptions) {
			const current = requireInstance(ctx, instance.id);
			if (current.vmState !== VmState.ACTIVE) {
				throw new ComputeError(
					`Instance ${current.id} must be active to rebuild.`,
					ComputeErrorKind.REBUILD_REQUIRES_ACTIVE_INSTANCE,
				);
			}
			requireImage(imageRef);
			if (rebuildOptions.metadata) {
				checkMetadataQuota(rebuildOptions.metadata);
			}
			checkInjectedFileQuotas(rebuildOptions.filesToInject);

			passwords.set(current.id, adminPassword);
			record(current.id, 'rebuild');
			save(current, {
				imageRef,
				...(rebuildOptions.name !== undefined ? { name: rebuildOptions.name } : {}),
				...(rebuildOptions.metadata ? { metadata: { ...rebuildOptions.metadata } } : {}),
			});
		},

		async backup(ctx, instance, name, backupType, rotation, extraProperties): Promise<CreatedImage> {
			const current = requireInstance(ctx, instance.id);
			const image = storeImage(current, name, backupType, extraProperties);
			record(current.id, 'backup');

			// Keep only the newest `rotation` backups of this type
			const backups = images.filter((i) => i.instanceId === current.id && i.imageType === backupType);
			const excess = backups.length - rotation;
			for (const old of backups.slice(0, Math.max(excess, 0))) {
				images.splice(images.indexOf(old), 1);
			}

			return { id: image.id };
		},

		async snapshot(ctx, instance, name, extraProperties): Promise<CreatedImage> {
			const current = requireInstance(ctx, instance.id);
			if (current.taskState === TaskState.IMAGE_SNAPSHOT || current.taskState === TaskState.IMAGE_BACKUP) {
				throw new ComputeError(`Instance ${current.id} is busy creating an image`, ComputeErrorKind.INSTANCE_BUSY);
			}
			const image = storeImage(current, name, 'snapshot', extraProperties);
			record(current.id, 'snapshot');
			return { id: image.id };
		},

		async setAdminPassword(ctx, instance, password) {
			const current = requireInstance(ctx, instance.id);
			passwords.set(current.id, password);
			record(current.id, 'set_admin_password');
			save(current, { taskState: null });
		},

		async getAll(ctx, searchOptions) {
			const visible = [...instances.values()].filter(
				(instance) => ctx.isAdmin || instance.projectId === ctx.projectId,
			);
			return visible.filter((instance) => matches(instance, searchOptions));
		},

		async routingGet(ctx, instanceId) {
			return requireInstance(ctx, instanceId);
		},

		async checkImageMetadataQuota(_ctx, metadata) {
			checkMetadataQuota(metadata);
		},

		async getDiagnostics(ctx, instance) {
			const current = requireInstance(ctx, instance.id);
			const flavor = requireFlavor(current.flavorId);
			return {
				vm_state: current.vmState,
				memory: flavor.memoryMb * 1024,
				disk_gb: flavor.diskGb,
				uptime: Math.max(Math.floor((now().getTime() - current.createdAt.getTime()) / 1000), 0),
			};
		},

		async getActions(ctx, instance) {
			const current = requireInstance(ctx, instance.id);
			return [...(actionLog.get(current.id) ?? [])];
		},

		getInstance(instanceId) {
			return instances.get(instanceId);
		},

		listImages() {
			return [...images];
		},

		getAdminPassword(instanceId) {
			return passwords.get(instanceId);
		},

		setState(instanceId, vmState, taskState = null) {
			const instance = instances.get(instanceId);
			if (!instance) {
				throw ComputeError.notFound(ComputeErrorKind.INSTANCE_NOT_FOUND, `Instance ${instanceId} could not be found.`);
			}
			save(instance, { vmState, taskState });
		},
	};
}

function lastSegment(ref: string): string {
	const segments = ref.split('/');
	return segments[segments.length - 1] ?? ref;
}

function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
