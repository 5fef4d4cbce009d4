/**
 * Compute Orchestrator
 *
 * The compute lifecycle service this layer fronts. Scheduling, placement,
 * quota accounting and image storage all live behind this interface; every
 * method either resolves or throws a ComputeError.
 */

import type { ExecutionContext } from '@computegate/domain-core';
import type { InstanceRecord } from './instance.js';

/**
 * A file to write into the instance at boot.
 */
export interface InjectedFile {
	readonly path: string;
	readonly contents: Buffer;
}

/**
 * A network to attach, optionally pinned to a fixed IPv4 address.
 */
export interface RequestedNetwork {
	readonly networkId: string;
	readonly fixedIp?: string;
}

export type RebootType = 'HARD' | 'SOFT';

/**
 * Filter values forwarded to `getAll`. `changes-since` arrives parsed.
 */
export type SearchOptions = Readonly<Record<string, string | boolean | Date>>;

/**
 * Fields of a create request, after validation.
 */
export interface InstanceCreateFields {
	readonly displayName: string;
	readonly displayDescription: string;
	readonly keyName?: string;
	readonly metadata: Readonly<Record<string, string>>;
	readonly accessIpV4?: string;
	readonly accessIpV6?: string;
	readonly injectedFiles: readonly InjectedFile[];
	readonly adminPassword: string;
	readonly reservationId: string | null;
	readonly minCount: number;
	readonly maxCount: number;
	readonly requestedNetworks: readonly RequestedNetwork[] | null;
	readonly securityGroups: readonly string[];
	readonly userData?: string;
	readonly availabilityZone?: string;
	readonly configDrive?: unknown;
	readonly blockDeviceMapping?: unknown;
	readonly autoDiskConfig?: boolean;
}

/**
 * Sparse instance patch; absent fields are left unchanged.
 */
export interface InstancePatch {
	readonly displayName?: string;
	readonly accessIpV4?: string;
	readonly accessIpV6?: string;
	readonly autoDiskConfig?: boolean;
}

export interface RebuildOptions {
	readonly name?: string;
	readonly metadata?: Readonly<Record<string, string>>;
	readonly filesToInject: readonly InjectedFile[];
}

export interface CreatedImage {
	readonly id: string;
}

/**
 * An action recorded against an instance. `error` is null when it succeeded.
 */
export interface InstanceActionRecord {
	readonly action: string;
	readonly error: string | null;
	readonly createdAt: Date;
}

/** Hypervisor figures for an instance; the keys depend on the hypervisor. */
export type InstanceDiagnostics = Readonly<Record<string, string | number>>;

export interface ComputeOrchestrator {
	create(
		ctx: ExecutionContext,
		flavorId: string,
		imageRef: string,
		fields: InstanceCreateFields,
	): Promise<{ instances: InstanceRecord[]; reservationId: string }>;
	update(ctx: ExecutionContext, instanceId: string, patch: InstancePatch): Promise<void>;
	delete(ctx: ExecutionContext, instance: InstanceRecord): Promise<void>;
	softDelete(ctx: ExecutionContext, instance: InstanceRecord): Promise<void>;
	reboot(ctx: ExecutionContext, instance: InstanceRecord, rebootType: RebootType): Promise<void>;
	resize(ctx: ExecutionContext, instance: InstanceRecord, flavorId: string): Promise<void>;
	confirmResize(ctx: ExecutionContext, instance: InstanceRecord): Promise<void>;
	revertResize(ctx: ExecutionContext, instance: InstanceRecord): Promise<void>;
	rebuild(
		ctx: ExecutionContext,
		instance: InstanceRecord,
		imageRef: string,
		adminPassword: string,
		options: RebuildOptions,
	): Promise<void>;
	backup(
		ctx: ExecutionContext,
		instance: InstanceRecord,
		name: string,
		backupType: string,
		rotation: number,
		extraProperties: Readonly<Record<string, string>>,
	): Promise<CreatedImage>;
	snapshot(
		ctx: ExecutionContext,
		instance: InstanceRecord,
		name: string,
		extraProperties: Readonly<Record<string, string>>,
	): Promise<CreatedImage>;
	setAdminPassword(ctx: ExecutionContext, instance: InstanceRecord, password: string): Promise<void>;
	getAll(ctx: ExecutionContext, searchOptions: SearchOptions): Promise<InstanceRecord[]>;
	routingGet(ctx: ExecutionContext, instanceId: string): Promise<InstanceRecord>;
	/** Throws a MetadataLimitExceeded quota error when the metadata is too large for an image. */
	checkImageMetadataQuota(ctx: ExecutionContext, metadata: Readonly<Record<string, string>>): Promise<void>;
	getDiagnostics(ctx: ExecutionContext, instance: InstanceRecord): Promise<InstanceDiagnostics>;
	/** Recorded actions, oldest first. */
	getActions(ctx: ExecutionContext, instance: InstanceRecord): Promise<InstanceActionRecord[]>;
}

/**
 * Generates admin passwords for instances whose caller did not supply one.
 */
export interface PasswordPolicy {
	generate(): string;
}
