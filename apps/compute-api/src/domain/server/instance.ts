/**
 * Instance Record
 *
 * The orchestration service's view of a compute instance, as returned by
 * `routingGet` and `getAll`. This layer reads it to build responses and
 * never mutates it.
 */

/**
 * Lifecycle states an instance can be in.
 */
export const VmState = {
	ACTIVE: 'active',
	BUILDING: 'building',
	REBUILDING: 'rebuilding',
	PAUSED: 'paused',
	SUSPENDED: 'suspended',
	RESCUED: 'rescued',
	DELETED: 'deleted',
	STOPPED: 'stopped',
	SOFT_DELETE: 'soft-delete',
	MIGRATING: 'migrating',
	RESIZING: 'resizing',
	ERROR: 'error',
} as const;

export type VmState = (typeof VmState)[keyof typeof VmState];

/**
 * Transient tasks running against an instance.
 */
export const TaskState = {
	REBOOTING: 'rebooting',
	HARD_REBOOTING: 'rebooting_hard',
	UPDATING_PASSWORD: 'updating_password',
	RESIZE_VERIFY: 'resize_verify',
	IMAGE_SNAPSHOT: 'image_snapshot',
	IMAGE_BACKUP: 'image_backup',
} as const;

export type TaskState = (typeof TaskState)[keyof typeof TaskState];

export interface InstanceAddress {
	readonly version: 4 | 6;
	readonly addr: string;
}

export interface InstanceRecord {
	readonly id: string;
	readonly name: string;
	readonly userId: string;
	readonly projectId: string;
	readonly imageRef: string;
	readonly flavorId: string;
	readonly vmState: VmState;
	readonly taskState: TaskState | null;
	readonly hostId: string;
	readonly progress: number;
	readonly accessIpV4: string | null;
	readonly accessIpV6: string | null;
	readonly keyName: string | null;
	readonly metadata: Readonly<Record<string, string>>;
	readonly securityGroups: readonly string[];
	/** Addresses keyed by network label */
	readonly addresses: Readonly<Record<string, readonly InstanceAddress[]>>;
	readonly reservationId: string;
	readonly autoDiskConfig: boolean;
	readonly createdAt: Date;
	readonly updatedAt: Date;
	readonly deleted: boolean;
}

/**
 * Client-facing status for each lifecycle state. Tasks on an active
 * instance refine the status.
 */
const STATE_STATUS: Record<VmState, string> = {
	[VmState.ACTIVE]: 'ACTIVE',
	[VmState.BUILDING]: 'BUILD',
	[VmState.REBUILDING]: 'REBUILD',
	[VmState.STOPPED]: 'STOPPED',
	[VmState.MIGRATING]: 'MIGRATING',
	[VmState.RESIZING]: 'RESIZE',
	[VmState.PAUSED]: 'PAUSED',
	[VmState.SUSPENDED]: 'SUSPENDED',
	[VmState.RESCUED]: 'RESCUE',
	[VmState.ERROR]: 'ERROR',
	[VmState.DELETED]: 'DELETED',
	[VmState.SOFT_DELETE]: 'DELETED',
};

const ACTIVE_TASK_STATUS: Partial<Record<TaskState, string>> = {
	[TaskState.REBOOTING]: 'REBOOT',
	[TaskState.HARD_REBOOTING]: 'HARD_REBOOT',
	[TaskState.UPDATING_PASSWORD]: 'PASSWORD',
	[TaskState.RESIZE_VERIFY]: 'VERIFY_RESIZE',
};

/**
 * Client-facing status of an instance.
 */
export function statusFromState(vmState: VmState, taskState: TaskState | null): string {
	if (vmState === VmState.ACTIVE && taskState !== null) {
		return ACTIVE_TASK_STATUS[taskState] ?? STATE_STATUS[vmState];
	}
	return STATE_STATUS[vmState];
}

/**
 * Lifecycle state for a client-facing status filter, matched
 * case-insensitively. Returns null for an unknown status.
 */
export function vmStateFromStatus(status: string): VmState | null {
	const wanted = status.toLowerCase();
	for (const [state, label] of Object.entries(STATE_STATUS)) {
		if (label.toLowerCase() === wanted && isVmState(state)) {
			return state;
		}
	}
	return null;
}

function isVmState(value: string): value is VmState {
	return Object.values<string>(VmState).includes(value);
}
