export {
	VmState,
	TaskState,
	statusFromState,
	vmStateFromStatus,
	type InstanceRecord,
	type InstanceAddress,
} from './instance.js';
export { ComputeError, ComputeErrorKind, QuotaCode, isComputeError } from './compute-error.js';
export type {
	ComputeOrchestrator,
	PasswordPolicy,
	InjectedFile,
	RequestedNetwork,
	RebootType,
	SearchOptions,
	InstanceCreateFields,
	InstancePatch,
	RebuildOptions,
	CreatedImage,
	InstanceActionRecord,
	InstanceDiagnostics,
} from './orchestrator.js';
