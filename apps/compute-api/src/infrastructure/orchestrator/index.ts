export {
	createInMemoryOrchestrator,
	DEFAULT_FLAVORS,
	DEFAULT_IMAGES,
	type InMemoryOrchestrator,
	type InMemoryOrchestratorOptions,
	type FlavorSpec,
	type ImageSpec,
	type StoredImage,
	type QuotaLimits,
} from './in-memory-orchestrator.js';
export { createPasswordPolicy, type PasswordPolicyConfig } from './password-policy.js';
