export * from './create-server/index.js';
export * from './update-server/index.js';
export * from './delete-server/index.js';
export * from './show-server/index.js';
export * from './list-servers/index.js';
export * from './server-action/index.js';
export * from './server-diagnostics/index.js';
export * from './list-server-actions/index.js';
export {
	classifyComputeError,
	type ClassificationSubject,
	type ComputeOperation,
} from './error-classifier.js';
export { normalizeBody, type BodyEncoding, type BodyKind } from './normalizer.js';
export { isMapping, isStringMap, type RequestBody } from './request-body.js';
export { lookupInstance } from './lookup.js';
