/**
 * Fastify Plugins
 */

export { tracingPlugin } from './tracing.js';
export { executionContextPlugin } from './execution-context.js';
export { rawBodyPlugin, isXmlRequest } from './raw-body.js';
