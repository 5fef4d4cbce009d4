/**
 * Infrastructure
 */

export * from './orchestrator/index.js';
