/**
 * Domain
 */

export * from './server/index.js';
