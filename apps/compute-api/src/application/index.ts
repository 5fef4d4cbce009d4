/**
 * Application Layer
 */

export * from './server/index.js';
