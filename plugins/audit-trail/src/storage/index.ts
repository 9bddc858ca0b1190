/**
 * Storage Backends
 */

export * from './memory.js';
export * from './postgres.js';
export * from './schema.js';
