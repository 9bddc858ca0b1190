/**
 * @ledgerproof/audit-trail
 *
 * Append-only, hash-chained archive of compliance audit runs.
 */

export * from './types.js';
export * from './storage/index.js';
export * from './service.js';
