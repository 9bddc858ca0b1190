/**
 * @ledgerproof/utils
 *
 * Logging, settings, identifiers and the shared error base.
 */

export * from './logger.js';
export * from './errors.js';
export * from './id.js';
export * from './settings.js';
