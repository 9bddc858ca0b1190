/**
 * @ledgerproof/aml-policy
 *
 * Rule catalog, evaluator, validator, report synthesis and the compliance
 * engine that ties them to an audit archive.
 */

export * from './types.js';
export * from './errors.js';
export * from './catalog.js';
export * from './evaluator.js';
export * from './validator.js';
export * from './report.js';
export * from './normalize.js';
export * from './transactions.js';
export * from './engine.js';
