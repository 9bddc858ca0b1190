import { ComplianceError } from '@ledgerproof/utils';

/**
 * Malformed or missing rule configuration. Fatal at load time.
 */
export class CatalogError extends ComplianceError {
  readonly code = 'catalog_error';
  readonly httpStatus = 500;
}

/**
 * Invalid run input (empty transaction set, unknown policy type, bad record).
 * The run is not recorded.
 */
export class ValidationError extends ComplianceError {
  readonly code = 'validation_error';
  readonly httpStatus = 400;
}

/**
 * The audit archive could not persist a run. The computed report is still
 * handed back to the caller.
 */
export class StoreError extends ComplianceError {
  readonly code = 'store_error';
  readonly httpStatus = 503;
}
