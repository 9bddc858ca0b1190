/**
 * Audit Trail Types
 *
 * Types for the append-only, hash-chained archive of audit runs.
 */

import type { AuditTrailEntry, OverallStatus, ReportType } from '@ledgerproof/aml-policy';

export type { AuditTrailEntry } from '@ledgerproof/aml-policy';

export type HashAlgorithm = 'sha256' | 'sha384' | 'sha512';

/**
 * Audit trail store configuration
 */
export interface AuditTrailConfig {
  /** Storage backend type */
  storageType: 'memory' | 'postgres';
  /** PostgreSQL connection string */
  postgresConnectionString?: string;
  /** Hash algorithm for the entry chain */
  hashAlgorithm?: HashAlgorithm;
  /** Clock used for `recordedAt` */
  now?: () => Date;
}

/**
 * Half-open time window: `from <= recordedAt < to`
 */
export interface TimeRange {
  /** ISO-8601, inclusive */
  from: string;
  /** ISO-8601, exclusive */
  to: string;
}

export interface AuditTrailFilter {
  reportType?: ReportType;
  overallStatus?: OverallStatus;
  /** Defaults to 100 */
  limit?: number;
  offset?: number;
}

/**
 * Query handed to a storage backend. Bounds are ISO-8601 strings already
 * normalized by the store.
 */
export interface StorageQuery {
  from?: string;
  to?: string;
  reportType?: ReportType;
  overallStatus?: OverallStatus;
  /** `newest`: recordedAt then runId, both descending. `run`: runId ascending */
  order: 'newest' | 'run';
  limit: number;
  offset: number;
}

/**
 * Storage backend interface
 */
export interface AuditTrailStorageBackend {
  /** Initialize storage */
  init(): Promise<void>;

  /** Append an entry; run ids are unique */
  append(entry: AuditTrailEntry): Promise<void>;

  query(query: StorageQuery): Promise<AuditTrailEntry[]>;

  get(runId: number): Promise<AuditTrailEntry | null>;

  /** Entry with the highest run id (for chaining) */
  getLastEntry(): Promise<AuditTrailEntry | null>;

  count(): Promise<number>;

  /** Close connection */
  close(): Promise<void>;
}

/**
 * Result of integrity check
 */
export interface IntegrityCheckResult {
  valid: boolean;
  entriesChecked: number;
  /** First entry whose hash or link does not verify */
  firstInvalidRunId?: number;
  error?: string;
  checkedAt: string;
}

/**
 * Audit trail statistics
 */
export interface AuditTrailStats {
  totalEntries: number;
  byReportType: Record<string, number>;
  byOverallStatus: Record<string, number>;
  totalViolations: number;
  /** Oldest recordedAt */
  oldestEntry?: string;
  /** Newest recordedAt */
  newestEntry?: string;
}
