/**
 * Audit Trail Store
 *
 * Append-only archive of audit runs. Writes go through a single queue, each
 * entry is hash-chained to its predecessor, and backend failures surface as
 * StoreError.
 */

import { createHash } from 'node:crypto';
import { createLogger, getErrorMessage, type Logger, type Settings } from '@ledgerproof/utils';
import {
  StoreError,
  ValidationError,
  type AuditArchive,
  type AuditReport,
  type AuditTrailEntry,
} from '@ledgerproof/aml-policy';
import type {
  AuditTrailConfig,
  AuditTrailFilter,
  AuditTrailStats,
  AuditTrailStorageBackend,
  IntegrityCheckResult,
  StorageQuery,
  TimeRange,
} from './types.js';
import { InMemoryAuditTrailStorage } from './storage/memory.js';
import { PostgresAuditTrailStorage } from './storage/postgres.js';

export const DEFAULT_QUERY_LIMIT = 100;
const EXPORT_PAGE_SIZE = 100;

/**
 * Default audit trail configuration
 */
const DEFAULT_CONFIG: AuditTrailConfig = {
  storageType: 'memory',
  hashAlgorithm: 'sha256',
};

/**
 * JSON with object keys sorted, so a hash survives storage that does not
 * preserve key order (JSONB)
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, item]) => item !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, item]) => [key, canonicalize(item)])
    );
  }
  return value;
}

type UnhashedEntry = Omit<AuditTrailEntry, 'entryHash'>;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const item of Object.values(value)) {
      deepFreeze(item);
    }
    Object.freeze(value);
  }
  return value;
}

function normalizeInstant(value: string, field: 'from' | 'to'): string {
  const time = Date.parse(value);
  if (Number.isNaN(time)) {
    throw new ValidationError(`Invalid time range bound: ${value}`, { field });
  }
  return new Date(time).toISOString();
}

function toStoreError(message: string, error: unknown, details?: Record<string, unknown>): StoreError {
  if (error instanceof StoreError) {
    return error;
  }
  return new StoreError(`${message}: ${getErrorMessage(error)}`, details, { cause: error });
}

/**
 * Audit trail store
 */
export class AuditTrailStore implements AuditArchive {
  private readonly logger: Logger;
  private readonly config: AuditTrailConfig;
  private readonly storage: AuditTrailStorageBackend;
  private readonly now: () => Date;
  private last: { runId: number; entryHash: string } | null = null;
  private writeQueue: Promise<void> = Promise.resolve();
  private initialization: Promise<void> | null = null;

  constructor(config: Partial<AuditTrailConfig> = {}, storage?: AuditTrailStorageBackend) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = createLogger({ service: 'audit-trail' });
    this.now = this.config.now ?? (() => new Date());
    this.storage = storage ?? this.createStorageBackend();
  }

  private createStorageBackend(): AuditTrailStorageBackend {
    switch (this.config.storageType) {
      case 'postgres':
        if (!this.config.postgresConnectionString) {
          throw new StoreError('PostgreSQL connection string required', { storageType: 'postgres' });
        }
        return new PostgresAuditTrailStorage({ connectionString: this.config.postgresConnectionString });
      case 'memory':
        return new InMemoryAuditTrailStorage();
    }
  }

  /**
   * Initialize the store. Idempotent; a failed attempt may be retried.
   */
  init(): Promise<void> {
    if (!this.initialization) {
      this.initialization = this.initialize().catch((error: unknown) => {
        this.initialization = null;
        throw toStoreError('Failed to initialize audit trail storage', error);
      });
    }
    return this.initialization;
  }

  private async initialize(): Promise<void> {
    this.logger.info('Initializing audit trail store', {
      storageType: this.config.storageType,
      hashAlgorithm: this.config.hashAlgorithm,
    });

    await this.storage.init();

    const lastEntry = await this.storage.getLastEntry();
    this.last = lastEntry ? { runId: lastEntry.runId, entryHash: lastEntry.entryHash } : null;

    this.logger.info('Audit trail store initialized', { lastRunId: this.last?.runId ?? 0 });
  }

  /**
   * Shutdown the store after pending writes settle
   */
  async shutdown(): Promise<void> {
    await this.writeQueue;
    await this.storage.close();
    this.initialization = null;
    this.last = null;
  }

  /**
   * Archive a report as the next run.
   *
   * @throws StoreError when the backend rejects the write
   */
  record(report: AuditReport): Promise<AuditTrailEntry> {
    // Archived entries never share structure with the caller's report
    const snapshot = deepFreeze(structuredClone(report));
    const write = this.writeQueue.then(() => this.append(snapshot));
    // Later writes wait for this one whether or not it succeeds; the caller
    // observes its outcome through `write`.
    this.writeQueue = write.then(
      () => undefined,
      () => undefined
    );
    return write;
  }

  private async append(report: AuditReport): Promise<AuditTrailEntry> {
    await this.init();

    const unhashed: UnhashedEntry = {
      runId: (this.last?.runId ?? 0) + 1,
      recordedAt: this.now().toISOString(),
      scope: report.scope,
      reportType: report.reportType,
      reportId: report.reportId,
      overallStatus: report.status.overallStatus,
      totalViolations: report.status.totalViolations,
      report,
      previousHash: this.last?.entryHash ?? null,
    };
    const entry: AuditTrailEntry = deepFreeze({ ...unhashed, entryHash: this.hashEntry(unhashed) });

    try {
      await this.storage.append(entry);
    } catch (error) {
      const storeError = toStoreError('Failed to archive audit run', error, {
        runId: entry.runId,
        reportId: report.reportId,
      });
      this.logger.error('Audit trail write failed', storeError);
      throw storeError;
    }

    this.last = { runId: entry.runId, entryHash: entry.entryHash };
    this.logger.debug('Audit run recorded', {
      runId: entry.runId,
      reportId: entry.reportId,
      overallStatus: entry.overallStatus,
    });

    return entry;
  }

  /**
   * Entries recorded within `from <= recordedAt < to`, newest first (ties
   * broken by run id, descending). No match yields an empty list.
   */
  async query(range: TimeRange, filter: AuditTrailFilter = {}): Promise<AuditTrailEntry[]> {
    const from = normalizeInstant(range.from, 'from');
    const to = normalizeInstant(range.to, 'to');
    if (Date.parse(from) > Date.parse(to)) {
      throw new ValidationError('Time range starts after it ends', { from, to });
    }

    const storageQuery: StorageQuery = {
      from,
      to,
      reportType: filter.reportType,
      overallStatus: filter.overallStatus,
      order: 'newest',
      limit: filter.limit ?? DEFAULT_QUERY_LIMIT,
      offset: filter.offset ?? 0,
    };
    if (storageQuery.limit <= 0 || storageQuery.offset < 0) {
      throw new ValidationError('limit must be positive and offset non-negative', {
        limit: storageQuery.limit,
        offset: storageQuery.offset,
      });
    }

    return this.read('Failed to query audit trail', () => this.storage.query(storageQuery));
  }

  async getEntry(runId: number): Promise<AuditTrailEntry | null> {
    return this.read('Failed to read audit trail entry', () => this.storage.get(runId));
  }

  /**
   * Stream entries in run order, optionally restricted to a window and filter
   */
  async *exportEntries(
    range?: TimeRange,
    filter: Omit<AuditTrailFilter, 'limit' | 'offset'> = {}
  ): AsyncIterable<AuditTrailEntry> {
    const base = {
      from: range ? normalizeInstant(range.from, 'from') : undefined,
      to: range ? normalizeInstant(range.to, 'to') : undefined,
      reportType: filter.reportType,
      overallStatus: filter.overallStatus,
      order: 'run' as const,
      limit: EXPORT_PAGE_SIZE,
    };

    let offset = 0;
    let hasMore = true;

    while (hasMore) {
      const page = await this.read('Failed to export audit trail', () =>
        this.storage.query({ ...base, offset })
      );

      for (const entry of page) {
        yield entry;
      }

      hasMore = page.length === EXPORT_PAGE_SIZE;
      offset += EXPORT_PAGE_SIZE;
    }
  }

  /**
   * Export audit trail as JSON Lines
   */
  async *exportAsJsonLines(range?: TimeRange): AsyncIterable<string> {
    for await (const entry of this.exportEntries(range)) {
      yield JSON.stringify(entry) + '\n';
    }
  }

  /**
   * Export audit trail as CSV
   */
  async *exportAsCsv(range?: TimeRange): AsyncIterable<string> {
    yield 'runId,recordedAt,reportType,reportId,overallStatus,totalViolations,scope,entryHash\n';

    for await (const entry of this.exportEntries(range)) {
      const row = [
        entry.runId,
        entry.recordedAt,
        entry.reportType,
        entry.reportId,
        entry.overallStatus,
        entry.totalViolations,
        `"${entry.scope.replace(/"/g, '""')}"`,
        entry.entryHash,
      ].join(',');
      yield row + '\n';
    }
  }

  /**
   * Walk the whole chain in run order, checking every link and hash
   */
  async verifyIntegrity(): Promise<IntegrityCheckResult> {
    let previous: AuditTrailEntry | null = null;
    let entriesChecked = 0;

    for await (const entry of this.exportEntries()) {
      entriesChecked++;

      const expectedRunId: number = previous ? previous.runId + 1 : 1;
      const expectedPrevious: string | null = previous ? previous.entryHash : null;

      let error: string | undefined;
      if (entry.runId !== expectedRunId) {
        error = `Expected run ${expectedRunId}, found run ${entry.runId}`;
      } else if (entry.previousHash !== expectedPrevious) {
        error = `Run ${entry.runId} does not link to its predecessor`;
      } else if (this.hashEntry(entry) !== entry.entryHash) {
        error = `Run ${entry.runId} hash mismatch`;
      }

      if (error !== undefined) {
        this.logger.warn('Audit trail integrity check failed', { runId: entry.runId, error });
        return {
          valid: false,
          entriesChecked,
          firstInvalidRunId: entry.runId,
          error,
          checkedAt: this.now().toISOString(),
        };
      }

      previous = entry;
    }

    return { valid: true, entriesChecked, checkedAt: this.now().toISOString() };
  }

  async getStats(): Promise<AuditTrailStats> {
    const totalEntries = await this.read('Failed to count audit trail', () => this.storage.count());

    const byReportType: Record<string, number> = {};
    const byOverallStatus: Record<string, number> = {};
    let totalViolations = 0;
    let oldestEntry: string | undefined;
    let newestEntry: string | undefined;

    for await (const entry of this.exportEntries()) {
      byReportType[entry.reportType] = (byReportType[entry.reportType] ?? 0) + 1;
      byOverallStatus[entry.overallStatus] = (byOverallStatus[entry.overallStatus] ?? 0) + 1;
      totalViolations += entry.totalViolations;

      if (!oldestEntry || entry.recordedAt < oldestEntry) {
        oldestEntry = entry.recordedAt;
      }
      if (!newestEntry || entry.recordedAt > newestEntry) {
        newestEntry = entry.recordedAt;
      }
    }

    return {
      totalEntries,
      byReportType,
      byOverallStatus,
      totalViolations,
      oldestEntry,
      newestEntry,
    };
  }

  private async read<T>(message: string, operation: () => Promise<T>): Promise<T> {
    await this.init();
    try {
      return await operation();
    } catch (error) {
      throw toStoreError(message, error);
    }
  }

  private hashEntry(entry: UnhashedEntry): string {
    const hashContent = canonicalJson({
      runId: entry.runId,
      recordedAt: entry.recordedAt,
      scope: entry.scope,
      reportType: entry.reportType,
      reportId: entry.reportId,
      overallStatus: entry.overallStatus,
      totalViolations: entry.totalViolations,
      report: entry.report,
      previousHash: entry.previousHash,
    });
    return createHash(this.config.hashAlgorithm ?? 'sha256').update(hashContent).digest('hex');
  }
}

/**
 * Factory function to create the audit trail store
 */
export function createAuditTrailStore(
  config?: Partial<AuditTrailConfig>,
  storage?: AuditTrailStorageBackend
): AuditTrailStore {
  return new AuditTrailStore(config, storage);
}

/**
 * Build a store from process settings
 */
export function createAuditTrailStoreFromSettings(settings: Settings): AuditTrailStore {
  return new AuditTrailStore({
    storageType: settings.auditStorage,
    postgresConnectionString: settings.databaseUrl,
  });
}
