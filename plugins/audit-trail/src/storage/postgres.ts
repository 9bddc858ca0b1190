/**
 * PostgreSQL Storage Backend
 *
 * Persists audit trail entries with the full report in a JSONB column.
 */

import { createLogger, type Logger } from '@ledgerproof/utils';
import type { AuditTrailEntry, AuditTrailStorageBackend, StorageQuery } from '../types.js';
import { rowToEntry } from './schema.js';

/**
 * The slice of a pg Pool this backend uses
 */
export interface PostgresPool {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
  end(): Promise<void>;
}

export interface PostgresStorageOptions {
  connectionString?: string;
  /** Pre-built pool; takes precedence over the connection string */
  pool?: PostgresPool;
  tableName?: string;
}

const COLUMNS =
  'run_id, recorded_at, scope, report_type, report_id, overall_status, total_violations, report, previous_hash, entry_hash';

/**
 * PostgreSQL audit trail storage backend
 */
export class PostgresAuditTrailStorage implements AuditTrailStorageBackend {
  private readonly logger: Logger;
  private readonly connectionString?: string;
  private readonly table: string;
  private pool: PostgresPool | null;

  constructor(options: PostgresStorageOptions) {
    this.connectionString = options.connectionString;
    this.pool = options.pool ?? null;
    this.table = options.tableName ?? 'audit_trail_entries';
    this.logger = createLogger({ service: 'postgres-audit-trail' });
  }

  async init(): Promise<void> {
    this.logger.info('Initializing PostgreSQL audit trail storage', { table: this.table });

    try {
      if (!this.pool) {
        this.pool = await this.connect();
      }
      await this.createTables();
      this.logger.info('PostgreSQL audit trail storage initialized');
    } catch (error) {
      this.logger.error('Failed to initialize PostgreSQL', error instanceof Error ? error : { error });
      throw error;
    }
  }

  private async connect(): Promise<PostgresPool> {
    if (!this.connectionString) {
      throw new Error('PostgreSQL connection string required');
    }
    // Loaded on demand so the in-memory backend never touches pg
    const { default: pg } = await import('pg');
    const pool = new pg.Pool({
      connectionString: this.connectionString,
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });
    return {
      query: (text, values) => pool.query(text, values),
      end: () => pool.end(),
    };
  }

  private client(): PostgresPool {
    if (!this.pool) {
      throw new Error('PostgreSQL audit trail storage is not initialized');
    }
    return this.pool;
  }

  private async createTables(): Promise<void> {
    const createTableSQL = `
      CREATE TABLE IF NOT EXISTS ${this.table} (
        run_id BIGINT PRIMARY KEY,
        recorded_at TIMESTAMPTZ NOT NULL,
        scope TEXT NOT NULL,
        report_type VARCHAR(32) NOT NULL,
        report_id VARCHAR(64) NOT NULL,
        overall_status VARCHAR(16) NOT NULL,
        total_violations INTEGER NOT NULL,
        report JSONB NOT NULL,
        previous_hash VARCHAR(128),
        entry_hash VARCHAR(128) NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_${this.table}_recorded_at ON ${this.table}(recorded_at DESC, run_id DESC);
      CREATE INDEX IF NOT EXISTS idx_${this.table}_report_type ON ${this.table}(report_type);
    `;

    await this.client().query(createTableSQL);
  }

  async append(entry: AuditTrailEntry): Promise<void> {
    const sql = `INSERT INTO ${this.table} (${COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`;

    const values = [
      entry.runId,
      entry.recordedAt,
      entry.scope,
      entry.reportType,
      entry.reportId,
      entry.overallStatus,
      entry.totalViolations,
      JSON.stringify(entry.report),
      entry.previousHash,
      entry.entryHash,
    ];

    await this.client().query(sql, values);
  }

  async query(query: StorageQuery): Promise<AuditTrailEntry[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];

    const bind = (value: unknown): string => {
      values.push(value);
      return `$${values.length}`;
    };

    if (query.from !== undefined) {
      conditions.push(`recorded_at >= ${bind(query.from)}`);
    }
    if (query.to !== undefined) {
      conditions.push(`recorded_at < ${bind(query.to)}`);
    }
    if (query.reportType !== undefined) {
      conditions.push(`report_type = ${bind(query.reportType)}`);
    }
    if (query.overallStatus !== undefined) {
      conditions.push(`overall_status = ${bind(query.overallStatus)}`);
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const orderBy = query.order === 'run' ? 'run_id ASC' : 'recorded_at DESC, run_id DESC';
    const limit = bind(query.limit);
    const offset = bind(query.offset);

    const sql = `SELECT ${COLUMNS} FROM ${this.table} ${whereClause} ORDER BY ${orderBy} LIMIT ${limit} OFFSET ${offset}`;

    const result = await this.client().query(sql, values);
    return result.rows.map(rowToEntry);
  }

  async get(runId: number): Promise<AuditTrailEntry | null> {
    const result = await this.client().query(`SELECT ${COLUMNS} FROM ${this.table} WHERE run_id = $1`, [runId]);
    const row = result.rows[0];
    return row ? rowToEntry(row) : null;
  }

  async getLastEntry(): Promise<AuditTrailEntry | null> {
    const result = await this.client().query(`SELECT ${COLUMNS} FROM ${this.table} ORDER BY run_id DESC LIMIT 1`);
    const row = result.rows[0];
    return row ? rowToEntry(row) : null;
  }

  async count(): Promise<number> {
    const result = await this.client().query(`SELECT COUNT(*) AS count FROM ${this.table}`);
    const row = result.rows[0];
    if (typeof row !== 'object' || row === null || !('count' in row)) {
      return 0;
    }
    return Number(row.count);
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }
}
