/**
 * In-Memory Storage Backend
 *
 * Simple in-memory storage for development and testing.
 */

import type { AuditTrailEntry, AuditTrailStorageBackend, StorageQuery } from '../types.js';

function newestFirst(a: AuditTrailEntry, b: AuditTrailEntry): number {
  const byTime = Date.parse(b.recordedAt) - Date.parse(a.recordedAt);
  return byTime !== 0 ? byTime : b.runId - a.runId;
}

function runOrder(a: AuditTrailEntry, b: AuditTrailEntry): number {
  return a.runId - b.runId;
}

/**
 * In-memory audit trail storage backend
 */
export class InMemoryAuditTrailStorage implements AuditTrailStorageBackend {
  private entries: Map<number, AuditTrailEntry> = new Map();
  private lastRunId: number | null = null;

  async init(): Promise<void> {
    // No initialization needed
  }

  async append(entry: AuditTrailEntry): Promise<void> {
    if (this.entries.has(entry.runId)) {
      throw new Error(`Run ${entry.runId} already exists`);
    }
    this.entries.set(entry.runId, entry);
    if (this.lastRunId === null || entry.runId > this.lastRunId) {
      this.lastRunId = entry.runId;
    }
  }

  async query(query: StorageQuery): Promise<AuditTrailEntry[]> {
    let results = Array.from(this.entries.values());

    // Filter by time range
    if (query.from !== undefined) {
      const from = Date.parse(query.from);
      results = results.filter((entry) => Date.parse(entry.recordedAt) >= from);
    }
    if (query.to !== undefined) {
      const to = Date.parse(query.to);
      results = results.filter((entry) => Date.parse(entry.recordedAt) < to);
    }

    if (query.reportType !== undefined) {
      results = results.filter((entry) => entry.reportType === query.reportType);
    }
    if (query.overallStatus !== undefined) {
      results = results.filter((entry) => entry.overallStatus === query.overallStatus);
    }

    results.sort(query.order === 'run' ? runOrder : newestFirst);

    return results.slice(query.offset, query.offset + query.limit);
  }

  async get(runId: number): Promise<AuditTrailEntry | null> {
    return this.entries.get(runId) ?? null;
  }

  async getLastEntry(): Promise<AuditTrailEntry | null> {
    if (this.lastRunId === null) return null;
    return this.entries.get(this.lastRunId) ?? null;
  }

  async count(): Promise<number> {
    return this.entries.size;
  }

  async close(): Promise<void> {
    this.entries.clear();
    this.lastRunId = null;
  }
}
