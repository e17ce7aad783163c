import type Database from 'better-sqlite3';
import { HealthSnapshotSchema, type HealthSnapshot } from '@stackwright/shared';
import { getDb } from '../db/index.js';

interface SnapshotRow {
  snapshot: string;
}

export interface PruneOptions {
  retentionHours: number;
  maxPerStack: number;
  now?: Date;
}

function parseSnapshot(row: SnapshotRow): HealthSnapshot {
  return HealthSnapshotSchema.parse(JSON.parse(row.snapshot));
}

/**
 * Time series of health snapshots per stack.
 */
export class HealthHistoryStore {
  constructor(private readonly db: Database.Database = getDb()) {}

  append(snapshot: HealthSnapshot): void {
    this.db.prepare(`
      INSERT INTO health_snapshots (stack_id, environment_id, overall_status, snapshot, captured_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(snapshot.stackId, snapshot.environmentId, snapshot.overallStatus, JSON.stringify(snapshot), snapshot.capturedAt);
  }

  latest(stackId: string): HealthSnapshot | null {
    const row = this.db.prepare<[string], SnapshotRow>(`
      SELECT snapshot FROM health_snapshots
      WHERE stack_id = ?
      ORDER BY captured_at DESC, id DESC
      LIMIT 1
    `).get(stackId);
    return row ? parseSnapshot(row) : null;
  }

  /** Newest first. */
  history(stackId: string, since: Date, limit = 500): HealthSnapshot[] {
    return this.db.prepare<[string, string, number], SnapshotRow>(`
      SELECT snapshot FROM health_snapshots
      WHERE stack_id = ? AND captured_at >= ?
      ORDER BY captured_at DESC, id DESC
      LIMIT ?
    `).all(stackId, since.toISOString(), limit).map(parseSnapshot);
  }

  /** The newest snapshot of every stack in the environment. */
  latestForEnvironment(environmentId: string): HealthSnapshot[] {
    return this.db.prepare<[string], SnapshotRow>(`
      SELECT h.snapshot FROM health_snapshots h
      WHERE h.environment_id = ?
        AND h.id = (
          SELECT id FROM health_snapshots
          WHERE stack_id = h.stack_id
          ORDER BY captured_at DESC, id DESC
          LIMIT 1
        )
      ORDER BY h.stack_id
    `).all(environmentId).map(parseSnapshot);
  }

  /**
   * Drop snapshots past the retention window, then trim each stack to its
   * newest `maxPerStack` entries. Returns the number of rows removed.
   */
  prune(options: PruneOptions): number {
    const now = options.now ?? new Date();
    const cutoff = new Date(now.getTime() - options.retentionHours * 60 * 60 * 1000).toISOString();

    const expired = this.db.prepare('DELETE FROM health_snapshots WHERE captured_at < ?').run(cutoff).changes;
    const excess = this.db.prepare(`
      DELETE FROM health_snapshots
      WHERE id IN (
        SELECT id FROM (
          SELECT id, ROW_NUMBER() OVER (PARTITION BY stack_id ORDER BY captured_at DESC, id DESC) AS rn
          FROM health_snapshots
        ) WHERE rn > ?
      )
    `).run(options.maxPerStack).changes;

    return expired + excess;
  }

  deleteForStack(stackId: string): void {
    this.db.prepare('DELETE FROM health_snapshots WHERE stack_id = ?').run(stackId);
  }
}
