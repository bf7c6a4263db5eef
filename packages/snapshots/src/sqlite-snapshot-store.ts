// packages/snapshots/src/sqlite-snapshot-store.ts
import { randomUUID } from "node:crypto";

import Database from "better-sqlite3";

import type { AnalysisSnapshot } from "../../schema/src/types.js";
import { parseAnalysisSummary, parseClassifiedRecords } from "../../schema/src/validate.js";
import type {
  AnalysisSnapshotStore,
  CreateProvisionalInput,
  ProvisionalSnapshot,
  SnapshotHeader,
} from "./store.js";

type SnapshotRow = {
  snapshot_id: string;
  owner_id: string;
  sequence_index: number;
  source_name: string;
  uploaded_at: string;
  records_json: string | null;
  summary_json: string | null;
};

function toSnapshot(row: SnapshotRow): AnalysisSnapshot {
  if (row.records_json == null || row.summary_json == null) {
    throw new Error(`Snapshot ${row.snapshot_id} is marked READY but has no payload`);
  }

  return {
    snapshot_id: row.snapshot_id,
    owner_id: row.owner_id,
    sequence_index: row.sequence_index,
    source_name: row.source_name,
    uploaded_at: row.uploaded_at,
    status: "READY",
    records: parseClassifiedRecords(JSON.parse(row.records_json)),
    summary: parseAnalysisSummary(JSON.parse(row.summary_json)),
  };
}

export class SqliteAnalysisSnapshotStore implements AnalysisSnapshotStore {
  private db: Database.Database;
  private newId: () => string;

  constructor(db: Database.Database, opts: { newId?: () => string } = {}) {
    this.db = db;
    this.newId = opts.newId ?? randomUUID;
    this.migrate();
  }

  private migrate() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS analysis_snapshots (
        snapshot_id    TEXT PRIMARY KEY,
        owner_id       TEXT NOT NULL,
        sequence_index INTEGER NOT NULL CHECK (sequence_index > 0),
        source_name    TEXT NOT NULL,
        uploaded_at    TEXT NOT NULL,
        status         TEXT NOT NULL CHECK (status IN ('PROVISIONAL', 'READY')),
        records_json   TEXT,
        summary_json   TEXT,
        UNIQUE (owner_id, sequence_index)
      );

      CREATE INDEX IF NOT EXISTS idx_snapshots_owner_recent
        ON analysis_snapshots(owner_id, status, uploaded_at DESC, sequence_index DESC);

      -- high-water mark per owner; survives deletion of the snapshot that set it
      CREATE TABLE IF NOT EXISTS snapshot_sequences (
        owner_id   TEXT PRIMARY KEY,
        last_index INTEGER NOT NULL
      );
    `);
  }

  async createProvisional(input: CreateProvisionalInput): Promise<ProvisionalSnapshot> {
    const lastIssued = this.db.prepare<[string], { last_index: number }>(
      `SELECT last_index FROM snapshot_sequences WHERE owner_id = ?`
    );
    const maxStored = this.db.prepare<[string], { max_index: number }>(
      `SELECT COALESCE(MAX(sequence_index), 0) AS max_index
       FROM analysis_snapshots
       WHERE owner_id = ?`
    );
    const bump = this.db.prepare<[string, number]>(
      `INSERT INTO snapshot_sequences(owner_id, last_index)
       VALUES (?, ?)
       ON CONFLICT(owner_id) DO UPDATE SET last_index = excluded.last_index`
    );
    const insert = this.db.prepare<[string, string, number, string, string]>(
      `INSERT INTO analysis_snapshots(snapshot_id, owner_id, sequence_index, source_name, uploaded_at, status)
       VALUES (?, ?, ?, ?, ?, 'PROVISIONAL')`
    );

    // Read-max, bump and insert run as one IMMEDIATE transaction: the write
    // lock is taken up front, so no other connection can interleave.
    const assign = this.db.transaction((): ProvisionalSnapshot => {
      const issued = lastIssued.get(input.owner_id)?.last_index ?? 0;
      const stored = maxStored.get(input.owner_id)?.max_index ?? 0;
      const sequence_index = Math.max(issued, stored) + 1;

      const snapshot: ProvisionalSnapshot = {
        snapshot_id: this.newId(),
        owner_id: input.owner_id,
        sequence_index,
        source_name: input.source_name,
        uploaded_at: input.now(),
        status: "PROVISIONAL",
      };

      bump.run(input.owner_id, sequence_index);
      insert.run(
        snapshot.snapshot_id,
        snapshot.owner_id,
        snapshot.sequence_index,
        snapshot.source_name,
        snapshot.uploaded_at
      );
      return snapshot;
    });

    return assign.immediate();
  }

  async finalizeSnapshot(
    snapshot_id: string,
    data: Parameters<AnalysisSnapshotStore["finalizeSnapshot"]>[1]
  ): Promise<AnalysisSnapshot> {
    const info = this.db
      .prepare<[string, string, string]>(
        `UPDATE analysis_snapshots
         SET status = 'READY', records_json = ?, summary_json = ?
         WHERE snapshot_id = ? AND status = 'PROVISIONAL'`
      )
      .run(JSON.stringify(data.records), JSON.stringify(data.summary), snapshot_id);

    if (info.changes !== 1) {
      throw new Error(`No provisional snapshot to finalize: ${snapshot_id}`);
    }

    const snap = await this.getSnapshot(snapshot_id);
    if (!snap) throw new Error(`Snapshot vanished after finalize: ${snapshot_id}`);
    return snap;
  }

  async deleteSnapshot(snapshot_id: string): Promise<{ deleted: number }> {
    const info = this.db
      .prepare<[string]>(`DELETE FROM analysis_snapshots WHERE snapshot_id = ?`)
      .run(snapshot_id);
    return { deleted: info.changes };
  }

  async getSnapshot(snapshot_id: string): Promise<AnalysisSnapshot | null> {
    const row = this.db
      .prepare<[string], SnapshotRow>(
        `SELECT snapshot_id, owner_id, sequence_index, source_name, uploaded_at, records_json, summary_json
         FROM analysis_snapshots
         WHERE snapshot_id = ? AND status = 'READY'
         LIMIT 1`
      )
      .get(snapshot_id);

    return row ? toSnapshot(row) : null;
  }

  async listRecentSnapshots(owner_id: string, limit: number): Promise<AnalysisSnapshot[]> {
    const rows = this.db
      .prepare<[string, number], SnapshotRow>(
        `SELECT snapshot_id, owner_id, sequence_index, source_name, uploaded_at, records_json, summary_json
         FROM analysis_snapshots
         WHERE owner_id = ? AND status = 'READY'
         ORDER BY uploaded_at DESC, sequence_index DESC
         LIMIT ?`
      )
      .all(owner_id, Math.max(0, Math.floor(limit)));

    return rows.map(toSnapshot);
  }

  async listSnapshotHeaders(owner_id: string): Promise<SnapshotHeader[]> {
    return this.db
      .prepare<[string], SnapshotHeader>(
        `SELECT snapshot_id, owner_id, sequence_index, source_name, uploaded_at
         FROM analysis_snapshots
         WHERE owner_id = ? AND status = 'READY'
         ORDER BY sequence_index ASC`
      )
      .all(owner_id);
  }

  async pruneSnapshots(owner_id: string, keep_last_n: number): Promise<{ deleted: number }> {
    const keep = Math.max(0, Math.floor(keep_last_n));
    if (keep === 0) {
      const info = this.db
        .prepare<[string]>(`DELETE FROM analysis_snapshots WHERE owner_id = ? AND status = 'READY'`)
        .run(owner_id);
      return { deleted: info.changes };
    }

    const info = this.db
      .prepare<[string, string, number]>(
        `
        DELETE FROM analysis_snapshots
        WHERE owner_id = ?
          AND status = 'READY'
          AND snapshot_id NOT IN (
            SELECT snapshot_id
            FROM analysis_snapshots
            WHERE owner_id = ? AND status = 'READY'
            ORDER BY uploaded_at DESC, sequence_index DESC
            LIMIT ?
          )
      `
      )
      .run(owner_id, owner_id, keep);

    return { deleted: info.changes };
  }
}
