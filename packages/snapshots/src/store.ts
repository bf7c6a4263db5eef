// packages/snapshots/src/store.ts
import type {
  AnalysisSnapshot,
  AnalysisSummary,
  ClassifiedRecord,
} from "../../schema/src/types.js";

/**
 * Snapshot header as written before the table has been validated.
 * Provisional rows are invisible to every read and to retention.
 */
export type ProvisionalSnapshot = Pick<
  AnalysisSnapshot,
  "snapshot_id" | "owner_id" | "sequence_index" | "source_name" | "uploaded_at"
> & { status: "PROVISIONAL" };

export type SnapshotHeader = Pick<
  AnalysisSnapshot,
  "snapshot_id" | "owner_id" | "sequence_index" | "source_name" | "uploaded_at"
>;

export type CreateProvisionalInput = {
  owner_id: string;
  source_name: string;
  // called inside the sequencing transaction so uploaded_at follows sequence order
  now: () => string;
};

/**
 * AnalysisSnapshotStore contract
 * - sequence_index is assigned atomically per owner and never reused.
 * - records/summary are written once, by finalizeSnapshot.
 * - only READY snapshots are returned or counted.
 */
export type AnalysisSnapshotStore = {
  createProvisional(input: CreateProvisionalInput): Promise<ProvisionalSnapshot>;

  finalizeSnapshot(
    snapshot_id: string,
    data: { records: ClassifiedRecord[]; summary: AnalysisSummary }
  ): Promise<AnalysisSnapshot>;

  deleteSnapshot(snapshot_id: string): Promise<{ deleted: number }>;

  getSnapshot(snapshot_id: string): Promise<AnalysisSnapshot | null>;

  /** newest first: uploaded_at DESC, then sequence_index DESC */
  listRecentSnapshots(owner_id: string, limit: number): Promise<AnalysisSnapshot[]>;

  /** every ready snapshot of the owner, sequence_index ASC, without payloads */
  listSnapshotHeaders(owner_id: string): Promise<SnapshotHeader[]>;

  /** keep the newest `keep_last_n` ready snapshots, delete the rest in one batch */
  pruneSnapshots(owner_id: string, keep_last_n: number): Promise<{ deleted: number }>;
};
