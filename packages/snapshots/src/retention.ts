import { SNAPSHOT_RETENTION_LIMIT } from "../../schema/src/constants.js";
import { getLogger } from "../../runtime/src/logger.js";
import type { Logger } from "../../runtime/src/logger.js";
import type { AnalysisSnapshotStore } from "./store.js";

export type SnapshotRetentionPolicy = {
  // keep last N ready snapshots per owner
  keep_last_n_snapshots: number;
};

export const DEFAULT_RETENTION_POLICY: SnapshotRetentionPolicy = {
  keep_last_n_snapshots: SNAPSHOT_RETENTION_LIMIT,
};

/**
 * Newest `keep` by uploaded_at survive; the rest go in one delete.
 * Idempotent: a second call with nothing new in between deletes nothing.
 */
export async function enforceRetention(
  store: AnalysisSnapshotStore,
  owner_id: string,
  policy: SnapshotRetentionPolicy = DEFAULT_RETENTION_POLICY,
  logger: Logger = getLogger()
): Promise<{ deleted: number }> {
  const r = await store.pruneSnapshots(owner_id, policy.keep_last_n_snapshots);
  if (r.deleted > 0) {
    logger.info("snapshot retention applied", {
      owner_id,
      keep: policy.keep_last_n_snapshots,
      deleted: r.deleted,
    });
  }
  return r;
}
