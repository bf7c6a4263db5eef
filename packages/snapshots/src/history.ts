import { SNAPSHOT_RETENTION_LIMIT } from "../../schema/src/constants.js";
import { SnapshotNotFoundError } from "../../runtime/src/errors.js";
import { viewSnapshot } from "./reconcile.js";
import type { ReconcileDeps, SnapshotView } from "./reconcile.js";
import type { AnalysisSnapshotStore } from "./store.js";

/**
 * Owner-scoped lookup: another user's snapshot id reads as not found.
 */
export async function getSnapshotView(
  store: AnalysisSnapshotStore,
  snapshot_id: string,
  requesting_user_id: string,
  deps: ReconcileDeps
): Promise<SnapshotView> {
  const snap = await store.getSnapshot(snapshot_id);
  if (!snap || snap.owner_id !== requesting_user_id) throw new SnapshotNotFoundError(snapshot_id);
  return viewSnapshot(snap, requesting_user_id, deps);
}

export async function getHistory(
  store: AnalysisSnapshotStore,
  owner_id: string,
  deps: ReconcileDeps,
  limit = SNAPSHOT_RETENTION_LIMIT
): Promise<SnapshotView[]> {
  const snaps = await store.listRecentSnapshots(owner_id, limit);
  const views: SnapshotView[] = [];
  for (const s of snaps) views.push(await viewSnapshot(s, owner_id, deps));
  return views;
}
