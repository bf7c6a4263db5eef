import { reclassifyRecords } from "../../analytics/src/analyze.js";
import type { ThresholdFallbackConfig } from "../../runtime/src/config.js";
import { errorMessage } from "../../runtime/src/errors.js";
import { getLogger } from "../../runtime/src/logger.js";
import type { Logger } from "../../runtime/src/logger.js";
import type { AnalysisSnapshot, ResolvedThresholds } from "../../schema/src/types.js";
import { resolveThresholdsForUser } from "../../thresholds/src/service.js";
import type { ThresholdSettingsStore } from "../../thresholds/src/store.js";

export type SnapshotView = AnalysisSnapshot & {
  // thresholds the classification was recomputed with; null when serving stored
  thresholds: ResolvedThresholds | null;
  reclassified: boolean;
};

export type ReconcileDeps = {
  thresholds: ThresholdSettingsStore;
  fallback?: ThresholdFallbackConfig;
  logger?: Logger;
};

/**
 * Read-time view of a stored snapshot.
 *
 * Outliers and per-record health are recomputed with the requesting user's
 * current thresholds; every other field (counts, averages, type comparison,
 * correlation, raw values) is served exactly as stored. If recomputation
 * fails the stored classification is returned instead.
 */
export async function viewSnapshot(
  snapshot: AnalysisSnapshot,
  requesting_user_id: string,
  deps: ReconcileDeps
): Promise<SnapshotView> {
  const logger = deps.logger ?? getLogger();

  try {
    const thresholds = await resolveThresholdsForUser(deps.thresholds, requesting_user_id, deps.fallback);
    const c = reclassifyRecords(snapshot.records, thresholds);

    return {
      ...snapshot,
      records: c.records,
      summary: { ...snapshot.summary, outliers: c.outliers },
      thresholds,
      reclassified: true,
    };
  } catch (e) {
    logger.warn("serving stored classification", {
      snapshot_id: snapshot.snapshot_id,
      requesting_user_id,
      error: errorMessage(e),
    });
    return { ...snapshot, thresholds: null, reclassified: false };
  }
}
