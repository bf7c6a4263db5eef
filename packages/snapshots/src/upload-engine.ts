// packages/snapshots/src/upload-engine.ts
import { analyzeRecords } from "../../analytics/src/analyze.js";
import { parseEquipmentCsv } from "../../ingest/src/table.js";
import { checkUploadedFile } from "../../ingest/src/upload.js";
import type { UploadedFile } from "../../ingest/src/upload.js";
import type { ThresholdFallbackConfig } from "../../runtime/src/config.js";
import { TableValidationError, errorMessage } from "../../runtime/src/errors.js";
import type { Violation } from "../../runtime/src/errors.js";
import { getLogger } from "../../runtime/src/logger.js";
import type { Logger } from "../../runtime/src/logger.js";
import type { AnalysisSnapshot } from "../../schema/src/types.js";
import { resolveThresholdsForUser } from "../../thresholds/src/service.js";
import type { ThresholdSettingsStore } from "../../thresholds/src/store.js";
import { DEFAULT_RETENTION_POLICY, enforceRetention } from "./retention.js";
import type { SnapshotRetentionPolicy } from "./retention.js";
import type { AnalysisSnapshotStore } from "./store.js";

export type UploadResult =
  | { ok: true; snapshot: AnalysisSnapshot; retention: { deleted: number } }
  | { ok: false; violations: Violation[] };

export type UploadEngineDeps = {
  snapshots: AnalysisSnapshotStore;
  thresholds: ThresholdSettingsStore;
  fallback?: ThresholdFallbackConfig;
};

export type UploadEngineOptions = {
  now?: () => string;
  logger?: Logger;
  retention?: SnapshotRetentionPolicy;
};

function nowIso(opts: UploadEngineOptions): string {
  return (opts.now ?? (() => new Date().toISOString()))();
}

async function discardProvisional(
  store: AnalysisSnapshotStore,
  snapshot_id: string,
  logger: Logger
): Promise<void> {
  try {
    await store.deleteSnapshot(snapshot_id);
  } catch (e) {
    // the row stays PROVISIONAL, which reads and retention already ignore
    logger.error("failed to discard provisional snapshot", { snapshot_id, error: errorMessage(e) });
  }
}

/**
 * ingest -> validate -> statistics -> outliers -> health -> persist -> retention.
 *
 * The snapshot row (and its sequence_index) is written first as PROVISIONAL;
 * any failure before finalize deletes it again. Table problems come back as
 * violations, anything else is rethrown after the rollback.
 */
export async function uploadDataset(
  deps: UploadEngineDeps,
  input: { owner_id: string; file: UploadedFile | null | undefined },
  opts: UploadEngineOptions = {}
): Promise<UploadResult> {
  const logger = opts.logger ?? getLogger();

  const fileViolations = checkUploadedFile(input.file);
  if (!input.file || fileViolations.length > 0) {
    return { ok: false, violations: fileViolations };
  }
  const file = input.file;

  // 1) provisional row + atomic sequence index
  const provisional = await deps.snapshots.createProvisional({
    owner_id: input.owner_id,
    source_name: file.name,
    now: () => nowIso(opts),
  });

  let snapshot: AnalysisSnapshot;
  try {
    // 2) table -> records (throws TableValidationError)
    const records = parseEquipmentCsv(file.content);

    // 3) owner's thresholds at upload time
    const thresholds = await resolveThresholdsForUser(deps.thresholds, input.owner_id, deps.fallback);

    // 4) statistics + classification
    const analysis = analyzeRecords(records, thresholds);

    // 5) make it visible
    snapshot = await deps.snapshots.finalizeSnapshot(provisional.snapshot_id, analysis);
  } catch (e) {
    await discardProvisional(deps.snapshots, provisional.snapshot_id, logger);

    if (e instanceof TableValidationError) {
      logger.info("upload rejected", {
        owner_id: input.owner_id,
        source_name: file.name,
        codes: e.violations.map((v) => v.code),
      });
      return { ok: false, violations: e.violations };
    }

    logger.error("upload failed", { owner_id: input.owner_id, source_name: file.name, error: errorMessage(e) });
    throw e;
  }

  // 6) retention, once per successful create
  const retention = await enforceRetention(
    deps.snapshots,
    input.owner_id,
    opts.retention ?? DEFAULT_RETENTION_POLICY,
    logger
  );

  logger.info("upload analysed", {
    owner_id: input.owner_id,
    snapshot_id: snapshot.snapshot_id,
    sequence_index: snapshot.sequence_index,
    total_count: snapshot.summary.total_count,
    outliers: snapshot.summary.outliers.length,
  });

  return { ok: true, snapshot, retention };
}
