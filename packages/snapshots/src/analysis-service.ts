import type Database from "better-sqlite3";

import type { UploadedFile } from "../../ingest/src/upload.js";
import type { ThresholdFallbackConfig } from "../../runtime/src/config.js";
import { getLogger } from "../../runtime/src/logger.js";
import type { Logger } from "../../runtime/src/logger.js";
import { ThresholdSettingsService } from "../../thresholds/src/service.js";
import { SqliteThresholdSettingsStore } from "../../thresholds/src/sqlite-settings-store.js";
import type { ThresholdSettingsStore } from "../../thresholds/src/store.js";
import { getHistory, getSnapshotView } from "./history.js";
import type { ReconcileDeps, SnapshotView } from "./reconcile.js";
import type { SnapshotRetentionPolicy } from "./retention.js";
import { SqliteAnalysisSnapshotStore } from "./sqlite-snapshot-store.js";
import type { AnalysisSnapshotStore } from "./store.js";
import { uploadDataset } from "./upload-engine.js";
import type { UploadResult } from "./upload-engine.js";

export type AnalysisServiceOptions = {
  fallback?: ThresholdFallbackConfig;
  now?: () => string;
  logger?: Logger;
  retention?: SnapshotRetentionPolicy;
};

/**
 * Entry point for a transport layer: one object per database connection,
 * every call scoped to the calling user.
 */
export class AnalysisService {
  readonly snapshots: AnalysisSnapshotStore;
  readonly thresholdStore: ThresholdSettingsStore;
  readonly thresholds: ThresholdSettingsService;

  private readonly opts: AnalysisServiceOptions;
  private readonly logger: Logger;

  constructor(
    stores: { snapshots: AnalysisSnapshotStore; thresholds: ThresholdSettingsStore },
    opts: AnalysisServiceOptions = {}
  ) {
    this.snapshots = stores.snapshots;
    this.thresholdStore = stores.thresholds;
    this.opts = opts;
    this.logger = opts.logger ?? getLogger();
    this.thresholds = new ThresholdSettingsService(this.thresholdStore, {
      fallback: opts.fallback,
      now: opts.now,
      logger: this.logger,
    });
  }

  static fromDatabase(db: Database.Database, opts: AnalysisServiceOptions = {}): AnalysisService {
    return new AnalysisService(
      {
        snapshots: new SqliteAnalysisSnapshotStore(db),
        thresholds: new SqliteThresholdSettingsStore(db),
      },
      opts
    );
  }

  private reconcileDeps(): ReconcileDeps {
    return { thresholds: this.thresholdStore, fallback: this.opts.fallback, logger: this.logger };
  }

  async upload(owner_id: string, file: UploadedFile | null | undefined): Promise<UploadResult> {
    return uploadDataset(
      { snapshots: this.snapshots, thresholds: this.thresholdStore, fallback: this.opts.fallback },
      { owner_id, file },
      { now: this.opts.now, logger: this.logger, retention: this.opts.retention }
    );
  }

  async history(owner_id: string): Promise<SnapshotView[]> {
    return getHistory(this.snapshots, owner_id, this.reconcileDeps());
  }

  async view(snapshot_id: string, requesting_user_id: string): Promise<SnapshotView> {
    return getSnapshotView(this.snapshots, snapshot_id, requesting_user_id, this.reconcileDeps());
  }
}
