// ---------- Store ----------
export { SqliteAnalysisSnapshotStore } from "./sqlite-snapshot-store.js";
export type {
  AnalysisSnapshotStore,
  CreateProvisionalInput,
  ProvisionalSnapshot,
  SnapshotHeader,
} from "./store.js";

// ---------- Retention ----------
export { DEFAULT_RETENTION_POLICY, enforceRetention } from "./retention.js";
export type { SnapshotRetentionPolicy } from "./retention.js";

// ---------- Upload ----------
export { uploadDataset } from "./upload-engine.js";
export type { UploadEngineDeps, UploadEngineOptions, UploadResult } from "./upload-engine.js";

// ---------- Read path ----------
export { viewSnapshot } from "./reconcile.js";
export type { ReconcileDeps, SnapshotView } from "./reconcile.js";
export { getHistory, getSnapshotView } from "./history.js";

export { AnalysisService } from "./analysis-service.js";
export type { AnalysisServiceOptions } from "./analysis-service.js";
