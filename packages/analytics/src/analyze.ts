import type {
  AnalysisSummary,
  ClassifiedRecord,
  EquipmentRecord,
  OutlierEntry,
  Thresholds,
} from "../../schema/src/types.js";
import { classifyRecords } from "./health.js";
import { detectOutliers } from "./outliers.js";
import { summarizeRecords } from "./statistics.js";

export type Classification = {
  records: ClassifiedRecord[];
  outliers: OutlierEntry[];
};

export type Analysis = {
  records: ClassifiedRecord[];
  summary: AnalysisSummary;
};

/**
 * Outlier detection + health classification only. Shared by the upload
 * path and the read path so both classify identically.
 */
export function reclassifyRecords(records: readonly EquipmentRecord[], thresholds: Thresholds): Classification {
  const outliers = detectOutliers(records, thresholds.outlier_iqr_multiplier);
  return {
    records: classifyRecords(records, outliers, thresholds.warning_percentile),
    outliers,
  };
}

export function analyzeRecords(records: readonly EquipmentRecord[], thresholds: Thresholds): Analysis {
  const stats = summarizeRecords(records);
  const c = reclassifyRecords(records, thresholds);
  return {
    records: c.records,
    summary: { ...stats, outliers: c.outliers },
  };
}
