// ---------- Statistics ----------
export {
  correlationMatrix,
  describeColumn,
  summarizeRecords,
  typeComparison,
  typeDistribution,
} from "./statistics.js";

export type { ColumnStatistics } from "./statistics.js";

// ---------- Outliers ----------
export {
  countOutlierParameters,
  detectOutliers,
  iqrBounds,
  outlierDirection,
} from "./outliers.js";

export type { IqrBounds, OutlierDirection } from "./outliers.js";

// ---------- Health ----------
export {
  classifyRecords,
  countHealthStatuses,
  healthStatusOf,
  warningLimits,
} from "./health.js";

export type { WarningLimits } from "./health.js";

// ---------- Composition ----------
export { analyzeRecords, reclassifyRecords } from "./analyze.js";
export type { Analysis, Classification } from "./analyze.js";

export { columnValues, percentile, percentileSorted } from "./percentile.js";
