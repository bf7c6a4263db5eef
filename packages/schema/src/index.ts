export type * from "./types.js";

export {
  DEFAULT_THRESHOLDS,
  HEALTH_COLORS,
  NUMERIC_PARAMETERS,
  OUTLIER_IQR_MULTIPLIER_RANGE,
  REQUIRED_COLUMNS,
  REQUIRED_COLUMN_NAMES,
  SNAPSHOT_RETENTION_LIMIT,
  WARNING_PERCENTILE_RANGE,
} from "./constants.js";

export type { RequiredColumn } from "./constants.js";

export {
  AnalysisSummarySchema,
  EquipmentRecordSchema,
  ThresholdInputSchema,
  parseAnalysisSummary,
  parseClassifiedRecords,
  parseEquipmentRecord,
  parseThresholdValue,
} from "./validate.js";

export type { ThresholdField, ThresholdInput } from "./validate.js";
