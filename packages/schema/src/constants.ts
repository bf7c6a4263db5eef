import type { EquipmentRecord, HealthColor, HealthStatus, NumericParameter } from "./types.js";

// Fixed scan order for every per-column pass.
export const NUMERIC_PARAMETERS: readonly NumericParameter[] = ["flowrate", "pressure", "temperature"];

export const REQUIRED_COLUMN_NAMES = ["Equipment Name", "Type", "Flowrate", "Pressure", "Temperature"] as const;

export type RequiredColumn = (typeof REQUIRED_COLUMN_NAMES)[number];

// Source table header -> record field.
export const REQUIRED_COLUMNS: Record<RequiredColumn, keyof EquipmentRecord> = {
  "Equipment Name": "equipment_name",
  Type: "type",
  Flowrate: "flowrate",
  Pressure: "pressure",
  Temperature: "temperature",
};

export const HEALTH_COLORS: Record<HealthStatus, HealthColor> = {
  normal: "#10b981",
  warning: "#f59e0b",
  critical: "#ef4444",
};

export const WARNING_PERCENTILE_RANGE = { min: 0.5, max: 0.95 } as const;
export const OUTLIER_IQR_MULTIPLIER_RANGE = { min: 0.5, max: 3.0 } as const;

export const DEFAULT_THRESHOLDS = {
  warning_percentile: 0.75,
  outlier_iqr_multiplier: 1.5,
} as const;

export const SNAPSHOT_RETENTION_LIMIT = 5;
