// Equipment analytics data model.
// Types only. No functions.

export type ISO8601 = string;

/* ------------------------------ Records ------------------------------ */

export type NumericParameter = "flowrate" | "pressure" | "temperature";

export interface EquipmentRecord {
  equipment_name: string;
  type: string;
  flowrate: number;
  pressure: number;
  temperature: number;
}

export type HealthStatus = "normal" | "warning" | "critical";

export type HealthColor = "#10b981" | "#f59e0b" | "#ef4444";

export interface ClassifiedRecord extends EquipmentRecord {
  health_status: HealthStatus;
  health_color: HealthColor;
}

/* ------------------------------ Outliers ----------------------------- */

export interface OutlierParameter {
  parameter: NumericParameter;
  value: number;
  lower_bound: number;
  upper_bound: number;
}

export interface OutlierEntry {
  equipment_name: string;
  parameters: OutlierParameter[];
}

/* ------------------------------ Summary ------------------------------ */

// null stands in for an undefined statistic (empty column, N <= 1 std,
// zero-variance correlation) so snapshots stay JSON-safe.
export type Stat = number | null;

export interface TypeComparisonRow {
  count: number;
  avg_flowrate: Stat;
  avg_pressure: Stat;
  avg_temperature: Stat;
}

export type CorrelationMatrix = Record<NumericParameter, Record<NumericParameter, Stat>>;

export interface DatasetStatistics {
  total_count: number;

  avg_flowrate: Stat;
  min_flowrate: Stat;
  max_flowrate: Stat;
  std_flowrate: Stat;

  avg_pressure: Stat;
  min_pressure: Stat;
  max_pressure: Stat;
  std_pressure: Stat;

  avg_temperature: Stat;
  min_temperature: Stat;
  max_temperature: Stat;
  std_temperature: Stat;

  type_distribution: Record<string, number>;
  type_comparison: Record<string, TypeComparisonRow>;
  correlation_matrix: CorrelationMatrix;
}

export interface AnalysisSummary extends DatasetStatistics {
  outliers: OutlierEntry[];
}

/* ----------------------------- Thresholds ---------------------------- */

export interface Thresholds {
  warning_percentile: number;
  outlier_iqr_multiplier: number;
}

export interface ThresholdSettings extends Thresholds {
  user_id: string;
  updated_at: ISO8601;
}

export type ThresholdSource = "user" | "process" | "default";

export interface ResolvedThresholds extends Thresholds {
  // per-field tier that produced the value
  source: {
    warning_percentile: ThresholdSource;
    outlier_iqr_multiplier: ThresholdSource;
  };
}

/* ----------------------------- Snapshots ----------------------------- */

export type SnapshotStatus = "PROVISIONAL" | "READY";

export interface AnalysisSnapshot {
  snapshot_id: string;
  owner_id: string;
  sequence_index: number;
  source_name: string;
  uploaded_at: ISO8601;
  status: SnapshotStatus;

  records: ClassifiedRecord[];
  summary: AnalysisSummary;
}
