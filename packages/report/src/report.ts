import { countHealthStatuses } from "../../analytics/src/health.js";
import { outlierDirection } from "../../analytics/src/outliers.js";
import type { OutlierDirection } from "../../analytics/src/outliers.js";
import { NUMERIC_PARAMETERS } from "../../schema/src/constants.js";
import type {
  ClassifiedRecord,
  HealthStatus,
  NumericParameter,
  Stat,
} from "../../schema/src/types.js";
import type { SnapshotView } from "../../snapshots/src/reconcile.js";

export const REPORT_ROW_LIMIT = 25;

export type ReportParameterStats = {
  parameter: NumericParameter;
  avg: Stat;
  min: Stat;
  max: Stat;
  std: Stat;
};

export type ReportOutlier = {
  equipment_name: string;
  parameter: NumericParameter;
  value: number;
  lower_bound: number;
  upper_bound: number;
  status: OutlierDirection;
};

export type SnapshotReport = {
  title: string;
  snapshot_id: string;
  sequence_index: number;
  source_name: string;
  uploaded_at: string;

  total_count: number;
  parameters: ReportParameterStats[];
  type_distribution: Array<{ type: string; count: number }>;
  health: Record<HealthStatus, number>;
  outliers: ReportOutlier[];

  rows: ClassifiedRecord[];
  rows_omitted: number;

  thresholds: { warning_percentile: number; outlier_iqr_multiplier: number } | null;
};

function parameterStats(view: SnapshotView): Record<NumericParameter, ReportParameterStats> {
  const s = view.summary;
  return {
    flowrate: { parameter: "flowrate", avg: s.avg_flowrate, min: s.min_flowrate, max: s.max_flowrate, std: s.std_flowrate },
    pressure: { parameter: "pressure", avg: s.avg_pressure, min: s.min_pressure, max: s.max_pressure, std: s.std_pressure },
    temperature: {
      parameter: "temperature",
      avg: s.avg_temperature,
      min: s.min_temperature,
      max: s.max_temperature,
      std: s.std_temperature,
    },
  };
}

/**
 * Everything a renderer needs, taken from the reconciled view as-is.
 * The only derivation is the high/low status of each outlier parameter.
 */
export function buildReport(view: SnapshotView, opts: { rowLimit?: number } = {}): SnapshotReport {
  const rowLimit = opts.rowLimit ?? REPORT_ROW_LIMIT;
  const stats = parameterStats(view);

  return {
    title: `Equipment Data Analysis Report - #${view.sequence_index}`,
    snapshot_id: view.snapshot_id,
    sequence_index: view.sequence_index,
    source_name: view.source_name,
    uploaded_at: view.uploaded_at,

    total_count: view.summary.total_count,
    parameters: NUMERIC_PARAMETERS.map((p) => stats[p]),
    type_distribution: Object.entries(view.summary.type_distribution).map(([type, count]) => ({ type, count })),
    health: countHealthStatuses(view.records),
    outliers: view.summary.outliers.flatMap((o) =>
      o.parameters.map((p) => ({
        equipment_name: o.equipment_name,
        parameter: p.parameter,
        value: p.value,
        lower_bound: p.lower_bound,
        upper_bound: p.upper_bound,
        status: outlierDirection(p),
      }))
    ),

    rows: view.records.slice(0, rowLimit),
    rows_omitted: Math.max(0, view.records.length - rowLimit),

    thresholds: view.thresholds
      ? {
          warning_percentile: view.thresholds.warning_percentile,
          outlier_iqr_multiplier: view.thresholds.outlier_iqr_multiplier,
        }
      : null,
  };
}
