import { HEALTH_COLORS, NUMERIC_PARAMETERS } from "../../schema/src/constants.js";
import type {
  ClassifiedRecord,
  EquipmentRecord,
  HealthStatus,
  NumericParameter,
  OutlierEntry,
} from "../../schema/src/types.js";
import { columnValues, percentile } from "./percentile.js";

export type WarningLimits = Record<NumericParameter, number | null>;

export function warningLimits(records: readonly EquipmentRecord[], warningPercentile: number): WarningLimits {
  return {
    flowrate: percentile(columnValues(records, "flowrate"), warningPercentile),
    pressure: percentile(columnValues(records, "pressure"), warningPercentile),
    temperature: percentile(columnValues(records, "temperature"), warningPercentile),
  };
}

export function healthStatusOf(
  record: EquipmentRecord,
  outlierNames: ReadonlySet<string>,
  limits: WarningLimits
): HealthStatus {
  if (outlierNames.has(record.equipment_name)) return "critical";

  const aboveLimit = NUMERIC_PARAMETERS.some((p) => {
    const limit = limits[p];
    return limit != null && record[p] > limit;
  });

  return aboveLimit ? "warning" : "normal";
}

/**
 * Priority: named in `outliers` -> critical; any parameter above its
 * column's warning percentile -> warning; otherwise normal.
 * Percentiles are taken over the full `records` set passed in.
 */
export function classifyRecords(
  records: readonly EquipmentRecord[],
  outliers: readonly OutlierEntry[],
  warningPercentile: number
): ClassifiedRecord[] {
  const outlierNames = new Set(outliers.map((o) => o.equipment_name));
  const limits = warningLimits(records, warningPercentile);

  return records.map((r) => {
    const health_status = healthStatusOf(r, outlierNames, limits);
    return {
      equipment_name: r.equipment_name,
      type: r.type,
      flowrate: r.flowrate,
      pressure: r.pressure,
      temperature: r.temperature,
      health_status,
      health_color: HEALTH_COLORS[health_status],
    };
  });
}

export function countHealthStatuses(records: readonly Pick<ClassifiedRecord, "health_status">[]): Record<HealthStatus, number> {
  const counts: Record<HealthStatus, number> = { normal: 0, warning: 0, critical: 0 };
  for (const r of records) counts[r.health_status] += 1;
  return counts;
}
