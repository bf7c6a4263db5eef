import { NUMERIC_PARAMETERS } from "../../schema/src/constants.js";
import type {
  EquipmentRecord,
  NumericParameter,
  OutlierEntry,
  OutlierParameter,
} from "../../schema/src/types.js";
import { columnValues, percentileSorted, sortAscending } from "./percentile.js";

export type IqrBounds = {
  parameter: NumericParameter;
  q1: number;
  q3: number;
  iqr: number;
  lower_bound: number;
  upper_bound: number;
};

export type OutlierDirection = "high" | "low";

export function iqrBounds(
  records: readonly EquipmentRecord[],
  parameter: NumericParameter,
  multiplier: number
): IqrBounds | null {
  const sorted = sortAscending(columnValues(records, parameter));
  const q1 = percentileSorted(sorted, 0.25);
  const q3 = percentileSorted(sorted, 0.75);
  if (q1 == null || q3 == null) return null;

  const iqr = q3 - q1;
  return {
    parameter,
    q1,
    q3,
    iqr,
    lower_bound: q1 - multiplier * iqr,
    upper_bound: q3 + multiplier * iqr,
  };
}

/**
 * IQR rule per numeric column, grouped by equipment name.
 *
 * Columns are scanned flowrate, pressure, temperature. An equipment's first
 * violation opens its entry; later violations append to `parameters`.
 * Names match by exact string equality, so records sharing a name share
 * one entry.
 */
export function detectOutliers(records: readonly EquipmentRecord[], multiplier: number): OutlierEntry[] {
  const byName = new Map<string, OutlierParameter[]>();

  for (const parameter of NUMERIC_PARAMETERS) {
    const bounds = iqrBounds(records, parameter, multiplier);
    if (!bounds) continue;

    for (const r of records) {
      const value = r[parameter];
      if (value >= bounds.lower_bound && value <= bounds.upper_bound) continue;

      const hit: OutlierParameter = {
        parameter,
        value,
        lower_bound: bounds.lower_bound,
        upper_bound: bounds.upper_bound,
      };

      const existing = byName.get(r.equipment_name);
      if (existing) existing.push(hit);
      else byName.set(r.equipment_name, [hit]);
    }
  }

  return [...byName.entries()].map(([equipment_name, parameters]) => ({ equipment_name, parameters }));
}

export function outlierDirection(p: OutlierParameter): OutlierDirection {
  return p.value > p.upper_bound ? "high" : "low";
}

export function countOutlierParameters(outliers: readonly OutlierEntry[]): number {
  return outliers.reduce((n, o) => n + o.parameters.length, 0);
}
