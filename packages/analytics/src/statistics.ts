import { max, mean, min, sampleCorrelation, sampleStandardDeviation } from "simple-statistics";

import { NUMERIC_PARAMETERS } from "../../schema/src/constants.js";
import type {
  CorrelationMatrix,
  DatasetStatistics,
  EquipmentRecord,
  NumericParameter,
  Stat,
  TypeComparisonRow,
} from "../../schema/src/types.js";
import { columnValues } from "./percentile.js";

export type ColumnStatistics = {
  avg: Stat;
  min: Stat;
  max: Stat;
  std: Stat;
};

function finiteOrNull(x: number): Stat {
  return Number.isFinite(x) ? x : null;
}

export function describeColumn(values: readonly number[]): ColumnStatistics {
  if (values.length === 0) return { avg: null, min: null, max: null, std: null };

  const xs = [...values];
  return {
    avg: mean(xs),
    min: min(xs),
    max: max(xs),
    // Bessel-corrected; undefined below two observations
    std: xs.length > 1 ? finiteOrNull(sampleStandardDeviation(xs)) : null,
  };
}

/**
 * Pearson correlation across every pair of numeric columns over the full
 * record set. Each off-diagonal pair is computed once and mirrored.
 */
export function correlationMatrix(records: readonly EquipmentRecord[]): CorrelationMatrix {
  const columns = new Map(NUMERIC_PARAMETERS.map((p) => [p, columnValues(records, p)]));
  const col = (p: NumericParameter): number[] => columns.get(p) ?? [];

  const hasVariance = (p: NumericParameter): boolean => {
    const xs = col(p);
    return xs.length > 1 && sampleStandardDeviation(xs) > 0;
  };

  const out: CorrelationMatrix = {
    flowrate: { flowrate: null, pressure: null, temperature: null },
    pressure: { flowrate: null, pressure: null, temperature: null },
    temperature: { flowrate: null, pressure: null, temperature: null },
  };

  NUMERIC_PARAMETERS.forEach((a, i) => {
    out[a][a] = hasVariance(a) ? 1 : null;

    for (const b of NUMERIC_PARAMETERS.slice(i + 1)) {
      const r = hasVariance(a) && hasVariance(b) ? finiteOrNull(sampleCorrelation(col(a), col(b))) : null;
      out[a][b] = r;
      out[b][a] = r;
    }
  });

  return out;
}

export function typeDistribution(records: readonly EquipmentRecord[]): Record<string, number> {
  const counts = new Map<string, number>();
  for (const r of records) counts.set(r.type, (counts.get(r.type) ?? 0) + 1);
  return Object.fromEntries(counts);
}

export function typeComparison(records: readonly EquipmentRecord[]): Record<string, TypeComparisonRow> {
  const groups = new Map<string, EquipmentRecord[]>();
  for (const r of records) {
    const g = groups.get(r.type);
    if (g) g.push(r);
    else groups.set(r.type, [r]);
  }

  return Object.fromEntries(
    [...groups.entries()].map(([type, rows]) => [
      type,
      {
        count: rows.length,
        avg_flowrate: describeColumn(columnValues(rows, "flowrate")).avg,
        avg_pressure: describeColumn(columnValues(rows, "pressure")).avg,
        avg_temperature: describeColumn(columnValues(rows, "temperature")).avg,
      },
    ])
  );
}

export function summarizeRecords(records: readonly EquipmentRecord[]): DatasetStatistics {
  const f = describeColumn(columnValues(records, "flowrate"));
  const p = describeColumn(columnValues(records, "pressure"));
  const t = describeColumn(columnValues(records, "temperature"));

  return {
    total_count: records.length,

    avg_flowrate: f.avg,
    min_flowrate: f.min,
    max_flowrate: f.max,
    std_flowrate: f.std,

    avg_pressure: p.avg,
    min_pressure: p.min,
    max_pressure: p.max,
    std_pressure: p.std,

    avg_temperature: t.avg,
    min_temperature: t.min,
    max_temperature: t.max,
    std_temperature: t.std,

    type_distribution: typeDistribution(records),
    type_comparison: typeComparison(records),
    correlation_matrix: correlationMatrix(records),
  };
}
