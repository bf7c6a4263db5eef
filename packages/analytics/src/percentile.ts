import type { EquipmentRecord, NumericParameter } from "../../schema/src/types.js";

export function columnValues(records: readonly EquipmentRecord[], parameter: NumericParameter): number[] {
  return records.map((r) => r[parameter]);
}

export function sortAscending(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

/**
 * Percentile by linear interpolation between closest ranks:
 * rank h = (n - 1) * p, value = x[floor(h)] + frac(h) * (x[floor(h) + 1] - x[floor(h)]).
 * `sorted` must be ascending. Returns null for an empty column.
 */
export function percentileSorted(sorted: readonly number[], p: number): number | null {
  if (sorted.length === 0) return null;
  if (p <= 0) return sorted[0];
  if (p >= 1) return sorted[sorted.length - 1];

  const h = (sorted.length - 1) * p;
  const lo = Math.floor(h);
  const hi = Math.min(lo + 1, sorted.length - 1);
  return sorted[lo] + (h - lo) * (sorted[hi] - sorted[lo]);
}

export function percentile(values: readonly number[], p: number): number | null {
  return percentileSorted(sortAscending(values), p);
}
