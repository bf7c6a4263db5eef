import { z } from "zod";

import {
  OUTLIER_IQR_MULTIPLIER_RANGE,
  WARNING_PERCENTILE_RANGE,
} from "./constants.js";
import type { AnalysisSummary, ClassifiedRecord, EquipmentRecord } from "./types.js";

/* ------------------------------------------------------------------ */
/*                              Primitives                            */
/* ------------------------------------------------------------------ */

// Accepts a JSON number or a numeric string (CSV cells, env values, form input).
const NumberLike = z
  .union([z.number(), z.string().trim().min(1).transform((v) => Number(v))])
  .pipe(z.number().refine(Number.isFinite, "Must be a finite number"));

const Stat = z.number().nullable();

const NumericParameterSchema = z.enum(["flowrate", "pressure", "temperature"]);

/* ------------------------------------------------------------------ */
/*                               Records                              */
/* ------------------------------------------------------------------ */

export const EquipmentRecordSchema = z.object({
  equipment_name: z.string(),
  type: z.string(),
  flowrate: NumberLike,
  pressure: NumberLike,
  temperature: NumberLike,
});

const ClassifiedRecordSchema = z.object({
  equipment_name: z.string(),
  type: z.string(),
  flowrate: z.number(),
  pressure: z.number(),
  temperature: z.number(),
  health_status: z.enum(["normal", "warning", "critical"]),
  health_color: z.enum(["#10b981", "#f59e0b", "#ef4444"]),
});

/* ------------------------------------------------------------------ */
/*                               Summary                              */
/* ------------------------------------------------------------------ */

const CorrelationRowSchema = z.object({
  flowrate: Stat,
  pressure: Stat,
  temperature: Stat,
});

const OutlierEntrySchema = z.object({
  equipment_name: z.string(),
  parameters: z.array(
    z.object({
      parameter: NumericParameterSchema,
      value: z.number(),
      lower_bound: z.number(),
      upper_bound: z.number(),
    })
  ),
});

export const AnalysisSummarySchema = z.object({
  total_count: z.number().int().min(0),

  avg_flowrate: Stat,
  min_flowrate: Stat,
  max_flowrate: Stat,
  std_flowrate: Stat,

  avg_pressure: Stat,
  min_pressure: Stat,
  max_pressure: Stat,
  std_pressure: Stat,

  avg_temperature: Stat,
  min_temperature: Stat,
  max_temperature: Stat,
  std_temperature: Stat,

  type_distribution: z.record(z.string(), z.number().int().min(0)),
  type_comparison: z.record(
    z.string(),
    z.object({
      count: z.number().int().min(0),
      avg_flowrate: Stat,
      avg_pressure: Stat,
      avg_temperature: Stat,
    })
  ),
  correlation_matrix: z.object({
    flowrate: CorrelationRowSchema,
    pressure: CorrelationRowSchema,
    temperature: CorrelationRowSchema,
  }),
  outliers: z.array(OutlierEntrySchema),
});

/* ------------------------------------------------------------------ */
/*                              Thresholds                            */
/* ------------------------------------------------------------------ */

const WarningPercentile = NumberLike.pipe(
  z
    .number()
    .min(
      WARNING_PERCENTILE_RANGE.min,
      `warning_percentile must be between ${WARNING_PERCENTILE_RANGE.min} and ${WARNING_PERCENTILE_RANGE.max}`
    )
    .max(
      WARNING_PERCENTILE_RANGE.max,
      `warning_percentile must be between ${WARNING_PERCENTILE_RANGE.min} and ${WARNING_PERCENTILE_RANGE.max}`
    )
);

const OutlierIqrMultiplier = NumberLike.pipe(
  z
    .number()
    .min(
      OUTLIER_IQR_MULTIPLIER_RANGE.min,
      `outlier_iqr_multiplier must be between ${OUTLIER_IQR_MULTIPLIER_RANGE.min} and ${OUTLIER_IQR_MULTIPLIER_RANGE.max}`
    )
    .max(
      OUTLIER_IQR_MULTIPLIER_RANGE.max,
      `outlier_iqr_multiplier must be between ${OUTLIER_IQR_MULTIPLIER_RANGE.min} and ${OUTLIER_IQR_MULTIPLIER_RANGE.max}`
    )
);

// Partial update: either field may be omitted.
export const ThresholdInputSchema = z.object({
  warning_percentile: WarningPercentile.optional(),
  outlier_iqr_multiplier: OutlierIqrMultiplier.optional(),
});

export type ThresholdInput = z.infer<typeof ThresholdInputSchema>;

export type ThresholdField = keyof ThresholdInput;

/* ------------------------------------------------------------------ */
/*                               Parsers                              */
/* ------------------------------------------------------------------ */

export function parseEquipmentRecord(input: unknown): EquipmentRecord {
  return EquipmentRecordSchema.parse(input);
}

export function parseClassifiedRecords(input: unknown): ClassifiedRecord[] {
  return z.array(ClassifiedRecordSchema).parse(input);
}

export function parseAnalysisSummary(input: unknown): AnalysisSummary {
  return AnalysisSummarySchema.parse(input);
}

/**
 * Lenient single-value parse used by the fallback tiers: returns null
 * instead of throwing so the caller can move on to the next tier.
 */
export function parseThresholdValue(field: ThresholdField, raw: unknown): number | null {
  if (raw === undefined || raw === null) return null;
  const schema = field === "warning_percentile" ? WarningPercentile : OutlierIqrMultiplier;
  const r = schema.safeParse(raw);
  return r.success ? r.data : null;
}
