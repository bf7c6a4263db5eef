import { DEFAULT_THRESHOLDS } from "../../schema/src/constants.js";
import type { ResolvedThresholds, ThresholdSource, Thresholds } from "../../schema/src/types.js";
import { parseThresholdValue } from "../../schema/src/validate.js";
import type { ThresholdField } from "../../schema/src/validate.js";
import type { ThresholdFallbackConfig } from "../../runtime/src/config.js";

function resolveField(
  field: ThresholdField,
  override: Partial<Thresholds> | null,
  fallback: ThresholdFallbackConfig
): { value: number; source: ThresholdSource } {
  const fromUser = parseThresholdValue(field, override?.[field]);
  if (fromUser != null) return { value: fromUser, source: "user" };

  const fromProcess = parseThresholdValue(field, fallback[field]);
  if (fromProcess != null) return { value: fromProcess, source: "process" };

  return { value: DEFAULT_THRESHOLDS[field], source: "default" };
}

/**
 * Three tiers, first valid value wins, each field on its own:
 * user override -> process-wide fallback -> hardcoded default.
 *
 * Pure: the process tier is passed in, never read from the environment here.
 * Never throws; anything unparsable or out of range drops to the next tier.
 */
export function resolveThresholds(
  override: Partial<Thresholds> | null,
  fallback: ThresholdFallbackConfig = {}
): ResolvedThresholds {
  const wp = resolveField("warning_percentile", override, fallback);
  const m = resolveField("outlier_iqr_multiplier", override, fallback);

  return {
    warning_percentile: wp.value,
    outlier_iqr_multiplier: m.value,
    source: { warning_percentile: wp.source, outlier_iqr_multiplier: m.source },
  };
}
