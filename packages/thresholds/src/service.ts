import type { ResolvedThresholds, ThresholdSettings, Thresholds } from "../../schema/src/types.js";
import { ThresholdInputSchema } from "../../schema/src/validate.js";
import type { ThresholdFallbackConfig } from "../../runtime/src/config.js";
import type { ValidationResult, Violation } from "../../runtime/src/errors.js";
import { getLogger } from "../../runtime/src/logger.js";
import type { Logger } from "../../runtime/src/logger.js";
import { resolveThresholds } from "./resolver.js";
import type { ThresholdSettingsStore } from "./store.js";

export type ThresholdServiceOptions = {
  fallback?: ThresholdFallbackConfig;
  now?: () => string;
  logger?: Logger;
};

export type EffectiveThresholds = ResolvedThresholds & {
  is_custom: boolean;
  updated_at: string | null;
};

export async function resolveThresholdsForUser(
  store: ThresholdSettingsStore,
  user_id: string,
  fallback: ThresholdFallbackConfig = {}
): Promise<ResolvedThresholds> {
  const settings = await store.getSettings(user_id);
  return resolveThresholds(settings, fallback);
}

/**
 * Field-scoped validation of a user submission. Every bad field gets its
 * own violation; omitted fields are simply absent from the result.
 */
export function validateThresholdInput(input: unknown): ValidationResult<Partial<Thresholds>> {
  const r = ThresholdInputSchema.safeParse(input ?? {});
  if (r.success) {
    const value: Partial<Thresholds> = {};
    if (r.data.warning_percentile !== undefined) value.warning_percentile = r.data.warning_percentile;
    if (r.data.outlier_iqr_multiplier !== undefined) value.outlier_iqr_multiplier = r.data.outlier_iqr_multiplier;
    return { ok: true, value };
  }

  const byField = new Map<string, Violation>();
  for (const issue of r.error.issues) {
    const field = issue.path.length > 0 ? String(issue.path[0]) : "input";
    if (byField.has(field)) continue;

    const outOfRange = issue.code === "too_big" || issue.code === "too_small";
    byField.set(field, {
      code: outOfRange ? "OUT_OF_RANGE" : "INVALID_NUMBER",
      field,
      message: outOfRange ? issue.message : `${field} must be a number`,
    });
  }

  return { ok: false, violations: [...byField.values()] };
}

export class ThresholdSettingsService {
  private readonly store: ThresholdSettingsStore;
  private readonly fallback: ThresholdFallbackConfig;
  private readonly now: () => string;
  private readonly logger: Logger;

  constructor(store: ThresholdSettingsStore, opts: ThresholdServiceOptions = {}) {
    this.store = store;
    this.fallback = opts.fallback ?? {};
    this.now = opts.now ?? (() => new Date().toISOString());
    this.logger = opts.logger ?? getLogger();
  }

  async resolve(user_id: string): Promise<ResolvedThresholds> {
    return resolveThresholdsForUser(this.store, user_id, this.fallback);
  }

  async get(user_id: string): Promise<EffectiveThresholds> {
    const settings = await this.store.getSettings(user_id);
    return {
      ...resolveThresholds(settings, this.fallback),
      is_custom: settings != null,
      updated_at: settings?.updated_at ?? null,
    };
  }

  async save(
    user_id: string,
    input: unknown
  ): Promise<{ ok: true; settings: ThresholdSettings } | { ok: false; violations: Violation[] }> {
    const v = validateThresholdInput(input);
    if (!v.ok) {
      this.logger.info("threshold save rejected", {
        user_id,
        fields: v.violations.map((x) => x.field),
      });
      return { ok: false, violations: v.violations };
    }

    // First save fills unspecified fields with what the user sees today.
    const current = resolveThresholds(null, this.fallback);
    const settings = await this.store.upsertSettings({
      user_id,
      patch: v.value,
      initial: {
        warning_percentile: current.warning_percentile,
        outlier_iqr_multiplier: current.outlier_iqr_multiplier,
      },
      at: this.now(),
    });

    this.logger.info("threshold settings saved", { user_id, fields: Object.keys(v.value) });
    return { ok: true, settings };
  }

  async reset(user_id: string): Promise<{ deleted: boolean }> {
    const { deleted } = await this.store.deleteSettings(user_id);
    this.logger.info("threshold settings reset", { user_id, deleted: deleted > 0 });
    return { deleted: deleted > 0 };
  }
}
