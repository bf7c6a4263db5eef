import { z } from "zod";

import { ConfigError } from "./errors.js";

const ConfigSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug"]).default("info"),

  EQUISTAT_DB_PATH: z.string().min(1).default("equistat.sqlite"),

  // Threshold fallback tier. Kept as raw strings: the resolver validates each
  // one independently and a bad value must not fail process start-up.
  WARNING_PERCENTILE: z.string().optional(),
  OUTLIER_IQR_MULTIPLIER: z.string().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Raw process-wide threshold values, handed to the resolver explicitly.
 */
export type ThresholdFallbackConfig = {
  warning_percentile?: string | number;
  outlier_iqr_multiplier?: string | number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.map(String).join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

export function thresholdFallbackFromConfig(config: Config): ThresholdFallbackConfig {
  return {
    warning_percentile: config.WARNING_PERCENTILE,
    outlier_iqr_multiplier: config.OUTLIER_IQR_MULTIPLIER,
  };
}
