// packages/thresholds/__tests__/resolver.test.ts
import { describe, expect, test } from "vitest";

import { resolveThresholds } from "../src/resolver.js";

describe("resolveThresholds", () => {
  test("defaults when nothing is set", () => {
    expect(resolveThresholds(null)).toEqual({
      warning_percentile: 0.75,
      outlier_iqr_multiplier: 1.5,
      source: { warning_percentile: "default", outlier_iqr_multiplier: "default" },
    });
  });

  test("each field resolves on its own", () => {
    const r = resolveThresholds({ warning_percentile: 0.9 }, { outlier_iqr_multiplier: "2.0" });
    expect(r).toEqual({
      warning_percentile: 0.9,
      outlier_iqr_multiplier: 2,
      source: { warning_percentile: "user", outlier_iqr_multiplier: "process" },
    });
  });

  test("user tier wins over process tier", () => {
    const r = resolveThresholds(
      { warning_percentile: 0.6, outlier_iqr_multiplier: 2.5 },
      { warning_percentile: "0.9", outlier_iqr_multiplier: "1.0" }
    );
    expect(r.warning_percentile).toBe(0.6);
    expect(r.outlier_iqr_multiplier).toBe(2.5);
  });

  test("unusable process values fall through to the default", () => {
    const r = resolveThresholds(null, { warning_percentile: "0.99", outlier_iqr_multiplier: "abc" });
    expect(r).toEqual({
      warning_percentile: 0.75,
      outlier_iqr_multiplier: 1.5,
      source: { warning_percentile: "default", outlier_iqr_multiplier: "default" },
    });
  });

  test("an out-of-range stored override is skipped", () => {
    const r = resolveThresholds({ warning_percentile: 0.2 }, { warning_percentile: 0.85 });
    expect(r.warning_percentile).toBe(0.85);
    expect(r.source.warning_percentile).toBe("process");
  });
});
