// packages/schema/__tests__/validate.test.ts
import { describe, expect, test } from "vitest";

import {
  EquipmentRecordSchema,
  ThresholdInputSchema,
  parseAnalysisSummary,
  parseThresholdValue,
} from "../src/validate.js";

describe("parseThresholdValue", () => {
  test("accepts numbers and numeric strings inside the range", () => {
    expect(parseThresholdValue("warning_percentile", 0.5)).toBe(0.5);
    expect(parseThresholdValue("warning_percentile", 0.95)).toBe(0.95);
    expect(parseThresholdValue("warning_percentile", "0.8")).toBe(0.8);
    expect(parseThresholdValue("outlier_iqr_multiplier", " 2 ")).toBe(2);
    expect(parseThresholdValue("outlier_iqr_multiplier", "3.0")).toBe(3);
  });

  test("returns null for anything unusable", () => {
    expect(parseThresholdValue("warning_percentile", undefined)).toBeNull();
    expect(parseThresholdValue("warning_percentile", null)).toBeNull();
    expect(parseThresholdValue("warning_percentile", "")).toBeNull();
    expect(parseThresholdValue("warning_percentile", "abc")).toBeNull();
    expect(parseThresholdValue("warning_percentile", 0.99)).toBeNull();
    expect(parseThresholdValue("warning_percentile", 0.49)).toBeNull();
    expect(parseThresholdValue("outlier_iqr_multiplier", 3.5)).toBeNull();
    expect(parseThresholdValue("outlier_iqr_multiplier", "0.1")).toBeNull();
  });
});

describe("ThresholdInputSchema", () => {
  test("both fields are optional", () => {
    const r = ThresholdInputSchema.safeParse({});
    expect(r.success).toBe(true);
  });

  test("range messages name the field and bounds", () => {
    const r = ThresholdInputSchema.safeParse({ warning_percentile: 0.99, outlier_iqr_multiplier: 0.2 });
    expect(r.success).toBe(false);
    if (r.success) return;

    const messages = r.error.issues.map((i) => i.message);
    expect(messages).toContain("warning_percentile must be between 0.5 and 0.95");
    expect(messages).toContain("outlier_iqr_multiplier must be between 0.5 and 3");
  });
});

describe("EquipmentRecordSchema", () => {
  test("coerces numeric cells", () => {
    const r = EquipmentRecordSchema.parse({
      equipment_name: "P1",
      type: "Pump",
      flowrate: "12.5",
      pressure: " 5 ",
      temperature: 100,
    });
    expect(r).toEqual({ equipment_name: "P1", type: "Pump", flowrate: 12.5, pressure: 5, temperature: 100 });
  });

  test("rejects non-numeric and non-finite cells", () => {
    const base = { equipment_name: "P1", type: "Pump", pressure: "5", temperature: "100" };
    expect(EquipmentRecordSchema.safeParse({ ...base, flowrate: "abc" }).success).toBe(false);
    expect(EquipmentRecordSchema.safeParse({ ...base, flowrate: "" }).success).toBe(false);
    expect(EquipmentRecordSchema.safeParse({ ...base, flowrate: "Infinity" }).success).toBe(false);
  });
});

describe("parseAnalysisSummary", () => {
  test("keeps null statistics", () => {
    const empty = {
      total_count: 0,
      avg_flowrate: null,
      min_flowrate: null,
      max_flowrate: null,
      std_flowrate: null,
      avg_pressure: null,
      min_pressure: null,
      max_pressure: null,
      std_pressure: null,
      avg_temperature: null,
      min_temperature: null,
      max_temperature: null,
      std_temperature: null,
      type_distribution: {},
      type_comparison: {},
      correlation_matrix: {
        flowrate: { flowrate: null, pressure: null, temperature: null },
        pressure: { flowrate: null, pressure: null, temperature: null },
        temperature: { flowrate: null, pressure: null, temperature: null },
      },
      outliers: [],
    };
    expect(parseAnalysisSummary(empty)).toEqual(empty);
  });

  test("rejects a malformed payload", () => {
    expect(() => parseAnalysisSummary({ total_count: -1 })).toThrow();
  });
});
