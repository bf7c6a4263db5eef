// packages/analytics/__tests__/statistics.test.ts
import { describe, expect, test } from "vitest";

import { correlationMatrix, describeColumn, summarizeRecords } from "../src/statistics.js";
import { PLANT_A, rec } from "./_helpers/datasets.js";

describe("summarizeRecords", () => {
  test("two records", () => {
    const s = summarizeRecords([rec("P1", "Pump", 100, 5.0, 120), rec("V1", "Valve", 50, 4.0, 100)]);

    expect(s.total_count).toBe(2);
    expect(s.avg_flowrate).toBe(75);
    expect(s.min_flowrate).toBe(50);
    expect(s.max_flowrate).toBe(100);
    expect(s.std_flowrate).toBeCloseTo(Math.sqrt(1250), 6);
    expect(s.avg_temperature).toBe(110);
    expect(s.type_distribution).toEqual({ Pump: 1, Valve: 1 });

    for (const a of ["flowrate", "pressure", "temperature"] as const) {
      for (const b of ["flowrate", "pressure", "temperature"] as const) {
        expect(s.correlation_matrix[a][b]).toBeCloseTo(1, 9);
      }
    }
  });

  test("type distribution and comparison keep first-seen order", () => {
    const s = summarizeRecords(PLANT_A);

    expect(Object.keys(s.type_distribution)).toEqual(["Pump", "Valve", "Compressor"]);
    expect(s.type_distribution).toEqual({ Pump: 2, Valve: 2, Compressor: 2 });
    expect(Object.values(s.type_distribution).reduce((a, b) => a + b, 0)).toBe(s.total_count);

    const pump = s.type_comparison["Pump"];
    expect(pump?.count).toBe(2);
    expect(pump?.avg_flowrate).toBe(11);
    expect(pump?.avg_pressure).toBeCloseTo(5.1, 9);
    expect(pump?.avg_temperature).toBe(101);

    expect(s.avg_flowrate).toBeCloseTo(74 / 6, 9);
    expect(s.min_flowrate).toBe(10);
    expect(s.max_flowrate).toBe(16);
  });

  test("a single record has no spread and no correlation", () => {
    const s = summarizeRecords([rec("P1", "Pump", 10, 5, 100)]);
    expect(s.avg_flowrate).toBe(10);
    expect(s.std_flowrate).toBeNull();
    expect(s.correlation_matrix.flowrate.flowrate).toBeNull();
    expect(s.correlation_matrix.flowrate.pressure).toBeNull();
  });

  test("no records", () => {
    const s = summarizeRecords([]);
    expect(s.total_count).toBe(0);
    expect(s.avg_pressure).toBeNull();
    expect(s.min_pressure).toBeNull();
    expect(s.max_pressure).toBeNull();
    expect(s.std_pressure).toBeNull();
    expect(s.type_distribution).toEqual({});
    expect(s.type_comparison).toEqual({});
  });
});

describe("correlationMatrix", () => {
  test("symmetric, with null for a constant column", () => {
    const m = correlationMatrix([
      rec("a", "T", 1, 3, 5),
      rec("b", "T", 2, 2, 5),
      rec("c", "T", 3, 1, 5),
    ]);

    expect(m.flowrate.pressure).toBeCloseTo(-1, 9);
    expect(m.pressure.flowrate).toBe(m.flowrate.pressure);
    expect(m.flowrate.flowrate).toBe(1);
    expect(m.temperature.temperature).toBeNull();
    expect(m.flowrate.temperature).toBeNull();
    expect(m.temperature.pressure).toBeNull();
  });
});

describe("describeColumn", () => {
  test("sample standard deviation", () => {
    const d = describeColumn([2, 4, 4, 4, 5, 5, 7, 9]);
    expect(d.avg).toBe(5);
    expect(d.std).toBeCloseTo(Math.sqrt(32 / 7), 9);
  });
});
