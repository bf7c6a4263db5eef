// packages/analytics/__tests__/outliers.test.ts
import { describe, expect, test } from "vitest";

import { countOutlierParameters, detectOutliers, iqrBounds, outlierDirection } from "../src/outliers.js";
import { PLANT_A, PLANT_B, rec } from "./_helpers/datasets.js";

describe("iqrBounds", () => {
  test("quartiles by linear interpolation", () => {
    expect(iqrBounds(PLANT_A, "flowrate", 1.5)).toEqual({
      parameter: "flowrate",
      q1: 11.25,
      q3: 12.75,
      iqr: 1.5,
      lower_bound: 9,
      upper_bound: 15,
    });
  });

  test("no records, no bounds", () => {
    expect(iqrBounds([], "pressure", 1.5)).toBeNull();
  });
});

describe("detectOutliers", () => {
  test("multiplier widens the fence", () => {
    expect(detectOutliers(PLANT_A, 1.5)).toEqual([
      {
        equipment_name: "C2",
        parameters: [{ parameter: "flowrate", value: 16, lower_bound: 9, upper_bound: 15 }],
      },
    ]);
    expect(detectOutliers(PLANT_A, 3.0)).toEqual([]);
  });

  test("entries open in column scan order and collect every violated column", () => {
    expect(detectOutliers(PLANT_B, 1.5)).toEqual([
      {
        equipment_name: "E",
        parameters: [
          { parameter: "flowrate", value: 50, lower_bound: 9.5, upper_bound: 13.5 },
          { parameter: "pressure", value: 9, lower_bound: 5, upper_bound: 5 },
        ],
      },
      {
        equipment_name: "G",
        parameters: [{ parameter: "pressure", value: 1, lower_bound: 5, upper_bound: 5 }],
      },
      {
        equipment_name: "F",
        parameters: [{ parameter: "temperature", value: 150, lower_bound: 97.75, upper_bound: 103.75 }],
      },
    ]);
    expect(countOutlierParameters(detectOutliers(PLANT_B, 1.5))).toBe(4);
  });

  test("records sharing a name share one entry", () => {
    const out = detectOutliers(
      [
        rec("X", "Pump", 100, 5, 100),
        rec("Y", "Pump", 10, 5, 100),
        rec("Z", "Pump", 10, 5, 100),
        rec("W", "Pump", 10, 5, 100),
        rec("X", "Pump", 10, 50, 100),
      ],
      1.5
    );
    expect(out).toHaveLength(1);
    expect(out[0]?.equipment_name).toBe("X");
    expect(out[0]?.parameters.map((p) => [p.parameter, p.value])).toEqual([
      ["flowrate", 100],
      ["pressure", 50],
    ]);
  });

  test("value on the fence is not an outlier", () => {
    // pressure fence is [5, 5]; every 5 sits on it
    const names = detectOutliers(PLANT_B, 1.5).map((o) => o.equipment_name);
    expect(names).not.toContain("A");
  });

  test("a wider fence never finds more", () => {
    const counts = [0.5, 1, 1.5, 2, 3].map((k) => countOutlierParameters(detectOutliers(PLANT_B, k)));
    for (let i = 1; i < counts.length; i++) {
      expect(counts[i]).toBeLessThanOrEqual(counts[i - 1] ?? Infinity);
    }
  });

  test("empty dataset", () => {
    expect(detectOutliers([], 1.5)).toEqual([]);
  });
});

describe("outlierDirection", () => {
  test("high above the upper bound, low otherwise", () => {
    expect(outlierDirection({ parameter: "flowrate", value: 50, lower_bound: 9.5, upper_bound: 13.5 })).toBe("high");
    expect(outlierDirection({ parameter: "pressure", value: 1, lower_bound: 5, upper_bound: 5 })).toBe("low");
  });
});
