// packages/snapshots/__tests__/reconcile.test.ts
import { describe, expect, test, vi } from "vitest";

import { SnapshotNotFoundError } from "../../runtime/src/errors.js";
import { createLogger } from "../../runtime/src/logger.js";
import type { AnalysisSnapshot } from "../../schema/src/types.js";
import type { ThresholdSettingsStore } from "../../thresholds/src/store.js";
import { viewSnapshot } from "../src/reconcile.js";
import { PLANT_A, setupService, toCsv } from "./_helpers/setup.js";

async function uploadPlant(svc: ReturnType<typeof setupService>["svc"], owner = "u1"): Promise<AnalysisSnapshot> {
  const r = await svc.upload(owner, { name: "plant.csv", content: toCsv(PLANT_A) });
  if (!r.ok) throw new Error(r.violations.map((v) => v.message).join(" "));
  return r.snapshot;
}

describe("viewSnapshot", () => {
  test("reclassifies with the viewer's current thresholds", async () => {
    const { svc } = setupService();
    const stored = await uploadPlant(svc);
    expect(stored.records[5]?.health_status).toBe("critical");

    await svc.thresholds.save("u1", { outlier_iqr_multiplier: 3.0 });
    const view = await svc.view(stored.snapshot_id, "u1");

    expect(view.reclassified).toBe(true);
    expect(view.thresholds?.outlier_iqr_multiplier).toBe(3);
    expect(view.thresholds?.source.outlier_iqr_multiplier).toBe("user");
    expect(view.summary.outliers).toEqual([]);
    expect(view.records[5]).toMatchObject({ equipment_name: "C2", health_status: "warning", health_color: "#f59e0b" });

    // everything else is served as stored
    expect(view.summary.avg_flowrate).toBe(stored.summary.avg_flowrate);
    expect(view.summary.correlation_matrix).toEqual(stored.summary.correlation_matrix);
    expect(view.summary.type_comparison).toEqual(stored.summary.type_comparison);
    expect(view.records.map((r) => r.flowrate)).toEqual(stored.records.map((r) => r.flowrate));

    // the stored classification is untouched
    const again = await svc.snapshots.getSnapshot(stored.snapshot_id);
    expect(again?.records[5]?.health_status).toBe("critical");
    expect(again?.summary.outliers.map((o) => o.equipment_name)).toEqual(["C2"]);
  });

  test("reset brings the default classification back", async () => {
    const { svc } = setupService();
    await svc.thresholds.save("u1", { outlier_iqr_multiplier: 3.0 });
    const stored = await uploadPlant(svc);
    expect(stored.summary.outliers).toEqual([]);

    await svc.thresholds.reset("u1");
    const view = await svc.view(stored.snapshot_id, "u1");
    expect(view.summary.outliers.map((o) => o.equipment_name)).toEqual(["C2"]);
    expect(view.thresholds?.source).toEqual({ warning_percentile: "default", outlier_iqr_multiplier: "default" });
  });

  test("falls back to the stored classification when thresholds cannot be read", async () => {
    const { svc } = setupService();
    const stored = await uploadPlant(svc);

    const broken: ThresholdSettingsStore = {
      getSettings: async () => {
        throw new Error("settings unavailable");
      },
      upsertSettings: async () => {
        throw new Error("settings unavailable");
      },
      deleteSettings: async () => ({ deleted: 0 }),
    };
    const logger = createLogger({ silent: true });
    const warn = vi.spyOn(logger, "warn");

    const view = await viewSnapshot(stored, "u1", { thresholds: broken, logger });

    expect(view.reclassified).toBe(false);
    expect(view.thresholds).toBeNull();
    expect(view.records).toEqual(stored.records);
    expect(view.summary).toEqual(stored.summary);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("serving stored classification", {
      snapshot_id: stored.snapshot_id,
      requesting_user_id: "u1",
      error: "settings unavailable",
    });
  });
});

describe("history and lookup", () => {
  test("another user's snapshot reads as not found", async () => {
    const { svc } = setupService();
    const stored = await uploadPlant(svc, "u1");

    await expect(svc.view(stored.snapshot_id, "u2")).rejects.toBeInstanceOf(SnapshotNotFoundError);
    await expect(svc.view("missing-id", "u1")).rejects.toThrow("Snapshot not found: missing-id");
  });

  test("history is newest first and reclassified for the owner", async () => {
    const { svc } = setupService();
    await uploadPlant(svc);
    await uploadPlant(svc);
    await svc.thresholds.save("u1", { outlier_iqr_multiplier: 3.0 });

    const history = await svc.history("u1");
    expect(history.map((h) => h.sequence_index)).toEqual([2, 1]);
    expect(history.every((h) => h.reclassified && h.summary.outliers.length === 0)).toBe(true);
    expect(await svc.history("u2")).toEqual([]);
  });
});
