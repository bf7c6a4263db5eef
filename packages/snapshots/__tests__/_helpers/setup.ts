import Database from "better-sqlite3";

import type { EquipmentRecord } from "../../../schema/src/types.js";
import { AnalysisService } from "../../src/analysis-service.js";
import type { AnalysisServiceOptions } from "../../src/analysis-service.js";

export { PLANT_A, PLANT_B } from "../../../analytics/__tests__/_helpers/datasets.js";

export const HEADER = "Equipment Name,Type,Flowrate,Pressure,Temperature";

export function toCsv(records: readonly EquipmentRecord[]): string {
  const rows = records.map((r) => [r.equipment_name, r.type, r.flowrate, r.pressure, r.temperature].join(","));
  return [HEADER, ...rows].join("\n") + "\n";
}

// +1ms per call
export function clock(start = "2026-01-01T00:00:00.000Z"): () => string {
  let t = Date.parse(start);
  return () => new Date(t++).toISOString();
}

export function setupService(opts: AnalysisServiceOptions = {}) {
  const db = new Database(":memory:");
  const svc = AnalysisService.fromDatabase(db, { now: clock(), ...opts });
  return { db, svc };
}

export function countRows(db: Database.Database): number {
  const row = db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM analysis_snapshots`).get();
  return row?.n ?? 0;
}
