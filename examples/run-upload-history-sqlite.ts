// examples/run-upload-history-sqlite.ts
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { openDatabase } from "../packages/runtime/src/database.js";
import { buildReport } from "../packages/report/src/report.js";
import { renderReportText } from "../packages/report/src/render.js";
import { AnalysisService } from "../packages/snapshots/src/analysis-service.js";

function assert(cond: unknown, msg: string): asserts cond {
  if (!cond) throw new Error(msg);
}

function makeDeterministicNow(startIso = "2026-01-01T00:00:00.000Z") {
  let t = Date.parse(startIso);
  return () => {
    const iso = new Date(t).toISOString();
    t += 1;
    return iso;
  };
}

async function main() {
  const csvPath = process.argv[2] ?? fileURLToPath(new URL("./data/equipment.csv", import.meta.url));
  const content = readFileSync(csvPath, "utf-8");

  const db = openDatabase(":memory:");
  const svc = AnalysisService.fromDatabase(db, { now: makeDeterministicNow() });
  const owner = "demo-user";

  // Seven uploads -> only the newest five survive
  for (let i = 1; i <= 7; i++) {
    const r = await svc.upload(owner, { name: `equipment-${i}.csv`, content });
    assert(r.ok, `upload ${i} failed`);
  }

  const history = await svc.history(owner);
  assert(history.length === 5, `expected 5 snapshots, got ${history.length}`);
  console.log("history:", history.map((h) => `#${h.sequence_index}`).join(" "));

  const latest = history[0];
  assert(latest, "no latest snapshot");
  console.log(renderReportText(buildReport(latest)));

  // Looser fence, same stored data
  const saved = await svc.thresholds.save(owner, { outlier_iqr_multiplier: 3.0 });
  assert(saved.ok, "threshold save failed");

  const view = await svc.view(latest.snapshot_id, owner);
  console.log(
    `outliers at 1.5: ${latest.summary.outliers.length}, at 3.0: ${view.summary.outliers.length}`
  );

  db.close();
}

main().catch((e: unknown) => {
  console.error(e);
  process.exit(1);
});
