import type { Stat } from "../../schema/src/types.js";
import type { SnapshotReport } from "./report.js";

export type ReportLine = {
  kind: "HEADER" | "SUMMARY" | "DISTRIBUTION" | "HEALTH" | "OUTLIER" | "ROW" | "NOTE";
  text: string;
};

function fmt(x: Stat): string {
  return x == null ? "n/a" : x.toFixed(2);
}

const LABEL: Record<string, string> = {
  flowrate: "Flowrate",
  pressure: "Pressure",
  temperature: "Temperature",
};

export function reportLines(r: SnapshotReport): ReportLine[] {
  const lines: ReportLine[] = [];

  lines.push({ kind: "HEADER", text: r.title });
  lines.push({ kind: "HEADER", text: `Source: ${r.source_name}` });
  lines.push({ kind: "HEADER", text: `Uploaded At: ${r.uploaded_at}` });

  // ---- Summary
  lines.push({ kind: "SUMMARY", text: `Total Equipment Count: ${r.total_count}` });
  for (const p of r.parameters) {
    const label = LABEL[p.parameter] ?? p.parameter;
    lines.push({
      kind: "SUMMARY",
      text: `${label}: avg ${fmt(p.avg)} | min ${fmt(p.min)} | max ${fmt(p.max)} | std ${fmt(p.std)}`,
    });
  }

  // ---- Type distribution
  for (const t of r.type_distribution) {
    lines.push({ kind: "DISTRIBUTION", text: `${t.type}: ${t.count}` });
  }

  // ---- Health
  lines.push({
    kind: "HEALTH",
    text: `Normal: ${r.health.normal} | Warning: ${r.health.warning} | Critical: ${r.health.critical}`,
  });

  // ---- Outliers
  if (r.outliers.length === 0) {
    lines.push({ kind: "OUTLIER", text: "No outliers detected." });
  }
  for (const o of r.outliers) {
    const label = LABEL[o.parameter] ?? o.parameter;
    lines.push({
      kind: "OUTLIER",
      text: `${o.equipment_name} ${label} ${fmt(o.value)} ${o.status.toUpperCase()} (expected ${fmt(o.lower_bound)} - ${fmt(o.upper_bound)})`,
    });
  }

  // ---- Rows
  for (const row of r.rows) {
    lines.push({
      kind: "ROW",
      text: [
        row.equipment_name,
        row.type,
        fmt(row.flowrate),
        fmt(row.pressure),
        fmt(row.temperature),
        row.health_status.toUpperCase(),
      ].join(" | "),
    });
  }
  if (r.rows_omitted > 0) {
    lines.push({ kind: "NOTE", text: `... ${r.rows_omitted} more row(s) not shown.` });
  }

  if (r.thresholds) {
    lines.push({
      kind: "NOTE",
      text: `Classified at warning percentile ${r.thresholds.warning_percentile} and IQR multiplier ${r.thresholds.outlier_iqr_multiplier}.`,
    });
  } else {
    lines.push({ kind: "NOTE", text: "Classification as stored at upload time." });
  }

  return lines;
}

const SECTION_TITLE: Partial<Record<ReportLine["kind"], string>> = {
  SUMMARY: "Summary Statistics:",
  DISTRIBUTION: "Type Distribution:",
  HEALTH: "Health:",
  OUTLIER: "Outliers:",
  ROW: "Equipment (Name | Type | Flowrate | Pressure | Temperature | Health):",
};

export function renderReportText(r: SnapshotReport): string {
  const out: string[] = [];
  let section: ReportLine["kind"] | null = null;

  for (const line of reportLines(r)) {
    if (line.kind !== section) {
      const title = SECTION_TITLE[line.kind];
      if (title) out.push("", title);
      section = line.kind;
    }
    out.push(line.kind === "HEADER" || line.kind === "NOTE" ? line.text : `  ${line.text}`);
  }

  return out.join("\n") + "\n";
}
