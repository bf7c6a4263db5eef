export { REPORT_ROW_LIMIT, buildReport } from "./report.js";
export type { ReportOutlier, ReportParameterStats, SnapshotReport } from "./report.js";

export { renderReportText, reportLines } from "./render.js";
export type { ReportLine } from "./render.js";
