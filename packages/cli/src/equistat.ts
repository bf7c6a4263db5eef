#!/usr/bin/env node
// packages/cli/src/equistat.ts
/* eslint-disable no-console */

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

import type Database from "better-sqlite3";
import dotenv from "dotenv";

import { buildReport } from "../../report/src/report.js";
import { renderReportText } from "../../report/src/render.js";
import { loadConfig, thresholdFallbackFromConfig } from "../../runtime/src/config.js";
import { openDatabase } from "../../runtime/src/database.js";
import { SnapshotNotFoundError, errorMessage } from "../../runtime/src/errors.js";
import type { Violation } from "../../runtime/src/errors.js";
import { createLogger } from "../../runtime/src/logger.js";
import type { Logger } from "../../runtime/src/logger.js";
import { AnalysisService } from "../../snapshots/src/analysis-service.js";
import type { SnapshotView } from "../../snapshots/src/reconcile.js";

export type CliIo = {
  out: (text: string) => void;
  err: (text: string) => void;
};

export type CliDeps = {
  env?: NodeJS.ProcessEnv;
  db?: Database.Database;
  logger?: Logger;
  io?: CliIo;
  now?: () => string;
};

function usage(): string {
  return `equistat - equipment parameter analytics

Usage:
  equistat --help

  equistat upload <file.csv> --user <id> [--json]
  equistat history --user <id> [--json]
  equistat view <snapshot-id> --user <id>
  equistat report <snapshot-id> --user <id>

  equistat thresholds get --user <id>
  equistat thresholds set --user <id> [--warning-percentile <0.50-0.95>] [--iqr-multiplier <0.5-3.0>]
  equistat thresholds reset --user <id>

Environment:
  EQUISTAT_DB_PATH        sqlite file (default equistat.sqlite)
  WARNING_PERCENTILE      process-wide fallback (default 0.75)
  OUTLIER_IQR_MULTIPLIER  process-wide fallback (default 1.5)
  LOG_LEVEL               error | warn | info | http | verbose | debug
`;
}

// -------------------- argv parsing --------------------

function getFlagValue(args: string[], flag: string): string | null {
  const i = args.indexOf(flag);
  if (i < 0) return null;
  const v = args[i + 1];
  return v && !v.startsWith("--") ? v : null;
}

function positional(args: string[], index: number): string | null {
  const v = args[index];
  return v && !v.startsWith("--") ? v : null;
}

// -------------------- output helpers --------------------

const defaultIo: CliIo = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

function json(io: CliIo, obj: unknown): void {
  io.out(JSON.stringify(obj, null, 2) + "\n");
}

function fail(io: CliIo, message: string): number {
  io.err(`[equistat] ${message}\n`);
  return 1;
}

function failViolations(io: CliIo, violations: Violation[]): number {
  for (const v of violations) {
    io.err(`[equistat] ${v.field ? `${v.field}: ` : ""}${v.message}\n`);
  }
  return 1;
}

function historyLine(v: SnapshotView): string {
  const s = v.summary;
  return `#${v.sequence_index}  ${v.uploaded_at}  ${v.source_name}  ${s.total_count} records  ${s.outliers.length} outlier(s)  ${v.snapshot_id}`;
}

// -------------------- commands --------------------

async function cmdUpload(svc: AnalysisService, io: CliIo, file: string, user: string, asJson: boolean): Promise<number> {
  const abs = path.resolve(process.cwd(), file);
  let content: string;
  try {
    content = fs.readFileSync(abs, "utf8");
  } catch {
    return fail(io, `file not found: ${file}`);
  }

  const r = await svc.upload(user, { name: path.basename(abs), content });
  if (!r.ok) return failViolations(io, r.violations);

  if (asJson) {
    json(io, r.snapshot);
  } else {
    io.out(
      `Uploaded #${r.snapshot.sequence_index} (${r.snapshot.snapshot_id}): ` +
        `${r.snapshot.summary.total_count} records, ${r.snapshot.summary.outliers.length} outlier(s)` +
        (r.retention.deleted > 0 ? `, ${r.retention.deleted} old snapshot(s) removed` : "") +
        "\n"
    );
  }
  return 0;
}

async function cmdHistory(svc: AnalysisService, io: CliIo, user: string, asJson: boolean): Promise<number> {
  const views = await svc.history(user);
  if (asJson) {
    json(io, views);
    return 0;
  }
  if (views.length === 0) {
    io.out("No uploads yet.\n");
    return 0;
  }
  for (const v of views) io.out(historyLine(v) + "\n");
  return 0;
}

async function cmdView(svc: AnalysisService, io: CliIo, id: string, user: string, asReport: boolean): Promise<number> {
  let view: SnapshotView;
  try {
    view = await svc.view(id, user);
  } catch (e) {
    if (e instanceof SnapshotNotFoundError) return fail(io, e.message);
    throw e;
  }

  if (asReport) io.out(renderReportText(buildReport(view)));
  else json(io, view);
  return 0;
}

async function cmdThresholds(svc: AnalysisService, io: CliIo, sub: string | null, args: string[], user: string): Promise<number> {
  if (sub === "get") {
    json(io, await svc.thresholds.get(user));
    return 0;
  }

  if (sub === "set") {
    const input: Record<string, string> = {};
    const wp = getFlagValue(args, "--warning-percentile");
    const m = getFlagValue(args, "--iqr-multiplier");
    if (wp != null) input.warning_percentile = wp;
    if (m != null) input.outlier_iqr_multiplier = m;

    if (Object.keys(input).length === 0) {
      return fail(io, "Nothing to set: pass --warning-percentile and/or --iqr-multiplier");
    }

    const r = await svc.thresholds.save(user, input);
    if (!r.ok) return failViolations(io, r.violations);
    json(io, await svc.thresholds.get(user));
    return 0;
  }

  if (sub === "reset") {
    await svc.thresholds.reset(user);
    json(io, await svc.thresholds.get(user));
    return 0;
  }

  io.err(`Unknown thresholds command: ${sub ?? "(none)"}\n\n${usage()}`);
  return 1;
}

// -------------------- entry --------------------

export async function run(argv: string[] = process.argv, deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? defaultIo;
  const args = argv.slice(2);
  const cmd = args[0];

  if (!cmd || cmd === "--help" || cmd === "-h" || cmd === "help") {
    io.out(usage());
    return 0;
  }

  const user = getFlagValue(args, "--user");
  if (!user) {
    io.err(`Missing --user <id>\n\n${usage()}`);
    return 1;
  }

  const config = loadConfig(deps.env ?? process.env);
  const logger = deps.logger ?? createLogger(config);
  const db = deps.db ?? openDatabase(config.EQUISTAT_DB_PATH);

  try {
    const svc = AnalysisService.fromDatabase(db, {
      fallback: thresholdFallbackFromConfig(config),
      logger,
      now: deps.now,
    });

    if (cmd === "upload") {
      const file = positional(args, 1);
      if (!file) return fail(io, "Missing file.");
      return await cmdUpload(svc, io, file, user, args.includes("--json"));
    }

    if (cmd === "history") return await cmdHistory(svc, io, user, args.includes("--json"));

    if (cmd === "view" || cmd === "report") {
      const id = positional(args, 1);
      if (!id) return fail(io, "Missing snapshot id.");
      return await cmdView(svc, io, id, user, cmd === "report");
    }

    if (cmd === "thresholds") return await cmdThresholds(svc, io, positional(args, 1), args, user);

    io.err(`Unknown command: ${cmd}\n\n${usage()}`);
    return 1;
  } catch (e) {
    logger.error("command failed", { cmd, error: errorMessage(e) });
    return fail(io, errorMessage(e));
  } finally {
    if (!deps.db) db.close();
  }
}

// Entrypoint: run when this module is the invoked script
const invoked = process.argv[1] ? path.resolve(process.argv[1]) : "";
if (invoked === fileURLToPath(import.meta.url)) {
  dotenv.config();
  run(process.argv).then(
    (code) => process.exit(code),
    (e: unknown) => {
      console.error(`[equistat] ${errorMessage(e)}`);
      process.exit(1);
    }
  );
}
