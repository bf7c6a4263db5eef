import { parse } from "csv-parse/sync";
import { z } from "zod";

import { REQUIRED_COLUMNS, REQUIRED_COLUMN_NAMES } from "../../schema/src/constants.js";
import type { RequiredColumn } from "../../schema/src/constants.js";
import type { EquipmentRecord } from "../../schema/src/types.js";
import { EquipmentRecordSchema } from "../../schema/src/validate.js";
import { TableValidationError, errorMessage } from "../../runtime/src/errors.js";
import type { Violation } from "../../runtime/src/errors.js";

export type RawTable = {
  columns: string[];
  rows: string[][];
};

const REQUIRED: readonly RequiredColumn[] = REQUIRED_COLUMN_NAMES;

const FIELD_TO_COLUMN = new Map<string, RequiredColumn>(
  REQUIRED.map((c) => [REQUIRED_COLUMNS[c], c])
);

// Beyond this, remaining cell errors are summarised in one violation.
const MAX_CELL_VIOLATIONS = 10;

const CsvRows = z.array(z.array(z.string()));

export function readCsvTable(text: string): RawTable {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (e) {
    throw new TableValidationError([
      { code: "MALFORMED_CSV", message: `Could not read CSV: ${errorMessage(e)}` },
    ]);
  }

  const rows = CsvRows.parse(parsed);
  const [header, ...body] = rows;
  if (!header) {
    throw new TableValidationError([
      {
        code: "MISSING_COLUMNS",
        message: `Missing required columns: ${REQUIRED.join(", ")}.`,
        meta: { missing: REQUIRED },
      },
    ]);
  }

  return { columns: header, rows: body };
}

export function missingColumns(columns: readonly string[]): RequiredColumn[] {
  const present = new Set(columns);
  return REQUIRED.filter((c) => !present.has(c));
}

/**
 * Column check first (case- and spelling-exact, extra columns ignored),
 * then every row. All problems are collected before throwing.
 */
export function recordsFromTable(table: RawTable): EquipmentRecord[] {
  const missing = missingColumns(table.columns);
  if (missing.length > 0) {
    throw new TableValidationError([
      {
        code: "MISSING_COLUMNS",
        message: `Missing required columns: ${missing.join(", ")}. Expected: ${REQUIRED.join(", ")}.`,
        meta: { missing },
      },
    ]);
  }

  const index = new Map(REQUIRED.map((c) => [c, table.columns.indexOf(c)]));
  const cell = (row: string[], c: RequiredColumn): string => row[index.get(c) ?? -1] ?? "";

  const records: EquipmentRecord[] = [];
  const violations: Violation[] = [];
  let dropped = 0;

  table.rows.forEach((row, i) => {
    const candidate = {
      equipment_name: cell(row, "Equipment Name"),
      type: cell(row, "Type"),
      flowrate: cell(row, "Flowrate"),
      pressure: cell(row, "Pressure"),
      temperature: cell(row, "Temperature"),
    };

    const r = EquipmentRecordSchema.safeParse(candidate);
    if (r.success) {
      records.push(r.data);
      return;
    }

    const seen = new Set<string>();
    for (const issue of r.error.issues) {
      const column = FIELD_TO_COLUMN.get(String(issue.path[0]));
      if (!column || seen.has(column)) continue;
      seen.add(column);

      if (violations.length >= MAX_CELL_VIOLATIONS) {
        dropped++;
        continue;
      }

      const value = cell(row, column);
      violations.push({
        code: "INVALID_CELL",
        field: column,
        message: `Row ${i + 1}: ${column} must be a number (got "${value}").`,
        meta: { row: i + 1, column, value },
      });
    }
  });

  if (dropped > 0) {
    violations.push({
      code: "TOO_MANY_INVALID_CELLS",
      message: `${dropped} more invalid cell(s) not listed.`,
      meta: { dropped },
    });
  }

  if (violations.length > 0) throw new TableValidationError(violations);
  return records;
}

export function parseEquipmentCsv(text: string): EquipmentRecord[] {
  return recordsFromTable(readCsvTable(text));
}
