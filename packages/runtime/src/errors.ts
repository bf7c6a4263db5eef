/**
 * One reportable problem. `field` scopes it to an input column or form
 * field so several can be fixed in one round trip.
 */
export type Violation = {
  code: string;
  message: string;
  field?: string;
  meta?: Record<string, unknown> | null;
};

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; violations: Violation[] };

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Thrown by ingestion when the source table cannot become records.
 * The message joins every violation; `violations` keeps them apart.
 */
export class TableValidationError extends Error {
  readonly violations: Violation[];

  constructor(violations: Violation[]) {
    super(violations.map((v) => v.message).join(" "));
    this.name = "TableValidationError";
    this.violations = violations;
  }
}

export class SnapshotNotFoundError extends Error {
  readonly snapshot_id: string;

  constructor(snapshot_id: string) {
    super(`Snapshot not found: ${snapshot_id}`);
    this.name = "SnapshotNotFoundError";
    this.snapshot_id = snapshot_id;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
